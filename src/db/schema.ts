// src/db/schema.ts
import { relations, sql } from 'drizzle-orm';
import {
  pgTable,
  serial,
  varchar,
  integer,
  decimal,
  boolean,
  timestamp,
  uniqueIndex
} from 'drizzle-orm/pg-core';

export const SHOE_NAME_INDEX = 'shoes_brand_name_available_idx';
export const SHOE_COLOR_INDEX = 'shoe_color_variations_shoe_color_idx';

// Shoes - the catalog; rows are never removed, only flagged unavailable
export const shoes = pgTable('shoes', {
  id: serial('id').primaryKey(),
  name: varchar('name', { length: 100 }).notNull(),
  brand: varchar('brand', { length: 100 }).notNull(),
  size: varchar('size', { length: 50 }).notNull(),
  baseColor: varchar('base_color', { length: 30 }).notNull(),
  currentColor: varchar('current_color', { length: 30 }),
  price: decimal('price', { precision: 10, scale: 2 }).notNull(),
  description: varchar('description', { length: 500 }),
  imageUrl: varchar('image_url', { length: 200 }),
  isAvailable: boolean('is_available').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
  updatedAt: timestamp('updated_at'),
}, (table) => {
  return {
    // a name is unique within its brand among available shoes only
    brandNameIdx: uniqueIndex(SHOE_NAME_INDEX)
      .on(sql`lower(${table.brand})`, sql`lower(${table.name})`)
      .where(sql`${table.isAvailable} = true`)
  }
});

// Color variations, stock is tracked per color
export const shoeColorVariations = pgTable('shoe_color_variations', {
  id: serial('id').primaryKey(),
  shoeId: integer('shoe_id').notNull().references(() => shoes.id, { onDelete: 'cascade' }),
  colorName: varchar('color_name', { length: 30 }).notNull(),
  hexCode: varchar('hex_code', { length: 7 }).notNull(), // #RRGGBB
  stockQuantity: integer('stock_quantity').notNull().default(0),
  isActive: boolean('is_active').notNull().default(true),
  createdAt: timestamp('created_at').notNull().defaultNow(),
}, (table) => {
  return {
    shoeColorIdx: uniqueIndex(SHOE_COLOR_INDEX).on(table.shoeId, table.colorName)
  }
});

export const shoesRelations = relations(shoes, ({ many }) => ({
  variations: many(shoeColorVariations),
}));

export const shoeColorVariationsRelations = relations(shoeColorVariations, ({ one }) => ({
  shoe: one(shoes, {
    fields: [shoeColorVariations.shoeId],
    references: [shoes.id],
  }),
}));

export type ShoeRow = typeof shoes.$inferSelect;
export type ShoeColorVariationRow = typeof shoeColorVariations.$inferSelect;
