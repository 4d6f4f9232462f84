import { and, asc, eq, gt, ilike, or, sql, type SQL } from 'drizzle-orm';
import type { AnyPgColumn } from 'drizzle-orm/pg-core';
import type { Database } from '../db/connection';
import {
  SHOE_COLOR_INDEX,
  SHOE_NAME_INDEX,
  shoes,
  shoeColorVariations,
  type ShoeRow,
  type ShoeColorVariationRow
} from '../db/schema';
import { duplicateColorError, duplicateShoeError, type ShoeRepository } from './shoeRepository';
import type {
  ColorVariationChanges,
  NewBaseVariation,
  NewColorVariation,
  NewShoe,
  Shoe,
  ShoeChanges,
  ShoeColorVariation,
  ShoeWithVariations
} from '../types/shoe';

// decimal columns come back from pg as strings
export const toShoe = (row: ShoeRow): Shoe => ({ ...row, price: Number(row.price) });

export const toPriceColumn = (price: number) => price.toFixed(2);

const toVariation = (row: ShoeColorVariationRow): ShoeColorVariation => ({ ...row });

const toShoeWithVariations = (
  row: ShoeRow & { variations: ShoeColorVariationRow[] }
): ShoeWithVariations => ({
  ...toShoe(row),
  variations: row.variations.map(toVariation),
});

/** `%term%` with the LIKE wildcards in the term escaped. */
export const likePattern = (term: string) => `%${term.replace(/[\\%_]/g, (c) => `\\${c}`)}%`;

export const equalsIgnoringCase = (column: AnyPgColumn, value: string) =>
  sql`lower(${column}) = lower(${value})`;

/**
 * Name of the unique index a PostgreSQL error (code 23505) reports, or null
 * for any other error. Looks through `cause` for errors wrapped by a driver.
 */
export function uniqueViolationConstraint(error: unknown): string | null {
  if (typeof error !== 'object' || error === null) {
    return null;
  }
  if ('code' in error && error.code === '23505') {
    return 'constraint' in error && typeof error.constraint === 'string' ? error.constraint : '';
  }
  return 'cause' in error ? uniqueViolationConstraint(error.cause) : null;
}

interface DuplicateContext {
  shoe?: { name: string; brand: string };
  colorName?: string;
}

/** Turns a unique index violation into the business rule it enforces; other errors pass through. */
export function translateUniqueViolation(error: unknown, context: DuplicateContext): unknown {
  switch (uniqueViolationConstraint(error)) {
    case SHOE_NAME_INDEX:
      return context.shoe ? duplicateShoeError(context.shoe.name, context.shoe.brand) : error;
    case SHOE_COLOR_INDEX:
      return context.colorName !== undefined ? duplicateColorError(context.colorName) : error;
    default:
      return error;
  }
}

export class DrizzleShoeRepository implements ShoeRepository {
  constructor(private readonly db: Database) {}

  async listShoes() {
    return this.findShoes(eq(shoes.isAvailable, true));
  }

  async getShoeById(id: number) {
    const row = await this.db.query.shoes.findFirst({
      where: eq(shoes.id, id),
      with: { variations: { orderBy: [asc(shoeColorVariations.id)] } },
    });
    return row ? toShoeWithVariations(row) : null;
  }

  async findByBrand(brand: string) {
    return this.findShoes(and(
      eq(shoes.isAvailable, true),
      ilike(shoes.brand, likePattern(brand))
    ));
  }

  async searchShoes(term: string) {
    const pattern = likePattern(term);
    return this.findShoes(and(
      eq(shoes.isAvailable, true),
      or(
        ilike(shoes.name, pattern),
        ilike(shoes.brand, pattern),
        ilike(shoes.description, pattern)
      )
    ));
  }

  async findShoeByNameAndBrand(name: string, brand: string) {
    const [row] = await this.db.select()
      .from(shoes)
      .where(and(
        eq(shoes.isAvailable, true),
        equalsIgnoringCase(shoes.name, name),
        equalsIgnoringCase(shoes.brand, brand)
      ))
      .limit(1);
    return row ? toShoe(row) : null;
  }

  async createShoeWithBaseVariation(newShoe: NewShoe, baseVariation: NewBaseVariation) {
    try {
      return await this.db.transaction(async (tx): Promise<ShoeWithVariations> => {
        const [row] = await tx.insert(shoes)
          .values({ ...newShoe, price: toPriceColumn(newShoe.price) })
          .returning();
        const [variation] = await tx.insert(shoeColorVariations)
          .values({ ...baseVariation, shoeId: row.id })
          .returning();
        return { ...toShoe(row), variations: [toVariation(variation)] };
      });
    } catch (error) {
      throw translateUniqueViolation(error, { shoe: newShoe, colorName: baseVariation.colorName });
    }
  }

  async updateShoe(id: number, changes: ShoeChanges) {
    try {
      const [row] = await this.db.update(shoes)
        .set({
          ...changes,
          price: toPriceColumn(changes.price),
          updatedAt: new Date(),
        })
        .where(eq(shoes.id, id))
        .returning();
      return row ? toShoe(row) : null;
    } catch (error) {
      throw translateUniqueViolation(error, { shoe: changes });
    }
  }

  async softDeleteShoe(id: number) {
    const affected = await this.db.update(shoes)
      .set({ isAvailable: false, updatedAt: new Date() })
      .where(eq(shoes.id, id))
      .returning({ id: shoes.id });
    return affected.length > 0;
  }

  async listVariations(shoeId: number) {
    const rows = await this.db.select()
      .from(shoeColorVariations)
      .where(eq(shoeColorVariations.shoeId, shoeId))
      .orderBy(asc(shoeColorVariations.id));
    return rows.map(toVariation);
  }

  async listActiveVariations(shoeId: number) {
    const rows = await this.db.select()
      .from(shoeColorVariations)
      .where(and(
        eq(shoeColorVariations.shoeId, shoeId),
        eq(shoeColorVariations.isActive, true)
      ))
      .orderBy(asc(shoeColorVariations.id));
    return rows.map(toVariation);
  }

  async getVariationById(id: number) {
    const [row] = await this.db.select()
      .from(shoeColorVariations)
      .where(eq(shoeColorVariations.id, id));
    return row ? toVariation(row) : null;
  }

  async createVariation(newVariation: NewColorVariation) {
    try {
      const [row] = await this.db.insert(shoeColorVariations)
        .values(newVariation)
        .returning();
      return toVariation(row);
    } catch (error) {
      throw translateUniqueViolation(error, { colorName: newVariation.colorName });
    }
  }

  async updateVariation(id: number, changes: ColorVariationChanges) {
    try {
      const [row] = await this.db.update(shoeColorVariations)
        .set(changes)
        .where(eq(shoeColorVariations.id, id))
        .returning();
      return row ? toVariation(row) : null;
    } catch (error) {
      throw translateUniqueViolation(error, { colorName: changes.colorName });
    }
  }

  async deleteVariation(id: number) {
    const deleted = await this.db.delete(shoeColorVariations)
      .where(eq(shoeColorVariations.id, id))
      .returning({ id: shoeColorVariations.id });
    return deleted.length > 0;
  }

  async changeCurrentColor(shoeId: number, colorName: string) {
    const [variation] = await this.db.select({ colorName: shoeColorVariations.colorName })
      .from(shoeColorVariations)
      .where(and(
        eq(shoeColorVariations.shoeId, shoeId),
        eq(shoeColorVariations.isActive, true),
        equalsIgnoringCase(shoeColorVariations.colorName, colorName)
      ))
      .limit(1);

    if (!variation) {
      return false;
    }

    const updated = await this.db.update(shoes)
      .set({ currentColor: variation.colorName, updatedAt: new Date() })
      .where(eq(shoes.id, shoeId))
      .returning({ id: shoes.id });
    return updated.length > 0;
  }

  async listAvailableColorNames(shoeId: number) {
    const rows = await this.db.select({ colorName: shoeColorVariations.colorName })
      .from(shoeColorVariations)
      .where(and(
        eq(shoeColorVariations.shoeId, shoeId),
        eq(shoeColorVariations.isActive, true),
        gt(shoeColorVariations.stockQuantity, 0)
      ))
      .orderBy(asc(shoeColorVariations.id));
    return rows.map((row) => row.colorName);
  }

  private async findShoes(where: SQL | undefined) {
    const rows = await this.db.query.shoes.findMany({
      where,
      with: { variations: { orderBy: [asc(shoeColorVariations.id)] } },
      orderBy: [asc(shoes.name), asc(shoes.id)],
    });
    return rows.map(toShoeWithVariations);
  }
}
