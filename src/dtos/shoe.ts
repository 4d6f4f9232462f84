import { z } from 'zod';
import type { ShoeColorVariation, ShoeView } from '../types/shoe';

// HTML forms post empty inputs as ''
const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

// Form posts send numbers as text; anything that is not a number is left for z.number to reject
const toNumber = (value: unknown) => {
  if (typeof value !== 'string') return value;
  if (value.trim() === '') return undefined;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? value : parsed;
};

const toBoolean = (value: unknown) => {
  if (value === 'true' || value === 'on') return true;
  if (value === 'false') return false;
  return value;
};

const requiredText = (label: string, max: number) =>
  z.string({ required_error: `${label} is required`, invalid_type_error: `${label} must be text` })
    .trim()
    .min(1, `${label} is required`)
    .max(max, `${label} cannot exceed ${max} characters`);

export const HEX_CODE_PATTERN = /^#[0-9A-Fa-f]{6}$/;

// stock_quantity is a PostgreSQL integer
export const MAX_STOCK_QUANTITY = 2_147_483_647;

// === Request DTOs ===

export const shoeFieldsSchema = z.object({
  name: requiredText('Shoe name', 100),
  brand: requiredText('Brand', 100),
  size: requiredText('Size', 50),
  price: z.preprocess(
    toNumber,
    z.number({ required_error: 'Price is required', invalid_type_error: 'Price must be a number' })
      .positive('Price must be greater than 0')
      .max(9999.99, 'Price cannot exceed 9999.99')
      .multipleOf(0.01, 'Price can have at most 2 decimals')
  ),
  description: z.preprocess(
    emptyToUndefined,
    z.string().trim().max(500, 'Description cannot exceed 500 characters').optional()
  ),
  imageUrl: z.preprocess(
    emptyToUndefined,
    z.string()
      .trim()
      .url('Image URL must be a valid URL')
      .max(200, 'Image URL cannot exceed 200 characters')
      .optional()
  ),
});

export const createShoeSchema = shoeFieldsSchema.extend({
  baseColor: requiredText('Base color', 30),
});

export const updateShoeSchema = shoeFieldsSchema.extend({
  id: z.coerce.number().int().positive().optional(),
});

export const changeColorSchema = z.object({
  colorName: requiredText('Color name', 30),
});

export const createVariationSchema = z.object({
  colorName: requiredText('Color name', 30),
  hexCode: z.string({ required_error: 'Hex code is required' })
    .trim()
    .regex(HEX_CODE_PATTERN, 'Hex code must look like #RRGGBB'),
  stockQuantity: z.preprocess(
    toNumber,
    z.number({ invalid_type_error: 'Stock quantity must be a number' })
      .int('Stock quantity must be a whole number')
      .min(0, 'Stock quantity cannot be negative')
      .max(MAX_STOCK_QUANTITY, `Stock quantity cannot exceed ${MAX_STOCK_QUANTITY}`)
      .default(0)
  ),
});

export const updateVariationSchema = createVariationSchema.extend({
  isActive: z.preprocess(toBoolean, z.boolean({ invalid_type_error: 'isActive must be true or false' })).default(true),
});

export type CreateShoeInput = z.input<typeof createShoeSchema>;
export type UpdateShoeInput = z.input<typeof shoeFieldsSchema>;
export type CreateVariationInput = z.input<typeof createVariationSchema>;
export type UpdateVariationInput = z.input<typeof updateVariationSchema>;

// === Response DTOs ===

export interface ColorVariationResponse {
  id: number;
  shoeId: number;
  colorName: string;
  hexCode: string;
  stockQuantity: number;
  isActive: boolean;
  createdAt: string;
}

export interface ShoeResponse {
  id: number;
  name: string;
  brand: string;
  size: string;
  baseColor: string;
  currentColor: string | null;
  price: number;
  description: string | null;
  imageUrl: string | null;
  isAvailable: boolean;
  createdAt: string;
  updatedAt: string | null;
  variations: ColorVariationResponse[];
  availableColors: string[];
}

export const toColorVariationResponse = (variation: ShoeColorVariation): ColorVariationResponse => ({
  id: variation.id,
  shoeId: variation.shoeId,
  colorName: variation.colorName,
  hexCode: variation.hexCode,
  stockQuantity: variation.stockQuantity,
  isActive: variation.isActive,
  createdAt: variation.createdAt.toISOString(),
});

export const toShoeResponse = (shoe: ShoeView): ShoeResponse => ({
  id: shoe.id,
  name: shoe.name,
  brand: shoe.brand,
  size: shoe.size,
  baseColor: shoe.baseColor,
  currentColor: shoe.currentColor,
  price: shoe.price,
  description: shoe.description,
  imageUrl: shoe.imageUrl,
  isAvailable: shoe.isAvailable,
  createdAt: shoe.createdAt.toISOString(),
  updatedAt: shoe.updatedAt ? shoe.updatedAt.toISOString() : null,
  variations: shoe.variations.map(toColorVariationResponse),
  availableColors: shoe.availableColors,
});
