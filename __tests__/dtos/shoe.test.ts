import { describe, test, expect } from 'vitest';
import {
  createShoeSchema,
  createVariationSchema,
  toShoeResponse,
  updateShoeSchema,
  updateVariationSchema
} from '../../src/dtos/shoe';
import { parseInput } from '../../src/dtos/validation';
import { ValidationError } from '../../src/errors';
import type { ShoeView } from '../../src/types/shoe';

describe('request schemas', () => {
  test('coerces form-encoded numbers', () => {
    const input = parseInput(createShoeSchema, {
      name: 'Air Zoom',
      brand: 'Nike',
      size: 'US 9',
      baseColor: 'Blue',
      price: '129.99',
    });

    expect(input.price).toBe(129.99);
  });

  test('reports missing required fields by name', () => {
    expect(() => parseInput(createShoeSchema, {})).toThrow(ValidationError);

    try {
      parseInput(createShoeSchema, {});
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      expect(error.details).toEqual({
        name: ['Shoe name is required'],
        brand: ['Brand is required'],
        size: ['Size is required'],
        price: ['Price is required'],
        baseColor: ['Base color is required'],
      });
    }
  });

  test('rejects prices with more than two decimals', () => {
    const result = createShoeSchema.safeParse({
      name: 'Air Zoom', brand: 'Nike', size: 'US 9', baseColor: 'Blue', price: 0.004,
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual(['Price can have at most 2 decimals']);
    }
  });

  test('only turns numeric text into numbers', () => {
    const base = { name: 'Air Zoom', brand: 'Nike', size: 'US 9', baseColor: 'Blue' };
    const priceErrors = (price: unknown) => {
      const result = createShoeSchema.safeParse({ ...base, price });
      return result.success ? [] : result.error.issues.map((issue) => issue.message);
    };

    expect(priceErrors(true)).toEqual(['Price must be a number']);
    expect(priceErrors('cheap')).toEqual(['Price must be a number']);
    expect(priceErrors('')).toEqual(['Price is required']);
    expect(priceErrors(' 89.5 ')).toEqual([]);
  });

  test('caps stock at the largest value the stock column holds', () => {
    const base = { colorName: 'Red', hexCode: '#FF0000' };

    expect(parseInput(createVariationSchema, { ...base, stockQuantity: 2147483647 }).stockQuantity).toBe(2147483647);
    const tooMany = createVariationSchema.safeParse({ ...base, stockQuantity: 3000000000 });
    expect(tooMany.success).toBe(false);
    if (!tooMany.success) {
      expect(tooMany.error.issues.map((issue) => issue.message)).toEqual(['Stock quantity cannot exceed 2147483647']);
    }
    expect(parseInput(createVariationSchema, { ...base, stockQuantity: '' }).stockQuantity).toBe(0);
  });

  test('reports a non-object body against the body', () => {
    try {
      parseInput(createShoeSchema, 'nope');
      expect.unreachable();
    } catch (error) {
      if (!(error instanceof ValidationError)) throw error;
      expect(Object.keys(error.details)).toEqual(['body']);
    }
  });

  test('enforces length limits', () => {
    const result = createShoeSchema.safeParse({
      name: 'n'.repeat(101),
      brand: 'Nike',
      size: 'US 9',
      baseColor: 'Blue',
      price: 10,
      description: 'd'.repeat(501),
    });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues.map((issue) => issue.message)).toEqual([
        'Shoe name cannot exceed 100 characters',
        'Description cannot exceed 500 characters',
      ]);
    }
  });

  test('update payloads may carry their id', () => {
    const input = parseInput(updateShoeSchema, {
      id: '3', name: 'Air Zoom', brand: 'Nike', size: 'US 9', price: 10,
    });

    expect(input.id).toBe(3);
  });

  test('variation updates read checkbox style booleans', () => {
    const base = { colorName: 'Red', hexCode: '#FF0000', stockQuantity: '4' };

    expect(parseInput(updateVariationSchema, { ...base, isActive: 'false' }).isActive).toBe(false);
    expect(parseInput(updateVariationSchema, { ...base, isActive: 'on' }).isActive).toBe(true);
    expect(parseInput(updateVariationSchema, base)).toEqual({
      colorName: 'Red', hexCode: '#FF0000', stockQuantity: 4, isActive: true,
    });
  });
});

describe('toShoeResponse', () => {
  test('serializes dates and keeps the computed colors', () => {
    const shoe: ShoeView = {
      id: 1,
      name: 'Air Zoom',
      brand: 'Nike',
      size: 'US 9',
      baseColor: 'Blue',
      currentColor: 'Blue',
      price: 129.99,
      description: null,
      imageUrl: null,
      isAvailable: true,
      createdAt: new Date('2025-01-02T03:04:05.000Z'),
      updatedAt: null,
      variations: [{
        id: 5,
        shoeId: 1,
        colorName: 'Blue',
        hexCode: '#0000FF',
        stockQuantity: 10,
        isActive: true,
        createdAt: new Date('2025-01-02T03:04:05.000Z'),
      }],
      availableColors: ['Blue'],
    };

    expect(toShoeResponse(shoe)).toEqual({
      id: 1,
      name: 'Air Zoom',
      brand: 'Nike',
      size: 'US 9',
      baseColor: 'Blue',
      currentColor: 'Blue',
      price: 129.99,
      description: null,
      imageUrl: null,
      isAvailable: true,
      createdAt: '2025-01-02T03:04:05.000Z',
      updatedAt: null,
      variations: [{
        id: 5,
        shoeId: 1,
        colorName: 'Blue',
        hexCode: '#0000FF',
        stockQuantity: 10,
        isActive: true,
        createdAt: '2025-01-02T03:04:05.000Z',
      }],
      availableColors: ['Blue'],
    });
  });
});
