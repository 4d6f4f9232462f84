import { BusinessRuleError } from '../errors';
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

export const duplicateShoeError = (name: string, brand: string) =>
  new BusinessRuleError(`A shoe named "${name}" already exists for brand ${brand}`);

export const duplicateColorError = (colorName: string) =>
  new BusinessRuleError(`This shoe already has a "${colorName}" variation`);

/**
 * Storage contract for shoes and their color variations.
 *
 * Listing and search operations only return shoes that are still available;
 * lookups by id return the row whatever its availability.
 */
export interface ShoeRepository {
  listShoes(): Promise<ShoeWithVariations[]>;
  getShoeById(id: number): Promise<ShoeWithVariations | null>;
  findByBrand(brand: string): Promise<ShoeWithVariations[]>;
  /** Case-insensitive substring match over name, brand and description. */
  searchShoes(term: string): Promise<ShoeWithVariations[]>;
  /** Case-insensitive exact match among available shoes. */
  findShoeByNameAndBrand(name: string, brand: string): Promise<Shoe | null>;

  /**
   * Writes the shoe and its first color variation as one unit: either both
   * are stored or neither is. Rejects with a `BusinessRuleError` when another
   * available shoe of the brand already has the name.
   */
  createShoeWithBaseVariation(shoe: NewShoe, baseVariation: NewBaseVariation): Promise<ShoeWithVariations>;
  /**
   * Stamps `updatedAt`. Resolves to null when no row has that id.
   * Subject to the same name rule as creation.
   */
  updateShoe(id: number, changes: ShoeChanges): Promise<Shoe | null>;
  /** Flags the shoe unavailable. Resolves to whether a row was affected. */
  softDeleteShoe(id: number): Promise<boolean>;

  listVariations(shoeId: number): Promise<ShoeColorVariation[]>;
  listActiveVariations(shoeId: number): Promise<ShoeColorVariation[]>;
  getVariationById(id: number): Promise<ShoeColorVariation | null>;
  /** Color names are unique per shoe; a clash rejects with a `BusinessRuleError`. */
  createVariation(variation: NewColorVariation): Promise<ShoeColorVariation>;
  updateVariation(id: number, changes: ColorVariationChanges): Promise<ShoeColorVariation | null>;
  deleteVariation(id: number): Promise<boolean>;

  /**
   * Points the shoe's current color at one of its active variations, matched
   * case-insensitively and stored with the variation's own casing.
   * Resolves to false when no such variation exists. Stock is left alone.
   */
  changeCurrentColor(shoeId: number, colorName: string): Promise<boolean>;
  /** Names of variations that are active and have stock left. */
  listAvailableColorNames(shoeId: number): Promise<string[]>;
}
