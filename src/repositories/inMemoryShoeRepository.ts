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

const contains = (value: string | null, term: string) =>
  value !== null && value.toLowerCase().includes(term.toLowerCase());

const sameText = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

/**
 * Map-backed repository used by the `memory` storage backend and the test suite.
 * Mirrors the PostgreSQL behaviour that callers can observe: ordering by name,
 * both unique indexes, the foreign key from variations to shoes and the
 * all-or-nothing creation of a shoe with its base variation.
 */
export class InMemoryShoeRepository implements ShoeRepository {
  private shoes = new Map<number, Shoe>();
  private variations = new Map<number, ShoeColorVariation>();
  private nextShoeId = 1;
  private nextVariationId = 1;

  async listShoes() {
    return this.collect((shoe) => shoe.isAvailable);
  }

  async getShoeById(id: number) {
    const shoe = this.shoes.get(id);
    return shoe ? this.withVariations(shoe) : null;
  }

  async findByBrand(brand: string) {
    return this.collect((shoe) => shoe.isAvailable && contains(shoe.brand, brand));
  }

  async searchShoes(term: string) {
    return this.collect((shoe) =>
      shoe.isAvailable &&
      (contains(shoe.name, term) || contains(shoe.brand, term) || contains(shoe.description, term))
    );
  }

  async findShoeByNameAndBrand(name: string, brand: string) {
    for (const shoe of this.shoes.values()) {
      if (shoe.isAvailable && sameText(shoe.name, name) && sameText(shoe.brand, brand)) {
        return structuredClone(shoe);
      }
    }
    return null;
  }

  async createShoeWithBaseVariation(newShoe: NewShoe, baseVariation: NewBaseVariation) {
    const now = new Date();
    const shoe: Shoe = {
      id: this.nextShoeId,
      ...newShoe,
      isAvailable: true,
      createdAt: now,
      updatedAt: null,
    };
    const variation: ShoeColorVariation = {
      id: this.nextVariationId,
      shoeId: shoe.id,
      ...baseVariation,
      createdAt: now,
    };

    // nothing is stored until both records pass their checks
    this.assertNameAvailable(shoe);
    this.checkVariation(variation, [shoe.id]);

    this.nextShoeId++;
    this.nextVariationId++;
    this.shoes.set(shoe.id, shoe);
    this.variations.set(variation.id, variation);
    return this.withVariations(shoe);
  }

  async updateShoe(id: number, changes: ShoeChanges) {
    const shoe = this.shoes.get(id);
    if (!shoe) {
      return null;
    }
    this.assertNameAvailable({ ...shoe, ...changes });
    Object.assign(shoe, changes, { updatedAt: new Date() });
    return structuredClone(shoe);
  }

  async softDeleteShoe(id: number) {
    const shoe = this.shoes.get(id);
    if (!shoe) {
      return false;
    }
    shoe.isAvailable = false;
    shoe.updatedAt = new Date();
    return true;
  }

  async listVariations(shoeId: number) {
    return this.variationsOf(shoeId);
  }

  async listActiveVariations(shoeId: number) {
    return this.variationsOf(shoeId).filter((variation) => variation.isActive);
  }

  async getVariationById(id: number) {
    const variation = this.variations.get(id);
    return variation ? structuredClone(variation) : null;
  }

  async createVariation(newVariation: NewColorVariation) {
    const variation: ShoeColorVariation = {
      id: this.nextVariationId,
      ...newVariation,
      createdAt: new Date(),
    };
    this.checkVariation(variation);

    this.nextVariationId++;
    this.variations.set(variation.id, variation);
    return structuredClone(variation);
  }

  async updateVariation(id: number, changes: ColorVariationChanges) {
    const variation = this.variations.get(id);
    if (!variation) {
      return null;
    }
    this.checkVariation({ ...variation, ...changes });
    Object.assign(variation, changes);
    return structuredClone(variation);
  }

  async deleteVariation(id: number) {
    return this.variations.delete(id);
  }

  async changeCurrentColor(shoeId: number, colorName: string) {
    const shoe = this.shoes.get(shoeId);
    const match = this.variationsOf(shoeId).find(
      (variation) => variation.isActive && sameText(variation.colorName, colorName)
    );
    if (!shoe || !match) {
      return false;
    }
    shoe.currentColor = match.colorName;
    shoe.updatedAt = new Date();
    return true;
  }

  async listAvailableColorNames(shoeId: number) {
    return this.variationsOf(shoeId)
      .filter((variation) => variation.isActive && variation.stockQuantity > 0)
      .map((variation) => variation.colorName);
  }

  private collect(predicate: (shoe: Shoe) => boolean): ShoeWithVariations[] {
    return [...this.shoes.values()]
      .filter(predicate)
      .sort((a, b) => a.name.localeCompare(b.name) || a.id - b.id)
      .map((shoe) => this.withVariations(shoe));
  }

  private withVariations(shoe: Shoe): ShoeWithVariations {
    return { ...structuredClone(shoe), variations: this.variationsOf(shoe.id) };
  }

  private variationsOf(shoeId: number): ShoeColorVariation[] {
    return [...this.variations.values()]
      .filter((variation) => variation.shoeId === shoeId)
      .sort((a, b) => a.id - b.id)
      .map((variation) => structuredClone(variation));
  }

  // Same rule as the partial unique index: lower(brand), lower(name) among available shoes
  private assertNameAvailable(candidate: Shoe) {
    if (!candidate.isAvailable) {
      return;
    }
    for (const shoe of this.shoes.values()) {
      if (
        shoe.id !== candidate.id &&
        shoe.isAvailable &&
        sameText(shoe.name, candidate.name) &&
        sameText(shoe.brand, candidate.brand)
      ) {
        throw duplicateShoeError(candidate.name, candidate.brand);
      }
    }
  }

  /**
   * Foreign key and (shoe, color) unique index checks for a variation about to
   * be written. `pendingShoeIds` are shoes being inserted in the same step.
   */
  protected checkVariation(candidate: ShoeColorVariation, pendingShoeIds: number[] = []) {
    if (!this.shoes.has(candidate.shoeId) && !pendingShoeIds.includes(candidate.shoeId)) {
      throw new Error(`insert on shoe_color_variations violates foreign key: shoe ${candidate.shoeId} does not exist`);
    }
    // exact, case-sensitive, like the index
    for (const variation of this.variations.values()) {
      if (
        variation.id !== candidate.id &&
        variation.shoeId === candidate.shoeId &&
        variation.colorName === candidate.colorName
      ) {
        throw duplicateColorError(candidate.colorName);
      }
    }
  }
}
