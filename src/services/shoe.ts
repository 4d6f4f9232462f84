import {
  changeColorSchema,
  createShoeSchema,
  createVariationSchema,
  shoeFieldsSchema,
  updateVariationSchema,
  type CreateShoeInput,
  type CreateVariationInput,
  type UpdateShoeInput,
  type UpdateVariationInput
} from '../dtos/shoe';
import { parseInput } from '../dtos/validation';
import { BusinessRuleError, NotFoundError } from '../errors';
import {
  duplicateColorError,
  duplicateShoeError,
  type ShoeRepository
} from '../repositories/shoeRepository';
import type { Logger } from '../types/logger';
import type { ShoeColorVariation, ShoeView, ShoeWithVariations } from '../types/shoe';
import { deriveHexCode } from './colorCatalog';

/** Stock given to the base-color variation that every new shoe starts with. */
export const DEFAULT_VARIATION_STOCK = 10;

export interface ShoeFilters {
  brand?: string;
  search?: string;
}

const sameText = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export class ShoeService {
  constructor(
    private readonly repository: ShoeRepository,
    private readonly logger: Logger = console
  ) {}

  async getAllShoes() {
    return this.enrichAll(await this.repository.listShoes());
  }

  async getShoesByBrand(brand: string) {
    return this.enrichAll(await this.repository.findByBrand(brand));
  }

  async searchShoes(term: string) {
    return this.enrichAll(await this.repository.searchShoes(term));
  }

  /** A search term wins over a brand filter; blank filters are ignored. */
  async listShoes(filters: ShoeFilters = {}) {
    const search = filters.search?.trim();
    const brand = filters.brand?.trim();

    if (search) {
      return this.searchShoes(search);
    }
    if (brand) {
      return this.getShoesByBrand(brand);
    }
    return this.getAllShoes();
  }

  async getShoeById(id: number): Promise<ShoeView> {
    return this.enrich(await this.requireShoe(id));
  }

  async createShoe(input: CreateShoeInput): Promise<ShoeView> {
    const command = parseInput(createShoeSchema, input);
    await this.assertNameAvailable(command.name, command.brand);

    this.logger.log(`🆕 Creating shoe ${command.brand} ${command.name} (${command.baseColor})`);

    const shoe = await this.repository.createShoeWithBaseVariation(
      {
        name: command.name,
        brand: command.brand,
        size: command.size,
        baseColor: command.baseColor,
        currentColor: command.baseColor,
        price: command.price,
        description: command.description ?? null,
        imageUrl: command.imageUrl ?? null,
      },
      {
        colorName: command.baseColor,
        hexCode: deriveHexCode(command.baseColor),
        stockQuantity: DEFAULT_VARIATION_STOCK,
        isActive: true,
      }
    );

    this.logger.log(`✅ Created shoe ${shoe.id} with base color ${shoe.baseColor}`);
    return this.enrich(shoe);
  }

  async updateShoe(id: number, input: UpdateShoeInput): Promise<ShoeView> {
    const command = parseInput(shoeFieldsSchema, input);
    await this.requireShoe(id);
    await this.assertNameAvailable(command.name, command.brand, id);

    const updated = await this.repository.updateShoe(id, {
      name: command.name,
      brand: command.brand,
      size: command.size,
      price: command.price,
      description: command.description ?? null,
      imageUrl: command.imageUrl ?? null,
    });

    if (!updated) {
      throw new NotFoundError(`Shoe ${id} not found`);
    }

    this.logger.log(`🔄 Updated shoe ${id}`);
    return this.getShoeById(id);
  }

  async deleteShoe(id: number) {
    const deleted = await this.repository.softDeleteShoe(id);
    if (deleted) {
      this.logger.log(`🗑️ Shoe ${id} marked unavailable`);
    }
    return deleted;
  }

  /**
   * Switches the shoe to another of its colors. Only colors that are active and
   * in stock qualify; the stored casing of the variation is returned.
   */
  async changeColor(shoeId: number, colorName: string) {
    const { colorName: requested } = parseInput(changeColorSchema, { colorName });
    await this.requireShoe(shoeId);

    const available = await this.repository.listAvailableColorNames(shoeId);
    const match = available.find((name) => sameText(name, requested));

    if (!match) {
      throw new BusinessRuleError(`Color "${requested}" is not available for this shoe`);
    }

    const changed = await this.repository.changeCurrentColor(shoeId, match);
    if (!changed) {
      throw new BusinessRuleError(`Color "${requested}" is not available for this shoe`);
    }

    this.logger.log(`🎨 Shoe ${shoeId} is now ${match}`);
    return match;
  }

  async getAvailableColors(shoeId: number) {
    await this.requireShoe(shoeId);
    return this.repository.listAvailableColorNames(shoeId);
  }

  async listVariations(shoeId: number) {
    await this.requireShoe(shoeId);
    return this.repository.listActiveVariations(shoeId);
  }

  async getVariationById(id: number) {
    return this.requireVariation(id);
  }

  async createVariation(shoeId: number, input: CreateVariationInput) {
    const command = parseInput(createVariationSchema, input);
    const shoe = await this.requireShoe(shoeId);
    this.assertColorUnique(shoe, command.colorName);

    const variation = await this.repository.createVariation({
      shoeId,
      colorName: command.colorName,
      hexCode: command.hexCode.toUpperCase(),
      stockQuantity: command.stockQuantity,
      isActive: true,
    });

    this.logger.log(`➕ Added color ${variation.colorName} to shoe ${shoeId}`);
    return variation;
  }

  async updateVariation(id: number, input: UpdateVariationInput) {
    const command = parseInput(updateVariationSchema, input);
    const variation = await this.requireVariation(id);
    const shoe = await this.requireShoe(variation.shoeId);
    this.assertColorUnique(shoe, command.colorName, id);

    if (this.isCurrentColor(shoe, variation)) {
      if (!command.isActive) {
        throw new BusinessRuleError(
          `Cannot deactivate "${variation.colorName}" while it is the shoe's current color`
        );
      }
      if (command.colorName !== variation.colorName) {
        throw new BusinessRuleError(
          `Cannot rename "${variation.colorName}" while it is the shoe's current color`
        );
      }
    }

    const updated = await this.repository.updateVariation(id, {
      colorName: command.colorName,
      hexCode: command.hexCode.toUpperCase(),
      stockQuantity: command.stockQuantity,
      isActive: command.isActive,
    });

    if (!updated) {
      throw new NotFoundError(`Color variation ${id} not found`);
    }
    return updated;
  }

  async deleteVariation(id: number) {
    const variation = await this.requireVariation(id);
    const shoe = await this.requireShoe(variation.shoeId);

    if (this.isCurrentColor(shoe, variation)) {
      throw new BusinessRuleError(
        `Cannot remove "${variation.colorName}" while it is the shoe's current color`
      );
    }

    const deleted = await this.repository.deleteVariation(id);
    if (!deleted) {
      throw new NotFoundError(`Color variation ${id} not found`);
    }
    this.logger.log(`➖ Removed color ${variation.colorName} from shoe ${shoe.id}`);
  }

  private async requireShoe(id: number) {
    const shoe = await this.repository.getShoeById(id);
    if (!shoe) {
      throw new NotFoundError(`Shoe ${id} not found`);
    }
    return shoe;
  }

  private async requireVariation(id: number) {
    const variation = await this.repository.getVariationById(id);
    if (!variation) {
      throw new NotFoundError(`Color variation ${id} not found`);
    }
    return variation;
  }

  private async assertNameAvailable(name: string, brand: string, exceptId?: number) {
    const existing = await this.repository.findShoeByNameAndBrand(name, brand);
    if (existing && existing.id !== exceptId) {
      throw duplicateShoeError(name, brand);
    }
  }

  private assertColorUnique(shoe: ShoeWithVariations, colorName: string, exceptId?: number) {
    const clash = shoe.variations.find(
      (variation) => variation.id !== exceptId && sameText(variation.colorName, colorName)
    );
    if (clash) {
      throw duplicateColorError(clash.colorName);
    }
  }

  private isCurrentColor(shoe: ShoeWithVariations, variation: ShoeColorVariation) {
    return shoe.currentColor !== null && sameText(shoe.currentColor, variation.colorName);
  }

  private async enrich(shoe: ShoeWithVariations): Promise<ShoeView> {
    const availableColors = await this.repository.listAvailableColorNames(shoe.id);
    return { ...shoe, availableColors };
  }

  private async enrichAll(shoes: ShoeWithVariations[]) {
    return Promise.all(shoes.map((shoe) => this.enrich(shoe)));
  }
}
