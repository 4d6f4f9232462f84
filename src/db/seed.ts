import type { ShoeService } from '../services/shoe';
import type { Logger } from '../types/logger';

interface SeedShoe {
  name: string;
  brand: string;
  size: string;
  baseColor: string;
  price: number;
  stock: number;
}

// Starter catalog for fresh installs
export const SEED_SHOES: SeedShoe[] = [
  { name: 'Air Max 90', brand: 'Nike', size: 'US 9', baseColor: 'White', price: 120, stock: 25 },
  { name: 'Stan Smith', brand: 'Adidas', size: 'US 9', baseColor: 'White', price: 80, stock: 30 },
  { name: 'Chuck Taylor All Star', brand: 'Converse', size: 'US 10', baseColor: 'Black', price: 65, stock: 15 },
  { name: 'Old Skool', brand: 'Vans', size: 'US 8', baseColor: 'Black', price: 75, stock: 20 },
  { name: 'Air Jordan 1', brand: 'Nike', size: 'US 10', baseColor: 'Red', price: 170, stock: 12 },
];

/**
 * Inserts the starter catalog when there are no shoes yet.
 * Resolves to the number of shoes created.
 */
export async function seedCatalog(shoeService: ShoeService, logger: Logger = console) {
  const existing = await shoeService.getAllShoes();
  if (existing.length > 0) {
    logger.log(`ℹ️ Catalog already has ${existing.length} shoes, skipping seed`);
    return 0;
  }

  for (const seed of SEED_SHOES) {
    const shoe = await shoeService.createShoe(seed);
    const [baseVariation] = shoe.variations;

    await shoeService.updateVariation(baseVariation.id, {
      colorName: baseVariation.colorName,
      hexCode: baseVariation.hexCode,
      stockQuantity: seed.stock,
      isActive: true,
    });
  }

  logger.log(`🌱 Seeded ${SEED_SHOES.length} shoes`);
  return SEED_SHOES.length;
}
