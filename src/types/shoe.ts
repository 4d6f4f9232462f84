export interface Shoe {
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
  createdAt: Date;
  updatedAt: Date | null;
}

export interface ShoeColorVariation {
  id: number;
  shoeId: number;
  colorName: string;
  hexCode: string;
  stockQuantity: number;
  isActive: boolean;
  createdAt: Date;
}

export interface ShoeWithVariations extends Shoe {
  variations: ShoeColorVariation[];
}

// What callers of the service get back: the stored shoe plus the colors it can switch to right now
export interface ShoeView extends ShoeWithVariations {
  availableColors: string[];
}

export interface NewShoe {
  name: string;
  brand: string;
  size: string;
  baseColor: string;
  currentColor: string;
  price: number;
  description: string | null;
  imageUrl: string | null;
}

export type ShoeChanges = Pick<Shoe, 'name' | 'brand' | 'size' | 'price' | 'description' | 'imageUrl'>;

export interface NewColorVariation {
  shoeId: number;
  colorName: string;
  hexCode: string;
  stockQuantity: number;
  isActive: boolean;
}

// The variation a shoe is created with; its shoe id is only known once the shoe row exists
export type NewBaseVariation = Omit<NewColorVariation, 'shoeId'>;

export type ColorVariationChanges = Pick<
  ShoeColorVariation,
  'colorName' | 'hexCode' | 'stockQuantity' | 'isActive'
>;
