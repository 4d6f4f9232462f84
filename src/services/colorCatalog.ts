export const DEFAULT_HEX_CODE = '#808080';

const HEX_BY_COLOR_NAME = new Map<string, string>(Object.entries({
  white: '#FFFFFF',
  black: '#000000',
  red: '#FF0000',
  blue: '#0000FF',
  green: '#008000',
  yellow: '#FFFF00',
  orange: '#FFA500',
  purple: '#800080',
  pink: '#FFC0CB',
  brown: '#A52A2A',
  gray: '#808080',
  grey: '#808080',
  navy: '#000080',
  beige: '#F5F5DC',
  silver: '#C0C0C0',
}));

/** Hex code for a well-known color name, falling back to gray. */
export function deriveHexCode(colorName: string): string {
  return HEX_BY_COLOR_NAME.get(colorName.trim().toLowerCase()) ?? DEFAULT_HEX_CODE;
}
