// Color values: named colors, hex literals and packed RGBA helpers

import colorNames from './data/color-names.json' with { type: 'json' };

export type ColorFormat = 'name' | 'literal';

/**
 * RGBA quadruple, 0-255 per channel. Alpha is opaque unless set explicitly.
 */
export interface ColorValue {
  r: number;
  g: number;
  b: number;
  a: number;
  format: ColorFormat;
}

// Name -> 24-bit RGB, keyed by lower-case names without spaces
const COLOR_TABLE: ReadonlyMap<string, number> = new Map(
  Object.entries(colorNames).map(([name, hex]) => [name, parseInt(hex.slice(1), 16)])
);

export const BLACK = 0x000000;

export function normalizeColorName(name: string): string {
  return name.replace(/\s+/g, '').toLowerCase();
}

/**
 * Build a color from a 24-bit 0xRRGGBB value.
 */
export function rgb(color: number, format: ColorFormat = 'literal'): ColorValue {
  return {
    r: (color >> 16) & 0xFF,
    g: (color >> 8) & 0xFF,
    b: color & 0xFF,
    a: 255,
    format,
  };
}

export function rgba(r: number, g: number, b: number, a = 255): ColorValue {
  return { r: r & 0xFF, g: g & 0xFF, b: b & 0xFF, a: a & 0xFF, format: 'literal' };
}

/**
 * Look up a color name ("Cornflower Blue", "cornflowerblue").
 * Returns undefined when the name is not in the table.
 */
export function lookupColorName(name: string): ColorValue | undefined {
  const color = COLOR_TABLE.get(normalizeColorName(name));
  return color === undefined ? undefined : rgb(color, 'name');
}

export function isColorName(name: string): boolean {
  return COLOR_TABLE.has(normalizeColorName(name));
}

function parseHexLiteral(hex: string): ColorValue | undefined {
  if (!/^[0-9a-f]+$/i.test(hex)) {
    return undefined;
  }
  if (hex.length === 3) {
    const r = parseInt(hex[0] + hex[0], 16);
    const g = parseInt(hex[1] + hex[1], 16);
    const b = parseInt(hex[2] + hex[2], 16);
    return rgba(r, g, b);
  } else if (hex.length === 6) {
    return rgb(parseInt(hex, 16));
  } else if (hex.length === 8) {
    const r = parseInt(hex.slice(0, 2), 16);
    const g = parseInt(hex.slice(2, 4), 16);
    const b = parseInt(hex.slice(4, 6), 16);
    const a = parseInt(hex.slice(6, 8), 16);
    return rgba(r, g, b, a);
  }
  return undefined;
}

/**
 * Parse a color attribute value.
 *
 * Accepts "#rgb", "#rrggbb", "#rrggbbaa", "0xRRGGBB" and color names.
 * Anything else resolves to opaque black; the fallback is not reported.
 */
export function parseColor(input: string): ColorValue {
  const trimmed = input.trim();

  if (trimmed.startsWith('#')) {
    const literal = parseHexLiteral(trimmed.slice(1));
    if (literal) return literal;
  } else if (/^0x/i.test(trimmed)) {
    const literal = parseHexLiteral(trimmed.slice(2));
    if (literal) return literal;
  }

  return lookupColorName(trimmed) ?? rgb(BLACK, 'name');
}

export function colorToRgb24(color: ColorValue): number {
  return ((color.r & 0xFF) << 16) | ((color.g & 0xFF) << 8) | (color.b & 0xFF);
}

export function colorToHex(color: ColorValue): string {
  return `#${colorToRgb24(color).toString(16).padStart(6, '0').toUpperCase()}`;
}

export function colorEquals(a: ColorValue, b: ColorValue): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * Pack RGBA components into a single 32-bit value
 */
export function packRGBA(color: ColorValue): number {
  return (((color.r & 0xFF) << 24) | ((color.g & 0xFF) << 16) | ((color.b & 0xFF) << 8) | (color.a & 0xFF)) >>> 0;
}

/**
 * Unpack a 32-bit RGBA value into a literal color
 */
export function unpackRGBA(packed: number): ColorValue {
  return rgba((packed >>> 24) & 0xFF, (packed >>> 16) & 0xFF, (packed >>> 8) & 0xFF, packed & 0xFF);
}

/**
 * Convert to a CSS color string
 */
export function rgbaToCss(color: ColorValue): string {
  if (color.a === 255) {
    return `rgb(${color.r},${color.g},${color.b})`;
  }
  return `rgba(${color.r},${color.g},${color.b},${(color.a / 255).toFixed(2)})`;
}
