// Unit-aware value parsing: numeric-with-unit, quad shorthand and keyword options

import { MalformedShorthandError, UnknownOptionError } from './errors.ts';

export type NumericUnit = 'px' | 'pt' | 'em' | 'percent' | 'auto';

/**
 * A magnitude plus its unit. Values are never converted between units here.
 */
export interface NumericValue {
  value: number;
  unit: NumericUnit;
}

export type Quad = [NumericValue, NumericValue, NumericValue, NumericValue];

const UNIT_SUFFIXES: ReadonlyMap<string, NumericUnit> = new Map([
  ['px', 'px'],
  ['pt', 'pt'],
  ['em', 'em'],
  ['percent', 'percent'],
  ['pct', 'percent'],
  ['%', 'percent'],
  ['autocalculate', 'auto'],
  ['auto', 'auto'],
]);

const LEADING_NUMBER = /^[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:e[+-]?\d+)?/;

function normalizeKeyword(input: string): string {
  return input.replace(/\s+/g, '').toLowerCase();
}

/**
 * Parse strings such as "10px", "12 pt", "50%", "1,000_px" or "auto".
 * An unparsable number reads as 0 and an unknown suffix as auto-calculate.
 */
export function parseNumeric(input: string): NumericValue {
  const cleaned = input.replace(/[\s,_]+/g, '').toLowerCase();
  const match = LEADING_NUMBER.exec(cleaned);
  const literal = match ? match[0] : '';
  const value = literal ? Number(literal) : 0;
  const suffix = cleaned.slice(literal.length);

  return {
    value: Number.isFinite(value) ? value : 0,
    unit: UNIT_SUFFIXES.get(suffix) ?? 'auto',
  };
}

export function numeric(value: number, unit: NumericUnit): NumericValue {
  return { value, unit };
}

export const px = (value: number): NumericValue => numeric(value, 'px');
export const pt = (value: number): NumericValue => numeric(value, 'pt');
export const em = (value: number): NumericValue => numeric(value, 'em');
export const percent = (value: number): NumericValue => numeric(value, 'percent');
export const pct = percent;
export const autoCalculate = (value = 0): NumericValue => numeric(value, 'auto');

export function numericEquals(a: NumericValue, b: NumericValue): boolean {
  return a.value === b.value && a.unit === b.unit;
}

export function formatNumeric(v: NumericValue): string {
  switch (v.unit) {
    case 'percent':
      return `${v.value}%`;
    case 'auto':
      return 'auto';
    default:
      return `${v.value}${v.unit}`;
  }
}

const QUAD_TOKEN = String.raw`[+-]?(?:\d+(?:\.\d*)?|\.\d+)(?:%|[a-z]*)`;
const QUAD_SEPARATOR = String.raw`\s*,?\s*`;
const QUAD_PATTERN = new RegExp(
  String.raw`^\s*[{(\[]?\s*` +
  `(${QUAD_TOKEN})` +
  `(?:${QUAD_SEPARATOR}(${QUAD_TOKEN}))?`.repeat(3) +
  String.raw`\s*,?\s*[})\]]?\s*$`,
  'i'
);

/**
 * Split a shorthand such as "10px,20px,30px,40px" or "(1em 2em)" into four values.
 *
 * The caller decides what the four positions mean (top/left/height/width for
 * coordinates, top/left/bottom/right for margin and padding). Fewer than four
 * tokens are repeated: one value fills all four, two give a,b,a,b and three
 * give a,b,c,b.
 */
export function parseQuadCoordinates(input: string): Quad {
  const match = QUAD_PATTERN.exec(input);
  if (!match) {
    throw new MalformedShorthandError(input);
  }

  const tokens = match.slice(1).filter((t): t is string => t !== undefined && t !== '');
  const values = tokens.map(parseNumeric);
  const [a, b = a, c = a, d = b] = values;
  return [a, b, c, d];
}

// Keyword option lists

export type Display = 'inline' | 'block' | 'none';
export type Position = 'absolute' | 'relative';
export type TextAlignment = 'left' | 'center' | 'right' | 'justified';
export type BorderStyle =
  | 'none' | 'dotted' | 'dashed' | 'solid' | 'doubled'
  | 'groove' | 'ridge' | 'inset' | 'outset';
export type ListStyleType =
  | 'none' | 'disc' | 'circle' | 'square' | 'decimal'
  | 'alpha' | 'greek' | 'latin' | 'roman';
export type LineHeightOption = 'normal' | 'numeric';

export interface LineHeight {
  value: number;
  option: LineHeightOption;
}

function optionTable<T extends string>(options: readonly T[]): ReadonlyMap<string, T> {
  return new Map(options.map(option => [option, option]));
}

const DISPLAY_OPTIONS = optionTable<Display>(['inline', 'block', 'none']);
const POSITION_OPTIONS = optionTable<Position>(['absolute', 'relative']);
const TEXT_ALIGNMENT_OPTIONS = optionTable<TextAlignment>(['left', 'center', 'right', 'justified']);
const BORDER_STYLE_OPTIONS = optionTable<BorderStyle>([
  'none', 'dotted', 'dashed', 'solid', 'doubled', 'groove', 'ridge', 'inset', 'outset',
]);
const LIST_STYLE_TYPE_OPTIONS = optionTable<ListStyleType>([
  'none', 'disc', 'circle', 'square', 'decimal', 'alpha', 'greek', 'latin', 'roman',
]);
const LINE_HEIGHT_OPTIONS = optionTable<LineHeightOption>(['normal', 'numeric']);

/**
 * Look up a keyword after stripping whitespace and lower-casing it.
 * @throws UnknownOptionError when the keyword is not in the table
 */
export function parseEnum<T extends string>(
  listName: string,
  table: ReadonlyMap<string, T>,
  input: string
): T {
  const option = table.get(normalizeKeyword(input));
  if (option === undefined) {
    throw new UnknownOptionError(listName, input);
  }
  return option;
}

export const parseDisplay = (input: string): Display =>
  parseEnum('display', DISPLAY_OPTIONS, input);

export const parsePosition = (input: string): Position =>
  parseEnum('position', POSITION_OPTIONS, input);

export const parseTextAlignment = (input: string): TextAlignment =>
  parseEnum('textAlignment', TEXT_ALIGNMENT_OPTIONS, input);

export const parseBorderStyle = (input: string): BorderStyle =>
  parseEnum('borderStyle', BORDER_STYLE_OPTIONS, input);

export const parseListStyleType = (input: string): ListStyleType =>
  parseEnum('listStyleType', LIST_STYLE_TYPE_OPTIONS, input);

/**
 * Line height carries both a number and a keyword ("1.5numeric", "normal").
 * A missing or unknown keyword reads as normal.
 */
export function parseLineHeight(input: string): LineHeight {
  const cleaned = input.replace(/[\s,_]+/g, '').toLowerCase();
  const match = LEADING_NUMBER.exec(cleaned);
  const literal = match ? match[0] : '';
  const value = literal ? Number(literal) : 0;

  return {
    value: Number.isFinite(value) ? value : 0,
    option: LINE_HEIGHT_OPTIONS.get(cleaned.slice(literal.length)) ?? 'normal',
  };
}
