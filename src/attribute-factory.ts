// Attribute factory: markup attribute name -> setter

import { attr } from './attributes.ts';
import { parseColor } from './color.ts';
import type { Element } from './element.ts';
import { InvalidValueError } from './errors.ts';
import {
  parseBorderStyle,
  parseDisplay,
  parseLineHeight,
  parseListStyleType,
  parseNumeric,
  parsePosition,
  parseQuadCoordinates,
  parseTextAlignment,
  type LineHeightOption,
} from './units.ts';

/**
 * Applies a parsed attribute to an element. Value-less shorthands receive ''.
 */
export type AttributeSetter = (element: Element, value: string) => void;

export interface AttributeDefinition {
  /** false for single-word shorthands such as `block` or `center` */
  expectsValue: boolean;
  set: AttributeSetter;
}

function parseNumber(attribute: string, input: string): number {
  const trimmed = input.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isFinite(value)) {
    throw new InvalidValueError(attribute, input);
  }
  return value;
}

function parseInteger(attribute: string, input: string): number {
  const value = parseNumber(attribute, input);
  if (!Number.isInteger(value)) {
    throw new InvalidValueError(attribute, input);
  }
  return value;
}

function setLineHeightOption(element: Element, option: LineHeightOption): void {
  const current = element.findAttribute('lineHeight');
  element.setAttribute(attr('lineHeight', { value: current?.value ?? 0, option }));
}

const valued = (set: AttributeSetter): AttributeDefinition => ({ expectsValue: true, set });
const shorthand = (set: AttributeSetter): AttributeDefinition => ({ expectsValue: false, set });

/**
 * Default definitions in lookup order. A name listed twice keeps its first
 * definition, so `left` is the objectLeft value attribute and not the
 * textAlignment shorthand further down.
 */
const DEFAULT_ATTRIBUTES: ReadonlyArray<[string, AttributeDefinition]> = [
  ['id', valued((e, s) => e.setAttribute(attr('indexBy', s)))],
  ['indexby', valued((e, s) => e.setAttribute(attr('indexBy', s)))],

  ['block', shorthand(e => e.setAttribute(attr('display', 'block')))],
  ['inline', shorthand(e => e.setAttribute(attr('display', 'inline')))],
  ['hidden', shorthand(e => e.setAttribute(attr('display', 'none')))],
  ['display', valued((e, s) => e.setAttribute(attr('display', parseDisplay(s))))],

  ['absolute', shorthand(e => e.setAttribute(attr('position', 'absolute')))],
  ['relative', shorthand(e => e.setAttribute(attr('position', 'relative')))],
  ['position', valued((e, s) => e.setAttribute(attr('position', parsePosition(s))))],

  ['objecttop', valued((e, s) => e.setAttribute(attr('objectTop', parseNumeric(s))))],
  ['top', valued((e, s) => e.setAttribute(attr('objectTop', parseNumeric(s))))],
  ['objectleft', valued((e, s) => e.setAttribute(attr('objectLeft', parseNumeric(s))))],
  ['left', valued((e, s) => e.setAttribute(attr('objectLeft', parseNumeric(s))))],
  ['objectheight', valued((e, s) => e.setAttribute(attr('objectHeight', parseNumeric(s))))],
  ['height', valued((e, s) => e.setAttribute(attr('objectHeight', parseNumeric(s))))],
  ['objectwidth', valued((e, s) => e.setAttribute(attr('objectWidth', parseNumeric(s))))],
  ['width', valued((e, s) => e.setAttribute(attr('objectWidth', parseNumeric(s))))],
  ['coordinates', valued((e, s) => {
    const [top, left, height, width] = parseQuadCoordinates(s);
    e.setAttributes([
      attr('objectTop', top),
      attr('objectLeft', left),
      attr('objectHeight', height),
      attr('objectWidth', width),
    ]);
  })],

  ['scrolltop', valued((e, s) => e.setAttribute(attr('scrollTop', parseNumeric(s))))],
  ['scrollleft', valued((e, s) => e.setAttribute(attr('scrollLeft', parseNumeric(s))))],

  ['background', valued((e, s) => e.setAttribute(attr('background', parseColor(s))))],
  ['opacity', valued((e, s) => {
    const opacity = Math.min(1, Math.max(0, parseNumber('opacity', s)));
    e.setAttribute(attr('opacity', opacity));
  })],

  ['textface', valued((e, s) => e.setAttribute(attr('textFace', s)))],
  ['textsize', valued((e, s) => e.setAttribute(attr('textSize', parseNumeric(s))))],
  ['textweight', valued((e, s) => e.setAttribute(attr('textWeight', s)))],
  ['weight', valued((e, s) => e.setAttribute(attr('textWeight', s)))],
  ['textcolor', valued((e, s) => e.setAttribute(attr('textColor', parseColor(s))))],
  ['color', valued((e, s) => e.setAttribute(attr('textColor', parseColor(s))))],

  ['textalignment', valued((e, s) => e.setAttribute(attr('textAlignment', parseTextAlignment(s))))],
  ['left', shorthand(e => e.setAttribute(attr('textAlignment', 'left')))],
  ['center', shorthand(e => e.setAttribute(attr('textAlignment', 'center')))],
  ['right', shorthand(e => e.setAttribute(attr('textAlignment', 'right')))],
  ['justified', shorthand(e => e.setAttribute(attr('textAlignment', 'justified')))],

  ['textindent', valued((e, s) => e.setAttribute(attr('textIndent', parseNumeric(s))))],
  ['indent', valued((e, s) => e.setAttribute(attr('textIndent', parseNumeric(s))))],
  ['tabsize', valued((e, s) => e.setAttribute(attr('tabSize', parseNumeric(s))))],
  ['tab', valued((e, s) => e.setAttribute(attr('tabSize', parseNumeric(s))))],

  ['lineheight', valued((e, s) => e.setAttribute(attr('lineHeight', parseLineHeight(s))))],
  ['normal', shorthand(e => setLineHeightOption(e, 'normal'))],
  ['numeric', shorthand(e => setLineHeightOption(e, 'numeric'))],

  ['margintop', valued((e, s) => e.setAttribute(attr('marginTop', parseNumeric(s))))],
  ['marginleft', valued((e, s) => e.setAttribute(attr('marginLeft', parseNumeric(s))))],
  ['marginbottom', valued((e, s) => e.setAttribute(attr('marginBottom', parseNumeric(s))))],
  ['marginright', valued((e, s) => e.setAttribute(attr('marginRight', parseNumeric(s))))],
  ['margin', valued((e, s) => {
    const [top, left, bottom, right] = parseQuadCoordinates(s);
    e.setAttributes([
      attr('marginTop', top),
      attr('marginLeft', left),
      attr('marginBottom', bottom),
      attr('marginRight', right),
    ]);
  })],

  ['paddingtop', valued((e, s) => e.setAttribute(attr('paddingTop', parseNumeric(s))))],
  ['paddingleft', valued((e, s) => e.setAttribute(attr('paddingLeft', parseNumeric(s))))],
  ['paddingbottom', valued((e, s) => e.setAttribute(attr('paddingBottom', parseNumeric(s))))],
  ['paddingright', valued((e, s) => e.setAttribute(attr('paddingRight', parseNumeric(s))))],
  ['padding', valued((e, s) => {
    const [top, left, bottom, right] = parseQuadCoordinates(s);
    e.setAttributes([
      attr('paddingTop', top),
      attr('paddingLeft', left),
      attr('paddingBottom', bottom),
      attr('paddingRight', right),
    ]);
  })],

  ['borderstyle', valued((e, s) => e.setAttribute(attr('borderStyle', parseBorderStyle(s))))],
  ['borderwidth', valued((e, s) => e.setAttribute(attr('borderWidth', parseNumeric(s))))],
  ['bordercolor', valued((e, s) => e.setAttribute(attr('borderColor', parseColor(s))))],
  ['borderradius', valued((e, s) => e.setAttribute(attr('borderRadius', parseNumeric(s))))],

  ['focusindex', valued((e, s) => e.setAttribute(attr('focusIndex', parseInteger('focusIndex', s))))],
  ['focus', valued((e, s) => e.setAttribute(attr('focusIndex', parseInteger('focusIndex', s))))],
  ['zindex', valued((e, s) => e.setAttribute(attr('zIndex', parseInteger('zIndex', s))))],

  ['liststyletype', valued((e, s) => e.setAttribute(attr('listStyleType', parseListStyleType(s))))],
];

/**
 * Lookup table from lower-case attribute names to setters.
 */
export class AttributeFactory {
  private _definitions = new Map<string, AttributeDefinition>();

  constructor(definitions: Iterable<[string, AttributeDefinition]> = DEFAULT_ATTRIBUTES) {
    for (const [name, definition] of definitions) {
      this.define(name, definition);
    }
  }

  /**
   * Add a definition. Returns false, leaving the table unchanged, when the
   * name is already defined.
   */
  define(name: string, definition: AttributeDefinition): boolean {
    const key = name.toLowerCase();
    if (this._definitions.has(key)) {
      return false;
    }
    this._definitions.set(key, definition);
    return true;
  }

  get(name: string): AttributeDefinition | undefined {
    return this._definitions.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this._definitions.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this._definitions.keys()];
  }
}

export const defaultAttributeFactory = new AttributeFactory();
