// Attribute kinds, per-element attribute store and content payload

import type { ColorValue } from './color.ts';
import type {
  BorderStyle,
  Display,
  LineHeight,
  ListStyleType,
  NumericValue,
  Position,
  TextAlignment,
} from './units.ts';

/**
 * Value type carried by each attribute kind.
 */
export interface AttributeValueMap {
  indexBy: string;
  display: Display;
  position: Position;
  objectTop: NumericValue;
  objectLeft: NumericValue;
  objectHeight: NumericValue;
  objectWidth: NumericValue;
  scrollTop: NumericValue;
  scrollLeft: NumericValue;
  background: ColorValue;
  opacity: number;
  textFace: string;
  textSize: NumericValue;
  textWeight: string;
  textColor: ColorValue;
  textAlignment: TextAlignment;
  textIndent: NumericValue;
  tabSize: NumericValue;
  lineHeight: LineHeight;
  marginTop: NumericValue;
  marginLeft: NumericValue;
  marginBottom: NumericValue;
  marginRight: NumericValue;
  paddingTop: NumericValue;
  paddingLeft: NumericValue;
  paddingBottom: NumericValue;
  paddingRight: NumericValue;
  borderStyle: BorderStyle;
  borderWidth: NumericValue;
  borderColor: ColorValue;
  borderRadius: NumericValue;
  focusIndex: number;
  zIndex: number;
  listStyleType: ListStyleType;
}

export type AttributeKind = keyof AttributeValueMap;

export const ATTRIBUTE_KINDS: readonly AttributeKind[] = [
  'indexBy', 'display', 'position',
  'objectTop', 'objectLeft', 'objectHeight', 'objectWidth',
  'scrollTop', 'scrollLeft',
  'background', 'opacity',
  'textFace', 'textSize', 'textWeight', 'textColor', 'textAlignment', 'textIndent',
  'tabSize', 'lineHeight',
  'marginTop', 'marginLeft', 'marginBottom', 'marginRight',
  'paddingTop', 'paddingLeft', 'paddingBottom', 'paddingRight',
  'borderStyle', 'borderWidth', 'borderColor', 'borderRadius',
  'focusIndex', 'zIndex', 'listStyleType',
];

const ATTRIBUTE_KIND_SET: ReadonlySet<string> = new Set(ATTRIBUTE_KINDS);

export function isAttributeKind(name: string): name is AttributeKind {
  return ATTRIBUTE_KIND_SET.has(name);
}

/**
 * Closed tagged union of every attribute: `{ kind: 'display', value: 'block' }`, ...
 */
export type Attribute<K extends AttributeKind = AttributeKind> = {
  [P in K]: { kind: P; value: AttributeValueMap[P] };
}[K];

export function attr<K extends AttributeKind>(
  kind: K,
  value: AttributeValueMap[K]
): { kind: K; value: AttributeValueMap[K] } {
  return { kind, value };
}

export const indexBy = (id: string) => attr('indexBy', id);

// Content payload

export interface ContentMap {
  text: string[];
  number: number[];
  table: string[][];
  indexed: [number, string][];
}

export type ContentKind = keyof ContentMap;

export type ContentSetting = {
  [K in ContentKind]: { kind: 'content'; content: K; value: ContentMap[K] };
}[ContentKind];

export function textContent(...lines: string[]): ContentSetting {
  return { kind: 'content', content: 'text', value: lines };
}

export function numberContent(...values: number[]): ContentSetting {
  return { kind: 'content', content: 'number', value: values };
}

export function tableContent(rows: string[][]): ContentSetting {
  return { kind: 'content', content: 'table', value: rows.map(row => [...row]) };
}

export function indexedContent(entries: [number, string][]): ContentSetting {
  return {
    kind: 'content',
    content: 'indexed',
    value: entries.map(([index, label]): [number, string] => [index, label]),
  };
}

/**
 * Anything `setAttribute` accepts. A bare string or number replaces the
 * text or number content list with a single entry.
 */
export type AttributeSetting = Attribute | ContentSetting | string | number;

/**
 * Attribute values keyed by kind; setting a kind again overwrites it.
 */
export class AttributeStore {
  private _values: Partial<AttributeValueMap> = {};

  get<K extends AttributeKind>(kind: K): AttributeValueMap[K] | undefined {
    return this._values[kind];
  }

  set<K extends AttributeKind>(kind: K, value: AttributeValueMap[K]): void {
    this._values[kind] = value;
  }

  has(kind: AttributeKind): boolean {
    return this._values[kind] !== undefined;
  }

  delete(kind: AttributeKind): boolean {
    const had = this.has(kind);
    delete this._values[kind];
    return had;
  }

  /** Kinds currently set, in declaration order */
  kinds(): AttributeKind[] {
    return ATTRIBUTE_KINDS.filter(kind => this.has(kind));
  }

  get size(): number {
    return this.kinds().length;
  }

  clear(): void {
    this._values = {};
  }
}

export class ContentPayload {
  private _lists: Partial<ContentMap> = {};

  get<K extends ContentKind>(kind: K): ContentMap[K] | undefined {
    return this._lists[kind];
  }

  replace<K extends ContentKind>(kind: K, value: ContentMap[K]): void {
    this._lists[kind] = value;
  }

  appendText(text: string): void {
    (this._lists.text ??= []).push(text);
  }

  get text(): readonly string[] {
    return this._lists.text ?? [];
  }

  get numbers(): readonly number[] {
    return this._lists.number ?? [];
  }

  isEmpty(): boolean {
    return Object.values(this._lists).every(list => !list || list.length === 0);
  }

  clear(): void {
    this._lists = {};
  }
}
