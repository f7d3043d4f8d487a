// Element factory: markup tag name -> element constructor

import type { Document } from './document.ts';
import type { Element } from './element.ts';

export type ElementConstructor = (document: Document) => Element;

const create = (type: string): ElementConstructor => document => document.createElement(type);

const DEFAULT_TAGS: ReadonlyArray<[string, ElementConstructor]> = [
  ['br', create('br')],
  ['h1', create('h1')],
  ['h2', create('h2')],
  ['h3', create('h3')],
  ['paragraph', create('paragraph')],
  ['p', create('paragraph')],
  ['div', create('div')],
  ['span', create('span')],
  ['ul', create('ul')],
  ['ol', create('ol')],
  ['li', create('li')],
  ['image', create('image')],
];

/**
 * Tag lookup used by the markup tokenizer. Names are case-insensitive.
 */
export class ElementFactory {
  private _tags = new Map<string, ElementConstructor>();

  constructor(tags: Iterable<[string, ElementConstructor]> = DEFAULT_TAGS) {
    for (const [name, ctor] of tags) {
      this.register(name, ctor);
    }
  }

  /** Register or replace a tag */
  register(name: string, ctor: ElementConstructor): void {
    this._tags.set(name.toLowerCase(), ctor);
  }

  get(name: string): ElementConstructor | undefined {
    return this._tags.get(name.toLowerCase());
  }

  has(name: string): boolean {
    return this._tags.has(name.toLowerCase());
  }

  names(): string[] {
    return [...this._tags.keys()];
  }
}

export const defaultElementFactory = new ElementFactory();
