// Character-driven markup tokenizer
// Classifies each word inside `<...>` against the element and attribute
// factories and the color table; text outside tags becomes text tokens.

import type { AttributeFactory } from '../attribute-factory.ts';
import { isColorName, lookupColorName } from '../color.ts';
import type { ElementFactory } from '../element-factory.ts';
import type { DiagnosticSink, TokenSink } from './types.ts';

type Quote = '"' | "'";

const WHITESPACE = /\s/;

/**
 * Tokenizer state survives between feed() calls, so a tag or an attribute
 * value may be split across chunks. Pending text is flushed at the end of
 * every chunk.
 */
export class MarkupTokenizer {
  private _elements: ElementFactory;
  private _attributes: AttributeFactory;

  private _inTag = false;
  private _terminal = false; // `/` seen before the tag name
  private _named = false; // tag name classified; later words are attributes
  private _closing = false;
  private _slash = false; // `/` after the tag name; self-closing only when `>` follows
  private _discarding = false; // inside an unknown tag, skip to `>`
  private _expectingValue = false;
  private _unknownAttribute = false;
  private _skipValue = false;
  private _quote: Quote | null = null;
  private _tagName = '';
  private _word = '';
  private _text = '';

  constructor(elements: ElementFactory, attributes: AttributeFactory) {
    this._elements = elements;
    this._attributes = attributes;
  }

  get inTag(): boolean {
    return this._inTag;
  }

  /** An attribute was emitted and its value has not been seen yet */
  get awaitingValue(): boolean {
    return this._inTag && this._expectingValue;
  }

  feed(chunk: string, emit: TokenSink, report: DiagnosticSink): void {
    for (const ch of chunk) {
      if (!this._inTag) {
        if (ch === '<') {
          this._flushText(emit);
          this._startTag();
        } else {
          this._text += ch;
        }
        continue;
      }

      if (this._discarding) {
        if (ch === '>') {
          this._endTag();
        }
        continue;
      }

      if (this._quote) {
        if (ch === this._quote) {
          this._quote = null;
          this._quotedValue(emit, report);
        } else {
          this._word += ch;
        }
        continue;
      }

      if (this._slash) {
        this._slash = false;
        if (ch === '>') {
          this._classify(emit, report);
          if (this._named && !this._closing && !this._discarding) {
            emit({ type: 'element-close', name: this._tagName });
          }
          this._endTag();
          continue;
        }
        this._word += '/';
      }

      switch (ch) {
        case '"':
        case "'":
          if (this._word === '') {
            this._quote = ch;
          } else {
            this._word += ch;
          }
          break;

        case '=':
          this._classify(emit, report);
          if (this._unknownAttribute) {
            this._skipValue = true;
          }
          break;

        case '/':
          if (!this._named && this._word === '') {
            this._terminal = true;
          } else {
            this._slash = true;
          }
          break;

        case '>':
          this._classify(emit, report);
          this._endTag();
          break;

        default:
          if (WHITESPACE.test(ch)) {
            this._classify(emit, report);
          } else {
            this._word += ch;
          }
      }
    }

    this._flushText(emit);
  }

  private _startTag(): void {
    this._inTag = true;
    this._resetTag();
  }

  private _endTag(): void {
    this._inTag = false;
    this._resetTag();
  }

  private _resetTag(): void {
    this._terminal = false;
    this._named = false;
    this._closing = false;
    this._slash = false;
    this._discarding = false;
    this._expectingValue = false;
    this._unknownAttribute = false;
    this._skipValue = false;
    this._quote = null;
    this._tagName = '';
    this._word = '';
  }

  private _flushText(emit: TokenSink): void {
    // Whitespace-only runs between tags carry no content
    if (this._text.trim() !== '') {
      emit({ type: 'text', text: this._text });
    }
    this._text = '';
  }

  private _quotedValue(emit: TokenSink, report: DiagnosticSink): void {
    const value = this._word;
    this._word = '';

    if (this._skipValue) {
      this._skipValue = false;
      this._unknownAttribute = false;
      return;
    }

    if (this._expectingValue) {
      emit({ type: 'attribute-value', value });
      this._expectingValue = false;
    } else {
      report({ code: 'stray-word', message: `Quoted value without an attribute: "${value}"`, subject: value });
    }
  }

  private _classify(emit: TokenSink, report: DiagnosticSink): void {
    const word = this._word;
    if (word === '') {
      return;
    }
    this._word = '';

    if (this._skipValue) {
      this._skipValue = false;
      this._unknownAttribute = false;
      return;
    }
    this._unknownAttribute = false;

    if (this._expectingValue) {
      emit({ type: 'attribute-value', value: word });
      this._expectingValue = false;
      return;
    }

    if (this._closing) {
      report({ code: 'stray-word', message: `Unexpected word in closing tag </${this._tagName}>: ${word}`, subject: word });
      return;
    }

    if (this._named) {
      const definition = this._attributes.get(word);
      if (!definition) {
        report({ code: 'unknown-attribute', message: `Unknown attribute on <${this._tagName}>: ${word}`, subject: word });
        this._unknownAttribute = true;
        return;
      }
      emit(definition.expectsValue
        ? { type: 'attribute', name: word, set: definition.set }
        : { type: 'attribute-simple', name: word, set: definition.set });
      this._expectingValue = definition.expectsValue;
      return;
    }

    this._named = true;
    this._tagName = word;

    if (this._terminal) {
      this._closing = true;
      if (this._elements.has(word) || isColorName(word)) {
        emit({ type: 'element-close', name: word });
      } else {
        report({ code: 'unknown-tag', message: `Unknown closing tag: </${word}>`, subject: word });
      }
      return;
    }

    const create = this._elements.get(word);
    if (create) {
      emit({ type: 'element-open', name: word, create });
      return;
    }

    const color = lookupColorName(word);
    if (color) {
      emit({ type: 'color', name: word, color });
      return;
    }

    report({ code: 'unknown-tag', message: `Unknown tag: <${word}>`, subject: word });
    this._discarding = true;
  }
}
