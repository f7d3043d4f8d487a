// Markup builder: applies tokens to the tree using an element stack

import type { AttributeSetter } from '../attribute-factory.ts';
import { attr } from '../attributes.ts';
import type { Element } from '../element.ts';
import { QuireError } from '../errors.ts';
import type { DiagnosticSink, MarkupToken } from './types.ts';

export class MarkupBuilder {
  private _pending: MarkupToken[] = [];
  private _stack: Element[];
  private _report: DiagnosticSink;

  constructor(target: Element, report: DiagnosticSink) {
    this._stack = [target];
    this._report = report;
  }

  push(token: MarkupToken): void {
    this._pending.push(token);
  }

  /** Elements currently open, target first */
  get stack(): readonly Element[] {
    return this._stack;
  }

  get top(): Element {
    return this._stack[this._stack.length - 1];
  }

  /**
   * Apply pending tokens. When `awaitingValue` is set and the last pending
   * token is an attribute, that attribute stays pending until its value
   * arrives. Returns the element on top of the stack.
   */
  build(awaitingValue: boolean): Element {
    this._dropDestroyed();

    const tokens = this._pending;
    this._pending = [];

    for (let i = 0; i < tokens.length; i++) {
      const token = tokens[i];
      switch (token.type) {
        case 'element-open': {
          const element = token.create(this.top.document);
          this.top.appendChild(element);
          this._stack.push(element);
          break;
        }

        case 'color': {
          const element = this.top.document.createElement('text', [attr('textColor', token.color)]);
          this.top.appendChild(element);
          this._stack.push(element);
          break;
        }

        case 'element-close':
          if (this._stack.length > 1) {
            this._stack.pop();
          } else {
            this._report({
              code: 'stack-underflow',
              message: `Closing tag </${token.name}> with no open element`,
              subject: token.name,
            });
          }
          break;

        case 'attribute': {
          const next = tokens[i + 1];
          if (next === undefined && awaitingValue) {
            this._pending.push(token);
          } else if (next?.type === 'attribute-value') {
            this._apply(token.name, token.set, next.value);
            i++;
          } else {
            this._report({
              code: 'missing-value',
              message: `Attribute ${token.name} has no value`,
              subject: token.name,
            });
          }
          break;
        }

        case 'attribute-simple':
          this._apply(token.name, token.set, '');
          break;

        case 'attribute-value':
          // Values are consumed together with their attribute
          this._report({
            code: 'stray-word',
            message: `Value without an attribute: ${token.value}`,
            subject: token.value,
          });
          break;

        case 'text':
          this.top.content.appendText(token.text);
          break;
      }
    }

    return this.top;
  }

  private _apply(name: string, set: AttributeSetter, value: string): void {
    try {
      set(this.top, value);
    } catch (error) {
      if (!(error instanceof QuireError)) {
        throw error;
      }
      this._report({ code: 'invalid-value', message: `${name}: ${error.message}`, subject: name });
    }
  }

  // Open elements removed from the tree since the last build are closed implicitly
  private _dropDestroyed(): void {
    while (this._stack.length > 1 && !this.top.alive) {
      this._stack.pop();
    }
  }
}
