// Per-target parser session: tokenizer state, element stack and diagnostics

import type { AttributeFactory } from '../attribute-factory.ts';
import type { Element } from '../element.ts';
import type { ElementFactory } from '../element-factory.ts';
import { getLogger } from '../logging.ts';
import { MarkupBuilder } from './builder.ts';
import { MarkupTokenizer } from './tokenizer.ts';
import type { MarkupDiagnostic } from './types.ts';

const logger = getLogger('Markup');

export class ParserSession {
  readonly target: Element;
  private _tokenizer: MarkupTokenizer;
  private _builder: MarkupBuilder;
  private _diagnostics: MarkupDiagnostic[] = [];

  constructor(target: Element, elements: ElementFactory, attributes: AttributeFactory) {
    this.target = target;
    this._tokenizer = new MarkupTokenizer(elements, attributes);
    this._builder = new MarkupBuilder(target, diagnostic => this._record(diagnostic));
  }

  /**
   * Tokenize a chunk, then apply its tokens. Returns the element on top of
   * the stack, which is where the next chunk continues.
   */
  ingest(markup: string): Element {
    this._tokenizer.feed(
      markup,
      token => this._builder.push(token),
      diagnostic => this._record(diagnostic)
    );
    return this._builder.build(this._tokenizer.awaitingValue);
  }

  get top(): Element {
    return this._builder.top;
  }

  get depth(): number {
    return this._builder.stack.length - 1;
  }

  get diagnostics(): readonly MarkupDiagnostic[] {
    return this._diagnostics;
  }

  clearDiagnostics(): void {
    this._diagnostics = [];
  }

  private _record(diagnostic: MarkupDiagnostic): void {
    this._diagnostics.push(diagnostic);
    logger.debug(diagnostic.message, {
      code: diagnostic.code,
      target: this.target.toString(),
    });
  }
}
