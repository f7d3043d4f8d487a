// Token and diagnostic types shared by the markup tokenizer and builder

import type { AttributeSetter } from '../attribute-factory.ts';
import type { ColorValue } from '../color.ts';
import type { ElementConstructor } from '../element-factory.ts';

export type MarkupToken =
  | { type: 'element-open'; name: string; create: ElementConstructor }
  | { type: 'element-close'; name: string }
  | { type: 'attribute'; name: string; set: AttributeSetter }
  | { type: 'attribute-simple'; name: string; set: AttributeSetter }
  | { type: 'attribute-value'; value: string }
  | { type: 'color'; name: string; color: ColorValue }
  | { type: 'text'; text: string };

export type MarkupTokenType = MarkupToken['type'];

export type DiagnosticCode =
  | 'unknown-tag'
  | 'unknown-attribute'
  | 'stray-word'
  | 'missing-value'
  | 'stack-underflow'
  | 'invalid-value';

export interface MarkupDiagnostic {
  code: DiagnosticCode;
  message: string;
  /** The word, tag or attribute the diagnostic is about */
  subject: string;
}

export type TokenSink = (token: MarkupToken) => void;
export type DiagnosticSink = (diagnostic: MarkupDiagnostic) => void;
