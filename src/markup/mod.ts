// Markup parser - public exports

export type {
  DiagnosticCode,
  DiagnosticSink,
  MarkupDiagnostic,
  MarkupToken,
  MarkupTokenType,
  TokenSink,
} from './types.ts';
export { MarkupTokenizer } from './tokenizer.ts';
export { MarkupBuilder } from './builder.ts';
export { ParserSession } from './session.ts';
