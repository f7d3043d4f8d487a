// Text renderer: depth-first traversal and a plain-text dump of the tree

import type { ColorValue } from './color.ts';
import type { Element, ElementHandle } from './element.ts';

export const NO_ID = '-noID-';

export interface RenderNode {
  depth: number;
  handle: ElementHandle;
  type: string;
  /** indexBy value, or NO_ID */
  id: string;
  lines: readonly string[];
  textColor?: ColorValue;
}

export interface RenderOptions {
  /** Spaces per depth level (default 4) */
  indent?: number;
  /** Applied to each header line, e.g. to color it */
  decorateHeader?: (header: string, node: RenderNode) => string;
}

/**
 * Depth-first pre-order walk starting at `root` (depth 0).
 */
export function* traverse(root: Element, depth = 0): Generator<RenderNode> {
  yield {
    depth,
    handle: root.handle,
    type: root.type,
    id: root.id || NO_ID,
    lines: root.content.text,
    textColor: root.attributes.get('textColor'),
  };
  for (const child of root.children()) {
    yield* traverse(child, depth + 1);
  }
}

export function formatHeader(node: RenderNode): string {
  return `${node.depth} ${node.type} (${node.id})`;
}

/**
 * One header line per element, `<depth> <type> (<id>)`, followed by its
 * text content. Everything is indented by `indent * depth` spaces; content
 * containing newlines is split into separate lines.
 */
export function renderLines(root: Element, options: RenderOptions = {}): string[] {
  const indent = options.indent ?? 4;
  const out: string[] = [];

  for (const node of traverse(root)) {
    const pad = ' '.repeat(indent * node.depth);
    const header = formatHeader(node);
    out.push(pad + (options.decorateHeader ? options.decorateHeader(header, node) : header));
    for (const line of node.lines) {
      for (const part of line.split('\n')) {
        out.push(pad + part);
      }
    }
  }

  return out;
}

export function renderToText(root: Element, options: RenderOptions = {}): string {
  return renderLines(root, options).join('\n') + '\n';
}
