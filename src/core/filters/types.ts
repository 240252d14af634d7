/**
 * Filter contract for the pandoc AST filter chain
 */

import type { PandocNode } from '../pandoc/ast';

/**
 * Data every handler gets besides the node
 */
export interface FilterContext {
  /** Output format passed by pandoc, e.g. "html5", "slidy", "latex"; may be empty */
  format: string;
  /** Document metadata (front matter) */
  meta: Record<string, unknown>;
}

/**
 * A replacement node, several nodes, or null to leave the node as is
 */
export type HandlerOutput = PandocNode | PandocNode[] | null;

export type NodeHandler = (
  node: PandocNode,
  context: FilterContext,
) => HandlerOutput | Promise<HandlerOutput>;

/**
 * Handlers keyed by lower-cased element tag ("str", "codeblock", ...)
 */
export type NodeHandlers = Readonly<Partial<Record<string, NodeHandler>>>;

export interface PandocFilter {
  readonly name: string;

  /**
   * Start a pass over one document.
   * Per-document state lives in the returned handlers.
   */
  begin(): NodeHandlers;
}

/**
 * Outcome of one handler invocation
 */
export type FilterResult =
  | { ok: true; replacement: HandlerOutput }
  | { ok: false; message: string; error: Error };

/**
 * Output formats rendered in a browser
 */
export const SLIDE_FORMATS: ReadonlySet<string> = new Set([
  's5',
  'slidy',
  'slideous',
  'dzslides',
  'revealjs',
]);

export const HTML_FORMATS: ReadonlySet<string> = new Set([
  'html',
  'html5',
  ...SLIDE_FORMATS,
]);

export function isHtmlFormat(format: string): boolean {
  return HTML_FORMATS.has(format);
}

/**
 * Progress callback for file-producing filters
 */
export type ProgressCallback = (message: string) => void;
