/**
 * Drives a chain of filters over a pandoc document
 *
 * Each filter walks the whole document once, depth first, in chain order.
 * When a handler returns a replacement, the children of the replacement are
 * walked with the same filter, but the replacement itself is not handed to
 * the filter again. Error annotations are not walked at all.
 */

import {
  BLOCK_TAGS,
  Plain,
  Str,
  Strong,
  isNode,
  isRecord,
  type PandocDocument,
  type PandocNode,
} from '../pandoc/ast';
import type {
  FilterContext,
  FilterResult,
  HandlerOutput,
  NodeHandler,
  NodeHandlers,
  PandocFilter,
} from './types';

/**
 * Run a handler, turning any exception into a failed result
 */
export async function invokeHandler(
  handler: NodeHandler,
  node: PandocNode,
  context: FilterContext,
): Promise<FilterResult> {
  try {
    return { ok: true, replacement: await handler(node, context) };
  } catch (error) {
    const err = error instanceof Error ? error : new Error(String(error));
    return { ok: false, message: err.message, error: err };
  }
}

/**
 * Visible replacement for a node whose handler failed
 *
 * Block positions get a Plain block, inline positions a Strong inline, so
 * the document keeps its structure.
 */
export function errorAnnotation(node: PandocNode, message: string): PandocNode {
  const strong = Strong([Str(`Filter error: ${message}`)]);
  return BLOCK_TAGS.has(node.t) ? Plain([strong]) : strong;
}

/**
 * A replacement to walk further, or an error annotation that is kept as is
 */
type DispatchOutcome =
  | { final: false; replacement: HandlerOutput }
  | { final: true; annotation: PandocNode };

class DocumentWalker {
  constructor(
    private readonly filterName: string,
    private readonly handlers: NodeHandlers,
    private readonly context: FilterContext,
  ) {}

  async walk(value: unknown): Promise<void> {
    if (Array.isArray(value)) {
      await this.walkArray(value);
    } else if (isRecord(value)) {
      for (const key of Object.keys(value)) {
        if (Array.isArray(value[key]) || isRecord(value[key])) {
          await this.walk(value[key]);
        }
      }
    }
  }

  /**
   * Walk the elements of an array, splicing in replacements
   */
  private async walkArray(items: unknown[]): Promise<void> {
    const result: unknown[] = [];
    let changed = false;

    for (const item of items) {
      const outcome = isNode(item) ? await this.dispatch(item) : null;
      if (outcome !== null && outcome.final) {
        changed = true;
        result.push(outcome.annotation);
        continue;
      }

      const replacement = outcome !== null && !outcome.final ? outcome.replacement : null;
      if (replacement === null) {
        await this.walk(item);
        result.push(item);
        continue;
      }

      changed = true;
      const nodes = Array.isArray(replacement) ? replacement : [replacement];
      for (const node of nodes) {
        await this.walk(node);
        result.push(node);
      }
    }

    if (changed) {
      items.splice(0, items.length, ...result);
    }
  }

  private async dispatch(node: PandocNode): Promise<DispatchOutcome | null> {
    const handler = this.handlers[node.t.toLowerCase()];
    if (!handler) return null;

    const result = await invokeHandler(handler, node, this.context);
    if (result.ok) {
      return { final: false, replacement: result.replacement };
    }

    console.error(
      `${this.filterName}: error on ${node.t}:`,
      result.error.stack ?? result.message,
    );
    return { final: true, annotation: errorAnnotation(node, result.message) };
  }
}

/**
 * Apply filters to a document in place and return it
 */
export async function applyFilters(
  doc: PandocDocument,
  filters: readonly PandocFilter[],
  format: string,
): Promise<PandocDocument> {
  for (const filter of filters) {
    const context: FilterContext = { format, meta: doc.meta };
    await new DocumentWalker(filter.name, filter.begin(), context).walk(doc);
  }
  return doc;
}
