/**
 * Filters that turn fenced diagram code blocks into images
 *
 * ```dot
 * digraph { a -> b }
 * ```
 *
 * HTML-family targets get an SVG linked through the temp link, all other
 * targets a PNG referenced by its file name (for LaTeX embedding).
 */

import type { CacheEntry, ContentCache } from '../cache';
import { BLOCKDIAG_ENGINES } from '../diagrams/blockdiag';
import { GRAPHVIZ_ENGINES } from '../diagrams/graphviz';
import type { DiagramRenderer, ImageFormat, RenderRequest } from '../diagrams/types';
import {
  CodeBlock,
  Image,
  Para,
  getCaption,
  isCodeBlock,
  type Block_CodeBlock,
  type PandocNode,
} from '../pandoc/ast';
import {
  isHtmlFormat,
  type FilterContext,
  type NodeHandlers,
  type PandocFilter,
  type ProgressCallback,
} from './types';

export interface FileFilterOptions {
  cache: ContentCache;
  onProgress?: ProgressCallback;
}

export interface DiagramFilterOptions extends FileFilterOptions {
  renderer: DiagramRenderer;
}

abstract class DiagramFilter implements PandocFilter {
  abstract readonly name: string;
  protected abstract readonly engines: readonly string[];

  constructor(protected readonly options: DiagramFilterOptions) {}

  begin(): NodeHandlers {
    return {
      codeblock: (node, context) => this.processCodeBlock(node, context),
    };
  }

  private async processCodeBlock(
    node: PandocNode,
    { format }: FilterContext,
  ): Promise<PandocNode | null> {
    if (!isCodeBlock(node)) return null;

    const [[ident, classes, keyvals], code] = node.c;
    const engine = this.engines.find((e) => classes.includes(e));
    if (!engine) {
      return this.processOther(node);
    }

    const { caption, title, keyvals: rest } = getCaption(keyvals);
    const web = isHtmlFormat(format);
    const entry = await this.generateFile(engine, code, web ? 'svg' : 'png');
    const target = web ? this.options.cache.linkFor(entry) : entry.fullName;

    return Para([Image([ident, [], rest], caption, [target, title])]);
  }

  /**
   * Code blocks without a known engine class
   */
  protected processOther(_node: Block_CodeBlock): PandocNode | null {
    return null;
  }

  protected renderRequest(
    engine: string,
    code: string,
    format: ImageFormat,
    entry: CacheEntry,
  ): RenderRequest {
    return { engine, format, source: code, outputPath: entry.fullName };
  }

  /**
   * Render the code unless the cache already holds the image
   */
  async generateFile(
    engine: string,
    code: string,
    format: ImageFormat,
  ): Promise<CacheEntry> {
    const { cache, renderer, onProgress } = this.options;
    const entry = cache.entryFor(engine, code, format);
    if (await cache.has(entry)) {
      return entry;
    }

    if (await cache.prepare(entry)) {
      onProgress?.(`Created directory ${entry.directory}`);
    }
    onProgress?.(`Call '${engine}' to create ${entry.fullName}`);
    await renderer.render(this.renderRequest(engine, code, format, entry));

    if (!(await cache.has(entry))) {
      throw new Error(`${engine} did not create ${entry.relPath}`);
    }
    return entry;
  }
}

/**
 * Renders dot, neato, twopi, circo and fdp blocks
 */
export class GraphvizFilter extends DiagramFilter {
  readonly name = 'graphviz';
  protected readonly engines = GRAPHVIZ_ENGINES;

  /**
   * A block classed "graphviz" is relabelled as "dot"
   */
  protected processOther(node: Block_CodeBlock): PandocNode | null {
    const [[ident, classes, keyvals], code] = node.c;
    if (!classes.includes('graphviz')) return null;

    const newClasses = classes.map((cls) => (cls === 'graphviz' ? 'dot' : cls));
    return CodeBlock([ident, newClasses, keyvals], code);
  }
}

/**
 * Renders blockdiag, seqdiag, actdiag, nwdiag, packetdiag and rackdiag blocks
 */
export class BlockdiagFilter extends DiagramFilter {
  readonly name = 'blockdiag';
  protected readonly engines = BLOCKDIAG_ENGINES;

  /**
   * The source goes next to the image as <digest>.<engine>
   */
  protected renderRequest(
    engine: string,
    code: string,
    format: ImageFormat,
    entry: CacheEntry,
  ): RenderRequest {
    return {
      ...super.renderRequest(engine, code, format, entry),
      inputPath: this.options.cache.siblingOf(entry, engine).fullName,
    };
  }
}
