/**
 * The slide filter chain as run by pandoc
 */

import { ContentCache } from '../cache';
import type { TempSettings } from '../config';
import { BlockdiagRenderer } from '../diagrams/blockdiag';
import { GraphvizRenderer } from '../diagrams/graphviz';
import { ImageMagickConverter } from '../diagrams/imagemagick';
import type { DiagramRenderer, SvgConverter } from '../diagrams/types';
import { BlockdiagFilter, GraphvizFilter } from './diagram';
import { GermanQuotesFilter } from './germanQuotes';
import { MetaVarFilter } from './metaVar';
import { SvgFilter } from './svg';
import type { PandocFilter, ProgressCallback } from './types';

export interface SlideFilterOptions extends TempSettings {
  /** Progress and tool diagnostics; the filter process sends them to stderr */
  onProgress?: ProgressCallback;
  graphvizRenderer?: DiagramRenderer;
  blockdiagRenderer?: DiagramRenderer;
  svgConverter?: SvgConverter;
}

/**
 * Create the default chain: metavars, quotes, graphviz, blockdiag, svg
 */
export function createSlideFilters(options: SlideFilterOptions): PandocFilter[] {
  const { onProgress } = options;
  const cache = new ContentCache(options.tempDir, options.tempLink);

  return [
    new MetaVarFilter(),
    new GermanQuotesFilter(),
    new GraphvizFilter({
      cache,
      onProgress,
      renderer: options.graphvizRenderer ?? new GraphvizRenderer({ onStderr: onProgress }),
    }),
    new BlockdiagFilter({
      cache,
      onProgress,
      renderer: options.blockdiagRenderer ?? new BlockdiagRenderer({ onStderr: onProgress }),
    }),
    new SvgFilter({
      cache,
      onProgress,
      converter: options.svgConverter ?? new ImageMagickConverter({ onStderr: onProgress }),
    }),
  ];
}

export { applyFilters, errorAnnotation, invokeHandler } from './walk';
export { MetaVarFilter, replaceMetavars, lookupVariable } from './metaVar';
export { GermanQuotesFilter, replaceQuotes, createQuoteState, type QuoteState } from './germanQuotes';
export { GraphvizFilter, BlockdiagFilter, type DiagramFilterOptions, type FileFilterOptions } from './diagram';
export { SvgFilter, type SvgFilterOptions } from './svg';
export * from './types';
