/**
 * Core module exports
 *
 * This is the shared core used by the slider CLI and the slide-filter.
 */

// Configuration
export {
  type SliderConfig,
  type SlideStyle,
  type LineSyntax,
  type TempSettings,
  type PreprocessorConfig,
  type PreprocessorOptions,
  SYMBOL_SLIDES,
  ENV_TEMPDIR,
  ENV_TEMPLINK,
  createDefaultConfig,
  loadConfig,
  isSlideStyle,
  tempSettingsFromEnv,
  tempSettingsToEnv,
  createPreprocessorConfig,
} from './config';

// Preprocessor
export {
  LINE_PARSERS,
  SourceFile,
  SlidePreprocessor,
  preprocessToLines,
  type DirectiveMatch,
  type LineParser,
  type LineSink,
} from './preprocessor';

// Pandoc AST
export * from './pandoc/ast';

// Cache
export { ContentCache, sha256, type CacheEntry } from './cache';

// Filters
export * from './filters';

// Diagram renderers
export type { DiagramRenderer, SvgConverter, RenderRequest, ImageFormat } from './diagrams/types';
export { GraphvizRenderer, GRAPHVIZ_ENGINES, type GraphvizOptions } from './diagrams/graphviz';
export { BlockdiagRenderer, BLOCKDIAG_ENGINES, type BlockdiagOptions } from './diagrams/blockdiag';
export { ImageMagickConverter, type ImageMagickOptions } from './diagrams/imagemagick';
export { runTool, type RunOptions } from './process';

// Render pipeline
export {
  rendererFor,
  styleUrlFor,
  buildPandocSlidesCommand,
  buildPandocNotesCommand,
  buildAsciidocCommand,
  type Converter,
  type RenderKind,
  type PandocCommandOptions,
} from './converters';
export {
  renderDocument,
  preprocessForPandoc,
  type RenderOptions,
  type RenderResult,
} from './render';
