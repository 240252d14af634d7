/**
 * Render pipeline: source file -> slides (HTML) or notes (PDF)
 *
 * Steps for markdown:
 * 1. Preprocess the file (includes, conditionals, images)
 * 2. Pipe the result into pandoc, which runs the slide filter chain
 * 3. Return the HTML, or the path of the generated PDF
 *
 * asciidoc sources are handed to asciidoc unchanged.
 */

import { tmpdir } from 'os';
import { dirname, join, resolve } from 'path';
import {
  createPreprocessorConfig,
  tempSettingsToEnv,
  type SliderConfig,
  type SlideStyle,
} from './config';
import {
  buildAsciidocCommand,
  buildPandocNotesCommand,
  buildPandocSlidesCommand,
  rendererFor,
  type Converter,
  type RenderKind,
} from './converters';
import type { ProgressCallback } from './filters/types';
import { SourceFile, preprocessToLines } from './preprocessor';
import { runTool } from './process';

export interface RenderOptions {
  /** Path of the slide filter executable handed to pandoc */
  filterPath: string;
  /** Overrides config.slideStyle */
  slideStyle?: SlideStyle;
  /** URL of the slide style's assets */
  styleUrl?: string;
  /** Where to write the PDF for notes. Default: a new temp file */
  outputPath?: string;
  onProgress?: ProgressCallback;
}

export interface RenderResult {
  converter: Converter;
  kind: RenderKind;
  /** Converter output (HTML) */
  output?: Buffer;
  /** Generated file (PDF notes) */
  outputPath?: string;
}

/**
 * Generate unique temp file path for a PDF
 */
function getTempPdfPath(): string {
  const timestamp = Date.now();
  const random = Math.random().toString(36).substring(2, 8);
  return join(tmpdir(), `slider-${timestamp}-${random}.pdf`);
}

/**
 * Preprocess a markdown file for pandoc (html comment syntax)
 *
 * Slides link images absolutely from the root; notes are converted inside
 * the file's directory, so their image links are relative to it.
 */
export function preprocessForPandoc(
  filename: string,
  kind: RenderKind,
  config: SliderConfig,
): string {
  const slides = kind === 'slides';
  const preprocessorConfig = createPreprocessorConfig({
    root: config.rootDir,
    base: slides ? config.rootDir : dirname(filename),
    includes: config.includePaths,
    slides,
  });
  const lines = preprocessToLines(
    preprocessorConfig,
    [SourceFile.fromPath(filename)],
    'html',
  );
  return lines.map((line) => `${line}\n`).join('');
}

export async function renderDocument(
  file: string,
  kind: RenderKind,
  config: SliderConfig,
  options: RenderOptions,
): Promise<RenderResult> {
  const filename = resolve(file);
  const converter = rendererFor(filename);
  if (!converter) {
    throw new Error(`No renderer for ${file}`);
  }
  const { onProgress } = options;

  if (converter === 'asciidoc') {
    const [command, ...args] = buildAsciidocCommand(kind, filename);
    onProgress?.(`Exec ${command} ${args.join(' ')}`);
    const output = await runTool(command, args, { onStderr: onProgress });
    return { converter, kind, output };
  }

  onProgress?.(`Preprocessing ${filename}...`);
  const input = preprocessForPandoc(filename, kind, config);
  const env = { ...process.env, ...tempSettingsToEnv(config) };
  const commandOptions = {
    filterPath: options.filterPath,
    citeStyle: config.citeStyle,
    bibliography: config.bibliography,
  };

  if (kind === 'slides') {
    const [command, ...args] = buildPandocSlidesCommand({
      ...commandOptions,
      slideStyle: options.slideStyle ?? config.slideStyle,
      styleUrl: options.styleUrl,
    });
    onProgress?.(`Exec ${command} ${args.join(' ')}`);
    const output = await runTool(command, args, { input, env, onStderr: onProgress });
    return { converter, kind, output };
  }

  const outputPath = options.outputPath ? resolve(options.outputPath) : getTempPdfPath();
  const [command, ...args] = buildPandocNotesCommand({ ...commandOptions, outputPath });
  onProgress?.(`Exec ${command} ${args.join(' ')}`);
  await runTool(command, args, {
    input,
    env,
    cwd: dirname(filename),
    onStderr: onProgress,
    // xelatex runs are slow
    timeout: 300000,
  });
  return { converter, kind, outputPath };
}
