/**
 * Document converter command building
 *
 * Builds the argument lists for pandoc and asciidoc used by the render
 * pipeline. Kept free of process handling so it can be tested directly.
 */

import { extname } from 'path';
import type { SlideStyle } from './config';

export type Converter = 'pandoc' | 'asciidoc';

export type RenderKind = 'slides' | 'notes';

const RENDERERS = new Map<string, Converter>([
  ['.md', 'pandoc'],
  ['.txt', 'asciidoc'],
]);

/**
 * Converter for a source file, by extension
 */
export function rendererFor(filename: string): Converter | null {
  return RENDERERS.get(extname(filename).toLowerCase()) ?? null;
}

/** Slide styles that need the URL of their assets */
const STYLE_URL_FORMATS: ReadonlySet<SlideStyle> = new Set<SlideStyle>([
  's5',
  'slidy',
  'slideous',
  'revealjs',
]);

/**
 * URL of the assets for a slide style below a static directory
 *
 * @example
 * styleUrlFor('s5', '/static') // => '/static/s5/ui/default'
 */
export function styleUrlFor(style: SlideStyle, staticUrl = '/static'): string {
  const url = `${staticUrl}/${style}`;
  return style === 's5' ? `${url}/ui/default` : url;
}

export interface PandocCommandOptions {
  /** Path of the slide filter executable */
  filterPath: string;
  citeStyle?: string;
  bibliography?: string;
}

function citationArgs(options: PandocCommandOptions): string[] {
  if (!options.bibliography) return [];

  const args = ['--citeproc', '--bibliography', options.bibliography];
  if (options.citeStyle) {
    args.push('--csl', options.citeStyle);
  }
  return args;
}

/**
 * pandoc command for an HTML slide show, reading markdown from stdin
 */
export function buildPandocSlidesCommand(
  options: PandocCommandOptions & { slideStyle: SlideStyle; styleUrl?: string },
): string[] {
  const command = [
    'pandoc',
    '-f',
    'markdown+smart',
    '-s',
    ...citationArgs(options),
    '-F',
    options.filterPath,
    '--slide-level',
    '2',
    '-t',
    options.slideStyle,
  ];

  if (options.styleUrl && STYLE_URL_FORMATS.has(options.slideStyle)) {
    command.push('-V', `${options.slideStyle}-url=${options.styleUrl}`);
  }

  return command;
}

/**
 * pandoc command for a PDF handout via xelatex
 */
export function buildPandocNotesCommand(
  options: PandocCommandOptions & { outputPath: string },
): string[] {
  return [
    'pandoc',
    '-f',
    'markdown+smart',
    '--pdf-engine=xelatex',
    ...citationArgs(options),
    '-F',
    options.filterPath,
    '-o',
    options.outputPath,
    '-V',
    'documentclass=scrartcl',
    '-V',
    'margin-left=1in',
    '-V',
    'margin-top=1in',
  ];
}

/**
 * asciidoc command writing HTML to stdout
 */
export function buildAsciidocCommand(kind: RenderKind, filename: string): string[] {
  const backend = kind === 'slides' ? 'beamer' : 'script';
  return ['asciidoc', '-a', backend, '-o', '-', filename];
}
