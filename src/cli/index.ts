#!/usr/bin/env node
/**
 * slider CLI
 *
 * - preprocess: expand include/image/conditional directives
 * - render: preprocess and convert a slide source with pandoc or asciidoc
 */

import { Option, program } from 'commander';
import { writeFile } from 'fs/promises';
import { join } from 'path';
import {
  SYMBOL_SLIDES,
  createPreprocessorConfig,
  isSlideStyle,
  loadConfig,
  type LineSyntax,
} from '../core/config';
import { styleUrlFor } from '../core/converters';
import { SlidePreprocessor, SourceFile } from '../core/preprocessor';
import { renderDocument } from '../core/render';
import { readStdin } from './stdin';

// Package version (will be set during build)
const VERSION = '1.0.0';

const SLIDE_STYLES = ['s5', 'slidy', 'slideous', 'dzslides', 'revealjs'];

interface PreprocessCliOptions {
  root?: string;
  base?: string;
  define: string[];
  slides?: boolean;
  include: string[];
  parser: LineSyntax;
}

interface RenderCliOptions {
  notes?: boolean;
  style?: string;
  staticUrl: string;
  output?: string;
  config?: string;
  verbose?: boolean;
}

/**
 * Collect repeated option values into an array
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

function fail(message: string, err?: unknown): never {
  console.error(message);
  if (err !== undefined) {
    console.error(err instanceof Error ? err.message : err);
  }
  process.exit(1);
}

program
  .name('slider')
  .description('Slide preprocessor and pandoc slide renderer')
  .version(VERSION);

program
  .command('preprocess')
  .description('Expand preprocessor directives and write the result to stdout')
  .argument('[files...]', 'Files to read (default: standard input)')
  .option('-R, --root <dir>', 'Root directory')
  .option('-B, --base <dir>', 'Base directory for relative image links')
  .option('-D, --define <symbol>', 'Define symbol (repeatable)', collect, [])
  .option('-s, --slides', `Define symbol "${SYMBOL_SLIDES}"`)
  .option('-I, --include <dir>', 'Add directory to include search path (repeatable)', collect, [])
  .addOption(
    new Option('-P, --parser <syntax>', 'Select line parser')
      .choices(['hash', 'html'])
      .default('hash'),
  )
  .action(async (files: string[], options: PreprocessCliOptions) => {
    process.on('SIGINT', () => process.exit(0));

    const config = createPreprocessorConfig({
      root: options.root,
      base: options.base,
      includes: options.include,
      define: options.define,
      slides: options.slides,
    });

    let sources: SourceFile[];
    try {
      sources =
        files.length > 0
          ? files.map((file) => SourceFile.fromPath(file))
          : [SourceFile.fromText('<stdin>', await readStdin())];
    } catch (err) {
      fail('Error reading input:', err);
    }

    try {
      new SlidePreprocessor(config, sources, options.parser, (line) => {
        process.stdout.write(`${line}\n`);
      }).run();
    } catch (err) {
      fail('Error during preprocessing:', err);
    }
  });

program
  .command('render')
  .description('Render a slide source (.md with pandoc, .txt with asciidoc)')
  .argument('<file>', 'Slide source file')
  .option('--notes', 'Render notes (PDF) instead of slides (HTML)')
  .addOption(new Option('--style <style>', 'Slide style').choices(SLIDE_STYLES))
  .option('--static-url <url>', 'URL the slide style assets are served from', '/static')
  .option('-o, --output <file>', 'Output file (default: stdout for slides, temp file for notes)')
  .option('-c, --config <file>', 'Config file (default: slider.config.json)')
  .option('--verbose', 'Verbose output')
  .action(async (file: string, options: RenderCliOptions) => {
    const { verbose } = options;
    const config = loadConfig(options.config);
    const slideStyle = isSlideStyle(options.style) ? options.style : config.slideStyle;

    if (verbose) {
      console.error('Config:', JSON.stringify(config, null, 2));
    }

    try {
      const result = await renderDocument(file, options.notes ? 'notes' : 'slides', config, {
        filterPath: join(__dirname, 'filter.js'),
        slideStyle,
        styleUrl: styleUrlFor(slideStyle, options.staticUrl),
        outputPath: options.output,
        onProgress: verbose ? (message) => console.error(message) : undefined,
      });

      if (result.outputPath) {
        console.error(`Exported: ${result.outputPath}`);
      } else if (result.output && options.output) {
        await writeFile(options.output, result.output);
        console.error(`Exported: ${options.output}`);
      } else if (result.output) {
        process.stdout.write(result.output);
      }
    } catch (err) {
      fail(`Rendering ${file} failed:`, err);
    }
  });

// Parse command line
program.parseAsync().catch((err) => fail('slider failed:', err));
