/**
 * Line preprocessor for slide sources
 *
 * Runs BEFORE the document converter sees the markup. Pandoc has no way to
 * include other files or to select content by symbol, so this handles:
 * - include / image with a search path
 * - ifdef / ifndef / elifdef / else / endif
 * - page / pause markers for slide output
 * - comment lines
 *
 * Two line syntaxes are supported:
 * - hash: `#command arg`
 * - html: `<!--command arg-->`
 */

import { readFileSync, statSync } from 'fs';
import { dirname, posix, resolve, sep } from 'path';
import { SYMBOL_SLIDES, type LineSyntax, type PreprocessorConfig } from './config';

const COMMAND_RE = '[a-z#]+';
const ARGUMENT_RE = '\\S+';

/**
 * Command found on a directive line
 */
export interface DirectiveMatch {
  command: string;
  argument: string | null;
}

export type LineParser = (line: string) => DirectiveMatch | null;

function createLineParser(pattern: string): LineParser {
  const regex = new RegExp(
    pattern.replace('{command}', COMMAND_RE).replace('{argument}', ARGUMENT_RE),
  );

  return (line) => {
    const match = regex.exec(line);
    if (!match) return null;
    return { command: match[1], argument: match[2] ?? null };
  };
}

/**
 * Directive parsers by line syntax
 *
 * @example
 * LINE_PARSERS.hash('#include intro.md')
 * // => { command: 'include', argument: 'intro.md' }
 *
 * LINE_PARSERS.html('<!-- pause -->')
 * // => { command: 'pause', argument: null }
 */
export const LINE_PARSERS: Record<LineSyntax, LineParser> = {
  hash: createLineParser('^\\s*#({command})(?:\\s+({argument}))?$'),
  html: createLineParser('^\\s*<!--\\s*({command})(?:\\s+({argument}))?\\s*-->\\s*$'),
};

function splitLines(text: string): string[] {
  const lines = text.split(/\r\n|\r|\n/);
  if (lines[lines.length - 1] === '') {
    lines.pop();
  }
  return lines;
}

function isFile(path: string): boolean {
  try {
    return statSync(path).isFile();
  } catch {
    return false;
  }
}

/**
 * One input source on the include stack
 */
export class SourceFile {
  /** Index of the next line */
  private position = 0;

  private constructor(
    readonly name: string,
    /** Containing directory; null for standard input */
    readonly directory: string | null,
    /** Absolute path used for cycle detection; null for standard input */
    readonly path: string | null,
    private readonly lines: string[],
  ) {}

  static fromPath(path: string): SourceFile {
    const absolute = resolve(path);
    return new SourceFile(
      path,
      dirname(absolute),
      absolute,
      splitLines(readFileSync(absolute, 'utf-8')),
    );
  }

  /**
   * Source without a file behind it, e.g. standard input
   */
  static fromText(name: string, text: string): SourceFile {
    return new SourceFile(name, null, null, splitLines(text));
  }

  readLine(): string | null {
    if (this.position >= this.lines.length) {
      return null;
    }
    return this.lines[this.position++];
  }
}

export type LineSink = (line: string) => void;

type ArgumentUse = 'required' | 'optional' | 'none';

interface Directive {
  argument: ArgumentUse;
  /** Runs even while output is suppressed, to keep if-blocks balanced */
  always: boolean;
  run: (argument: string) => void;
}

/**
 * Reads all input sources and writes the processed lines to a sink
 */
export class SlidePreprocessor {
  private readonly stack: SourceFile[] = [];
  private readonly pending: SourceFile[];
  private readonly parseLine: LineParser;
  private readonly relativePrefix: string;
  private readonly directives: Map<string, Directive>;

  private emitting = true;
  private readonly ifStack: boolean[] = [];

  constructor(
    private readonly config: PreprocessorConfig,
    sources: SourceFile[],
    syntax: LineSyntax,
    private readonly sink: LineSink,
  ) {
    this.pending = [...sources];
    this.parseLine = LINE_PARSERS[syntax];

    // "/lectures/ch1" -> "../.."
    this.relativePrefix = config.base
      .split(/[\\/]/)
      .filter((segment) => segment.length > 0)
      .map(() => '..')
      .join('/');

    this.directives = new Map<string, Directive>([
      ['#', { argument: 'optional', always: false, run: () => {} }],
      ['ifdef', { argument: 'required', always: true, run: (s) => this.ifdef(s) }],
      ['ifndef', { argument: 'required', always: true, run: (s) => this.ifndef(s) }],
      ['elifdef', { argument: 'required', always: true, run: (s) => this.elifdef(s) }],
      ['else', { argument: 'none', always: true, run: () => this.else() }],
      ['endif', { argument: 'none', always: true, run: () => this.endif() }],
      ['page', { argument: 'none', always: false, run: () => this.page() }],
      ['pause', { argument: 'none', always: false, run: () => this.pause() }],
      ['include', { argument: 'required', always: false, run: (p) => this.include(p) }],
      ['image', { argument: 'required', always: false, run: (p) => this.image(p) }],
    ]);
  }

  /**
   * Read and process all input sources
   */
  run(): void {
    for (let line = this.readLine(); line !== null; line = this.readLine()) {
      this.handleLine(line);
    }
  }

  handleLine(line: string): void {
    const match = this.parseLine(line);
    if (match && this.handleDirective(match)) {
      return;
    }
    this.emit(line);
  }

  /**
   * Process a detected command; false if the line should be treated as text
   */
  private handleDirective(match: DirectiveMatch): boolean {
    const directive = this.directives.get(match.command);
    if (!directive) return false;
    if (directive.argument === 'required' && match.argument === null) {
      return false;
    }
    if (!this.emitting && !directive.always) {
      return false;
    }
    directive.run(match.argument ?? '');
    return true;
  }

  /**
   * Next line from the current source.
   *
   * An exhausted source yields one blank line before the next source takes
   * over, so that include directives on adjacent lines stay separate blocks.
   */
  private readLine(): string | null {
    for (;;) {
      let current = this.current();
      if (!current) {
        const next = this.pending.shift();
        if (!next) return null;
        this.stack.push(next);
        current = next;
      }

      const line = current.readLine();
      if (line !== null) {
        return line;
      }

      this.stack.pop();
      if (this.stack.length > 0 || this.pending.length > 0) {
        return '';
      }
    }
  }

  private current(): SourceFile | undefined {
    return this.stack[this.stack.length - 1];
  }

  private emit(line: string): void {
    if (this.emitting) {
      this.sink(line);
    }
  }

  private hasSymbol(symbol: string): boolean {
    return this.config.symbols.has(symbol.toLowerCase());
  }

  private page(): void {
    this.emit('');
    if (this.hasSymbol(SYMBOL_SLIDES)) {
      this.emit('----');
      this.emit('');
    }
  }

  private pause(): void {
    if (this.hasSymbol(SYMBOL_SLIDES)) {
      this.emit('');
      this.emit('. . .');
      this.emit('');
    }
  }

  private ifdef(symbol: string): void {
    this.ifStack.push(this.emitting);
    this.emitting = this.hasSymbol(symbol);
  }

  private ifndef(symbol: string): void {
    this.ifStack.push(this.emitting);
    this.emitting = !this.hasSymbol(symbol);
  }

  private elifdef(symbol: string): void {
    if (this.ifStack.length > 0) {
      this.emitting = this.hasSymbol(symbol);
    }
  }

  private else(): void {
    if (this.ifStack.length > 0) {
      this.emitting = !this.emitting;
    }
  }

  private endif(): void {
    const saved = this.ifStack.pop();
    if (saved !== undefined) {
      this.emitting = saved;
    }
  }

  /**
   * Candidate paths for a file: the current source's directory first,
   * then the configured include directories
   */
  private candidateNames(filepath: string): string[] {
    const currentDir = this.current()?.directory ?? null;
    const searchList =
      currentDir !== null
        ? [currentDir, ...this.config.includes]
        : [...this.config.includes];
    return searchList.map((dir) => resolve(dir, filepath));
  }

  private isOpen(path: string): boolean {
    for (let i = this.stack.length - 1; i >= 0; i--) {
      if (this.stack[i].path === path) return true;
    }
    return false;
  }

  private include(filepath: string): void {
    let recursive = false;
    for (const candidate of this.candidateNames(filepath)) {
      if (this.isOpen(candidate)) {
        recursive = true;
        continue;
      }
      if (isFile(candidate)) {
        this.stack.push(SourceFile.fromPath(candidate));
        return;
      }
    }
    this.emit(
      recursive
        ? `Recursive include: ${filepath}`
        : `File not found: ${filepath}`,
    );
  }

  private image(filepath: string): void {
    for (const candidate of this.candidateNames(filepath)) {
      if (isFile(candidate)) {
        this.emit(`![](${this.imageUrl(candidate)})\\ `);
        return;
      }
    }
    this.emit(`Image not found: ${filepath}`);
  }

  /**
   * Link to an image below the root: relative to the base directory if one
   * is configured, absolute from the site root otherwise
   */
  private imageUrl(candidate: string): string {
    const root = this.config.root;
    const prefix = root.endsWith(sep) ? root : root + sep;
    if (!candidate.startsWith(prefix)) {
      throw new Error(`Image ${candidate} is outside of root directory ${root}`);
    }

    const relativeName = candidate.substring(prefix.length).split(sep).join('/');
    if (this.relativePrefix) {
      return posix.join(this.relativePrefix, relativeName);
    }
    return '/' + relativeName;
  }
}

/**
 * Run the preprocessor and collect its output
 */
export function preprocessToLines(
  config: PreprocessorConfig,
  sources: SourceFile[],
  syntax: LineSyntax,
): string[] {
  const lines: string[] = [];
  new SlidePreprocessor(config, sources, syntax, (line) => lines.push(line)).run();
  return lines;
}
