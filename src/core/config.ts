/**
 * Configuration for slider
 * Shared between the CLI, the render pipeline and the filter process
 */

import { readFileSync, existsSync, statSync } from 'fs';
import { homedir, tmpdir } from 'os';
import { isAbsolute, join, resolve, sep } from 'path';

export type SlideStyle =
  | 's5'
  | 'slidy'
  | 'slideous'
  | 'dzslides'
  | 'revealjs';

export type LineSyntax = 'hash' | 'html';

/** Symbol that switches the preprocessor into slide mode */
export const SYMBOL_SLIDES = 'slides';

export interface SliderConfig {
  /** Directory that holds all slide sources; nothing outside is served */
  rootDir: string;

  /** Directories searched by the include and image directives */
  includePaths: string[];

  // Content-addressed cache for generated images
  tempDir: string;
  tempLink: string; // site-relative URL prefix of tempDir

  slideStyle: SlideStyle;

  // Citation processing is only enabled when a bibliography is configured
  citeStyle?: string;
  bibliography?: string;
}

export function createDefaultConfig(cwd: string = process.cwd()): SliderConfig {
  return {
    rootDir: cwd,
    includePaths: [join(cwd, 'pandoc')],
    tempDir: join(tmpdir(), 'slider'),
    tempLink: '/slider-temp/',
    slideStyle: 'slidy',
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Keep only the known keys of a parsed config file, with their expected types
 */
function sanitizeConfig(raw: unknown): Partial<SliderConfig> {
  if (!isRecord(raw)) return {};

  const result: Partial<SliderConfig> = {};
  const { rootDir, includePaths, tempDir, tempLink, slideStyle, citeStyle, bibliography } = raw;

  if (typeof rootDir === 'string') result.rootDir = rootDir;
  if (Array.isArray(includePaths)) {
    result.includePaths = includePaths.filter(
      (p): p is string => typeof p === 'string',
    );
  } else if (typeof includePaths === 'string') {
    // Colon separated list, as in a PATH variable
    result.includePaths = includePaths
      .split(':')
      .map((p) => p.trim())
      .filter((p) => p.length > 0);
  }
  if (typeof tempDir === 'string') result.tempDir = tempDir;
  if (typeof tempLink === 'string') result.tempLink = tempLink;
  if (isSlideStyle(slideStyle)) result.slideStyle = slideStyle;
  if (typeof citeStyle === 'string') result.citeStyle = citeStyle;
  if (typeof bibliography === 'string') result.bibliography = bibliography;

  return result;
}

export function isSlideStyle(value: unknown): value is SlideStyle {
  return (
    value === 's5' ||
    value === 'slidy' ||
    value === 'slideous' ||
    value === 'dzslides' ||
    value === 'revealjs'
  );
}

/**
 * Resolve include paths relative to the root directory
 */
function resolveIncludePaths(config: SliderConfig): SliderConfig {
  return {
    ...config,
    includePaths: config.includePaths.map((p) =>
      isAbsolute(p) ? p : resolve(config.rootDir, p),
    ),
  };
}

/**
 * Load config from file, merging with defaults
 */
export function loadConfig(configPath?: string): SliderConfig {
  const home = homedir();
  const defaultPaths = [
    'slider.config.json',
    '.slider.json',
    join(home, '.slider.json'),
    join(home, '.config', 'slider.json'),
  ];

  let configFile: string | undefined;

  if (configPath) {
    configFile = configPath;
  } else {
    for (const path of defaultPaths) {
      if (existsSync(path)) {
        configFile = path;
        break;
      }
    }
  }

  if (!configFile || !existsSync(configFile)) {
    return createDefaultConfig();
  }

  try {
    const content = readFileSync(configFile, 'utf-8');
    const parsed = sanitizeConfig(JSON.parse(content));
    // Include paths default to <rootDir>/pandoc, so they follow a configured root
    const defaults = createDefaultConfig(
      parsed.rootDir ? resolve(parsed.rootDir) : process.cwd(),
    );
    return resolveIncludePaths({ ...defaults, ...parsed });
  } catch (e) {
    console.warn(`Warning: Failed to load config from ${configFile}:`, e);
    return createDefaultConfig();
  }
}

/**
 * Temp directory settings as handed to the filter process
 */
export interface TempSettings {
  tempDir: string;
  tempLink: string;
}

export const ENV_TEMPDIR = 'SLIDER_TEMPDIR';
export const ENV_TEMPLINK = 'SLIDER_TEMPLINK';

export function tempSettingsFromEnv(
  env: NodeJS.ProcessEnv,
  fallback: TempSettings,
): TempSettings {
  return {
    tempDir: env[ENV_TEMPDIR] || fallback.tempDir,
    tempLink: env[ENV_TEMPLINK] || fallback.tempLink,
  };
}

export function tempSettingsToEnv(settings: TempSettings): Record<string, string> {
  return {
    [ENV_TEMPDIR]: settings.tempDir,
    [ENV_TEMPLINK]: settings.tempLink,
  };
}

/**
 * Immutable settings for one preprocessor run
 */
export interface PreprocessorConfig {
  /** Absolute root directory; images must lie below it */
  readonly root: string;
  /** Base directory relative to root (e.g. "/lectures/ch1"), or "" */
  readonly base: string;
  readonly includes: readonly string[];
  /** Lower-cased defined symbols */
  readonly symbols: ReadonlySet<string>;
}

export interface PreprocessorOptions {
  root?: string;
  base?: string;
  includes?: string[];
  define?: string[];
  slides?: boolean;
}

function isDirectory(path: string): boolean {
  try {
    return statSync(path).isDirectory();
  } catch {
    return false;
  }
}

function withTrailingSep(path: string): string {
  return path.endsWith(sep) ? path : path + sep;
}

/**
 * Absolute directory for a name; the current directory if it does not exist.
 * With a root, directories outside of it are clamped to the root.
 */
export function directory(root: string | undefined, name: string | undefined): string {
  const existing = name !== undefined && isDirectory(name) ? name : process.cwd();
  const result = resolve(existing);
  if (root !== undefined && result !== root && !result.startsWith(withTrailingSep(root))) {
    return root;
  }
  return result;
}

export function includeDirectories(includes: readonly string[] = []): string[] {
  return includes.filter(isDirectory).map((name) => resolve(name));
}

export function createPreprocessorConfig(
  options: PreprocessorOptions = {},
): PreprocessorConfig {
  const root = directory(undefined, options.root);
  const symbols = new Set((options.define ?? []).map((s) => s.toLowerCase()));
  if (options.slides) {
    symbols.add(SYMBOL_SLIDES);
  }

  return Object.freeze({
    root,
    base: directory(root, options.base).substring(root.length),
    includes: Object.freeze(includeDirectories(options.includes)),
    symbols,
  });
}
