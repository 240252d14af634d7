/**
 * Replaces SVG images by PNG images for LaTeX/PDF output
 */

import { access, readFile } from 'fs/promises';
import mimes from 'mime';
import { extname, resolve } from 'path';
import type { SvgConverter } from '../diagrams/types';
import { Image, isImage, type PandocNode } from '../pandoc/ast';
import type { FileFilterOptions } from './diagram';
import type { FilterContext, NodeHandlers, PandocFilter } from './types';

/** Cache subdirectory for converted images */
export const SVG_CACHE_NAME = 'convert';

export interface SvgFilterOptions extends FileFilterOptions {
  converter: SvgConverter;
  /** Directory image references are relative to. Default: process.cwd() */
  baseDir?: string;
}

function isMissingFile(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

export class SvgFilter implements PandocFilter {
  readonly name = 'svg';
  private readonly baseDir: string;

  constructor(private readonly options: SvgFilterOptions) {
    this.baseDir = options.baseDir ?? process.cwd();
  }

  begin(): NodeHandlers {
    return {
      image: (node, context) => this.processImage(node, context),
    };
  }

  private async processImage(
    node: PandocNode,
    { format }: FilterContext,
  ): Promise<PandocNode | null> {
    if (format !== 'latex' || !isImage(node)) return null;

    const [attr, caption, [imageRef, title]] = node.c;
    if (mimes.getType(imageRef) !== 'image/svg+xml') return null;

    const pngRef =
      (await this.substitutePng(imageRef)) ?? (await this.convertSvgToPng(imageRef));
    return pngRef ? Image(attr, caption, [pngRef, title]) : null;
  }

  /**
   * An existing PNG next to the SVG, e.g. "chart.png" for "chart.svg"
   */
  async substitutePng(imageRef: string): Promise<string | null> {
    const pngRef = imageRef.substring(0, imageRef.length - extname(imageRef).length) + '.png';
    try {
      await access(resolve(this.baseDir, pngRef));
      return pngRef;
    } catch {
      return null;
    }
  }

  /**
   * Rasterize the SVG into the cache; null if that is not possible
   */
  async convertSvgToPng(imageRef: string): Promise<string | null> {
    const svgPath = resolve(this.baseDir, imageRef);
    let code: string;
    try {
      code = await readFile(svgPath, 'utf-8');
    } catch (error) {
      if (isMissingFile(error)) return null;
      throw error;
    }

    const { cache, converter, onProgress } = this.options;
    const entry = cache.entryFor(SVG_CACHE_NAME, code, 'png');
    if (await cache.has(entry)) {
      return entry.fullName;
    }

    if (await cache.prepare(entry)) {
      onProgress?.(`Created directory ${entry.directory}`);
    }
    onProgress?.(`Call 'convert' to create ${entry.fullName}`);
    try {
      await converter.convert(svgPath, entry.fullName);
    } catch (error) {
      console.warn(
        `SVG conversion of ${imageRef} failed:`,
        error instanceof Error ? error.message : error,
      );
      return null;
    }

    return (await cache.has(entry)) ? entry.fullName : null;
  }
}
