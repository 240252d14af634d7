/**
 * SVG to PNG conversion with ImageMagick's convert
 */

import { runTool } from '../process';
import type { SvgConverter } from './types';

export interface ImageMagickOptions {
  /** Path to the convert executable. Default: 'convert' (assumes in PATH) */
  convertPath?: string;
  onStderr?: (text: string) => void;
}

export class ImageMagickConverter implements SvgConverter {
  private convertPath: string;

  constructor(private readonly options: ImageMagickOptions = {}) {
    this.convertPath = options.convertPath || 'convert';
  }

  async convert(svgPath: string, pngPath: string): Promise<void> {
    await runTool(this.convertPath, [svgPath, pngPath], {
      onStderr: this.options.onStderr,
    });
  }
}
