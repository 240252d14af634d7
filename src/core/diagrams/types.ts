/**
 * Diagram renderer interface
 *
 * Implementations call an external tool (dot, blockdiag, convert, ...) that
 * writes its result to a file in the content-addressed cache.
 */

export type ImageFormat = 'svg' | 'png';

export interface RenderRequest {
  /** Engine/executable name, e.g. "dot" or "seqdiag" */
  engine: string;
  format: ImageFormat;
  /** Diagram source */
  source: string;
  /** File the renderer must create */
  outputPath: string;
  /** Source file for tools that cannot read standard input */
  inputPath?: string;
}

export interface DiagramRenderer {
  /**
   * Render a diagram into request.outputPath
   */
  render(request: RenderRequest): Promise<void>;
}

/**
 * Rasterizes an existing SVG file to PNG
 */
export interface SvgConverter {
  convert(svgPath: string, pngPath: string): Promise<void>;
}
