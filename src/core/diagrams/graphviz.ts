/**
 * Graphviz renderer (dot, neato, twopi, circo, fdp)
 *
 * Requires graphviz on the PATH. The source is piped to standard input.
 */

import { runTool } from '../process';
import type { DiagramRenderer, RenderRequest } from './types';

export const GRAPHVIZ_ENGINES = ['dot', 'neato', 'twopi', 'circo', 'fdp'] as const;

export interface GraphvizOptions {
  onStderr?: (text: string) => void;
}

export class GraphvizRenderer implements DiagramRenderer {
  constructor(private readonly options: GraphvizOptions = {}) {}

  async render(request: RenderRequest): Promise<void> {
    await runTool(
      request.engine,
      ['-T', request.format, '-o', request.outputPath],
      { input: request.source, onStderr: this.options.onStderr },
    );
  }
}
