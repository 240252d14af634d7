/**
 * blockdiag family renderer (blockdiag, seqdiag, actdiag, nwdiag, ...)
 *
 * These tools only read from a file, so the caller provides
 * request.inputPath and this renderer writes the source there first.
 */

import { writeFile } from 'fs/promises';
import { runTool } from '../process';
import type { DiagramRenderer, RenderRequest } from './types';

export const BLOCKDIAG_ENGINES = [
  'blockdiag',
  'seqdiag',
  'actdiag',
  'nwdiag',
  'packetdiag',
  'rackdiag',
] as const;

export interface BlockdiagOptions {
  onStderr?: (text: string) => void;
}

export class BlockdiagRenderer implements DiagramRenderer {
  constructor(private readonly options: BlockdiagOptions = {}) {}

  async render(request: RenderRequest): Promise<void> {
    if (!request.inputPath) {
      throw new Error(`${request.engine} needs an input file`);
    }

    await writeFile(request.inputPath, `${request.source}\n`);
    await runTool(
      request.engine,
      ['-T', request.format, '-o', request.outputPath, request.inputPath],
      { onStderr: this.options.onStderr },
    );
  }
}
