import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { runTool } from '../process';
import { BlockdiagRenderer } from './blockdiag';
import { GraphvizRenderer } from './graphviz';
import { ImageMagickConverter } from './imagemagick';

vi.mock('../process', () => ({
  runTool: vi.fn(async () => Buffer.alloc(0)),
}));

const runToolMock = vi.mocked(runTool);

describe('diagram renderers', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'slider-renderers-'));
    runToolMock.mockClear();
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('pipes graphviz sources to the engine', async () => {
    const onStderr = vi.fn();
    await new GraphvizRenderer({ onStderr }).render({
      engine: 'neato',
      format: 'png',
      source: 'graph { a -- b }',
      outputPath: '/cache/neato/x.png',
    });

    expect(runToolMock).toHaveBeenCalledWith('neato', ['-T', 'png', '-o', '/cache/neato/x.png'], {
      input: 'graph { a -- b }',
      onStderr,
    });
  });

  it('writes blockdiag sources to the input file', async () => {
    const inputPath = join(dir, 'x.seqdiag');
    await new BlockdiagRenderer().render({
      engine: 'seqdiag',
      format: 'svg',
      source: 'seqdiag { a -> b; }',
      outputPath: join(dir, 'x.svg'),
      inputPath,
    });

    expect(readFileSync(inputPath, 'utf-8')).toBe('seqdiag { a -> b; }\n');
    expect(runToolMock).toHaveBeenCalledWith(
      'seqdiag',
      ['-T', 'svg', '-o', join(dir, 'x.svg'), inputPath],
      { onStderr: undefined },
    );
  });

  it('needs an input file for blockdiag', async () => {
    await expect(
      new BlockdiagRenderer().render({
        engine: 'blockdiag',
        format: 'svg',
        source: 'blockdiag { a -> b; }',
        outputPath: join(dir, 'x.svg'),
      }),
    ).rejects.toThrow('blockdiag needs an input file');
    expect(runToolMock).not.toHaveBeenCalled();
  });

  it('converts SVG files with convert', async () => {
    await new ImageMagickConverter({ convertPath: '/usr/local/bin/convert' }).convert(
      'in.svg',
      'out.png',
    );

    expect(runToolMock).toHaveBeenCalledWith('/usr/local/bin/convert', ['in.svg', 'out.png'], {
      onStderr: undefined,
    });
  });
});
