import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { writeFile } from 'fs/promises';
import { tmpdir } from 'os';
import { join } from 'path';
import { ContentCache, sha256 } from '../cache';
import type { SvgConverter } from '../diagrams/types';
import { Image, Para, Str, type PandocDocument } from '../pandoc/ast';
import { SvgFilter } from './svg';
import { applyFilters } from './walk';

const SVG = '<svg xmlns="http://www.w3.org/2000/svg"/>';

function imageDoc(ref: string): PandocDocument {
  return { meta: {}, blocks: [Para([Image(['', [], []], [Str('Chart')], [ref, ''])])] };
}

function createFakeConverter() {
  const convert = vi.fn(async (_svgPath: string, pngPath: string) => {
    await writeFile(pngPath, 'png');
  });
  const converter: SvgConverter = { convert };
  return { converter, convert };
}

describe('SvgFilter', () => {
  let baseDir: string;
  let tempDir: string;
  let cache: ContentCache;

  beforeEach(() => {
    baseDir = mkdtempSync(join(tmpdir(), 'slider-svg-'));
    tempDir = mkdtempSync(join(tmpdir(), 'slider-svg-cache-'));
    cache = new ContentCache(tempDir, '/slider-temp/');
  });

  afterEach(() => {
    rmSync(baseDir, { recursive: true, force: true });
    rmSync(tempDir, { recursive: true, force: true });
    vi.restoreAllMocks();
  });

  it('uses an existing PNG next to the SVG', async () => {
    writeFileSync(join(baseDir, 'chart.svg'), SVG);
    writeFileSync(join(baseDir, 'chart.png'), 'png');
    const { converter, convert } = createFakeConverter();
    const doc = imageDoc('chart.svg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'latex');

    expect(doc.blocks).toEqual([Para([Image(['', [], []], [Str('Chart')], ['chart.png', ''])])]);
    expect(convert).not.toHaveBeenCalled();
  });

  it('converts the SVG into the cache', async () => {
    writeFileSync(join(baseDir, 'chart.svg'), SVG);
    const { converter, convert } = createFakeConverter();
    const pngPath = join(tempDir, 'convert', `${sha256(SVG)}.png`);
    const doc = imageDoc('chart.svg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'latex');

    expect(doc.blocks).toEqual([Para([Image(['', [], []], [Str('Chart')], [pngPath, ''])])]);
    expect(convert).toHaveBeenCalledWith(join(baseDir, 'chart.svg'), pngPath);
  });

  it('converts the same SVG only once', async () => {
    writeFileSync(join(baseDir, 'chart.svg'), SVG);
    const { converter, convert } = createFakeConverter();
    const filter = new SvgFilter({ cache, converter, baseDir });

    await applyFilters(imageDoc('chart.svg'), [filter], 'latex');
    await applyFilters(imageDoc('chart.svg'), [filter], 'latex');

    expect(convert).toHaveBeenCalledTimes(1);
  });

  it('only acts on LaTeX output', async () => {
    writeFileSync(join(baseDir, 'chart.svg'), SVG);
    const { converter, convert } = createFakeConverter();
    const doc = imageDoc('chart.svg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'html5');

    expect(doc).toEqual(imageDoc('chart.svg'));
    expect(convert).not.toHaveBeenCalled();
  });

  it('leaves other image types alone', async () => {
    const { converter, convert } = createFakeConverter();
    const doc = imageDoc('photo.jpg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'latex');

    expect(doc).toEqual(imageDoc('photo.jpg'));
    expect(convert).not.toHaveBeenCalled();
  });

  it('leaves a missing SVG alone', async () => {
    const { converter, convert } = createFakeConverter();
    const doc = imageDoc('missing.svg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'latex');

    expect(doc).toEqual(imageDoc('missing.svg'));
    expect(convert).not.toHaveBeenCalled();
  });

  it('leaves the image alone when the conversion fails', async () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    writeFileSync(join(baseDir, 'chart.svg'), SVG);
    const converter: SvgConverter = {
      convert: vi.fn(async () => {
        throw new Error('convert: no decode delegate');
      }),
    };
    const doc = imageDoc('chart.svg');

    await applyFilters(doc, [new SvgFilter({ cache, converter, baseDir })], 'latex');

    expect(doc).toEqual(imageDoc('chart.svg'));
    expect(warn).toHaveBeenCalledWith(
      'SVG conversion of chart.svg failed:',
      'convert: no decode delegate',
    );
  });
});
