import { describe, it, expect, vi, afterEach } from 'vitest';
import { Para, Str, type PandocDocument, type PandocNode } from '../pandoc/ast';
import { GermanQuotesFilter, createQuoteState, replaceQuotes } from './germanQuotes';
import { applyFilters } from './walk';

const SPACE: PandocNode = { t: 'Space' };

describe('replaceQuotes', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('alternates opening and closing quotes', () => {
    const state = createQuoteState();
    expect(replaceQuotes('´´Hallo´´', 'html', state)).toBe('„Hallo“');
    expect(state.opening).toBe(true);
  });

  it('keeps the state across calls', () => {
    const state = createQuoteState();
    expect(replaceQuotes('´´Hallo', 'latex', state)).toBe('„Hallo');
    expect(state.opening).toBe(false);
    expect(replaceQuotes('Welt´´', 'latex', state)).toBe('Welt“');
    expect(state.opening).toBe(true);
  });

  it('removes markers without a target format', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    const state = createQuoteState();
    expect(replaceQuotes('´´Hallo', '', state)).toBe('Hallo');
    expect(replaceQuotes('Welt´´', '', state)).toBe('Welt');
    expect(warn).not.toHaveBeenCalled();
  });

  it('removes markers and warns for other formats', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    expect(replaceQuotes('´´Hallo´´', 'docx', createQuoteState())).toBe('Hallo');
    expect(warn).toHaveBeenCalledTimes(2);
  });

  it('returns null without a marker', () => {
    const state = createQuoteState();
    expect(replaceQuotes('Hallo', 'html', state)).toBeNull();
    expect(state.opening).toBe(true);
  });
});

describe('GermanQuotesFilter', () => {
  function createDoc(): PandocDocument {
    return {
      meta: {},
      blocks: [Para([Str('´´Hallo'), SPACE, Str('Welt´´')]), Para([Str('´´Tschüss´´')])],
    };
  }

  it('pairs markers across the document', async () => {
    const doc = createDoc();

    await applyFilters(doc, [new GermanQuotesFilter()], 'slidy');
    expect(doc.blocks).toEqual([
      Para([Str('„Hallo'), SPACE, Str('Welt“')]),
      Para([Str('„Tschüss“')]),
    ]);
  });

  it('starts every document with an opening quote', async () => {
    const filter = new GermanQuotesFilter();
    const unbalanced: PandocDocument = { meta: {}, blocks: [Para([Str('´´offen')])] };
    await applyFilters(unbalanced, [filter], 'html');
    expect(unbalanced.blocks).toEqual([Para([Str('„offen')])]);

    const doc = createDoc();
    await applyFilters(doc, [filter], 'html');
    expect(doc.blocks).toEqual([
      Para([Str('„Hallo'), SPACE, Str('Welt“')]),
      Para([Str('„Tschüss“')]),
    ]);
  });
});
