import { describe, it, expect } from 'vitest';
import {
  buildAsciidocCommand,
  buildPandocNotesCommand,
  buildPandocSlidesCommand,
  rendererFor,
  styleUrlFor,
} from './converters';

describe('rendererFor', () => {
  it('selects the converter by extension', () => {
    expect(rendererFor('lecture.md')).toBe('pandoc');
    expect(rendererFor('/srv/slides/Lecture.MD')).toBe('pandoc');
    expect(rendererFor('lecture.txt')).toBe('asciidoc');
  });

  it('returns null for unknown files', () => {
    expect(rendererFor('lecture.html')).toBeNull();
    expect(rendererFor('README')).toBeNull();
  });
});

describe('styleUrlFor', () => {
  it('appends the theme directory for s5', () => {
    expect(styleUrlFor('s5', '/static')).toBe('/static/s5/ui/default');
  });

  it('uses the style directory for other styles', () => {
    expect(styleUrlFor('slidy')).toBe('/static/slidy');
  });
});

describe('buildPandocSlidesCommand', () => {
  it('builds the slide command', () => {
    expect(
      buildPandocSlidesCommand({
        filterPath: '/opt/slider/filter.js',
        slideStyle: 'slidy',
        styleUrl: '/static/slidy',
      }),
    ).toEqual([
      'pandoc',
      '-f',
      'markdown+smart',
      '-s',
      '-F',
      '/opt/slider/filter.js',
      '--slide-level',
      '2',
      '-t',
      'slidy',
      '-V',
      'slidy-url=/static/slidy',
    ]);
  });

  it('omits the style URL for dzslides', () => {
    const command = buildPandocSlidesCommand({
      filterPath: 'filter.js',
      slideStyle: 'dzslides',
      styleUrl: '/static/dzslides',
    });
    expect(command).not.toContain('-V');
    expect(command.slice(-2)).toEqual(['-t', 'dzslides']);
  });

  it('adds citation processing with a bibliography', () => {
    const command = buildPandocSlidesCommand({
      filterPath: 'filter.js',
      slideStyle: 'revealjs',
      bibliography: 'refs.bib',
      citeStyle: 'ieee.csl',
    });
    expect(command.slice(4, 9)).toEqual([
      '--citeproc',
      '--bibliography',
      'refs.bib',
      '--csl',
      'ieee.csl',
    ]);
  });

  it('ignores a cite style without a bibliography', () => {
    const command = buildPandocSlidesCommand({
      filterPath: 'filter.js',
      slideStyle: 'revealjs',
      citeStyle: 'ieee.csl',
    });
    expect(command).not.toContain('--citeproc');
    expect(command).not.toContain('--csl');
  });
});

describe('buildPandocNotesCommand', () => {
  it('builds the PDF command', () => {
    expect(
      buildPandocNotesCommand({ filterPath: 'filter.js', outputPath: '/tmp/notes.pdf' }),
    ).toEqual([
      'pandoc',
      '-f',
      'markdown+smart',
      '--pdf-engine=xelatex',
      '-F',
      'filter.js',
      '-o',
      '/tmp/notes.pdf',
      '-V',
      'documentclass=scrartcl',
      '-V',
      'margin-left=1in',
      '-V',
      'margin-top=1in',
    ]);
  });
});

describe('buildAsciidocCommand', () => {
  it('selects the backend by kind', () => {
    expect(buildAsciidocCommand('slides', 'a.txt')).toEqual([
      'asciidoc',
      '-a',
      'beamer',
      '-o',
      '-',
      'a.txt',
    ]);
    expect(buildAsciidocCommand('notes', 'a.txt')).toEqual([
      'asciidoc',
      '-a',
      'script',
      '-o',
      '-',
      'a.txt',
    ]);
  });
});
