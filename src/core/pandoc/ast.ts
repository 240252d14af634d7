/**
 * Pandoc JSON AST
 *
 * Only the elements the slide filters create or inspect are typed; every
 * other element travels through as a generic node.
 */

/**
 * Any element of the document: a type tag and an optional payload
 */
export interface PandocNode {
  t: string;
  c?: unknown;
}

/**
 * Attributes: [id, classes, key-value pairs]
 */
export type Attr = [string, string[], [string, string][]];

/**
 * Target for links and images: [url, title]
 */
export type Target = [string, string];

export type Inline =
  | Inline_Str
  | Inline_Space
  | Inline_Strong
  | Inline_Link
  | Inline_Image
  | PandocNode;

export type Inline_Str = { t: 'Str'; c: string };
export type Inline_Space = { t: 'Space' };
export type Inline_Strong = { t: 'Strong'; c: Inline[] };
export type Inline_Link = { t: 'Link'; c: [Attr, Inline[], Target] };
export type Inline_Image = { t: 'Image'; c: [Attr, Inline[], Target] };

export type Block_Plain = { t: 'Plain'; c: Inline[] };
export type Block_Para = { t: 'Para'; c: Inline[] };
export type Block_CodeBlock = { t: 'CodeBlock'; c: [Attr, string] };

export type MetaValue_Inlines = { t: 'MetaInlines'; c: Inline[] };
export type MetaValue_String = { t: 'MetaString'; c: string };

export interface PandocDocument {
  'pandoc-api-version'?: number[];
  meta: Record<string, unknown>;
  blocks: unknown[];
}

/**
 * Tags of all pandoc block elements
 */
export const BLOCK_TAGS: ReadonlySet<string> = new Set([
  'Plain',
  'Para',
  'LineBlock',
  'CodeBlock',
  'RawBlock',
  'BlockQuote',
  'OrderedList',
  'BulletList',
  'DefinitionList',
  'Header',
  'HorizontalRule',
  'Table',
  'Figure',
  'Div',
  'Null',
]);

// Constructors

export const Str = (text: string): Inline_Str => ({ t: 'Str', c: text });

export const Strong = (content: Inline[]): Inline_Strong => ({ t: 'Strong', c: content });

export const Link = (attr: Attr, content: Inline[], target: Target): Inline_Link => ({
  t: 'Link',
  c: [attr, content, target],
});

export const Image = (attr: Attr, caption: Inline[], target: Target): Inline_Image => ({
  t: 'Image',
  c: [attr, caption, target],
});

export const Plain = (content: Inline[]): Block_Plain => ({ t: 'Plain', c: content });

export const Para = (content: Inline[]): Block_Para => ({ t: 'Para', c: content });

export const CodeBlock = (attr: Attr, code: string): Block_CodeBlock => ({
  t: 'CodeBlock',
  c: [attr, code],
});

// Guards

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function isNode(value: unknown): value is PandocNode {
  return isRecord(value) && typeof value.t === 'string';
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isKeyValues(value: unknown): value is [string, string][] {
  return (
    Array.isArray(value) &&
    value.every(
      (kv) =>
        Array.isArray(kv) &&
        kv.length === 2 &&
        typeof kv[0] === 'string' &&
        typeof kv[1] === 'string',
    )
  );
}

export function isAttr(value: unknown): value is Attr {
  return (
    Array.isArray(value) &&
    value.length === 3 &&
    typeof value[0] === 'string' &&
    isStringArray(value[1]) &&
    isKeyValues(value[2])
  );
}

function isTarget(value: unknown): value is Target {
  return (
    Array.isArray(value) &&
    value.length === 2 &&
    typeof value[0] === 'string' &&
    typeof value[1] === 'string'
  );
}

function isInlineList(value: unknown): value is Inline[] {
  return Array.isArray(value) && value.every(isNode);
}

export function isStr(node: PandocNode): node is Inline_Str {
  return node.t === 'Str' && typeof node.c === 'string';
}

export function isCodeBlock(node: PandocNode): node is Block_CodeBlock {
  return (
    node.t === 'CodeBlock' &&
    Array.isArray(node.c) &&
    node.c.length === 2 &&
    isAttr(node.c[0]) &&
    typeof node.c[1] === 'string'
  );
}

function hasLinkShape(node: PandocNode): boolean {
  return (
    Array.isArray(node.c) &&
    node.c.length === 3 &&
    isAttr(node.c[0]) &&
    isInlineList(node.c[1]) &&
    isTarget(node.c[2])
  );
}

export function isLink(node: PandocNode): node is Inline_Link {
  return node.t === 'Link' && hasLinkShape(node);
}

export function isImage(node: PandocNode): node is Inline_Image {
  return node.t === 'Image' && hasLinkShape(node);
}

// Helpers

/**
 * Flatten inline elements to plain text
 *
 * @example
 * stringify([Str('Intro'), { t: 'Space' }, Str('CS')]) // => 'Intro CS'
 */
export function stringify(inlines: readonly unknown[]): string {
  return inlines
    .map((inline) => {
      if (!isNode(inline)) return '';
      switch (inline.t) {
        case 'Str':
          return typeof inline.c === 'string' ? inline.c : '';
        case 'Space':
        case 'SoftBreak':
        case 'LineBreak':
          return ' ';
        default: {
          // Emph and Strong hold inlines directly; Span, Link, Quoted next to other data
          if (!Array.isArray(inline.c)) return '';
          if (inline.c.every(isNode)) return stringify(inline.c);
          const content = inline.c.find(
            (part) => Array.isArray(part) && part.length > 0 && part.every(isNode),
          );
          return Array.isArray(content) ? stringify(content) : '';
        }
      }
    })
    .join('');
}

/**
 * Remove a "caption" attribute from key-value pairs
 *
 * Returns the caption inlines, the image title ("fig:" marks a figure) and
 * the remaining pairs.
 */
export function getCaption(
  keyvals: [string, string][],
): { caption: Inline[]; title: string; keyvals: [string, string][] } {
  let caption: string | null = null;
  const rest: [string, string][] = [];
  for (const [key, value] of keyvals) {
    if (key === 'caption') {
      caption = value;
    } else {
      rest.push([key, value]);
    }
  }
  if (caption === null) {
    return { caption: [], title: '', keyvals: rest };
  }
  return { caption: [Str(caption)], title: 'fig:', keyvals: rest };
}

/**
 * Parse pandoc's JSON output
 */
export function parseDocument(json: string): PandocDocument {
  const parsed: unknown = JSON.parse(json);
  if (!isRecord(parsed) || !Array.isArray(parsed.blocks)) {
    throw new Error('Input is not a pandoc JSON document');
  }
  const meta = isRecord(parsed.meta) ? parsed.meta : {};
  const version = parsed['pandoc-api-version'];

  const doc: PandocDocument = { meta, blocks: parsed.blocks };
  if (Array.isArray(version) && version.every((v) => typeof v === 'number')) {
    return { 'pandoc-api-version': version, ...doc };
  }
  return doc;
}
