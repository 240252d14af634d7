/**
 * Injects document metadata into text: "%{course}" becomes the value of the
 * front matter field "course". Inside link targets pandoc has already
 * percent-encoded the braces, so "%%7Bcourse%7D" is matched there.
 */

import {
  Link,
  Str,
  isLink,
  isNode,
  isStr,
  stringify,
  type Inline,
  type PandocNode,
} from '../pandoc/ast';
import type { FilterContext, NodeHandlers, PandocFilter } from './types';

export const METAVAR_TEXT_PATTERN = /%\{(.*?)\}/g;
export const METAVAR_LINK_PATTERN = /%%7B(.*?)%7D/g;

interface VariableOccurrence {
  name: string;
  start: number;
  end: number;
}

function findVariables(value: string, pattern: RegExp): VariableOccurrence[] {
  const regex = new RegExp(pattern.source, 'g');
  return [...value.matchAll(regex)]
    .filter((match) => match.index !== undefined)
    .map((match) => ({
      name: match[1],
      start: match.index ?? 0,
      end: (match.index ?? 0) + match[0].length,
    }));
}

/**
 * Plain string value of a metadata field, or null if there is none
 */
export function lookupVariable(
  name: string,
  meta: Record<string, unknown>,
): string | null {
  if (!Object.prototype.hasOwnProperty.call(meta, name)) return null;
  const value = meta[name];
  if (!isNode(value)) return null;

  if (value.t === 'MetaInlines' && Array.isArray(value.c)) {
    return stringify(value.c);
  }
  if (value.t === 'MetaString' && typeof value.c === 'string') {
    return value.c;
  }
  return null;
}

/**
 * Replace all known variables in a string
 *
 * Occurrences are collected first and replaced from the end, so earlier
 * offsets stay valid. Returns null if nothing was replaced.
 *
 * @example
 * replaceMetavars('Title: %{course}', { course: { t: 'MetaString', c: 'CS101' } }, METAVAR_TEXT_PATTERN)
 * // => 'Title: CS101'
 */
export function replaceMetavars(
  value: string,
  meta: Record<string, unknown>,
  pattern: RegExp,
): string | null {
  const occurrences = findVariables(value, pattern);
  if (occurrences.length === 0) return null;

  let result = value;
  let changed = false;
  for (let i = occurrences.length - 1; i >= 0; i--) {
    const { name, start, end } = occurrences[i];
    const replacement = lookupVariable(name, meta);
    if (replacement === null) continue;

    result = result.substring(0, start) + replacement + result.substring(end);
    changed = true;
  }

  return changed ? result : null;
}

export class MetaVarFilter implements PandocFilter {
  readonly name = 'metavar';

  begin(): NodeHandlers {
    return {
      str: (node, context) => this.processStr(node, context),
      link: (node, context) => this.processLink(node, context),
    };
  }

  private processStr(node: PandocNode, { meta }: FilterContext): PandocNode | null {
    if (!isStr(node)) return null;
    const value = replaceMetavars(node.c, meta, METAVAR_TEXT_PATTERN);
    return value !== null ? Str(value) : null;
  }

  private processLink(node: PandocNode, { meta }: FilterContext): PandocNode | null {
    if (!isLink(node)) return null;
    const [attr, texts, [url, title]] = node.c;
    let changed = false;

    const newTexts: Inline[] = texts.map((text) => {
      if (!isStr(text)) return text;
      const value = replaceMetavars(text.c, meta, METAVAR_TEXT_PATTERN);
      if (value === null) return text;
      changed = true;
      return Str(value);
    });

    const [newUrl, newTitle] = [url, title].map((part) => {
      const value = replaceMetavars(part, meta, METAVAR_LINK_PATTERN);
      if (value === null) return part;
      changed = true;
      return value;
    });

    return changed ? Link(attr, newTexts, [newUrl, newTitle]) : null;
  }
}
