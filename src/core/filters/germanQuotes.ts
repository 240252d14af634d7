/**
 * Translates "´´" into German quotation marks.
 *
 * The marker does not say whether it opens or closes a quote, so the filter
 * alternates between both over the whole document.
 */

import { Str, isStr } from '../pandoc/ast';
import { isHtmlFormat, type NodeHandlers, type PandocFilter } from './types';

export const QUOTE_MARKER = '´´';

const OPENING_QUOTE = '„';
const CLOSING_QUOTE = '“';

export interface QuoteState {
  /** Whether the next marker opens a quote */
  opening: boolean;
}

export function createQuoteState(): QuoteState {
  return { opening: true };
}

function quoteReplacement(format: string, state: QuoteState): string {
  if (isHtmlFormat(format) || format === 'latex') {
    return state.opening ? OPENING_QUOTE : CLOSING_QUOTE;
  }
  if (format) {
    console.warn(`German quotes: no quote characters for format ${format}`);
  }
  return '';
}

/**
 * Replace all markers, left to right; null if there was none
 *
 * @example
 * const state = createQuoteState();
 * replaceQuotes('´´Hallo´´', 'html', state) // => '„Hallo“'
 */
export function replaceQuotes(
  value: string,
  format: string,
  state: QuoteState,
): string | null {
  if (!value.includes(QUOTE_MARKER)) return null;

  const parts = value.split(QUOTE_MARKER);
  let result = parts[0];
  for (let i = 1; i < parts.length; i++) {
    result += quoteReplacement(format, state) + parts[i];
    state.opening = !state.opening;
  }
  return result;
}

export class GermanQuotesFilter implements PandocFilter {
  readonly name = 'german-quotes';

  begin(): NodeHandlers {
    const state = createQuoteState();

    return {
      str: (node, { format }) => {
        if (!isStr(node)) return null;
        const value = replaceQuotes(node.c, format, state);
        return value !== null ? Str(value) : null;
      },
    };
  }
}
