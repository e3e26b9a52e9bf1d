import { type CheerioAPI, load } from 'cheerio';

import {
  type ICurrencyAmount,
  type ParseResult,
  ParseFailureReason,
  parseCurrencyAmount,
  scanCurrencyAmount,
} from './price-text.parser';

/** CSS selector, e.g. `table.table_main tr:nth-of-type(2) td:nth-of-type(3)`. */
export type MarkupSelector = string;

const NON_TEXT_ELEMENTS = 'script, style, noscript';
const RAW_SNIPPET_LENGTH = 160;

const collapseWhitespace = (text: string): string => text.replace(/\s+/g, ' ').trim();

const readText = (document: CheerioAPI, selector: MarkupSelector): string | null => {
  const matched = document(selector).first();

  if (matched.length === 0) {
    return null;
  }

  matched.find(NON_TEXT_ELEMENTS).remove();

  return collapseWhitespace(matched.text());
};

export const stripMarkup = (markup: string): string => {
  const document: CheerioAPI = load(markup);
  document(NON_TEXT_ELEMENTS).remove();

  return collapseWhitespace(document.root().text());
};

export const extractSelectorText = (markup: string, selector: MarkupSelector): string | null =>
  readText(load(markup), selector);

/**
 * Tries each selector in order and returns the first amount found. The
 * failure carries the text that could not be parsed, or the head of the page
 * when no selector matched at all.
 */
export const extractAmountFromMarkup = (
  markup: string,
  selectors: readonly MarkupSelector[],
): ParseResult<ICurrencyAmount> => {
  const document: CheerioAPI = load(markup);
  let lastUnparsedText: string | null = null;

  for (const selector of selectors) {
    const text: string | null = readText(document, selector);

    if (text === null) {
      continue;
    }

    const exact: ParseResult<ICurrencyAmount> = parseCurrencyAmount(text);
    const parsed: ParseResult<ICurrencyAmount> = exact.ok ? exact : scanCurrencyAmount(text);

    if (parsed.ok) {
      return { ok: true, value: parsed.value, rule: `${selector}/${parsed.rule}` };
    }

    lastUnparsedText = text;
  }

  if (lastUnparsedText !== null) {
    return { ok: false, reason: ParseFailureReason.NO_AMOUNT_IN_ELEMENT, raw: lastUnparsedText };
  }

  return {
    ok: false,
    reason: ParseFailureReason.ELEMENT_NOT_FOUND,
    raw: stripMarkup(markup).slice(0, RAW_SNIPPET_LENGTH),
  };
};
