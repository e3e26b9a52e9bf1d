import { type MarkupSelector, extractAmountFromMarkup } from './markup-extractor';
import type { ICurrencyAmount, ParseResult } from './price-text.parser';
import type { QuoteCurrency } from '../../../common/interfaces/pricing/price-quote.interfaces';
import { ParseFailureError } from '../../../common/interfaces/pricing/price-source.errors';

/**
 * Reads the price of a scraped page. Unmarked amounts are taken in the page's
 * currency; an amount marked with another currency or below zero is a parse failure.
 */
export const readScrapedAmount = (
  source: string,
  markup: string,
  selectors: readonly MarkupSelector[],
  pageCurrency: QuoteCurrency,
): number => {
  const parsed: ParseResult<ICurrencyAmount> = extractAmountFromMarkup(markup, selectors);

  if (!parsed.ok) {
    throw new ParseFailureError(source, parsed.reason, parsed.raw);
  }

  const { amount, currency } = parsed.value;

  if (currency !== null && currency !== pageCurrency) {
    throw new ParseFailureError(
      source,
      `unexpected currency ${currency} via ${parsed.rule}`,
      String(amount),
    );
  }

  if (amount < 0) {
    throw new ParseFailureError(source, `negative price via ${parsed.rule}`, String(amount));
  }

  return amount;
};
