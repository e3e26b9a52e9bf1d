import { describe, expect, it } from 'vitest';

import type { MarkupSelector } from './markup-extractor';
import { readScrapedAmount } from './scraped-amount.util';
import { ParseFailureError } from '../../../common/interfaces/pricing/price-source.errors';

const SELECTORS: readonly MarkupSelector[] = ['div.md_price'];

describe('readScrapedAmount', (): void => {
  it('accepts amounts in the page currency and unmarked amounts', (): void => {
    expect(readScrapedAmount('page', '<div class="md_price">¥1,500</div>', SELECTORS, 'JPY')).toBe(
      1500,
    );
    expect(readScrapedAmount('page', '<div class="md_price">1,500</div>', SELECTORS, 'JPY')).toBe(
      1500,
    );
  });

  it('rejects amounts marked with another currency', (): void => {
    expect((): number =>
      readScrapedAmount('page', '<div class="md_price">$65,000</div>', SELECTORS, 'JPY'),
    ).toThrow('page: unexpected currency USD via div.md_price/usd_prefix');
  });

  it('rejects negative amounts', (): void => {
    expect((): number =>
      readScrapedAmount('page', '<div class="md_price">-3 円</div>', SELECTORS, 'JPY'),
    ).toThrow('page: negative price via div.md_price/yen_suffix');
  });

  it('carries the failure reason and raw text', (): void => {
    let caught: unknown = null;

    try {
      readScrapedAmount('page', '<div class="md_price">--</div>', SELECTORS, 'JPY');
    } catch (error: unknown) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ParseFailureError);
    expect(caught).toMatchObject({
      message: 'page: no_amount_in_element',
      rawSnippet: '--',
    });
  });
});
