import { Injectable } from '@nestjs/common';

import { AssetKind } from '../../../common/interfaces/pricing/asset-kind.interfaces';
import type { IPriceQuote } from '../../../common/interfaces/pricing/price-quote.interfaces';
import { UnsupportedAssetError } from '../../../common/interfaces/pricing/price-source.errors';
import type { IPriceSourceAdapter } from '../../../common/interfaces/pricing/price-source.interfaces';
import { AppConfigService } from '../../../config/app-config.service';
import { LimiterKey } from '../../../rate-limiting/bottleneck-rate-limiter.interfaces';
import { PriceSourceHttpClient } from '../http/price-source-http.client';
import type { MarkupSelector } from '../parsing/markup-extractor';
import { readScrapedAmount } from '../parsing/scraped-amount.util';

export const FUND_NAV_SOURCE = 'fund_detail_page';

interface IFundListing {
  readonly name: string;
  readonly fundId: string;
}

const SP500: IFundListing = { name: 'S&P500', fundId: '2558' };
const ALL_COUNTRY: IFundListing = { name: 'All-Country', fundId: '03311187' };
const FANG_PLUS: IFundListing = { name: 'FANG+', fundId: '03312187' };

// Keys are NFKC-folded and upper-cased.
const FUND_LISTINGS: ReadonlyMap<string, IFundListing> = new Map<string, IFundListing>([
  ['S&P500', SP500],
  ['ALL-COUNTRY', ALL_COUNTRY],
  ['オルカン', ALL_COUNTRY],
  ['FANG+', FANG_PLUS],
]);

const FUND_NAV_SELECTORS: readonly MarkupSelector[] = [
  'span.value',
  'dd.fund-detail-nav',
];

export const resolveFundListing = (identifier: string): IFundListing | null =>
  FUND_LISTINGS.get(identifier.normalize('NFKC').trim().toUpperCase()) ?? null;

/** Net asset value per unit from the brokerage fund detail page. */
@Injectable()
export class FundNavAdapter implements IPriceSourceAdapter<AssetKind.FUND> {
  public readonly kind: AssetKind.FUND = AssetKind.FUND;
  public readonly source: string = FUND_NAV_SOURCE;

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly httpClient: PriceSourceHttpClient,
  ) {}

  public async fetch(identifier: string): Promise<IPriceQuote> {
    const listing: IFundListing | null = resolveFundListing(identifier);

    if (listing === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    const url: URL = new URL('/web/fund/detail/', this.appConfigService.fundPriceBaseUrl);
    url.searchParams.set('ID', listing.fundId);

    const markup: string | null = await this.httpClient.fetchText({
      source: this.source,
      limiterKey: LimiterKey.FUND_NAV,
      url,
    });

    if (markup === null) {
      throw new UnsupportedAssetError(this.kind, identifier);
    }

    return {
      kind: this.kind,
      identifier: listing.name,
      currentPrice: readScrapedAmount(this.source, markup, FUND_NAV_SELECTORS, 'JPY'),
      previousClose: null,
      currency: 'JPY',
      displayName: listing.name,
      fetchedAtEpochMs: Date.now(),
      source: this.source,
    };
  }
}
