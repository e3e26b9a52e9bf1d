import { describe, expect, it } from 'vitest';

import type { CryptoPriceAdapter } from './crypto/crypto-price.adapter';
import type { JpEquityPriceAdapter } from './equity/jp-equity-price.adapter';
import type { UsEquityPriceAdapter } from './equity/us-equity-price.adapter';
import type { FundNavAdapter } from './fund/fund-nav.adapter';
import type { GoldPriceAdapter } from './metal/gold-price.adapter';
import { PriceSourceRegistry } from './price-source.registry';
import {
  AssetKind,
  FETCHABLE_ASSET_KINDS,
} from '../../common/interfaces/pricing/asset-kind.interfaces';

const createAdapterStub = (kind: AssetKind): { kind: AssetKind; source: string } => ({
  kind,
  source: `${kind}_source`,
});

describe('PriceSourceRegistry', (): void => {
  it('resolves the adapter registered for every fetchable kind', (): void => {
    const registry: PriceSourceRegistry = new PriceSourceRegistry(
      createAdapterStub(AssetKind.JP_STOCK) as unknown as JpEquityPriceAdapter,
      createAdapterStub(AssetKind.US_STOCK) as unknown as UsEquityPriceAdapter,
      createAdapterStub(AssetKind.GOLD) as unknown as GoldPriceAdapter,
      createAdapterStub(AssetKind.CRYPTO) as unknown as CryptoPriceAdapter,
      createAdapterStub(AssetKind.FUND) as unknown as FundNavAdapter,
    );

    for (const kind of FETCHABLE_ASSET_KINDS) {
      expect(registry.resolve(kind).kind).toBe(kind);
    }
  });
});
