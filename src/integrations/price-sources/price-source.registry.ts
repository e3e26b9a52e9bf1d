import { Injectable } from '@nestjs/common';

import { CryptoPriceAdapter } from './crypto/crypto-price.adapter';
import { JpEquityPriceAdapter } from './equity/jp-equity-price.adapter';
import { UsEquityPriceAdapter } from './equity/us-equity-price.adapter';
import { FundNavAdapter } from './fund/fund-nav.adapter';
import { GoldPriceAdapter } from './metal/gold-price.adapter';
import {
  AssetKind,
  type FetchableAssetKind,
} from '../../common/interfaces/pricing/asset-kind.interfaces';
import type {
  IPriceSourceAdapter,
  IPriceSourceRegistry,
  PriceSourceTable,
} from '../../common/interfaces/pricing/price-source.interfaces';

@Injectable()
export class PriceSourceRegistry implements IPriceSourceRegistry {
  private readonly table: PriceSourceTable;

  public constructor(
    jpEquityPriceAdapter: JpEquityPriceAdapter,
    usEquityPriceAdapter: UsEquityPriceAdapter,
    goldPriceAdapter: GoldPriceAdapter,
    cryptoPriceAdapter: CryptoPriceAdapter,
    fundNavAdapter: FundNavAdapter,
  ) {
    this.table = {
      [AssetKind.JP_STOCK]: jpEquityPriceAdapter,
      [AssetKind.US_STOCK]: usEquityPriceAdapter,
      [AssetKind.GOLD]: goldPriceAdapter,
      [AssetKind.CRYPTO]: cryptoPriceAdapter,
      [AssetKind.FUND]: fundNavAdapter,
    };
  }

  public resolve(kind: FetchableAssetKind): IPriceSourceAdapter {
    return this.table[kind];
  }
}
