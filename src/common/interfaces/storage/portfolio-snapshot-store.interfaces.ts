import type { AssetKind } from '../pricing/asset-kind.interfaces';
import type { IPriceQuote } from '../pricing/price-quote.interfaces';

export const PORTFOLIO_SNAPSHOT_STORE: unique symbol = Symbol('PORTFOLIO_SNAPSHOT_STORE');

export interface ITrackedAsset {
  readonly userAssetId: number;
  readonly kind: AssetKind;
  readonly identifier: string;
}

export interface ISnapshotRecord {
  readonly runId: string;
  readonly asOfDate: string;
  readonly userAssetId: number;
  readonly quote: IPriceQuote;
  readonly takenAtEpochMs: number;
}

/** Storage collaborator that owns tracked assets and snapshot history. */
export interface IPortfolioSnapshotStore {
  listTrackedAssets(): Promise<readonly ITrackedAsset[]>;
  writeSnapshot(record: ISnapshotRecord): Promise<void>;
}
