/** Asset classes as stored in the `assets.asset_type` column. */
export enum AssetKind {
  JP_STOCK = 'jp_stock',
  US_STOCK = 'us_stock',
  CASH = 'cash',
  GOLD = 'gold',
  CRYPTO = 'crypto',
  FUND = 'investment_trust',
  INSURANCE = 'insurance',
}

/** Kinds valued manually by the user; they never reach an external source. */
export type ManualAssetKind = AssetKind.CASH | AssetKind.INSURANCE;

export type FetchableAssetKind = Exclude<AssetKind, ManualAssetKind>;

export const FETCHABLE_ASSET_KINDS: readonly FetchableAssetKind[] = [
  AssetKind.JP_STOCK,
  AssetKind.US_STOCK,
  AssetKind.GOLD,
  AssetKind.CRYPTO,
  AssetKind.FUND,
];

const ASSET_KIND_VALUES: ReadonlySet<string> = new Set<string>(Object.values(AssetKind));

export const isAssetKind = (value: string): value is AssetKind => ASSET_KIND_VALUES.has(value);

export const isFetchableAssetKind = (kind: AssetKind): kind is FetchableAssetKind =>
  kind !== AssetKind.CASH && kind !== AssetKind.INSURANCE;
