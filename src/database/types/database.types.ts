import type { ColumnType, Generated, Insertable } from 'kysely';

type TimestampColumn = ColumnType<Date, Date | string | undefined, never>;

type DoubleColumn = ColumnType<number, number | undefined, number>;

/** Holdings registered by the dashboard. Only the columns the pricing core touches are typed. */
export interface AssetsTable {
  id: Generated<number>;
  user_id: number;
  asset_type: string;
  symbol: string;
  name: string | null;
  quantity: number;
  price: DoubleColumn;
}

export interface AssetPriceSnapshotsTable {
  id: Generated<number>;
  run_id: string;
  user_asset_id: number;
  asset_type: string;
  symbol: string;
  price: number;
  previous_close: number | null;
  currency: string;
  source: string;
  fetched_at: ColumnType<Date, Date | string, never>;
  taken_at: ColumnType<Date, Date | string, never>;
  record_date: ColumnType<string, string, never>;
  created_at: TimestampColumn;
}

export interface IDatabase {
  assets: AssetsTable;
  asset_price_snapshots: AssetPriceSnapshotsTable;
}

export type NewAssetPriceSnapshotRow = Insertable<AssetPriceSnapshotsTable>;
