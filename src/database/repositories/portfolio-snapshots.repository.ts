import { Injectable, Logger } from '@nestjs/common';
import type { Kysely, Transaction } from 'kysely';

import { isAssetKind } from '../../common/interfaces/pricing/asset-kind.interfaces';
import type {
  IPortfolioSnapshotStore,
  ISnapshotRecord,
  ITrackedAsset,
} from '../../common/interfaces/storage/portfolio-snapshot-store.interfaces';
import { DatabaseService } from '../kysely/database.service';
import type { IDatabase, NewAssetPriceSnapshotRow } from '../types/database.types';

type TrackedAssetRow = {
  readonly id: number;
  readonly asset_type: string;
  readonly symbol: string;
};

@Injectable()
export class PortfolioSnapshotsRepository implements IPortfolioSnapshotStore {
  private readonly logger: Logger = new Logger(PortfolioSnapshotsRepository.name);

  public constructor(private readonly databaseService: DatabaseService) {}

  public async listTrackedAssets(): Promise<readonly ITrackedAsset[]> {
    const rows: readonly TrackedAssetRow[] = await this.databaseService
      .getDb()
      .selectFrom('assets')
      .select(['id', 'asset_type', 'symbol'])
      .orderBy('id', 'asc')
      .execute();

    const trackedAssets: ITrackedAsset[] = [];

    for (const row of rows) {
      if (!isAssetKind(row.asset_type)) {
        this.logger.warn(
          `tracked_asset_skipped userAssetId=${String(row.id)} assetType=${row.asset_type} reason=unknown_kind`,
        );
        continue;
      }

      trackedAssets.push({
        userAssetId: row.id,
        kind: row.asset_type,
        identifier: row.symbol,
      });
    }

    return trackedAssets;
  }

  /**
   * Appends one snapshot row and refreshes the holding's last known price.
   * A second write for the same asset and date keeps the first row.
   */
  public async writeSnapshot(record: ISnapshotRecord): Promise<void> {
    const db: Kysely<IDatabase> = this.databaseService.getDb();
    const row: NewAssetPriceSnapshotRow = this.mapRecordToRow(record);

    await db.transaction().execute(async (trx: Transaction<IDatabase>): Promise<void> => {
      await trx
        .insertInto('asset_price_snapshots')
        .values(row)
        .onConflict((conflict) => conflict.columns(['user_asset_id', 'record_date']).doNothing())
        .execute();

      await trx
        .updateTable('assets')
        .set({ price: record.quote.currentPrice })
        .where('id', '=', record.userAssetId)
        .execute();
    });
  }

  private mapRecordToRow(record: ISnapshotRecord): NewAssetPriceSnapshotRow {
    return {
      run_id: record.runId,
      user_asset_id: record.userAssetId,
      asset_type: record.quote.kind,
      symbol: record.quote.identifier,
      price: record.quote.currentPrice,
      previous_close: record.quote.previousClose,
      currency: record.quote.currency,
      source: record.quote.source,
      fetched_at: new Date(record.quote.fetchedAtEpochMs),
      taken_at: new Date(record.takenAtEpochMs),
      record_date: record.asOfDate,
    };
  }
}
