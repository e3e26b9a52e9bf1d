import { type Kysely, type Migration, sql } from 'kysely';

export const createAssetPriceSnapshots: Migration = {
  async up(db: Kysely<unknown>): Promise<void> {
    await db.schema
      .createTable('asset_price_snapshots')
      .ifNotExists()
      .addColumn('id', 'serial', (column) => column.primaryKey())
      .addColumn('run_id', 'uuid', (column) => column.notNull())
      .addColumn('user_asset_id', 'integer', (column) =>
        column.notNull().references('assets.id').onDelete('cascade'),
      )
      .addColumn('asset_type', 'varchar(50)', (column) => column.notNull())
      .addColumn('symbol', 'varchar(50)', (column) => column.notNull())
      .addColumn('price', 'double precision', (column) => column.notNull())
      .addColumn('previous_close', 'double precision')
      .addColumn('currency', 'varchar(3)', (column) => column.notNull())
      .addColumn('source', 'varchar(64)', (column) => column.notNull())
      .addColumn('fetched_at', 'timestamptz', (column) => column.notNull())
      .addColumn('taken_at', 'timestamptz', (column) => column.notNull())
      .addColumn('record_date', 'date', (column) => column.notNull())
      .addColumn('created_at', 'timestamptz', (column) =>
        column.notNull().defaultTo(sql`now()`),
      )
      .execute();

    await db.schema
      .createIndex('asset_price_snapshots_asset_date_uq')
      .ifNotExists()
      .on('asset_price_snapshots')
      .columns(['user_asset_id', 'record_date'])
      .unique()
      .execute();

    await db.schema
      .createIndex('asset_price_snapshots_run_idx')
      .ifNotExists()
      .on('asset_price_snapshots')
      .column('run_id')
      .execute();
  },

  async down(db: Kysely<unknown>): Promise<void> {
    await db.schema.dropTable('asset_price_snapshots').ifExists().execute();
  },
};
