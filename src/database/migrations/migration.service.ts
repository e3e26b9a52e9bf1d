import { Injectable, Logger, type OnModuleInit } from '@nestjs/common';
import {
  type Migration,
  type MigrationProvider,
  type MigrationResultSet,
  Migrator,
} from 'kysely';

import { createAssetPriceSnapshots } from './001-asset-price-snapshots.migration';
import { AppConfigService } from '../../config/app-config.service';
import { DatabaseService } from '../kysely/database.service';

const MIGRATION_TABLE = 'pricing_schema_migrations';
const MIGRATION_LOCK_TABLE = 'pricing_schema_migrations_lock';

export const PRICING_MIGRATIONS: Readonly<Record<string, Migration>> = {
  '001-asset-price-snapshots': createAssetPriceSnapshots,
};

class InCodeMigrationProvider implements MigrationProvider {
  public async getMigrations(): Promise<Record<string, Migration>> {
    return { ...PRICING_MIGRATIONS };
  }
}

@Injectable()
export class MigrationService implements OnModuleInit {
  private readonly logger: Logger = new Logger(MigrationService.name);

  public constructor(
    private readonly appConfigService: AppConfigService,
    private readonly databaseService: DatabaseService,
  ) {}

  public async onModuleInit(): Promise<void> {
    if (!this.appConfigService.databaseMigrationsEnabled) {
      this.logger.log('database_migrations_disabled');
      return;
    }

    const migrator: Migrator = this.createMigrator();
    const resultSet: MigrationResultSet = await migrator.migrateToLatest();

    for (const result of resultSet.results ?? []) {
      if (result.status === 'Error') {
        this.logger.error(`database_migration_failed name=${result.migrationName}`);
      } else if (result.status === 'Success') {
        this.logger.log(`database_migration_applied name=${result.migrationName}`);
      }
    }

    if (resultSet.error !== undefined) {
      throw resultSet.error instanceof Error
        ? resultSet.error
        : new Error(`Database migration failed: ${String(resultSet.error)}`);
    }

    this.logger.log(
      `database_schema_ready migrations=${String(Object.keys(PRICING_MIGRATIONS).length)}`,
    );
  }

  protected createMigrator(): Migrator {
    return new Migrator({
      db: this.databaseService.getDb(),
      provider: new InCodeMigrationProvider(),
      migrationTableName: MIGRATION_TABLE,
      migrationLockTableName: MIGRATION_LOCK_TABLE,
    });
  }
}
