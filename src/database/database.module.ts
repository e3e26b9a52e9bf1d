import { Module } from '@nestjs/common';

import { DatabaseService } from './kysely/database.service';
import { MigrationService } from './migrations/migration.service';
import { PortfolioSnapshotsRepository } from './repositories/portfolio-snapshots.repository';
import { PORTFOLIO_SNAPSHOT_STORE } from '../common/interfaces/storage/portfolio-snapshot-store.interfaces';

@Module({
  providers: [
    MigrationService,
    DatabaseService,
    PortfolioSnapshotsRepository,
    {
      provide: PORTFOLIO_SNAPSHOT_STORE,
      useExisting: PortfolioSnapshotsRepository,
    },
  ],
  exports: [DatabaseService, PORTFOLIO_SNAPSHOT_STORE],
})
export class DatabaseModule {}
