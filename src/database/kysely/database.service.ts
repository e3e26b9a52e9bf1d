import { Injectable, Logger, type OnModuleDestroy } from '@nestjs/common';
import { Kysely, PostgresDialect, sql } from 'kysely';
import { Pool } from 'pg';

import type { IDatabase } from '../types/database.types';
import { AppConfigService } from '../../config/app-config.service';

const APPLICATION_NAME = 'portfolio-pricing';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  private readonly logger: Logger = new Logger(DatabaseService.name);
  private readonly db: Kysely<IDatabase>;
  private readonly pool: Pool;

  public constructor(private readonly appConfigService: AppConfigService) {
    this.pool = new Pool({
      connectionString: this.appConfigService.databaseUrl,
      application_name: APPLICATION_NAME,
    });
    // Idle client errors are emitted on the pool and would otherwise crash the process.
    this.pool.on('error', (error: Error): void => {
      this.logger.error(`database_pool_error reason=${error.message}`);
    });

    this.db = new Kysely<IDatabase>({
      dialect: new PostgresDialect({ pool: this.pool }),
    });
  }

  public getDb(): Kysely<IDatabase> {
    return this.db;
  }

  public getPool(): Pool {
    return this.pool;
  }

  public async healthCheck(): Promise<boolean> {
    try {
      await sql`select 1`.execute(this.db);
      return true;
    } catch (error: unknown) {
      const errorMessage: string = error instanceof Error ? error.message : String(error);
      this.logger.warn(`database_health_check_failed reason=${errorMessage}`);
      return false;
    }
  }

  public async onModuleDestroy(): Promise<void> {
    await this.db.destroy();
  }
}
