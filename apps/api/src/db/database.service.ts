import { Injectable, OnModuleDestroy } from '@nestjs/common';
import { createPool } from '@fmops/db';
import type { Pool } from 'pg';

@Injectable()
export class DatabaseService implements OnModuleDestroy {
  readonly pool: Pool;

  constructor(databaseUrl: string) {
    this.pool = createPool(databaseUrl);
  }

  async onModuleDestroy(): Promise<void> {
    await this.pool.end();
  }
}
