import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_FILTER, APP_GUARD } from '@nestjs/core';
import { createJsonLogger, type Logger } from '@fmops/common';
import { loadEnv, type AppEnv } from '@fmops/config';
import { PgReportLookup, PgTechnicianDirectory, PgWorkOrderStore, type RequestDbContext } from '@fmops/db';
import { WorkOrderEngine } from '@fmops/work-orders';
import { HealthController } from './common/health.controller.js';
import { RequestIdMiddleware } from './common/request-id.middleware.js';
import { WorkOrderErrorFilter } from './common/work-order-error.filter.js';
import { JwtAuthGuard } from './auth/jwt-auth.guard.js';
import { DatabaseService } from './db/database.service.js';
import { RequestContextService } from './db/request-context.service.js';
import { WorkOrdersController } from './work-orders/work-orders.controller.js';
import { WORK_ORDER_ENGINE_FACTORY, WorkOrdersService, type WorkOrderEngineFactory } from './work-orders/work-orders.service.js';

@Module({
  controllers: [HealthController, WorkOrdersController],
  providers: [
    {
      provide: 'APP_ENV',
      useFactory: (): AppEnv => loadEnv(process.env)
    },
    {
      provide: 'APP_LOGGER',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv): Logger => createJsonLogger({ level: env.LOG_LEVEL })
    },
    {
      provide: 'JWT_SECRET_VALUE',
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => env.JWT_SECRET
    },
    {
      provide: DatabaseService,
      inject: ['APP_ENV'],
      useFactory: (env: AppEnv) => new DatabaseService(env.DATABASE_URL_API)
    },
    {
      provide: WORK_ORDER_ENGINE_FACTORY,
      inject: [DatabaseService, 'APP_LOGGER', 'APP_ENV'],
      useFactory:
        (database: DatabaseService, logger: Logger, env: AppEnv): WorkOrderEngineFactory =>
        (db: RequestDbContext) =>
          new WorkOrderEngine({
            store: new PgWorkOrderStore(database.pool, db),
            directory: new PgTechnicianDirectory(database.pool, db),
            reports: new PgReportLookup(database.pool, db),
            logger,
            timezone: env.BUSINESS_TIMEZONE,
            numberPrefix: env.WORK_ORDER_NUMBER_PREFIX
          })
    },
    RequestContextService,
    WorkOrdersService,
    {
      provide: APP_GUARD,
      useClass: JwtAuthGuard
    },
    {
      provide: APP_FILTER,
      useClass: WorkOrderErrorFilter
    }
  ]
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer): void {
    consumer.apply(RequestIdMiddleware).forRoutes('*');
  }
}
