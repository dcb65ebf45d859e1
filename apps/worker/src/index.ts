import { Queue, Worker } from 'bullmq';
import { createJsonLogger, errorMessage } from '@fmops/common';
import { loadEnv } from '@fmops/config';
import { PgReportLookup, PgTechnicianDirectory, PgWorkOrderStore, createPool, type RequestDbContext } from '@fmops/db';
import { WorkOrderEngine } from '@fmops/work-orders';
import { AUTO_SCHEDULE_QUEUE, processAutoScheduleJob, type AutoSchedulePayload } from './auto-schedule.processor.js';

const env = loadEnv();
const logger = createJsonLogger({ level: env.LOG_LEVEL });

if (env.DISABLE_QUEUE) {
  logger.warn('worker_queue_disabled', { queue: AUTO_SCHEDULE_QUEUE });
  process.exit(0);
}

const pool = createPool(env.DATABASE_URL_WORKER, env.WORKER_CONCURRENCY);
const redisConnection = { url: env.REDIS_URL };

const engineFor = (tenantId: string): WorkOrderEngine => {
  const context: RequestDbContext = { tenantId, userId: null, aud: 'worker' };
  return new WorkOrderEngine({
    store: new PgWorkOrderStore(pool, context),
    directory: new PgTechnicianDirectory(pool, context),
    reports: new PgReportLookup(pool, context),
    logger,
    timezone: env.BUSINESS_TIMEZONE,
    numberPrefix: env.WORK_ORDER_NUMBER_PREFIX
  });
};

const autoScheduleQueue = new Queue<AutoSchedulePayload>(AUTO_SCHEDULE_QUEUE, {
  connection: redisConnection,
  defaultJobOptions: {
    attempts: 3,
    backoff: {
      type: 'exponential',
      delay: 2000
    },
    removeOnComplete: {
      count: 1000
    },
    removeOnFail: {
      count: 1000,
      age: 60 * 60 * 24
    }
  }
});

// Passes for one tenant must not overlap, so the slot bookkeeping stays sequential.
const autoScheduleWorker = new Worker<AutoSchedulePayload>(
  AUTO_SCHEDULE_QUEUE,
  async (job) => {
    await processAutoScheduleJob({
      logger,
      payload: job.data,
      engineFor
    });
  },
  {
    connection: redisConnection,
    concurrency: 1
  }
);

const ensureRecurringAutoScheduleJobs = async () => {
  for (const tenantId of env.AUTO_SCHEDULE_TENANT_IDS) {
    await autoScheduleQueue.add(
      'auto_schedule',
      {
        tenantId,
        requestId: 'scheduler'
      },
      {
        jobId: `auto_schedule:${tenantId}`,
        repeat: {
          every: env.AUTO_SCHEDULE_INTERVAL_MINUTES * 60 * 1000
        }
      }
    );
  }

  logger.info('auto_schedule_jobs_registered', {
    tenants: env.AUTO_SCHEDULE_TENANT_IDS.length,
    every_minutes: env.AUTO_SCHEDULE_INTERVAL_MINUTES
  });
};

void ensureRecurringAutoScheduleJobs().catch((error) => {
  logger.error('auto_schedule_registration_failed', {
    error: errorMessage(error)
  });
});

autoScheduleWorker.on('ready', () => {
  logger.info('worker_ready', {
    queue: AUTO_SCHEDULE_QUEUE,
    concurrency: 1
  });
});

autoScheduleWorker.on('failed', (job, error) => {
  logger.error('worker_job_failed', {
    queue: AUTO_SCHEDULE_QUEUE,
    tenant_id: job?.data.tenantId ?? null,
    attempts: job?.attemptsMade ?? 0,
    error: error.message
  });
});

autoScheduleWorker.on('error', (error) => {
  logger.error('worker_error', {
    queue: AUTO_SCHEDULE_QUEUE,
    error: error.message
  });
});

const shutdown = async () => {
  logger.info('worker_shutdown');
  await autoScheduleWorker.close();
  await autoScheduleQueue.close();
  await pool.end();
  process.exit(0);
};

process.on('SIGINT', () => {
  void shutdown();
});

process.on('SIGTERM', () => {
  void shutdown();
});
