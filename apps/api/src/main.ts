import { getEnv } from './lib/env.js';
import { createLogger } from './lib/logger.js';
import { createDatabase } from './lib/db.js';
import { createAuditLog } from './lib/audit-log.js';
import { buildApp } from './server.js';
import { createRoutingStore } from './domains/notification/routing.store.js';
import { createChannelRegistry } from './domains/notification/channels.js';
import { buildRoutingPolicy } from './domains/notification/routing.config.js';
import { createNotificationRouter } from './domains/notification/notification.service.js';
import { registerRoutingJobs, type DigestServiceDeps } from './domains/notification/digest.service.js';
import { createRunLock } from './domains/notification/run-lock.js';
import { systemClock } from './domains/notification/schedule.js';

async function main() {
  const env = getEnv();
  const logger = createLogger({ level: env.LOG_LEVEL });

  const { db, pool } = createDatabase(env.DATABASE_URL);
  const store = createRoutingStore(db);
  const channels = createChannelRegistry(env, logger);
  const policy = buildRoutingPolicy(env);
  const auditLog = createAuditLog(env.AUDIT_LOG_PATH);

  const router = createNotificationRouter({
    store,
    channels,
    policy,
    clock: systemClock,
    logger,
    auditLog,
  });

  const digestDeps: DigestServiceDeps = {
    notificationRepo: store.notifications,
    channels,
    policy,
    clock: systemClock,
    logger,
    auditLog,
    runLock: createRunLock(),
  };

  // Descriptors for the external scheduler; the process itself keeps no timers.
  for (const job of registerRoutingJobs(digestDeps)) {
    logger.info({ job: job.name, cron: job.cronExpression }, 'Routing job available');
  }

  const app = await buildApp({
    deps: {
      router,
      digestDeps,
      notificationRepo: store.notifications,
      clock: systemClock,
    },
    apiKey: env.INTERNAL_API_KEY,
    logLevel: env.LOG_LEVEL,
  });

  app.addHook('onClose', async () => {
    await pool.end();
  });

  await app.listen({ port: env.API_PORT, host: env.API_HOST });
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
