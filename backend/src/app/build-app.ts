/**
 * backend/src/app/build-app.ts
 *
 * WHY:
 * - Single place that assembles the runnable Fastify app:
 *   config -> deps -> migrations -> server -> routes -> (dev seed)
 * - Makes E2E tests simple (build, app.inject, close).
 *
 * RULES:
 * - No business logic here (only composition).
 * - No request handlers here (those belong in routes/modules).
 */

import type { AppConfig } from './config';
import { buildDeps } from './di';
import type { DepsOverrides } from './di';
import { buildServer } from './server';
import { registerRoutes } from './routes';
import { migrateToLatest } from '../shared/db/migrate';
import { runDevSeed } from '../shared/db/seed/dev-seed';
import { logger } from '../shared/logger/logger';

export async function buildApp(config: AppConfig, overrides: DepsOverrides = {}) {
  const deps = await buildDeps(config, overrides);

  if (config.migrateOnStart) {
    await migrateToLatest(deps.db);
  }

  const app = await buildServer({ config, deps });

  registerRoutes(app, { config, deps });

  // DEV-only seed bootstrap
  if (config.seedOnStart) {
    const flow = 'seed.dev';

    if (config.nodeEnv === 'production') {
      logger.warn('seed.skipped_in_production', { flow });
    } else {
      logger.info('seed.start', { flow });
      const report = await runDevSeed({ authService: deps.auth.authService });
      logger.info('seed.done', { flow, ...report });
    }
  }

  await deps.auth.authService.warmUp();

  const close = async () => {
    await app.close();
    await deps.close();
  };

  return { app, deps, close };
}
