import { buildApp } from '../../src/app/build-app';
import type { AppConfig } from '../../src/app/config';
import { InMemCache } from '../../src/shared/cache/inmem-cache';

/**
 * WHY:
 * - Build a Fastify app for E2E-style tests using app.inject().
 * - Keeps tests clean: build, inject, close.
 *
 * RULES:
 * - Every app gets its own in-memory PGlite database (migrated on build) and its own
 *   InMemCache, so tests never share state and need no external infra.
 * - bcrypt cost is lowered to keep the suite fast; the production cost is covered by
 *   the password hasher unit test.
 * - `clock` moves session time forward without fake timers.
 */

export const TEST_SESSION_SECRET = 'test-secret-test-secret-test-secret-00';

export type TestClock = {
  now: () => number;
  advanceSeconds: (seconds: number) => void;
};

export function createTestClock(startMs = Date.parse('2026-01-01T00:00:00.000Z')): TestClock {
  let current = startMs;
  return {
    now: () => current,
    advanceSeconds: (seconds: number) => {
      current += seconds * 1000;
    },
  };
}

export type TestConfigOverrides = Partial<Omit<AppConfig, 'session'>> & {
  session?: Partial<AppConfig['session']>;
};

export function buildTestConfig(overrides: TestConfigOverrides = {}): AppConfig {
  const base: AppConfig = {
    nodeEnv: 'test',
    host: '127.0.0.1',
    port: 0,
    trustProxy: false,

    databaseUrl: 'pglite://memory',
    redisUrl: null,

    serviceName: 'tutor-match-test',

    bcryptCost: 4,

    session: {
      secret: TEST_SESSION_SECRET,
      ttlSeconds: 1800,
      rememberMeTtlSeconds: 14 * 86400,
    },

    migrateOnStart: true,
    seedOnStart: false, // IMPORTANT: OFF in tests by default
  };

  return {
    ...base,
    ...overrides,
    // ensure nested objects merge correctly
    session: {
      ...base.session,
      ...(overrides.session ?? {}),
    },
  };
}

export async function buildTestApp(
  overrides: TestConfigOverrides = {},
  opts: { clock?: TestClock } = {},
) {
  const clock = opts.clock ?? createTestClock();
  const cache = new InMemCache({ now: clock.now });

  const built = await buildApp(buildTestConfig(overrides), { cache });

  return {
    app: built.app,
    deps: built.deps,
    cache,
    clock,
    close: built.close,
  };
}
