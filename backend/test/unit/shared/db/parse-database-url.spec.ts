import { describe, it, expect } from 'vitest';
import { parseDatabaseUrl } from '../../../../src/shared/db/db';

describe('parseDatabaseUrl', () => {
  it('maps pglite:// to an embedded data directory', () => {
    expect(parseDatabaseUrl('pglite://./data/tutor-match')).toEqual({
      kind: 'embedded',
      dataDir: './data/tutor-match',
    });
  });

  it('keeps an absolute data directory', () => {
    expect(parseDatabaseUrl('pglite:///var/data/tutor')).toEqual({
      kind: 'embedded',
      dataDir: '/var/data/tutor',
    });
  });

  it('supports the in-memory database', () => {
    expect(parseDatabaseUrl('pglite://memory')).toEqual({ kind: 'embedded', dataDir: null });
  });

  it('routes postgres URLs to pg', () => {
    expect(parseDatabaseUrl('postgresql://u:p@db:5432/app')).toEqual({
      kind: 'postgres',
      connectionString: 'postgresql://u:p@db:5432/app',
    });
    expect(parseDatabaseUrl(' postgres://u:p@db/app ').kind).toBe('postgres');
  });

  it('rejects a pglite URL without a data directory', () => {
    expect(() => parseDatabaseUrl('pglite://')).toThrow(
      'DATABASE_URL: pglite URL is missing a data directory',
    );
  });

  it('rejects unsupported schemes', () => {
    expect(() => parseDatabaseUrl('sqlite:///tutor-match.db')).toThrow(
      'DATABASE_URL: unsupported scheme (expected pglite:// or postgres://)',
    );
  });
});
