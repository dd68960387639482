/**
 * Configuration Loading Tests
 *
 * Precedence: flags > environment > config file > defaults.
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdirSync, writeFileSync } from 'node:fs';
import { join } from 'node:path';
import { DEFAULT_CONFIG, datasetSources, loadConfig } from '../../../cli/lib/config.js';
import { ConfigError } from '../../../core/types/errors.js';
import { createTempDir } from '../../utils/fixtures.js';

describe('loadConfig', () => {
  let dir: string;
  let cleanup: () => void;

  beforeEach(() => {
    ({ dir, cleanup } = createTempDir());
  });

  afterEach(() => {
    cleanup();
  });

  it('should use defaults resolved against the working directory', async () => {
    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBeNull();
    expect(config.paths).toEqual({
      database: join(dir, 'complaints.db'),
      residents: join(dir, 'residents.csv'),
      categories: join(dir, 'service_categories.csv'),
      complaints: join(dir, 'complaints.csv'),
      statusLogs: join(dir, 'status_logs.csv'),
    });
    expect(config.reports).toEqual(DEFAULT_CONFIG.reports);
    expect(config.logging.json).toBe(false);
    expect(config.verbose).toBe(false);
  });

  it('should read a YAML rc file and resolve paths against its directory', async () => {
    writeFileSync(
      join(dir, '.complaints-deskrc'),
      ['paths:', '  database: data/desk.db', 'reports:', '  overdueDays: 45', ''].join('\n')
    );

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.configPath).toBe(join(dir, '.complaints-deskrc'));
    expect(config.paths.database).toBe(join(dir, 'data', 'desk.db'));
    expect(config.reports.overdueDays).toBe(45);
    expect(config.reports.topResidents).toBe(5);
  });

  it('should find an rc file in a parent directory', async () => {
    writeFileSync(join(dir, '.complaints-deskrc.json'), JSON.stringify({ reports: { topResidents: 3 } }));
    const nested = join(dir, 'reports', 'monthly');
    mkdirSync(nested, { recursive: true });

    const config = await loadConfig({ cwd: nested, env: {} });

    expect(config.reports.topResidents).toBe(3);
    expect(config.paths.residents).toBe(join(dir, 'residents.csv'));
  });

  it('should load an explicit config path', async () => {
    const path = join(dir, 'desk.yaml');
    writeFileSync(path, 'logging:\n  json: true\n');

    const config = await loadConfig({ cwd: dir, env: {}, configPath: 'desk.yaml' });

    expect(config.configPath).toBe(path);
    expect(config.logging.json).toBe(true);
  });

  it('should let environment variables override the file', async () => {
    writeFileSync(join(dir, '.complaints-deskrc'), 'reports:\n  overdueDays: 45\n');

    const config = await loadConfig({
      cwd: dir,
      env: {
        COMPLAINTS_DESK_OVERDUE_DAYS: '60',
        COMPLAINTS_DESK_DATABASE: '/srv/desk/complaints.db',
        COMPLAINTS_DESK_LOG_JSON: 'true',
      },
    });

    expect(config.reports.overdueDays).toBe(60);
    expect(config.paths.database).toBe('/srv/desk/complaints.db');
    expect(config.logging.json).toBe(true);
  });

  it('should let flags override the environment', async () => {
    const config = await loadConfig({
      cwd: dir,
      env: { COMPLAINTS_DESK_VERBOSE: 'false' },
      overrides: { verbose: true },
    });

    expect(config.verbose).toBe(true);
  });

  it('should treat an empty file as no settings', async () => {
    writeFileSync(join(dir, '.complaints-deskrc'), '');

    const config = await loadConfig({ cwd: dir, env: {} });

    expect(config.reports.overdueDays).toBe(30);
  });

  it('should reject a missing explicit config file', async () => {
    await expect(loadConfig({ cwd: dir, env: {}, configPath: 'absent.yaml' })).rejects.toThrow(
      `Config file not found: ${join(dir, 'absent.yaml')}`
    );
  });

  it('should reject invalid values with the offending key', async () => {
    writeFileSync(join(dir, '.complaints-deskrc'), 'reports:\n  overdueDays: -1\n');

    const result = loadConfig({ cwd: dir, env: {} });

    await expect(result).rejects.toBeInstanceOf(ConfigError);
    await expect(result).rejects.toThrow(/^reports\.overdueDays: /);
  });

  it('should reject unknown keys', async () => {
    writeFileSync(join(dir, '.complaints-deskrc'), 'paths:\n  archive: old.db\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toBeInstanceOf(ConfigError);
  });

  it('should reject malformed YAML', async () => {
    writeFileSync(join(dir, '.complaints-deskrc'), 'reports: [unclosed\n');

    await expect(loadConfig({ cwd: dir, env: {} })).rejects.toThrow(/^Cannot read config file: /);
  });

  it('should reject a non-numeric environment value', async () => {
    await expect(
      loadConfig({ cwd: dir, env: { COMPLAINTS_DESK_TOP_RESIDENTS: 'many' } })
    ).rejects.toThrow('COMPLAINTS_DESK_TOP_RESIDENTS must be a positive integer, got "many"');
  });
});

describe('datasetSources', () => {
  it('should map configured paths to dataset names', async () => {
    const { dir, cleanup } = createTempDir();
    try {
      const config = await loadConfig({ cwd: dir, env: {} });

      expect(datasetSources(config)).toEqual({
        residents: join(dir, 'residents.csv'),
        categories: join(dir, 'service_categories.csv'),
        complaints: join(dir, 'complaints.csv'),
        statusLogs: join(dir, 'status_logs.csv'),
      });
    } finally {
      cleanup();
    }
  });
});
