import { readFileSync } from 'node:fs';
import { join } from 'node:path';
import { afterEach, describe, expect, test } from 'vitest';
import { Configs } from '../src/configs';
import { HomeDirectoryError } from '../src/utils/errors';
import { cleanupTempHomes, configPath, createTempHome, writeConfigDocument, writeRawConfig } from './helpers/home';

afterEach(() => {
  cleanupTempHomes();
});

describe('Configs.load', () => {
  test('starts empty when no config file exists', () => {
    const home = createTempHome();
    const configs = Configs.load({ env: {}, homeDir: () => home });

    expect(configs.loadOutcome).toEqual({ kind: 'missing' });
    expect(configs.rootConfig).toEqual({ projects: {}, user: {} });
    expect(configs.rootConfigPath).toBe(join(home, '.railway', 'config.json'));
  });

  test('uses the config file of the selected environment', () => {
    const home = createTempHome();
    expect(Configs.load({ env: { RAILWAY_ENV: 'staging' }, homeDir: () => home }).rootConfigPath).toBe(
      configPath(home, 'config-staging.json')
    );
    expect(Configs.load({ env: { RAILWAY_ENV: 'develop' }, homeDir: () => home }).rootConfigPath).toBe(
      configPath(home, 'config-dev.json')
    );
  });

  test('reads a valid document verbatim', () => {
    const home = createTempHome();
    const doc = {
      projects: {
        '/work/api': {
          projectPath: '/work/api',
          name: 'api',
          project: 'prj-1',
          environment: 'env-1',
          environmentName: 'production',
          service: 'svc-1',
        },
      },
      user: { token: 'test-token' },
      lastUpdateCheck: '2026-10-18T09:30:00.000Z',
    };
    writeConfigDocument(home, doc);

    const configs = Configs.load({ env: {}, homeDir: () => home });
    expect(configs.loadOutcome).toEqual({ kind: 'loaded' });
    expect(configs.rootConfig).toEqual(doc);
  });

  test('ignores config files of other environments', () => {
    const home = createTempHome();
    writeConfigDocument(home, { projects: {}, user: { token: 'staging-token' } }, 'config-staging.json');

    const configs = Configs.load({ env: {}, homeDir: () => home });
    expect(configs.loadOutcome).toEqual({ kind: 'missing' });
    expect(configs.rootConfig.user.token).toBeUndefined();
  });

  test('regenerates an empty document from unparseable bytes and leaves the file alone', () => {
    const home = createTempHome();
    const target = writeRawConfig(home, 'not json at all');

    const configs = Configs.load({ env: {}, homeDir: () => home });
    expect(configs.loadOutcome.kind).toBe('regenerated');
    expect(configs.rootConfig).toEqual({ projects: {}, user: {} });
    expect(readFileSync(target, 'utf-8')).toBe('not json at all');
  });

  test('regenerates when the document has the wrong shape', () => {
    const home = createTempHome();
    writeConfigDocument(home, { projects: [], user: {} });

    const configs = Configs.load({ env: {}, homeDir: () => home });
    expect(configs.loadOutcome).toEqual({ kind: 'regenerated', reason: '/projects: must be object' });
  });

  test('fails only when the home directory cannot be resolved', () => {
    expect(() =>
      Configs.load({
        env: {},
        homeDir: () => {
          throw new Error('no passwd entry');
        },
      })
    ).toThrow(HomeDirectoryError);
    expect(() => Configs.load({ env: {}, homeDir: () => '' })).toThrow('Unable to get home directory');
  });
});
