import { afterEach, describe, expect, test } from 'vitest';
import { Configs, type ConfigsOptions } from '../src/configs';
import { NoLinkedProjectError, ProjectNotFoundError } from '../src/utils/errors';
import { cleanupTempHomes, createTempHome, writeConfigDocument } from './helpers/home';

afterEach(() => {
  cleanupTempHomes();
});

function entry(projectPath: string, project: string, service?: string) {
  return { projectPath, project, environment: `${project}-env`, ...(service ? { service } : {}) };
}

function loadAt(cwd: string, options: ConfigsOptions = {}): Configs {
  const home = createTempHome();
  writeConfigDocument(home, {
    projects: {
      '/a': entry('/a', 'outer'),
      '/a/b': entry('/a/b', 'inner', 'svc-inner'),
    },
    user: {},
  });
  return Configs.load({ env: {}, homeDir: () => home, cwd: () => cwd, ...options });
}

describe('closest linked project', () => {
  test('picks the deepest linked ancestor', async () => {
    const configs = loadAt('/a/b/c/d');
    expect(configs.getClosestLinkedProjectDirectory()).toBe('/a/b');
    expect(await configs.getLinkedProject()).toEqual(entry('/a/b', 'inner', 'svc-inner'));
  });

  test('matches the current directory itself', () => {
    expect(loadAt('/a').getClosestLinkedProjectDirectory()).toBe('/a');
  });

  test('compares whole path segments', () => {
    expect(loadAt('/a/bc').getClosestLinkedProjectDirectory()).toBe('/a');
  });

  test('normalizes the working directory before walking up', () => {
    expect(loadAt('/a/b/../x/.').getClosestLinkedProjectDirectory()).toBe('/a');
  });

  test('fails with NO_LINKED_PROJECT outside every link', async () => {
    const configs = loadAt('/x/y');
    expect(() => configs.getClosestLinkedProjectDirectory()).toThrow(NoLinkedProjectError);
    await expect(configs.getLinkedProject()).rejects.toMatchObject({ code: 'NO_LINKED_PROJECT' });
  });

  test('returns a copy from getLinkedProject', async () => {
    const configs = loadAt('/a/b');
    const linked = await configs.getLinkedProject();
    linked.service = 'changed';
    expect(configs.rootConfig.projects['/a/b']?.service).toBe('svc-inner');
  });

  test('returns the stored entry from getLinkedProjectMut', () => {
    const configs = loadAt('/a/b/c');
    configs.getLinkedProjectMut().environmentName = 'staging';
    expect(configs.rootConfig.projects['/a/b']?.environmentName).toBe('staging');
  });
});

describe('linkProject', () => {
  test('links the current directory, not the closest ancestor', () => {
    const configs = loadAt('/a/b/c');
    const linked = configs.linkProject('prj-new', 'new', 'env-new', 'production');

    expect(linked).toEqual({
      projectPath: '/a/b/c',
      name: 'new',
      project: 'prj-new',
      environment: 'env-new',
      environmentName: 'production',
    });
    expect(Object.keys(configs.rootConfig.projects).sort()).toEqual(['/a', '/a/b', '/a/b/c']);
  });

  test('replaces an existing link and drops its service', () => {
    const configs = loadAt('/a/b');
    configs.linkProject('prj-2', undefined, 'env-2', undefined);
    expect(configs.rootConfig.projects['/a/b']).toEqual({ projectPath: '/a/b', project: 'prj-2', environment: 'env-2' });
  });
});

describe('service links', () => {
  test('sets the service on the closest linked project', () => {
    const configs = loadAt('/a/x');
    expect(configs.linkService('svc-1')).toEqual({ ...entry('/a', 'outer'), service: 'svc-1' });
    expect(configs.rootConfig.projects['/a']?.service).toBe('svc-1');
  });

  test('unlinking a service twice is harmless', () => {
    const configs = loadAt('/a/b');
    configs.unlinkService();
    expect(configs.unlinkService()).toEqual(entry('/a/b', 'inner'));
    expect(configs.rootConfig.projects['/a/b']).not.toHaveProperty('service');
  });

  test('requires a linked project', () => {
    const configs = loadAt('/x');
    expect(() => configs.linkService('svc-1')).toThrow(NoLinkedProjectError);
  });

  test('cannot be changed while a project token is set', () => {
    const configs = loadAt('/a/b', { env: { RAILWAY_TOKEN: 'test-project-token' } });
    expect(() => configs.linkService('svc-1')).toThrow(ProjectNotFoundError);
    expect(() => configs.getLinkedProjectMut()).toThrow(
      'Linked project settings cannot be changed while RAILWAY_TOKEN is set'
    );
    expect(configs.rootConfig.projects['/a/b']?.service).toBe('svc-inner');
  });
});

describe('unlinkProject', () => {
  test('removes only the closest link', () => {
    const configs = loadAt('/a/b/c');
    expect(configs.unlinkProject()).toEqual(entry('/a/b', 'inner', 'svc-inner'));
    expect(Object.keys(configs.rootConfig.projects)).toEqual(['/a']);
  });

  test('is a no-op when nothing is linked', () => {
    const configs = loadAt('/x');
    expect(configs.unlinkProject()).toBeUndefined();
    expect(Object.keys(configs.rootConfig.projects).sort()).toEqual(['/a', '/a/b']);
  });
});

describe('project token', () => {
  test('makes the current directory the closest linked directory', () => {
    const configs = loadAt('/x/y', { env: { RAILWAY_TOKEN: 'test-project-token' } });
    expect(configs.getClosestLinkedProjectDirectory()).toBe('/x/y');
  });

  test('ignores a blank token', () => {
    const configs = loadAt('/x/y', { env: { RAILWAY_TOKEN: '  ' } });
    expect(() => configs.getClosestLinkedProjectDirectory()).toThrow(NoLinkedProjectError);
  });
});
