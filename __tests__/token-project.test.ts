import { afterEach, describe, expect, test } from 'vitest';
import { Configs } from '../src/configs';
import { cleanupTempHomes, createTempHome, writeConfigDocument } from './helpers/home';
import { fetchReturning } from './helpers/fetch';

afterEach(() => {
  cleanupTempHomes();
});

const TOKEN_RESPONSE = {
  data: {
    projectToken: {
      projectId: 'prj-token',
      environmentId: 'env-token',
      project: { id: 'prj-token', name: 'token-project' },
      environment: { id: 'env-token', name: 'staging' },
    },
  },
};

function loadWithToken(cwd: string, fetch = fetchReturning(TOKEN_RESPONSE)) {
  const home = createTempHome();
  writeConfigDocument(home, {
    projects: {
      '/repo': { projectPath: '/repo', project: 'prj-stored', environment: 'env-stored', service: 'svc-stored' },
    },
    user: { token: 'stored-token' },
  });
  const configs = Configs.load({
    env: { RAILWAY_TOKEN: 'test-project-token' },
    homeDir: () => home,
    cwd: () => cwd,
    fetch,
    version: '3.2.0',
  });
  return { configs, fetch };
}

describe('linked project from a project token', () => {
  test('resolves identity through the API instead of directory links', async () => {
    const { configs, fetch } = loadWithToken('/elsewhere');

    expect(await configs.getLinkedProject()).toEqual({
      projectPath: '/elsewhere',
      name: 'token-project',
      project: 'prj-token',
      environment: 'env-token',
      environmentName: 'staging',
    });
    expect(fetch).toHaveBeenCalledTimes(1);
    expect(fetch).toHaveBeenCalledWith(
      'https://backboard.railway.com/graphql/v2',
      expect.objectContaining({
        method: 'POST',
        headers: {
          'Content-Type': 'application/json',
          'User-Agent': 'cli-3.2.0',
          'project-access-token': 'test-project-token',
        },
      })
    );
  });

  test('keeps the service stored for the exact current directory', async () => {
    const { configs } = loadWithToken('/repo');
    const linked = await configs.getLinkedProject();
    expect(linked.project).toBe('prj-token');
    expect(linked.service).toBe('svc-stored');
  });

  test('does not inherit the service of an ancestor link', async () => {
    const { configs } = loadWithToken('/repo/sub');
    expect(await configs.getLinkedProject()).not.toHaveProperty('service');
  });

  test('propagates API failures', async () => {
    const { configs } = loadWithToken('/repo', fetchReturning({ errors: [{ message: 'Invalid project token' }] }, 401));
    await expect(configs.getLinkedProject()).rejects.toMatchObject({
      code: 'GRAPHQL_ERROR',
      message: 'Invalid project token',
    });
  });
});
