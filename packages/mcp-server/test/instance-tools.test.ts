import { describe, it, expect } from 'vitest';
import { InvalidArgumentError, PlatformOperationError } from '../src/errors.js';
import { generateProjectKey } from '../src/tools/instance.js';
import { harness } from './helpers.js';

describe('generateProjectKey', () => {
  it('upper-cases letters, keeps digits and replaces the rest', () => {
    expect(generateProjectKey('Sales 2024 – Q1')).toBe('SALES_2024___Q1');
    expect(generateProjectKey('my-project.v2')).toBe('MY_PROJECT_V2');
  });

  it('keeps non-ASCII letters', () => {
    expect(generateProjectKey('Café déjà vu')).toBe('CAFÉ_DÉJÀ_VU');
  });
});

describe('create_project', () => {
  it('derives the key from the name and the owner from the caller', async () => {
    const { call, backend } = harness({
      'GET /auth/info': { json: { authIdentifier: 'alice', groups: ['analysts'] } },
      'POST /projects/': { json: { projectKey: 'MY_PROJECT' } },
    });

    const result = await call('create_project', { project_name: 'My Project' });

    expect(result).toEqual({
      projectKey: 'MY_PROJECT',
      name: 'My Project',
      owner: 'alice',
      message: "Project 'My Project' created successfully with key 'MY_PROJECT'",
    });
    expect(backend.calls[1]?.body).toEqual({ projectKey: 'MY_PROJECT', name: 'My Project', owner: 'alice' });
    expect(backend.calls[1]?.params.has('projectFolderId')).toBe(false);
  });

  it('passes explicit key, owner, description and folder through', async () => {
    const { call, backend } = harness({ 'POST /projects/': { json: {} } });

    await call('create_project', {
      project_name: 'Churn',
      project_key: 'CHURN_1',
      owner: 'bob',
      description: 'Churn model',
      project_folder_id: 'f1',
    });

    expect(backend.calls).toHaveLength(1);
    expect(backend.calls[0]?.body).toEqual({
      projectKey: 'CHURN_1',
      name: 'Churn',
      owner: 'bob',
      shortDesc: 'Churn model',
    });
    expect(backend.calls[0]?.params.get('projectFolderId')).toBe('f1');
  });
});

describe('list_projects', () => {
  const projects = [
    {
      projectKey: 'A',
      name: 'Alpha',
      ownerLogin: 'alice',
      ownerDisplayName: 'Alice',
      tags: ['prod'],
      description: 'First',
      projectLocation: '/Sales',
      versionTag: { versionNumber: 12 },
    },
  ];

  it('keeps only the summary fields', async () => {
    const { call, backend } = harness({ 'GET /projects/': { json: projects } });

    await expect(call('list_projects')).resolves.toEqual([
      {
        name: 'Alpha',
        projectKey: 'A',
        ownerDisplayName: 'Alice',
        ownerLogin: 'alice',
        tutorialProject: '',
        tags: ['prod'],
      },
    ]);
    expect(backend.calls[0]?.params.get('includeLocation')).toBe('false');
  });

  it('adds description and location on request', async () => {
    const { call, backend } = harness({ 'GET /projects/': { json: projects } });

    const [summary] = (await call('list_projects', {
      include_location: true,
      include_description: true,
    })) as Record<string, unknown>[];

    expect(summary).toMatchObject({ description: 'First', projectLocation: '/Sales' });
    expect(summary).not.toHaveProperty('versionTag');
    expect(backend.calls[0]?.params.get('includeLocation')).toBe('true');
  });
});

describe('project folders', () => {
  const routes = {
    'GET /project-folders/ROOT': { json: { id: 'ROOT', name: 'Root', childrenIds: ['f1'], projectKeys: ['A'] } },
    'GET /project-folders/f1': {
      json: { id: 'f1', name: 'Sales', parentId: 'ROOT', childrenIds: ['f2'], projectKeys: ['B'] },
    },
    'GET /project-folders/f2': {
      json: { id: 'f2', name: 'EMEA', parentId: 'f1', childrenIds: [], projectKeys: [] },
    },
  };

  it('lists the folder tree from the root', async () => {
    const { call } = harness(routes);

    await expect(call('list_project_folders')).resolves.toEqual({
      id: 'ROOT',
      name: 'Root',
      path: '/',
      projectKeys: ['A'],
      children: [
        {
          id: 'f1',
          name: 'Sales',
          path: '/Sales',
          projectKeys: ['B'],
          children: [{ id: 'f2', name: 'EMEA', path: '/Sales/EMEA', projectKeys: [], children: [] }],
        },
      ],
    });
  });

  it('describes one folder with its path', async () => {
    const { call } = harness(routes);

    await expect(call('get_project_folder', { folder_id: 'f2' })).resolves.toEqual({
      id: 'f2',
      name: 'EMEA',
      path: '/Sales/EMEA',
      projectKeys: [],
      childrenIds: [],
    });
  });
});

describe('get_auth_info', () => {
  const authInfo = { authIdentifier: 'alice', groups: ['admins'] };

  it('reports an admin when connections can be listed', async () => {
    const { call } = harness({
      'GET /auth/info': { json: authInfo },
      'GET /admin/connections/': { json: {} },
    });

    await expect(call('get_auth_info')).resolves.toEqual({ ...authInfo, isAdmin: true });
  });

  it('reports a non-admin when the platform refuses', async () => {
    const { call } = harness({
      'GET /auth/info': { json: authInfo },
      'GET /admin/connections/': {
        status: 403,
        json: { errorType: 'com.dataiku.dip.exceptions.UnauthorizedException', message: 'Action forbidden' },
      },
    });

    await expect(call('get_auth_info')).resolves.toEqual({ ...authInfo, isAdmin: false });
  });

  it('fails when the admin probe cannot reach the platform', async () => {
    const { call } = harness({
      'GET /auth/info': { json: authInfo },
      'GET /admin/connections/': () => {
        throw new TypeError('fetch failed');
      },
    });

    const error = await call('get_auth_info').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(PlatformOperationError);
    expect((error as PlatformOperationError).category).toBe('network');
    expect((error as PlatformOperationError).message).toBe('GET /admin/connections/ failed: fetch failed');
  });
});

describe('general settings', () => {
  const raw = {
    maxRunningActivities: 5,
    sparkSettings: { executionConfigs: [] },
    ldapSettings: { enabled: true },
  };

  it('returns the allowed keys that are set', async () => {
    const { call } = harness({ 'GET /admin/general-settings': { json: raw } });

    await expect(call('get_general_settings')).resolves.toEqual({
      maxRunningActivities: 5,
      sparkSettings: { executionConfigs: [] },
    });
  });

  it('returns only the requested keys', async () => {
    const { call } = harness({ 'GET /admin/general-settings': { json: raw } });

    await expect(call('get_general_settings', { settings_keys: ['maxRunningActivities'] })).resolves.toEqual({
      maxRunningActivities: 5,
    });
  });

  it('refuses keys outside the allowed set without calling the platform', async () => {
    const { call, backend } = harness({ 'GET /admin/general-settings': { json: raw } });

    await expect(call('get_general_settings', { settings_keys: ['ldapSettings'] })).rejects.toThrow(
      InvalidArgumentError,
    );
    await expect(call('set_general_settings', { settings: { ldapSettings: {} } })).rejects.toThrow(
      /^Invalid settings keys: ldapSettings\. Allowed keys are: sparkSettings, /,
    );
    expect(backend.fetch).not.toHaveBeenCalled();
  });

  it('updates only the given keys and saves the rest untouched', async () => {
    const { call, backend } = harness({
      'GET /admin/general-settings': { json: raw },
      'PUT /admin/general-settings': { json: null },
    });

    await expect(call('set_general_settings', { settings: { maxRunningActivities: 8 } })).resolves.toEqual({
      message: 'General settings updated successfully',
      updatedKeys: ['maxRunningActivities'],
    });
    expect(backend.calls[1]?.body).toEqual({ ...raw, maxRunningActivities: 8 });
  });
});

describe('instance listings', () => {
  it('trims code envs to their identifying fields', async () => {
    const { call } = harness({
      'GET /admin/code-envs/': {
        json: [{ envName: 'py311', envLang: 'PYTHON', owner: 'admin', deploymentMode: 'DESIGN_MANAGED' }],
      },
    });

    await expect(call('list_code_envs')).resolves.toEqual([
      { envName: 'py311', envLang: 'PYTHON', owner: 'admin', pythonInterpreter: '' },
    ]);
  });

  it('asks for futures or scenarios of the caller or of everyone', async () => {
    const { call, backend } = harness({ 'GET /futures/': { json: [] } });

    await call('list_futures');
    await call('list_running_scenarios', { all_users: true });

    expect(backend.calls.map((c) => Object.fromEntries(c.params))).toEqual([
      { withScenarios: 'false', withNotScenarios: 'true', allUsers: 'false' },
      { withScenarios: 'true', withNotScenarios: 'false', allUsers: 'true' },
    ]);
  });

  it('passes include_settings to the user listing', async () => {
    const { call, backend } = harness({ 'GET /admin/users/': { json: [{ login: 'alice' }] } });

    await expect(call('list_users', { include_settings: true })).resolves.toEqual([{ login: 'alice' }]);
    expect(backend.calls[0]?.params.get('includeSettings')).toBe('true');
  });
});
