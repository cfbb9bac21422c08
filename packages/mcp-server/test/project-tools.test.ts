import { describe, it, expect } from 'vitest';
import { InvalidArgumentError } from '../src/errors.js';
import { harness } from './helpers.js';

const folders = {
  'GET /project-folders/ROOT': { json: { id: 'ROOT', name: 'Root', childrenIds: ['F1'] } },
  'GET /project-folders/F1': { json: { id: 'F1', name: 'Sales', parentId: 'ROOT', projectKeys: ['P'] } },
};

describe('project lifecycle tools', () => {
  it('moves a project and reports the destination path', async () => {
    const { call, backend } = harness({
      ...folders,
      'GET /projects/P/project-folder': folders['GET /project-folders/ROOT'],
      'POST /project-folders/ROOT/projects/P/move': { json: {} },
    });

    await expect(call('move_project_to_folder', { project_key: 'P', destination_folder_id: 'F1' })).resolves.toEqual({
      success: true,
      project_key: 'P',
      destination_folder_id: 'F1',
      destination_folder_path: '/Sales',
    });
    const move = backend.calls.find((c) => c.method === 'POST');
    expect(move?.params.get('destination')).toBe('F1');
  });

  it('deletes a project and returns the deletion messages', async () => {
    const { call, backend } = harness({
      'DELETE /projects/OLD/': { json: { jobId: 'f-1', hasResult: false, alive: true } },
      'GET /futures/f-1': { json: { jobId: 'f-1', hasResult: true, result: { messages: [] } } },
    });

    await expect(call('delete_project', { project_key: 'OLD', clear_managed_datasets: true })).resolves.toEqual({
      success: true,
      project_key: 'OLD',
      messages: { messages: [] },
    });
    expect(backend.calls[0]?.params.toString()).toBe(
      'clearManagedDatasets=true&clearOutputManagedFolders=false&clearJobAndScenarioLogs=true',
    );
  });

  it('duplicates into a folder with the chosen mode', async () => {
    const { call, backend } = harness({
      ...folders,
      'POST /projects/P/duplicate/': { json: { originalProjectKey: 'P', targetProjectKey: 'P2' } },
    });

    const result = await call('duplicate_project', {
      project_key: 'P',
      target_project_key: 'P2',
      target_project_name: 'Copy',
      duplication_mode: 'FULL',
      export_saved_models: false,
      target_project_folder_id: 'F1',
    });

    expect(result).toEqual({ originalProjectKey: 'P', targetProjectKey: 'P2' });
    expect(backend.calls.at(-1)?.body).toEqual({
      targetProjectKey: 'P2',
      targetProjectName: 'Copy',
      duplicationMode: 'FULL',
      exportAnalysisModels: true,
      exportSavedModels: false,
      exportInsightsData: true,
      targetProjectFolderId: 'F1',
    });
  });

  it('rejects an unknown duplication mode', async () => {
    const { call, backend } = harness({});

    await expect(
      call('duplicate_project', {
        project_key: 'P',
        target_project_key: 'P2',
        target_project_name: 'Copy',
        duplication_mode: 'EVERYTHING',
      }),
    ).rejects.toThrow(InvalidArgumentError);
    expect(backend.fetch).not.toHaveBeenCalled();
  });
});

describe('project information tools', () => {
  it('writes metadata and permissions as given', async () => {
    const metadata = { label: 'Sales', tags: ['prod'], custom: { kv: { team: 'bi' } } };
    const permissions = { owner: 'alice', permissions: [{ group: 'analysts', readProjectContent: true }] };
    const { call, backend } = harness({
      'PUT /projects/P/metadata': { json: null },
      'PUT /projects/P/permissions': { json: null },
    });

    await expect(call('set_project_metadata', { project_key: 'P', metadata })).resolves.toEqual({
      success: true,
      project_key: 'P',
      message: 'Project metadata updated successfully',
    });
    await expect(call('set_project_permissions', { project_key: 'P', permissions })).resolves.toMatchObject({
      message: 'Project permissions updated successfully',
    });
    expect(backend.calls.map((c) => c.body)).toEqual([metadata, permissions]);
  });

  it('asks for 100 timeline items unless told otherwise', async () => {
    const { call, backend } = harness({ 'GET /projects/P/timeline': { json: { items: [] } } });

    await call('get_project_timeline', { project_key: 'P' });
    await call('get_project_timeline', { project_key: 'P', item_count: 7 });

    expect(backend.calls.map((c) => c.params.get('itemCount'))).toEqual(['100', '7']);
  });
});

describe('project content tools', () => {
  it('trims datasets to their summary fields', async () => {
    const { call, backend } = harness({
      'GET /projects/P/datasets/': {
        json: [
          {
            type: 'Filesystem',
            managed: true,
            name: 'orders',
            projectKey: 'P',
            formatType: 'csv',
            schema: { columns: [{ name: 'id', type: 'int' }] },
            params: { connection: 'filesystem_managed', path: '/data/P/orders' },
          },
        ],
      },
    });

    await expect(call('list_project_datasets', { project_key: 'P', include_shared: true })).resolves.toEqual([
      {
        type: 'Filesystem',
        managed: true,
        name: 'orders',
        smartName: '',
        formatType: 'csv',
        projectKey: 'P',
        tags: [],
        schema: { columns: [{ name: 'id', type: 'int' }] },
      },
    ]);
    expect(backend.calls[0]?.params.get('includeShared')).toBe('true');
  });

  it('trims recipes and managed folders', async () => {
    const { call } = harness({
      'GET /projects/P/recipes/': {
        json: [{ type: 'python', name: 'compute_orders', projectKey: 'P', params: { envName: 'py311' } }],
      },
      'GET /projects/P/managedfolders/': { json: [{ id: 'x1', name: 'models', type: 'Filesystem' }] },
    });

    await expect(call('list_project_recipes', { project_key: 'P' })).resolves.toEqual([
      { type: 'python', name: 'compute_orders', projectKey: 'P', inputs: {}, outputs: {}, tags: [] },
    ]);
    await expect(call('list_project_managed_folders', { project_key: 'P' })).resolves.toEqual([
      { id: 'x1', type: 'Filesystem', name: 'models', projectKey: '', tags: [], params: {} },
    ]);
  });

  it('limits jobs, ML tasks and analyses', async () => {
    const items = (prefix: string) => Array.from({ length: 12 }, (_, i) => ({ id: `${prefix}${i}` }));
    const { call } = harness({
      'GET /projects/P/jobs/': { json: items('job') },
      'GET /projects/P/models/lab/': { json: items('ml') },
      'GET /projects/P/lab/': { json: items('an') },
    });

    await expect(call('list_project_jobs', { project_key: 'P' })).resolves.toHaveLength(10);
    await expect(call('list_project_ml_tasks', { project_key: 'P', num_ml_tasks: 2 })).resolves.toEqual([
      { id: 'ml0' },
      { id: 'ml1' },
    ]);
    await expect(call('list_project_analyses', { project_key: 'P', num_analyses: 0 })).resolves.toEqual([]);
  });
});

describe('get_flow_graph', () => {
  it('returns the nodes in traversal order', async () => {
    const node = (ref: string, predecessors: string[], successors: string[]) => ({
      ref,
      type: ref.startsWith('compute') ? 'RUNNABLE_RECIPE' : 'COMPUTABLE_DATASET',
      predecessors,
      successors,
    });
    const { call } = harness({
      'GET /projects/P/flow/graph/': {
        json: {
          nodes: {
            clean: node('clean', ['compute_clean'], []),
            compute_clean: node('compute_clean', ['raw'], ['clean']),
            raw: node('raw', [], ['compute_clean']),
          },
        },
      },
    });

    const graph = (await call('get_flow_graph', { project_key: 'P' })) as { nodes: { ref: string }[] };

    expect(graph.nodes.map((n) => n.ref)).toEqual(['raw', 'compute_clean', 'clean']);
    expect(graph).toMatchObject({ project_key: 'P' });
  });
});
