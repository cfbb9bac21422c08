/**
 * Project tools: lifecycle, information and contents of one project.
 */

import { z } from 'zod';
import { defineTool, jsonObject, projectKey, type ToolDescriptor } from './define.js';
import { summarize } from './summarize.js';

const listLimit = (what: string) =>
  z.number().int().nonnegative().default(10).describe(`Maximum number of ${what} to return`);

export const projectTools: ToolDescriptor[] = [
  // ─── Lifecycle ──────────────────────────────────────────────

  defineTool({
    name: 'move_project_to_folder',
    description: 'Move a project into another project folder.',
    params: {
      project_key: projectKey,
      destination_folder_id: z.string().min(1).describe('Id of the destination folder ("ROOT" for the root)'),
    },
    async handler({ project_key, destination_folder_id }, { client }) {
      const project = client.getProject(project_key);
      const destination = await client.getProjectFolder(destination_folder_id);
      await project.moveToFolder(destination);
      return {
        success: true,
        project_key,
        destination_folder_id,
        destination_folder_path: await destination.getPath(),
      };
    },
  }),

  defineTool({
    name: 'delete_project',
    description: 'Delete a project and wait for the deletion to finish. Admin only.',
    params: {
      project_key: projectKey,
      clear_managed_datasets: z.boolean().default(false).describe('Also delete the data of managed datasets'),
      clear_output_managed_folders: z
        .boolean()
        .default(false)
        .describe('Also delete the contents of output managed folders'),
      clear_job_and_scenario_logs: z.boolean().default(true).describe('Also delete job and scenario logs'),
    },
    destructive: true,
    async handler(args, { client }) {
      const messages = await client.getProject(args.project_key).delete({
        clearManagedDatasets: args.clear_managed_datasets,
        clearOutputManagedFolders: args.clear_output_managed_folders,
        clearJobAndScenarioLogs: args.clear_job_and_scenario_logs,
      });
      return { success: true, project_key: args.project_key, messages };
    },
  }),

  defineTool({
    name: 'duplicate_project',
    description:
      'Duplicate a project. Modes: MINIMAL copies the structure only, SHARING also sets up sharing, ' +
      'FULL copies the data too, NONE copies the structure with no special handling.',
    params: {
      project_key: projectKey,
      target_project_key: z.string().min(1).describe('Key of the new project'),
      target_project_name: z.string().min(1).describe('Name of the new project'),
      duplication_mode: z.enum(['MINIMAL', 'SHARING', 'FULL', 'NONE']).default('MINIMAL'),
      export_analysis_models: z.boolean().default(true),
      export_saved_models: z.boolean().default(true),
      export_insights_data: z.boolean().default(true),
      target_project_folder_id: z.string().optional().describe('Folder of the new project; root when omitted'),
    },
    async handler(args, { client }) {
      const targetProjectFolder = args.target_project_folder_id
        ? await client.getProjectFolder(args.target_project_folder_id)
        : undefined;
      return client.getProject(args.project_key).duplicate({
        targetProjectKey: args.target_project_key,
        targetProjectName: args.target_project_name,
        duplicationMode: args.duplication_mode,
        exportAnalysisModels: args.export_analysis_models,
        exportSavedModels: args.export_saved_models,
        exportInsightsData: args.export_insights_data,
        targetProjectFolder,
      });
    },
  }),

  // ─── Information ────────────────────────────────────────────

  defineTool({
    name: 'get_project_summary',
    description: 'A read-only summary of the project\'s state.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).getSummary(),
  }),

  defineTool({
    name: 'get_project_metadata',
    description: 'Project metadata: label, description, checklists, tags and custom metadata.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).getMetadata(),
  }),

  defineTool({
    name: 'set_project_metadata',
    description:
      'Replace the project metadata. Call get_project_metadata first, edit the result, and pass it back.',
    params: {
      project_key: projectKey,
      metadata: jsonObject.describe('Full metadata: label, description, tags, checklists, custom'),
    },
    async handler({ project_key, metadata }, { client }) {
      await client.getProject(project_key).setMetadata(metadata);
      return { success: true, project_key, message: 'Project metadata updated successfully' };
    },
  }),

  defineTool({
    name: 'get_project_permissions',
    description: 'Owner and per-group permissions of the project.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).getPermissions(),
  }),

  defineTool({
    name: 'set_project_permissions',
    description:
      'Replace the project permissions. Call get_project_permissions first, edit the result, and pass it back.',
    params: {
      project_key: projectKey,
      permissions: jsonObject.describe('Full permissions: owner and the list of group permissions'),
    },
    async handler({ project_key, permissions }, { client }) {
      await client.getProject(project_key).setPermissions(permissions);
      return { success: true, project_key, message: 'Project permissions updated successfully' };
    },
  }),

  defineTool({
    name: 'get_project_interest',
    description: 'Star and watcher counts of the project.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).getInterest(),
  }),

  defineTool({
    name: 'get_project_timeline',
    description: 'Who created and last modified the project, its contributors, and its recent modifications.',
    params: {
      project_key: projectKey,
      item_count: z.number().int().positive().default(100).describe('Maximum number of modifications'),
    },
    readOnly: true,
    handler: ({ project_key, item_count }, { client }) => client.getProject(project_key).getTimeline(item_count),
  }),

  // ─── Contents ───────────────────────────────────────────────

  defineTool({
    name: 'list_project_datasets',
    description: 'List the datasets of a project with their type, format, tags and schema.',
    params: {
      project_key: projectKey,
      include_shared: z.boolean().default(false).describe('Include datasets shared from other projects'),
    },
    readOnly: true,
    async handler({ project_key, include_shared }, { client }) {
      const datasets = await client.getProject(project_key).listDatasets({ includeShared: include_shared });
      return datasets.map((dataset) =>
        summarize(dataset, {
          type: '',
          managed: false,
          name: '',
          smartName: '',
          formatType: '',
          projectKey: '',
          tags: [],
          schema: {},
        }),
      );
    },
  }),

  defineTool({
    name: 'list_project_recipes',
    description: 'List the recipes of a project with their type, inputs, outputs and tags.',
    params: { project_key: projectKey },
    readOnly: true,
    async handler({ project_key }, { client }) {
      const recipes = await client.getProject(project_key).listRecipes();
      return recipes.map((recipe) =>
        summarize(recipe, { type: '', name: '', projectKey: '', inputs: {}, outputs: {}, tags: [] }),
      );
    },
  }),

  defineTool({
    name: 'list_project_scenarios',
    description: 'List the scenarios of a project.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).listScenarios(),
  }),

  defineTool({
    name: 'list_project_jobs',
    description: 'List the most recent jobs of a project.',
    params: { project_key: projectKey, num_jobs: listLimit('jobs') },
    readOnly: true,
    async handler({ project_key, num_jobs }, { client }) {
      return (await client.getProject(project_key).listJobs()).slice(0, num_jobs);
    },
  }),

  defineTool({
    name: 'list_project_ml_tasks',
    description: 'List the ML tasks of a project.',
    params: { project_key: projectKey, num_ml_tasks: listLimit('ML tasks') },
    readOnly: true,
    async handler({ project_key, num_ml_tasks }, { client }) {
      return (await client.getProject(project_key).listMlTasks()).slice(0, num_ml_tasks);
    },
  }),

  defineTool({
    name: 'list_project_analyses',
    description: 'List the visual analyses of a project.',
    params: { project_key: projectKey, num_analyses: listLimit('analyses') },
    readOnly: true,
    async handler({ project_key, num_analyses }, { client }) {
      return (await client.getProject(project_key).listAnalyses()).slice(0, num_analyses);
    },
  }),

  defineTool({
    name: 'list_project_saved_models',
    description: 'List the saved models of a project.',
    params: { project_key: projectKey },
    readOnly: true,
    handler: ({ project_key }, { client }) => client.getProject(project_key).listSavedModels(),
  }),

  defineTool({
    name: 'list_project_managed_folders',
    description: 'List the managed folders of a project.',
    params: { project_key: projectKey },
    readOnly: true,
    async handler({ project_key }, { client }) {
      const folders = await client.getProject(project_key).listManagedFolders();
      return folders.map((folder) =>
        summarize(folder, { id: '', type: '', name: '', projectKey: '', tags: [], params: {} }),
      );
    },
  }),
];
