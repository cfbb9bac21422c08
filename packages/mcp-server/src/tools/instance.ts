/**
 * Instance-level tools: projects, project folders, running tasks, users,
 * connections, code envs and instance settings.
 */

import { DSSApiError, type DSSClient, type DSSProjectFolder, type JsonObject } from '@dss-mcp/dss-client';
import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import { defineTool, jsonObject, type ToolDescriptor } from './define.js';
import { summarize } from './summarize.js';

export const GENERAL_SETTINGS_KEYS = [
  'sparkSettings',
  'containerSettings',
  'defaultK8sClusterId',
  'security',
  'cgroupSettings',
  'maxRunningActivitiesPerJob',
  'maxRunningActivities',
  'maxRunningActivitiesPerKey',
] as const;

const allowedSettingsKeys: ReadonlySet<string> = new Set(GENERAL_SETTINGS_KEYS);

function checkSettingsKeys(keys: string[]): void {
  const invalid = keys.filter((key) => !allowedSettingsKeys.has(key));
  if (invalid.length > 0) {
    throw new InvalidArgumentError(
      `Invalid settings keys: ${invalid.join(', ')}. Allowed keys are: ${GENERAL_SETTINGS_KEYS.join(', ')}`,
    );
  }
}

/** Letters upper-cased, digits kept, anything else replaced by "_". */
export function generateProjectKey(projectName: string): string {
  let key = '';
  for (const char of projectName) {
    if (/\p{L}/u.test(char)) key += char.toUpperCase();
    else if (/\p{Nd}/u.test(char)) key += char;
    else key += '_';
  }
  return key;
}

interface FolderTree {
  id: string;
  name: string;
  path: string;
  projectKeys: string[];
  children: FolderTree[];
}

async function folderTree(folder: DSSProjectFolder, path: string): Promise<FolderTree> {
  const children: FolderTree[] = [];
  for (const child of await folder.listChildFolders()) {
    children.push(await folderTree(child, `${path}/${child.name}`));
  }
  return {
    id: folder.id,
    name: folder.name,
    path: path || '/',
    projectKeys: folder.listProjectKeys(),
    children,
  };
}

/** Only admins may list connections; the platform's refusal is the answer. */
async function isAdmin(client: DSSClient): Promise<boolean> {
  try {
    await client.listConnections();
    return true;
  } catch (err) {
    if (err instanceof DSSApiError) return false;
    throw err;
  }
}

const allUsers = z
  .boolean()
  .default(false)
  .describe('Include tasks of every user (admin only); otherwise only the caller\'s');

export const instanceTools: ToolDescriptor[] = [
  // ─── Projects ───────────────────────────────────────────────

  defineTool({
    name: 'list_projects',
    description: 'List the projects the caller can see. Each item has at least a projectKey.',
    params: {
      include_location: z.boolean().default(false).describe('Include each project\'s folder location (slower)'),
      include_description: z
        .boolean()
        .default(false)
        .describe('Include project descriptions (many more tokens; only when needed)'),
    },
    readOnly: true,
    async handler({ include_location, include_description }, { client }) {
      const projects = await client.listProjects({ includeLocation: include_location });
      return projects.map((project) => {
        const summary = summarize(project, {
          name: '',
          projectKey: '',
          ownerDisplayName: '',
          ownerLogin: '',
          tutorialProject: '',
          tags: [],
        });
        if (include_description) summary.description = project.description ?? [];
        if (include_location) summary.projectLocation = project.projectLocation ?? [];
        return summary;
      });
    },
  }),

  defineTool({
    name: 'create_project',
    description:
      'Create a project. Needs the right to create projects, and to write in the root folder when no ' +
      'folder is given. If the key already exists, retry with "_1", "_2", ... appended to it.',
    params: {
      project_name: z.string().min(1).describe('Display name of the project'),
      owner: z.string().optional().describe('Login of the owner; defaults to the caller'),
      description: z.string().optional().describe('Short description'),
      project_key: z
        .string()
        .min(1)
        .optional()
        .describe('Unique key; derived from the name when omitted (letters upper-cased, digits kept, others "_")'),
      project_folder_id: z.string().optional().describe('Folder to create the project in; root when omitted'),
    },
    async handler(args, { client }) {
      const projectKey = args.project_key ?? generateProjectKey(args.project_name);
      let owner = args.owner;
      if (owner === undefined) {
        const auth = await client.getAuthInfo();
        owner = typeof auth.authIdentifier === 'string' ? auth.authIdentifier : undefined;
      }
      if (owner === undefined) {
        throw new InvalidArgumentError('No owner given and the caller\'s login could not be determined');
      }
      const project = await client.createProject({
        projectKey,
        name: args.project_name,
        owner,
        description: args.description,
        projectFolderId: args.project_folder_id,
      });
      return {
        projectKey: project.projectKey,
        name: args.project_name,
        owner,
        message: `Project '${args.project_name}' created successfully with key '${project.projectKey}'`,
      };
    },
  }),

  // ─── Project folders ────────────────────────────────────────

  defineTool({
    name: 'list_project_folders',
    description: 'The project folder tree from the root: id, name, path, projectKeys and children of each folder.',
    params: {},
    readOnly: true,
    async handler(_args, { client }) {
      return folderTree(await client.getRootProjectFolder(), '');
    },
  }),

  defineTool({
    name: 'get_project_folder',
    description: 'Details of one project folder: id, name, path, projectKeys and childrenIds.',
    params: {
      folder_id: z.string().min(1).describe('Folder id; "ROOT" for the root folder'),
    },
    readOnly: true,
    async handler({ folder_id }, { client }) {
      const folder = await client.getProjectFolder(folder_id);
      return {
        id: folder.id,
        name: folder.name,
        path: await folder.getPath(),
        projectKeys: folder.listProjectKeys(),
        childrenIds: folder.childrenIds,
      };
    },
  }),

  // ─── Running tasks ──────────────────────────────────────────

  defineTool({
    name: 'list_futures',
    description: 'List the running long tasks (futures). Each item has at least a jobId.',
    params: { all_users: allUsers },
    readOnly: true,
    handler: ({ all_users }, { client }) => client.listFutures({ allUsers: all_users }),
  }),

  defineTool({
    name: 'list_running_scenarios',
    description: 'List running scenarios, each with the jobId of its future and a payload naming the scenario.',
    params: { all_users: allUsers },
    readOnly: true,
    handler: ({ all_users }, { client }) => client.listRunningScenarios({ allUsers: all_users }),
  }),

  defineTool({
    name: 'list_running_notebooks',
    description: 'List the running Jupyter notebooks.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listRunningNotebooks(),
  }),

  // ─── Instance ───────────────────────────────────────────────

  defineTool({
    name: 'list_plugins',
    description: 'List the installed plugins.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listPlugins(),
  }),

  defineTool({
    name: 'list_users',
    description: 'List the users of the instance. Admin only.',
    params: {
      include_settings: z.boolean().default(false).describe('Include each user\'s detailed settings'),
    },
    readOnly: true,
    handler: ({ include_settings }, { client }) => client.listUsers({ includeSettings: include_settings }),
  }),

  defineTool({
    name: 'list_groups',
    description: 'List the groups of the instance. Admin only.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listGroups(),
  }),

  defineTool({
    name: 'get_auth_info',
    description:
      'Who the caller is: authIdentifier, groups and more, plus isAdmin. Call it before admin-only tools ' +
      'when unsure of the caller\'s rights.',
    params: {},
    readOnly: true,
    async handler(_args, { client }) {
      const info: JsonObject = await client.getAuthInfo();
      return { ...info, isAdmin: await isAdmin(client) };
    },
  }),

  defineTool({
    name: 'list_connections_names',
    description: 'List connection names.',
    params: {
      connection_type: z.string().min(1).describe('Only connections of this type; "all" for every type'),
    },
    readOnly: true,
    handler: ({ connection_type }, { client }) => client.listConnectionsNames(connection_type),
  }),

  defineTool({
    name: 'list_code_envs',
    description: 'List the code environments: envName, envLang, owner and pythonInterpreter of each.',
    params: {},
    readOnly: true,
    async handler(_args, { client }) {
      const envs = await client.listCodeEnvs();
      return envs.map((env) =>
        summarize(env, { envName: '', envLang: '', owner: '', pythonInterpreter: '' }),
      );
    },
  }),

  defineTool({
    name: 'list_code_env_usages',
    description: 'List every place a code environment is used. The result can be large.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listCodeEnvUsages(),
  }),

  defineTool({
    name: 'list_clusters',
    description: 'List the clusters: name, type and state.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listClusters(),
  }),

  defineTool({
    name: 'list_meanings',
    description: 'List the user-defined meanings.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listMeanings(),
  }),

  defineTool({
    name: 'list_workspaces',
    description: 'List the workspaces.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listWorkspaces(),
  }),

  defineTool({
    name: 'list_data_collections',
    description: 'List the data collections the caller can access.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.listDataCollections(),
  }),

  defineTool({
    name: 'get_licensing_status',
    description: 'Licensing status of the instance. Admin only.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.getLicensingStatus(),
  }),

  defineTool({
    name: 'get_sanity_check_codes',
    description: 'Codes the instance sanity check can report. Admin only.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.getSanityCheckCodes(),
  }),

  defineTool({
    name: 'get_data_quality_status',
    description:
      'Data quality of monitored projects, keyed by project key: counts of datasets in Ok, Warning, Error and Empty.',
    params: {},
    readOnly: true,
    handler: (_args, { client }) => client.getDataQualityStatus(),
  }),

  // ─── General settings ───────────────────────────────────────

  defineTool({
    name: 'get_general_settings',
    description: `Instance general settings, limited to: ${GENERAL_SETTINGS_KEYS.join(', ')}. Admin only.`,
    params: {
      settings_keys: z
        .array(z.string())
        .optional()
        .describe('Keys to return; every allowed key when omitted'),
    },
    readOnly: true,
    async handler({ settings_keys }, { client }) {
      const keys = settings_keys ?? [...GENERAL_SETTINGS_KEYS];
      checkSettingsKeys(keys);
      const raw = (await client.getGeneralSettings()).getRaw();
      const selected: JsonObject = {};
      for (const key of keys) {
        const value = raw[key];
        if (value !== undefined) selected[key] = value;
      }
      return selected;
    },
  }),

  defineTool({
    name: 'set_general_settings',
    description:
      'Update instance general settings. Only the given keys change. Call get_general_settings first, edit ' +
      `the result, and pass it back. Allowed keys: ${GENERAL_SETTINGS_KEYS.join(', ')}. Admin only.`,
    params: {
      settings: jsonObject.describe('Settings to update, keyed by setting name'),
    },
    async handler({ settings }, { client }) {
      const keys = Object.keys(settings);
      checkSettingsKeys(keys);
      const general = await client.getGeneralSettings();
      for (const [key, value] of Object.entries(settings)) {
        general.settings[key] = value;
      }
      await general.save();
      return { message: 'General settings updated successfully', updatedKeys: keys };
    },
  }),
];
