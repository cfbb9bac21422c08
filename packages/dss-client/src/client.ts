/**
 * DSSClient: entry point to the DSS public API.
 *
 * One client per caller: it authenticates with that caller's API key, so
 * every call runs with the caller's own permissions. close() aborts any
 * request still in flight and makes further calls fail.
 */

import { DSSGeneralSettings } from './general-settings.js';
import { DSSHttp } from './http.js';
import { DSSProject } from './project.js';
import { DSSProjectFolder, parseProjectFolder } from './project-folder.js';
import { asList, asObject, asObjectList, segment } from './responses.js';
import type { JsonObject, JsonValue } from './types.js';

export interface DSSClientOptions {
  /** Backend URL, e.g. http://localhost:11200 */
  host: string;
  apiKey: string;
  /** Override for tests or custom agents. */
  fetch?: typeof fetch;
  /** Delay between polls while waiting on jobs and futures. */
  pollIntervalMs?: number;
}

export interface CreateProjectOptions {
  projectKey: string;
  name: string;
  owner: string;
  description?: string;
  projectFolderId?: string;
}

export class DSSClient {
  readonly http: DSSHttp;
  readonly pollIntervalMs: number;

  constructor(options: DSSClientOptions) {
    this.http = new DSSHttp({ host: options.host, apiKey: options.apiKey, fetchImpl: options.fetch });
    this.pollIntervalMs = options.pollIntervalMs ?? 2000;
  }

  get closed(): boolean {
    return this.http.closed;
  }

  close(): void {
    this.http.close();
  }

  // ─── Identity ────────────────────────────────────────────────

  async getAuthInfo(options: { withSecrets?: boolean } = {}): Promise<JsonObject> {
    const data = await this.http.json('GET', '/auth/info', {
      params: { withSecrets: options.withSecrets ?? false },
    });
    return asObject(data, 'auth info');
  }

  // ─── Projects ────────────────────────────────────────────────

  async listProjects(options: { includeLocation?: boolean } = {}): Promise<JsonObject[]> {
    const data = await this.http.json('GET', '/projects/', {
      params: { includeLocation: options.includeLocation ?? false },
    });
    return asObjectList(data, 'project list');
  }

  getProject(projectKey: string): DSSProject {
    return new DSSProject(this, projectKey);
  }

  async createProject(options: CreateProjectOptions): Promise<DSSProject> {
    const body: JsonObject = {
      projectKey: options.projectKey,
      name: options.name,
      owner: options.owner,
    };
    if (options.description !== undefined) body.shortDesc = options.description;
    await this.http.json('POST', '/projects/', {
      body,
      params: { projectFolderId: options.projectFolderId },
    });
    return this.getProject(options.projectKey);
  }

  // ─── Project folders ─────────────────────────────────────────

  async getProjectFolder(folderId: string): Promise<DSSProjectFolder> {
    const data = await this.http.json('GET', `/project-folders/${segment(folderId)}`);
    return new DSSProjectFolder(this, parseProjectFolder(data, folderId));
  }

  getRootProjectFolder(): Promise<DSSProjectFolder> {
    return this.getProjectFolder('ROOT');
  }

  // ─── Running tasks ───────────────────────────────────────────

  listFutures(options: { allUsers?: boolean } = {}): Promise<JsonValue> {
    return this.http.json('GET', '/futures/', {
      params: { withScenarios: false, withNotScenarios: true, allUsers: options.allUsers ?? false },
    });
  }

  listRunningScenarios(options: { allUsers?: boolean } = {}): Promise<JsonValue> {
    return this.http.json('GET', '/futures/', {
      params: { withScenarios: true, withNotScenarios: false, allUsers: options.allUsers ?? false },
    });
  }

  listRunningNotebooks(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/notebooks/');
  }

  // ─── Instance administration ─────────────────────────────────

  listPlugins(): Promise<JsonValue> {
    return this.http.json('GET', '/plugins/');
  }

  listUsers(options: { includeSettings?: boolean } = {}): Promise<JsonValue> {
    return this.http.json('GET', '/admin/users/', {
      params: { includeSettings: options.includeSettings ?? false },
    });
  }

  listGroups(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/groups/');
  }

  /** Admin only: the platform rejects non-admin callers. */
  listConnections(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/connections/');
  }

  async listConnectionsNames(connectionType: string): Promise<JsonValue[]> {
    const data = await this.http.json('GET', '/connections/get-names', { params: { type: connectionType } });
    return asList(data, 'connection names');
  }

  async listCodeEnvs(): Promise<JsonObject[]> {
    return asObjectList(await this.http.json('GET', '/admin/code-envs/'), 'code env list');
  }

  listCodeEnvUsages(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/code-envs/usages');
  }

  listClusters(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/clusters/');
  }

  listMeanings(): Promise<JsonValue> {
    return this.http.json('GET', '/meanings/');
  }

  listWorkspaces(): Promise<JsonValue> {
    return this.http.json('GET', '/workspaces/');
  }

  listDataCollections(): Promise<JsonValue> {
    return this.http.json('GET', '/data-collections/');
  }

  getLicensingStatus(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/licensing/status');
  }

  getSanityCheckCodes(): Promise<JsonValue> {
    return this.http.json('GET', '/admin/sanity-check/codes');
  }

  getDataQualityStatus(): Promise<JsonValue> {
    return this.http.json('GET', '/data-quality/status');
  }

  async getGeneralSettings(): Promise<DSSGeneralSettings> {
    const data = await this.http.json('GET', '/admin/general-settings');
    return new DSSGeneralSettings(this.http, asObject(data, 'general settings'));
  }
}
