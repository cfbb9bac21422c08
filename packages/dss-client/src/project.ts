import { DSSDataset, DSSManagedDatasetCreator } from './dataset.js';
import { DSSProjectFlow } from './flow.js';
import { DSSFuture } from './future.js';
import type { DSSHttp } from './http.js';
import { DSSProjectFolder, parseProjectFolder } from './project-folder.js';
import type { DSSClient } from './client.js';
import { DSSRecipe, DSSRecipeCreator } from './recipe.js';
import { asObject, asObjectList, segment } from './responses.js';
import type { JsonObject, JsonValue } from './types.js';

export type DuplicationMode = 'MINIMAL' | 'SHARING' | 'FULL' | 'NONE';

export interface DeleteProjectOptions {
  clearManagedDatasets?: boolean;
  clearOutputManagedFolders?: boolean;
  clearJobAndScenarioLogs?: boolean;
}

export interface DuplicateProjectOptions {
  targetProjectKey: string;
  targetProjectName: string;
  duplicationMode?: DuplicationMode;
  exportAnalysisModels?: boolean;
  exportSavedModels?: boolean;
  exportInsightsData?: boolean;
  targetProjectFolder?: DSSProjectFolder;
}

/**
 * Handle on one project. Creating a handle performs no request; a missing
 * project surfaces on the first call.
 */
export class DSSProject {
  private readonly http: DSSHttp;

  constructor(
    private readonly client: DSSClient,
    readonly projectKey: string,
  ) {
    this.http = client.http;
  }

  private get path(): string {
    return `/projects/${segment(this.projectKey)}`;
  }

  // ─── Information ─────────────────────────────────────────────

  getSummary(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/`);
  }

  getMetadata(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/metadata`);
  }

  async setMetadata(metadata: JsonObject): Promise<void> {
    await this.http.json('PUT', `${this.path}/metadata`, { body: metadata });
  }

  getPermissions(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/permissions`);
  }

  async setPermissions(permissions: JsonObject): Promise<void> {
    await this.http.json('PUT', `${this.path}/permissions`, { body: permissions });
  }

  getInterest(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/interest`);
  }

  getTimeline(itemCount = 100): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/timeline`, { params: { itemCount } });
  }

  // ─── Lifecycle ───────────────────────────────────────────────

  async getProjectFolder(): Promise<DSSProjectFolder> {
    const data = await this.http.json('GET', `${this.path}/project-folder`);
    return new DSSProjectFolder(this.client, parseProjectFolder(data, `of project ${this.projectKey}`));
  }

  async moveToFolder(destination: DSSProjectFolder): Promise<void> {
    const current = await this.getProjectFolder();
    await current.moveProjectTo(this.projectKey, destination);
  }

  /** Delete the project and wait for the deletion task to finish. */
  async delete(options: DeleteProjectOptions = {}): Promise<JsonValue> {
    const response = await this.http.json('DELETE', `${this.path}/`, {
      params: {
        clearManagedDatasets: options.clearManagedDatasets ?? false,
        clearOutputManagedFolders: options.clearOutputManagedFolders ?? false,
        clearJobAndScenarioLogs: options.clearJobAndScenarioLogs ?? true,
      },
    });
    if (response === null) return null;
    const future = new DSSFuture(this.http, asObject(response, 'project deletion'), this.client.pollIntervalMs);
    return future.waitForResult();
  }

  duplicate(options: DuplicateProjectOptions): Promise<JsonValue> {
    const body: JsonObject = {
      targetProjectKey: options.targetProjectKey,
      targetProjectName: options.targetProjectName,
      duplicationMode: options.duplicationMode ?? 'MINIMAL',
      exportAnalysisModels: options.exportAnalysisModels ?? true,
      exportSavedModels: options.exportSavedModels ?? true,
      exportInsightsData: options.exportInsightsData ?? true,
    };
    if (options.targetProjectFolder) body.targetProjectFolderId = options.targetProjectFolder.id;
    return this.http.json('POST', `${this.path}/duplicate/`, { body });
  }

  // ─── Contents ────────────────────────────────────────────────

  async listDatasets(options: { includeShared?: boolean } = {}): Promise<JsonObject[]> {
    const data = await this.http.json('GET', `${this.path}/datasets/`, {
      params: { includeShared: options.includeShared ?? false },
    });
    return asObjectList(data, `datasets of ${this.projectKey}`);
  }

  async listRecipes(): Promise<JsonObject[]> {
    return asObjectList(await this.http.json('GET', `${this.path}/recipes/`), `recipes of ${this.projectKey}`);
  }

  async listManagedFolders(): Promise<JsonObject[]> {
    return asObjectList(
      await this.http.json('GET', `${this.path}/managedfolders/`),
      `managed folders of ${this.projectKey}`,
    );
  }

  listScenarios(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/scenarios/`);
  }

  async listJobs(): Promise<JsonValue[]> {
    return asObjectList(await this.http.json('GET', `${this.path}/jobs/`), `jobs of ${this.projectKey}`);
  }

  async listMlTasks(): Promise<JsonValue[]> {
    return asObjectList(await this.http.json('GET', `${this.path}/models/lab/`), `ML tasks of ${this.projectKey}`);
  }

  async listAnalyses(): Promise<JsonValue[]> {
    return asObjectList(await this.http.json('GET', `${this.path}/lab/`), `analyses of ${this.projectKey}`);
  }

  listSavedModels(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/savedmodels/`);
  }

  // ─── Handles ─────────────────────────────────────────────────

  getFlow(): DSSProjectFlow {
    return new DSSProjectFlow(this.http, this.projectKey);
  }

  getDataset(name: string): DSSDataset {
    return new DSSDataset(this.http, this.projectKey, name);
  }

  newManagedDataset(name: string): DSSManagedDatasetCreator {
    return new DSSManagedDatasetCreator(this.http, this, name);
  }

  getRecipe(name: string): DSSRecipe {
    return new DSSRecipe(this.http, this.projectKey, name, this.client.pollIntervalMs);
  }

  newRecipe(type: string, name?: string): DSSRecipeCreator {
    return new DSSRecipeCreator(this.http, this.projectKey, type, name, this.client.pollIntervalMs);
  }
}
