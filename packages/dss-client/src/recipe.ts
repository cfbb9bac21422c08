import { z } from 'zod';
import { DSSResponseError } from './errors.js';
import type { DSSHttp } from './http.js';
import { buildJobDefinition, DSSJob, parseStartedJob, type JobType } from './job.js';
import { asObject, parseResponse, segment } from './responses.js';
import { isJsonObject, type JsonObject, type JsonValue } from './types.js';

const rolesSchema = z.record(
  z.object({
    items: z.array(z.object({ ref: z.string() }).passthrough()).default([]),
  }).passthrough(),
);

/** Recipe definition and payload, as stored by the platform. */
export class DSSRecipeSettings {
  constructor(
    private readonly http: DSSHttp,
    private readonly path: string,
    readonly data: JsonObject,
  ) {}

  getRecipeRawDefinition(): JsonObject {
    return isJsonObject(this.data.recipe) ? this.data.recipe : {};
  }

  get type(): string {
    const type = this.getRecipeRawDefinition().type;
    return typeof type === 'string' ? type : '';
  }

  getRecipeInputs(): JsonValue {
    return this.getRecipeRawDefinition().inputs ?? {};
  }

  getRecipeOutputs(): JsonValue {
    return this.getRecipeRawDefinition().outputs ?? {};
  }

  getRecipeParams(): JsonValue {
    return this.getRecipeRawDefinition().params ?? {};
  }

  /** Refs of every output, across all roles. */
  getFlatOutputRefs(): string[] {
    const roles = parseResponse(rolesSchema, this.getRecipeOutputs(), 'recipe outputs');
    return Object.values(roles).flatMap((role) => role.items.map((item) => item.ref));
  }

  /** Script source for code recipes, JSON text for visual ones. */
  get strPayload(): string {
    return typeof this.data.payload === 'string' ? this.data.payload : '';
  }

  set strPayload(payload: string) {
    this.data.payload = payload;
  }

  getJsonPayload(): JsonValue {
    const text = this.strPayload;
    if (text.trim().length === 0) return {};
    try {
      return JSON.parse(text);
    } catch (err) {
      throw new DSSResponseError(`Recipe payload is not valid JSON: ${text.slice(0, 200)}`, { cause: err });
    }
  }

  setJsonPayload(payload: JsonValue): void {
    this.strPayload = JSON.stringify(payload, null, 2);
  }

  async save(): Promise<void> {
    await this.http.json('PUT', this.path, { body: this.data });
  }
}

/** Output schema changes a recipe needs after its settings changed. */
export class DSSSchemaUpdates {
  constructor(
    private readonly http: DSSHttp,
    private readonly path: string,
    readonly data: JsonObject,
  ) {}

  anyActionRequired(): boolean {
    const total = this.data.totalIncompatibilities;
    return typeof total === 'number' && total > 0;
  }

  async apply(): Promise<void> {
    await this.http.json('POST', `${this.path}/actions/updateSchemas`, { body: this.data });
  }
}

export interface RunRecipeOptions {
  jobType?: JobType;
  wait?: boolean;
  /** When waiting, resolve instead of rejecting if the job fails. */
  noFail?: boolean;
}

export class DSSRecipe {
  constructor(
    private readonly http: DSSHttp,
    readonly projectKey: string,
    readonly name: string,
    private readonly pollIntervalMs: number,
  ) {}

  private get path(): string {
    return `/projects/${segment(this.projectKey)}/recipes/${segment(this.name)}`;
  }

  async getSettings(): Promise<DSSRecipeSettings> {
    const data = await this.http.json('GET', this.path);
    return new DSSRecipeSettings(this.http, this.path, asObject(data, `settings of recipe ${this.name}`));
  }

  async computeSchemaUpdates(): Promise<DSSSchemaUpdates> {
    const data = await this.http.json('GET', `${this.path}/schema-update`);
    return new DSSSchemaUpdates(this.http, this.path, asObject(data, `schema updates of recipe ${this.name}`));
  }

  /** Start a build of the recipe's outputs, optionally waiting for it to end. */
  async run(options: RunRecipeOptions = {}): Promise<DSSJob> {
    const settings = await this.getSettings();
    const outputs = settings.getFlatOutputRefs().map((id) => ({ id }));
    if (outputs.length === 0) {
      throw new DSSResponseError(`Recipe ${this.name} has no outputs to build`);
    }
    const definition = buildJobDefinition(options.jobType ?? 'NON_RECURSIVE_FORCED_BUILD', outputs);
    const started = await this.http.json('POST', `/projects/${segment(this.projectKey)}/jobs/`, {
      body: definition,
    });
    const job = new DSSJob(this.http, this.projectKey, parseStartedJob(started), this.pollIntervalMs);
    if (options.wait ?? true) await job.wait({ noFail: options.noFail });
    return job;
  }
}

export interface RecipeOutputSpec {
  ref: string;
  append?: boolean;
}

const createdSchema = z.object({ id: z.string().optional(), name: z.string().optional() }).passthrough();

/** Builder for a new recipe wired between existing flow items. */
export class DSSRecipeCreator {
  private readonly inputs: string[] = [];
  private readonly outputs: RecipeOutputSpec[] = [];
  private script: string | undefined;

  constructor(
    private readonly http: DSSHttp,
    readonly projectKey: string,
    readonly type: string,
    private readonly name: string | undefined,
    private readonly pollIntervalMs: number,
  ) {}

  withInput(ref: string): this {
    this.inputs.push(ref);
    return this;
  }

  withOutput(ref: string, options: { append?: boolean } = {}): this {
    this.outputs.push({ ref, append: options.append ?? false });
    return this;
  }

  withScript(script: string): this {
    this.script = script;
    return this;
  }

  async create(): Promise<DSSRecipe> {
    const name = this.name ?? (this.outputs[0] ? `compute_${this.outputs[0].ref}` : undefined);
    const prototype: JsonObject = {
      type: this.type,
      inputs: { main: { items: this.inputs.map((ref) => ({ ref, deps: [] })) } },
      outputs: {
        main: { items: this.outputs.map((out) => ({ ref: out.ref, appendMode: out.append ?? false })) },
      },
    };
    if (name !== undefined) prototype.name = name;
    const creationSettings: JsonObject = {};
    if (this.script !== undefined) creationSettings.script = this.script;

    const response = await this.http.json('POST', `/projects/${segment(this.projectKey)}/recipes/`, {
      body: { recipePrototype: prototype, creationSettings },
    });
    const created = parseResponse(createdSchema, response ?? {}, 'recipe creation response');
    const recipeName = created.id ?? created.name ?? name;
    if (recipeName === undefined) {
      throw new DSSResponseError('Recipe creation response did not name the new recipe');
    }
    return new DSSRecipe(this.http, this.projectKey, recipeName, this.pollIntervalMs);
  }
}
