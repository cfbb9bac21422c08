import type { DSSHttp } from './http.js';
import type { DSSProject } from './project.js';
import { asObject, segment } from './responses.js';
import { TsvRowParser } from './tsv.js';
import type { JsonObject, JsonValue } from './types.js';

export interface IterRowsOptions {
  /** Partition identifiers to read; all partitions when omitted. */
  partitions?: string[];
}

export class DSSDataset {
  constructor(
    private readonly http: DSSHttp,
    readonly projectKey: string,
    readonly name: string,
  ) {}

  private get path(): string {
    return `/projects/${segment(this.projectKey)}/datasets/${segment(this.name)}`;
  }

  async getSettings(): Promise<JsonObject> {
    return asObject(await this.http.json('GET', `${this.path}/`), `settings of dataset ${this.name}`);
  }

  getSchema(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/schema`);
  }

  getMetadata(): Promise<JsonValue> {
    return this.http.json('GET', `${this.path}/metadata`);
  }

  async delete(options: { dropData?: boolean } = {}): Promise<void> {
    await this.http.json('DELETE', `${this.path}/`, { params: { dropData: options.dropData ?? false } });
  }

  async rename(newName: string): Promise<void> {
    await this.http.json('POST', `${this.path}/actions/rename`, { body: { newName } });
  }

  /**
   * Stream the dataset's rows as arrays of raw string values, in schema
   * column order. Breaking out of the loop cancels the download.
   */
  async *iterRows(options: IterRowsOptions = {}): AsyncGenerator<string[], void, undefined> {
    const response = await this.http.raw('GET', `${this.path}/data/`, {
      params: {
        format: 'tsv-excel-noheader',
        partitions: options.partitions?.join(','),
      },
    });
    if (response.body === null) return;

    const reader = response.body.getReader();
    const decoder = new TextDecoder();
    const parser = new TsvRowParser();
    try {
      for (;;) {
        const { done, value } = await reader.read();
        if (done) break;
        yield* parser.push(decoder.decode(value, { stream: true }));
      }
      yield* parser.push(decoder.decode());
      yield* parser.end();
    } finally {
      await reader.cancel();
    }
  }
}

export interface StoreIntoOptions {
  typeOptionId?: string;
  formatOptionId?: string;
}

/** Builder for a dataset whose storage is managed by the platform. */
export class DSSManagedDatasetCreator {
  private creationSettings: JsonObject = { specificSettings: {} };

  constructor(
    private readonly http: DSSHttp,
    private readonly project: DSSProject,
    readonly name: string,
  ) {}

  withStoreInto(connection: string, options: StoreIntoOptions = {}): this {
    const specificSettings: JsonObject = {};
    if (options.formatOptionId) specificSettings.formatOptionId = options.formatOptionId;
    this.creationSettings = { connectionId: connection, specificSettings };
    if (options.typeOptionId) this.creationSettings.typeOptionId = options.typeOptionId;
    return this;
  }

  /**
   * Create the dataset. An existing dataset with the same name is an
   * error unless `overwrite` is set, in which case it is deleted first.
   */
  async create(options: { overwrite?: boolean } = {}): Promise<DSSDataset> {
    const existing = await this.project.listDatasets();
    if (existing.some((ds) => ds.name === this.name)) {
      if (!options.overwrite) {
        throw new Error(`Dataset ${this.name} already exists`);
      }
      await this.project.getDataset(this.name).delete({ dropData: true });
    }
    await this.http.json('POST', `/projects/${segment(this.project.projectKey)}/datasets/managed`, {
      body: { name: this.name, creationSettings: this.creationSettings },
    });
    return this.project.getDataset(this.name);
  }
}
