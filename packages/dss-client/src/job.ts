import { setTimeout as sleep } from 'node:timers/promises';
import { z } from 'zod';
import type { DSSHttp } from './http.js';
import { asObject, parseResponse, segment } from './responses.js';
import type { JsonObject, JsonValue } from './types.js';

export type JobType =
  | 'NON_RECURSIVE_FORCED_BUILD'
  | 'RECURSIVE_BUILD'
  | 'RECURSIVE_FORCED_BUILD';

export const TERMINAL_JOB_STATES: ReadonlySet<string> = new Set(['DONE', 'FAILED', 'ABORTED']);

const statusSchema = z.object({
  baseStatus: z.object({ state: z.string().default('UNKNOWN') }).default({}),
});

const startedSchema = z.object({ id: z.string() });

export class DSSJobFailedError extends Error {
  override readonly name = 'DSSJobFailedError';

  constructor(
    readonly jobId: string,
    readonly state: string,
  ) {
    super(`Job ${jobId} finished in state ${state}`);
  }
}

export class DSSJob {
  constructor(
    private readonly http: DSSHttp,
    readonly projectKey: string,
    readonly id: string,
    private readonly pollIntervalMs: number,
  ) {}

  async getStatus(): Promise<JsonObject> {
    const data = await this.http.json(
      'GET',
      `/projects/${segment(this.projectKey)}/jobs/${segment(this.id)}/`,
    );
    return asObject(data, `status of job ${this.id}`);
  }

  /** The job's `baseStatus.state`, or UNKNOWN when the platform omits it. */
  static stateOf(status: JsonObject): string {
    return parseResponse(statusSchema, status, 'job status').baseStatus.state;
  }

  /**
   * Poll until the job reaches a terminal state. Unless `noFail` is set,
   * a job that did not finish DONE rejects with DSSJobFailedError.
   */
  async wait(options: { noFail?: boolean } = {}): Promise<JsonObject> {
    for (;;) {
      const status = await this.getStatus();
      const state = DSSJob.stateOf(status);
      if (TERMINAL_JOB_STATES.has(state)) {
        if (state !== 'DONE' && !options.noFail) throw new DSSJobFailedError(this.id, state);
        return status;
      }
      await sleep(this.pollIntervalMs);
    }
  }
}

export interface JobOutput {
  id: string;
  type?: 'DATASET' | 'MANAGED_FOLDER' | 'SAVED_MODEL';
  partition?: string;
}

export function buildJobDefinition(type: JobType, outputs: JobOutput[]): JsonObject {
  return {
    type,
    refreshHiveMetastore: false,
    outputs: outputs.map((out): JsonValue => {
      const item: JsonObject = { id: out.id, type: out.type ?? 'DATASET' };
      if (out.partition !== undefined) item.partition = out.partition;
      return item;
    }),
  };
}

export function parseStartedJob(value: JsonValue): string {
  return parseResponse(startedSchema, value, 'job start response').id;
}
