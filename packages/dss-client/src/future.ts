/**
 * Long-running platform tasks ("futures").
 *
 * Some calls answer with a future descriptor instead of their result;
 * waitForResult polls /futures/<jobId> until the task is done.
 */

import { setTimeout as sleep } from 'node:timers/promises';
import { DSSResponseError } from './errors.js';
import type { DSSHttp } from './http.js';
import { asObject, segment } from './responses.js';
import type { JsonObject, JsonValue } from './types.js';

export class DSSFuture {
  constructor(
    private readonly http: DSSHttp,
    private readonly state: JsonObject,
    private readonly pollIntervalMs: number,
  ) {}

  get jobId(): string | null {
    return typeof this.state.jobId === 'string' ? this.state.jobId : null;
  }

  async waitForResult(): Promise<JsonValue> {
    let state = this.state;
    for (;;) {
      if (state.hasResult === true) return state.result ?? null;
      const jobId = typeof state.jobId === 'string' ? state.jobId : null;
      if (jobId === null) {
        // Plain synchronous answer: nothing to wait for
        return state;
      }
      if (state.alive === false) {
        throw new DSSResponseError(`Future ${jobId} ended without a result`);
      }
      await sleep(this.pollIntervalMs);
      const next = await this.http.json('GET', `/futures/${segment(jobId)}`, { params: { peek: false } });
      state = asObject(next, `future ${jobId}`);
    }
  }
}
