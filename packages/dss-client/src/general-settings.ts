import type { DSSHttp } from './http.js';
import type { JsonObject } from './types.js';

/** Instance-wide settings. Edit `settings` in place, then save(). */
export class DSSGeneralSettings {
  constructor(
    private readonly http: DSSHttp,
    readonly settings: JsonObject,
  ) {}

  getRaw(): JsonObject {
    return this.settings;
  }

  async save(): Promise<void> {
    await this.http.json('PUT', '/admin/general-settings', { body: this.settings });
  }
}
