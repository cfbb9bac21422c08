import { z } from 'zod';
import type { DSSClient } from './client.js';
import { parseResponse, segment } from './responses.js';
import type { JsonValue } from './types.js';

const folderSchema = z.object({
  id: z.string(),
  name: z.string(),
  parentId: z.string().nullish(),
  childrenIds: z.array(z.string()).default([]),
  projectKeys: z.array(z.string()).default([]),
});

export type ProjectFolderData = z.infer<typeof folderSchema>;

export function parseProjectFolder(value: JsonValue, id: string): ProjectFolderData {
  return parseResponse(folderSchema, value, `project folder ${id}`);
}

/** A node of the project folder tree. ROOT is the tree's root id. */
export class DSSProjectFolder {
  constructor(
    private readonly client: DSSClient,
    readonly data: ProjectFolderData,
  ) {}

  get id(): string {
    return this.data.id;
  }

  get name(): string {
    return this.data.name;
  }

  get childrenIds(): string[] {
    return this.data.childrenIds;
  }

  listProjectKeys(): string[] {
    return this.data.projectKeys;
  }

  async listChildFolders(): Promise<DSSProjectFolder[]> {
    const children: DSSProjectFolder[] = [];
    for (const childId of this.data.childrenIds) {
      children.push(await this.client.getProjectFolder(childId));
    }
    return children;
  }

  async getParent(): Promise<DSSProjectFolder | null> {
    const parentId = this.data.parentId;
    return parentId ? this.client.getProjectFolder(parentId) : null;
  }

  /** Slash-separated path from the root, e.g. "/Sales/Reports". The root is "/". */
  async getPath(): Promise<string> {
    const parent = await this.getParent();
    if (parent === null) return '/';
    const parentPath = await parent.getPath();
    return `${parentPath === '/' ? '' : parentPath}/${this.name}`;
  }

  async moveProjectTo(projectKey: string, destination: DSSProjectFolder): Promise<void> {
    await this.client.http.json(
      'POST',
      `/project-folders/${segment(this.id)}/projects/${segment(projectKey)}/move`,
      { params: { destination: destination.id } },
    );
  }
}
