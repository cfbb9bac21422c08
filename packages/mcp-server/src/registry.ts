/**
 * Tool registry: the set of tools the server exposes.
 *
 * Built once at startup and handed to the transport binding. Lookups
 * after that are read-only, so concurrent invocations share it freely.
 */

import { DuplicateToolError, UnknownToolError } from './errors.js';
import type { ToolDescriptor } from './tools/define.js';

export class ToolRegistry {
  private readonly tools = new Map<string, ToolDescriptor>();

  /** Add a tool. A second tool under the same name is rejected; the first stays. */
  register(tool: ToolDescriptor): this {
    if (this.tools.has(tool.name)) {
      throw new DuplicateToolError(tool.name);
    }
    this.tools.set(tool.name, tool);
    return this;
  }

  resolve(name: string): ToolDescriptor {
    const tool = this.tools.get(name);
    if (!tool) throw new UnknownToolError(name);
    return tool;
  }

  has(name: string): boolean {
    return this.tools.has(name);
  }

  /** All tools in registration order. */
  list(): ToolDescriptor[] {
    return [...this.tools.values()];
  }

  get size(): number {
    return this.tools.size;
  }
}
