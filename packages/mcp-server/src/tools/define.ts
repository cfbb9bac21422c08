import type { DSSClient, JsonObject, JsonValue } from '@dss-mcp/dss-client';
import type { ToolAnnotations } from '@modelcontextprotocol/sdk/types.js';
import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import type { Logger } from '../logger.js';

export interface ToolContext {
  client: DSSClient;
  logger: Logger;
}

export type BoundTool = (ctx: ToolContext) => Promise<unknown>;

/** What the registry stores: everything but the argument types. */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputShape: z.ZodRawShape;
  annotations: ToolAnnotations;
  /** Validate raw arguments and return the handler ready to run. */
  bind(args: unknown): BoundTool;
}

export interface ToolDefinition<S extends z.ZodRawShape> {
  name: string;
  description: string;
  params: S;
  readOnly?: boolean;
  destructive?: boolean;
  handler(args: z.output<z.ZodObject<S>>, ctx: ToolContext): Promise<unknown>;
}

export function defineTool<S extends z.ZodRawShape>(definition: ToolDefinition<S>): ToolDescriptor {
  const schema = z.object(definition.params);
  const readOnly = definition.readOnly ?? false;
  return {
    name: definition.name,
    description: definition.description,
    inputShape: definition.params,
    annotations: {
      readOnlyHint: readOnly,
      destructiveHint: !readOnly && (definition.destructive ?? false),
    },
    bind(args) {
      const parsed = schema.safeParse(args ?? {});
      if (!parsed.success) {
        throw InvalidArgumentError.fromIssues(definition.name, parsed.error.issues);
      }
      const values = parsed.data;
      return (ctx) => definition.handler(values, ctx);
    },
  };
}

// Shared parameter schemas

export const projectKey = z.string().min(1).describe('The key of the project');

const jsonPrimitive = z.union([z.string(), z.number(), z.boolean(), z.null()]);

export const jsonValue: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([jsonPrimitive, z.array(jsonValue), z.record(jsonValue)]),
);

export const jsonObject: z.ZodType<JsonObject> = z.record(jsonValue);
