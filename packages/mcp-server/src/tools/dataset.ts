/**
 * Dataset tools. All of them address one dataset by project key and name.
 */

import { DSSResponseError } from '@dss-mcp/dss-client';
import { z } from 'zod';
import { defineTool, projectKey, type ToolDescriptor } from './define.js';

export const MAX_SAMPLE_ROWS = 1000;
export const DEFAULT_SAMPLE_ROWS = 50;

const datasetName = z.string().min(1).describe('Name of the dataset');

const schemaColumnsSchema = z.object({
  columns: z.array(z.object({ name: z.string() }).passthrough()).default([]),
});

export function clampSampleSize(requested: number): number {
  return Math.min(MAX_SAMPLE_ROWS, Math.max(1, requested));
}

/** "a, b,c" → ["a", "b", "c"]; undefined or blank means every partition. */
export function parsePartitions(partitions: string | undefined): string[] | undefined {
  if (!partitions) return undefined;
  return partitions.split(',').map((p) => p.trim());
}

/** Pair values with column names; extra values or columns are dropped. */
function zipRow(columns: string[], values: string[]): Record<string, string> {
  const row: Record<string, string> = {};
  columns.slice(0, values.length).forEach((column, i) => {
    row[column] = values[i];
  });
  return row;
}

export const datasetTools: ToolDescriptor[] = [
  defineTool({
    name: 'create_managed_dataset',
    description:
      'Create a dataset whose storage the platform manages. To find a connection name, look at ' +
      'params.connection in get_dataset_settings of an existing dataset.',
    params: {
      project_key: projectKey,
      dataset_name: datasetName,
      connection: z.string().min(1).describe('Connection to store the data in'),
      format_option_id: z.string().optional().describe('Storage format; the connection\'s default when omitted'),
      type_option_id: z.string().optional().describe('Storage type; the connection\'s default when omitted'),
      overwrite: z.boolean().default(false).describe('Replace an existing dataset of the same name'),
    },
    async handler(args, { client }) {
      await client
        .getProject(args.project_key)
        .newManagedDataset(args.dataset_name)
        .withStoreInto(args.connection, {
          typeOptionId: args.type_option_id,
          formatOptionId: args.format_option_id,
        })
        .create({ overwrite: args.overwrite });
      return {
        success: true,
        project_key: args.project_key,
        dataset_name: args.dataset_name,
        connection: args.connection,
        message: `Managed dataset '${args.dataset_name}' created successfully on connection '${args.connection}'`,
      };
    },
  }),

  defineTool({
    name: 'delete_dataset',
    description: 'Delete a dataset, optionally with its data.',
    params: {
      project_key: projectKey,
      dataset_name: datasetName,
      drop_data: z.boolean().default(false).describe('Also delete the stored data'),
    },
    destructive: true,
    async handler({ project_key, dataset_name, drop_data }, { client }) {
      await client.getProject(project_key).getDataset(dataset_name).delete({ dropData: drop_data });
      return {
        success: true,
        project_key,
        dataset_name,
        drop_data,
        message: `Dataset '${dataset_name}' deleted successfully`,
      };
    },
  }),

  defineTool({
    name: 'rename_dataset',
    description: 'Rename a dataset.',
    params: {
      project_key: projectKey,
      dataset_name: datasetName,
      new_name: z.string().min(1).describe('New name of the dataset'),
    },
    async handler({ project_key, dataset_name, new_name }, { client }) {
      await client.getProject(project_key).getDataset(dataset_name).rename(new_name);
      return {
        success: true,
        project_key,
        old_name: dataset_name,
        new_name,
        message: `Dataset renamed from '${dataset_name}' to '${new_name}'`,
      };
    },
  }),

  defineTool({
    name: 'get_dataset_settings',
    description: 'Dataset settings: type, connection, format, partitioning and the rest of its configuration.',
    params: { project_key: projectKey, dataset_name: datasetName },
    readOnly: true,
    handler: ({ project_key, dataset_name }, { client }) =>
      client.getProject(project_key).getDataset(dataset_name).getSettings(),
  }),

  defineTool({
    name: 'get_dataset_schema',
    description: 'Dataset schema: its columns with their names and types.',
    params: { project_key: projectKey, dataset_name: datasetName },
    readOnly: true,
    handler: ({ project_key, dataset_name }, { client }) =>
      client.getProject(project_key).getDataset(dataset_name).getSchema(),
  }),

  defineTool({
    name: 'get_dataset_metadata',
    description: 'Dataset metadata: label, description, checklists, tags and custom metadata.',
    params: { project_key: projectKey, dataset_name: datasetName },
    readOnly: true,
    handler: ({ project_key, dataset_name }, { client }) =>
      client.getProject(project_key).getDataset(dataset_name).getMetadata(),
  }),

  defineTool({
    name: 'get_dataset_sample',
    description: `First rows of a dataset, each as a mapping of column name to value (at most ${MAX_SAMPLE_ROWS}).`,
    params: {
      project_key: projectKey,
      dataset_name: datasetName,
      num_rows: z
        .number()
        .int()
        .default(DEFAULT_SAMPLE_ROWS)
        .describe(`Number of rows, between 1 and ${MAX_SAMPLE_ROWS}`),
      partitions: z.string().optional().describe('Comma-separated partition ids; all partitions when omitted'),
    },
    readOnly: true,
    async handler({ project_key, dataset_name, num_rows, partitions }, { client }) {
      const limit = clampSampleSize(num_rows);
      const dataset = client.getProject(project_key).getDataset(dataset_name);

      const schema = schemaColumnsSchema.safeParse(await dataset.getSchema());
      if (!schema.success) {
        throw new DSSResponseError(`Unexpected schema for dataset ${dataset_name}`);
      }
      const columns = schema.data.columns.map((column) => column.name);

      const rows: Record<string, string>[] = [];
      for await (const values of dataset.iterRows({ partitions: parsePartitions(partitions) })) {
        rows.push(zipRow(columns, values));
        if (rows.length >= limit) break;
      }
      return {
        project_key,
        dataset_name,
        num_rows_requested: limit,
        num_rows_returned: rows.length,
        columns,
        rows,
      };
    },
  }),
];
