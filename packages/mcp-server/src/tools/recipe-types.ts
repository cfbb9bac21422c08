/**
 * Recipe types the server knows how to create, grouped by how many
 * inputs and outputs they take.
 */

import { z } from 'zod';
import table from './recipe-types.json' with { type: 'json' };

const tableSchema = z.object({
  singleInputSingleOutput: z.array(z.string()),
  singleInputMultiOutput: z.array(z.string()),
  multiInputSingleOutput: z.array(z.string()),
  code: z.array(z.string()),
  scoring: z.array(z.string()),
  other: z.array(z.string()),
});

const types = tableSchema.parse(table);

/** Code recipes take any number of inputs and outputs, and a script. */
export const CODE_RECIPE_TYPES: ReadonlySet<string> = new Set(types.code);

export const SINGLE_INPUT_TYPES: ReadonlySet<string> = new Set([
  ...types.singleInputSingleOutput,
  ...types.singleInputMultiOutput,
  ...types.scoring,
  ...types.other,
]);

export const SINGLE_OUTPUT_TYPES: ReadonlySet<string> = new Set([
  ...types.singleInputSingleOutput,
  ...types.multiInputSingleOutput,
  ...types.scoring,
  ...types.other,
]);

export const ALL_RECIPE_TYPES: ReadonlySet<string> = new Set([
  ...types.singleInputSingleOutput,
  ...types.singleInputMultiOutput,
  ...types.multiInputSingleOutput,
  ...types.code,
  ...types.scoring,
  ...types.other,
]);

export function isCodeRecipe(type: string): boolean {
  return CODE_RECIPE_TYPES.has(type);
}

/** One line per group, for tool descriptions. */
export function describeRecipeTypes(): string {
  return [
    `single input and output: ${types.singleInputSingleOutput.join(', ')}`,
    `one input, several outputs: ${types.singleInputMultiOutput.join(', ')}`,
    `several inputs, one output: ${types.multiInputSingleOutput.join(', ')}`,
    `code, any inputs and outputs: ${types.code.join(', ')}`,
    `scoring and evaluation (one input, one output): ${types.scoring.join(', ')}`,
    `other (one input, one output): ${types.other.join(', ')}`,
  ].join('\n');
}
