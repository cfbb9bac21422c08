/**
 * Recipe tools: create recipes, read and edit their code or payload, run them.
 */

import type { DSSProject } from '@dss-mcp/dss-client';
import { DSSJob } from '@dss-mcp/dss-client';
import { z } from 'zod';
import { InvalidArgumentError } from '../errors.js';
import { defineTool, jsonValue, projectKey, type ToolDescriptor } from './define.js';
import {
  ALL_RECIPE_TYPES,
  SINGLE_INPUT_TYPES,
  SINGLE_OUTPUT_TYPES,
  describeRecipeTypes,
  isCodeRecipe,
} from './recipe-types.js';

const recipeName = z.string().min(1).describe('Name of the recipe');

export interface RecipeShape {
  recipeType: string;
  inputs: string[];
  outputs: string[];
  hasCode: boolean;
}

/** Checks that need no platform call: type, input and output counts, code. */
export function checkRecipeShape({ recipeType, inputs, outputs, hasCode }: RecipeShape): void {
  if (!ALL_RECIPE_TYPES.has(recipeType)) {
    throw new InvalidArgumentError(
      `Invalid recipe_type '${recipeType}'. Must be one of: ${[...ALL_RECIPE_TYPES].sort().join(', ')}`,
    );
  }
  if (inputs.length < 1) {
    throw new InvalidArgumentError(`Recipes require at least 1 input, got ${inputs.length}`);
  }
  if (outputs.length < 1) {
    throw new InvalidArgumentError(`Recipes require at least 1 output, got ${outputs.length}`);
  }
  if (SINGLE_INPUT_TYPES.has(recipeType) && inputs.length > 1) {
    throw new InvalidArgumentError(`Recipe type '${recipeType}' requires exactly 1 input, got ${inputs.length}`);
  }
  if (SINGLE_OUTPUT_TYPES.has(recipeType) && outputs.length > 1) {
    throw new InvalidArgumentError(`Recipe type '${recipeType}' requires exactly 1 output, got ${outputs.length}`);
  }
  if (hasCode && !isCodeRecipe(recipeType)) {
    throw new InvalidArgumentError(
      `The 'code' parameter is only valid for code recipe types, not '${recipeType}'`,
    );
  }
}

async function checkDatasetsExist(project: DSSProject, inputs: string[], outputs: string[]): Promise<void> {
  const existing = new Set((await project.listDatasets()).map((dataset) => dataset.name));
  const hint = 'Create them first with create_managed_dataset.';
  const missingInputs = inputs.filter((name) => !existing.has(name));
  if (missingInputs.length > 0) {
    throw new InvalidArgumentError(
      `Input dataset(s) not found in project '${project.projectKey}': ${missingInputs.join(', ')}. ${hint}`,
    );
  }
  const missingOutputs = outputs.filter((name) => !existing.has(name));
  if (missingOutputs.length > 0) {
    throw new InvalidArgumentError(
      `Output dataset(s) not found in project '${project.projectKey}': ${missingOutputs.join(', ')}. ${hint}`,
    );
  }
}

export const recipeTools: ToolDescriptor[] = [
  defineTool({
    name: 'create_recipe',
    description:
      'Create a recipe between existing datasets (create missing ones with create_managed_dataset). ' +
      `Recipe types:\n${describeRecipeTypes()}`,
    params: {
      project_key: projectKey,
      recipe_type: z.string().min(1).describe('Type of the recipe'),
      inputs: z.array(z.string()).describe('Names of the input datasets'),
      outputs: z
        .array(
          z.object({
            name: z.string().min(1).describe('Name of the output dataset'),
            append: z.boolean().default(false).describe('Append instead of overwriting'),
          }),
        )
        .describe('Output datasets'),
      recipe_name: z.string().min(1).optional().describe('Name of the recipe; generated when omitted'),
      code: z.string().optional().describe('Initial script, for code recipes only'),
    },
    async handler(args, { client }) {
      const outputNames = args.outputs.map((output) => output.name);
      checkRecipeShape({
        recipeType: args.recipe_type,
        inputs: args.inputs,
        outputs: outputNames,
        hasCode: args.code !== undefined,
      });

      const project = client.getProject(args.project_key);
      await checkDatasetsExist(project, args.inputs, outputNames);

      const creator = project.newRecipe(args.recipe_type, args.recipe_name);
      for (const input of args.inputs) creator.withInput(input);
      for (const output of args.outputs) creator.withOutput(output.name, { append: output.append });
      if (args.code) creator.withScript(args.code);
      const recipe = await creator.create();

      return {
        success: true,
        project_key: args.project_key,
        recipe_name: recipe.name,
        recipe_type: args.recipe_type,
        inputs: args.inputs,
        outputs: outputNames,
        message: `Recipe '${recipe.name}' created successfully`,
      };
    },
  }),

  defineTool({
    name: 'get_recipe_settings',
    description:
      'Recipe definition: type, inputs, outputs, params, and either its script (code recipes, as "code") ' +
      'or its JSON configuration (visual recipes, as "payload").',
    params: { project_key: projectKey, recipe_name: recipeName },
    readOnly: true,
    async handler({ project_key, recipe_name }, { client }) {
      const settings = await client.getProject(project_key).getRecipe(recipe_name).getSettings();
      const type = settings.type;
      const base = {
        recipe_name,
        type,
        inputs: settings.getRecipeInputs(),
        outputs: settings.getRecipeOutputs(),
        params: settings.getRecipeParams(),
      };
      return isCodeRecipe(type)
        ? { ...base, code: settings.strPayload }
        : { ...base, payload: settings.getJsonPayload() };
    },
  }),

  defineTool({
    name: 'set_code_recipe_code',
    description: 'Replace the script of a code recipe and save it. Use set_visual_recipe_payload for visual recipes.',
    params: {
      project_key: projectKey,
      recipe_name: recipeName,
      code: z.string().describe('The new script'),
    },
    async handler({ project_key, recipe_name, code }, { client }) {
      const settings = await client.getProject(project_key).getRecipe(recipe_name).getSettings();
      const type = settings.type;
      if (!isCodeRecipe(type)) {
        throw new InvalidArgumentError(
          `Recipe '${recipe_name}' is type '${type}', not a code recipe. Use set_visual_recipe_payload for visual recipes.`,
        );
      }
      settings.strPayload = code;
      await settings.save();
      return {
        success: true,
        project_key,
        recipe_name,
        recipe_type: type,
        message: `Code updated on recipe '${recipe_name}'`,
      };
    },
  }),

  defineTool({
    name: 'set_visual_recipe_payload',
    description:
      'Replace the JSON configuration of a visual recipe, save it, and apply the output schema changes ' +
      'it requires. Call get_recipe_settings first, edit "payload", and pass it back.',
    params: {
      project_key: projectKey,
      recipe_name: recipeName,
      payload: jsonValue.describe('The new payload'),
    },
    async handler({ project_key, recipe_name, payload }, { client, logger }) {
      const recipe = client.getProject(project_key).getRecipe(recipe_name);
      const settings = await recipe.getSettings();
      const type = settings.type;
      if (isCodeRecipe(type)) {
        throw new InvalidArgumentError(
          `Recipe '${recipe_name}' is a code recipe (type '${type}'). Use set_code_recipe_code instead.`,
        );
      }
      settings.setJsonPayload(payload);
      await settings.save();

      const result: Record<string, unknown> = {
        success: true,
        project_key,
        recipe_name,
        recipe_type: type,
        message: `Payload updated on recipe '${recipe_name}'`,
      };
      // The payload is saved at this point; a schema update failure does not undo it.
      try {
        const updates = await recipe.computeSchemaUpdates();
        if (updates.anyActionRequired()) {
          await updates.apply();
          result.schema_updates_applied = true;
        }
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.warn({ err, recipe: recipe_name }, 'schema update after payload change failed');
        result.schema_update_warning = message;
      }
      return result;
    },
  }),

  defineTool({
    name: 'run_recipe',
    description:
      'Build the outputs of a recipe. NON_RECURSIVE_FORCED_BUILD builds only this recipe; RECURSIVE_BUILD ' +
      'also builds missing upstream data; RECURSIVE_FORCED_BUILD rebuilds everything upstream.',
    params: {
      project_key: projectKey,
      recipe_name: recipeName,
      job_type: z
        .enum(['NON_RECURSIVE_FORCED_BUILD', 'RECURSIVE_BUILD', 'RECURSIVE_FORCED_BUILD'])
        .default('NON_RECURSIVE_FORCED_BUILD'),
      wait: z.boolean().default(true).describe('Wait for the job to end; otherwise return once it started'),
    },
    async handler({ project_key, recipe_name, job_type, wait }, { client }) {
      const job = await client
        .getProject(project_key)
        .getRecipe(recipe_name)
        .run({ jobType: job_type, wait, noFail: true });
      return {
        job_id: job.id,
        project_key,
        recipe_name,
        status: DSSJob.stateOf(await job.getStatus()),
      };
    },
  }),
];
