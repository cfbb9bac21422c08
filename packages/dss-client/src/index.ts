// Public API
export { DSSClient } from './client.js';
export type { DSSClientOptions, CreateProjectOptions } from './client.js';

export { DSSApiError, DSSNetworkError, DSSResponseError, DSSClientClosedError } from './errors.js';
export { DSSJobFailedError } from './job.js';

// Handles
export { DSSProject } from './project.js';
export type { DuplicationMode, DeleteProjectOptions, DuplicateProjectOptions } from './project.js';
export { DSSProjectFolder } from './project-folder.js';
export type { ProjectFolderData } from './project-folder.js';
export { DSSDataset, DSSManagedDatasetCreator } from './dataset.js';
export type { IterRowsOptions, StoreIntoOptions } from './dataset.js';
export { DSSRecipe, DSSRecipeSettings, DSSRecipeCreator, DSSSchemaUpdates } from './recipe.js';
export type { RunRecipeOptions, RecipeOutputSpec } from './recipe.js';
export { DSSJob, TERMINAL_JOB_STATES } from './job.js';
export type { JobType, JobOutput } from './job.js';
export { DSSFuture } from './future.js';
export { DSSFlowGraph, DSSProjectFlow } from './flow.js';
export { DSSGeneralSettings } from './general-settings.js';

// Formats
export { TsvRowParser } from './tsv.js';

// JSON
export type { JsonValue, JsonObject, JsonPrimitive, QueryParams } from './types.js';
export { isJsonObject } from './types.js';
