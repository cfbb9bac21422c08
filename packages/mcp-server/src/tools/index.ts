import { ToolRegistry } from '../registry.js';
import type { ToolDescriptor } from './define.js';
import { datasetTools } from './dataset.js';
import { flowTools } from './flow.js';
import { instanceTools } from './instance.js';
import { projectTools } from './project.js';
import { recipeTools } from './recipe.js';

export const allTools: readonly ToolDescriptor[] = [
  ...instanceTools,
  ...projectTools,
  ...flowTools,
  ...datasetTools,
  ...recipeTools,
];

export function buildRegistry(tools: readonly ToolDescriptor[] = allTools): ToolRegistry {
  const registry = new ToolRegistry();
  for (const tool of tools) registry.register(tool);
  return registry;
}

export { defineTool } from './define.js';
export type { ToolContext, ToolDescriptor, BoundTool } from './define.js';
