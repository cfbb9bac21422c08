import { defineTool, projectKey, type ToolDescriptor } from './define.js';

export const flowTools: ToolDescriptor[] = [
  defineTool({
    name: 'get_flow_graph',
    description:
      'The project\'s flow as a list of nodes (datasets, recipes, folders, models...) in left-to-right ' +
      'order: every node comes after its predecessors. Each node has ref, type, predecessors and successors.',
    params: { project_key: projectKey },
    readOnly: true,
    async handler({ project_key }, { client }) {
      const graph = await client.getProject(project_key).getFlow().getGraph();
      return { project_key, nodes: graph.getItemsInTraversalOrder() };
    },
  }),
];
