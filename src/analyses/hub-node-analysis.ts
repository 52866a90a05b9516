import { Property, PropertyDataType, Style, createStyle } from '../model';
import { GraphDocument } from '../graph/graph-document';
import { Analysis } from './analysis';

export const IS_HUB_PROPERTY = 'IsHub';

/**
 * Flags the nodes with the most links (incoming plus outgoing) as hubs.
 *
 * Every node gets `IsHub`; it is true for each node whose link count equals the
 * maximum, provided that maximum is above zero. Hubs are drawn with a red background.
 */
export class HubNodeAnalysis implements Analysis {
  readonly name = 'hub-node';

  readonly properties: readonly Property[] = [
    {
      id: IS_HUB_PROPERTY,
      dataType: PropertyDataType.BOOLEAN,
      label: 'Hub',
      description: 'Node has the highest number of links in the graph',
    },
  ];

  readonly styles: readonly Style[] = [
    createStyle({
      targetType: 'Node',
      groupLabel: 'Hub',
      valueLabel: 'True',
      conditions: [{ expression: `${IS_HUB_PROPERTY}='True'` }],
      setters: [{ property: 'Background', value: 'Red' }],
    }),
  ];

  execute(graph: GraphDocument): void {
    const degrees = new Map<string, number>();
    for (const link of graph.links) {
      degrees.set(link.source, (degrees.get(link.source) ?? 0) + 1);
      degrees.set(link.target, (degrees.get(link.target) ?? 0) + 1);
    }

    let maxDegree = 0;
    for (const node of graph.nodes) {
      maxDegree = Math.max(maxDegree, degrees.get(node.id) ?? 0);
    }

    for (const node of graph.nodes) {
      const degree = degrees.get(node.id) ?? 0;
      graph.setNodeProperty(node.id, IS_HUB_PROPERTY, maxDegree > 0 && degree === maxDegree);
    }
  }
}
