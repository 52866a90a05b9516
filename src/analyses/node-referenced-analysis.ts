import { Property, PropertyDataType, Style, createStyle } from '../model';
import { GraphDocument } from '../graph/graph-document';
import { Analysis } from './analysis';

export const UNREFERENCED_PROPERTY = 'Unreferenced';

/**
 * Marks nodes that no link points to.
 */
export class NodeReferencedAnalysis implements Analysis {
  readonly name = 'node-referenced';

  readonly properties: readonly Property[] = [
    {
      id: UNREFERENCED_PROPERTY,
      dataType: PropertyDataType.BOOLEAN,
      label: 'Unreferenced',
      description: 'No link targets this node',
    },
  ];

  readonly styles: readonly Style[] = [
    createStyle({
      targetType: 'Node',
      groupLabel: 'Unreferenced',
      valueLabel: 'True',
      conditions: [{ expression: `${UNREFERENCED_PROPERTY}='True'` }],
      setters: [{ property: 'Background', value: 'LightGray' }],
    }),
  ];

  execute(graph: GraphDocument): void {
    const referenced = new Set(graph.links.map(link => link.target));
    for (const node of graph.nodes) {
      graph.setNodeProperty(node.id, UNREFERENCED_PROPERTY, !referenced.has(node.id));
    }
  }
}
