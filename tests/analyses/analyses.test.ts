import {
  CategoryColorAnalysis,
  HubNodeAnalysis,
  IS_HUB_PROPERTY,
  NodeReferencedAnalysis,
  UNREFERENCED_PROPERTY,
} from '../../src/analyses';
import { GraphDocument } from '../../src/graph/graph-document';
import { createLink, createNode } from '../../src/model';
import defaultPalette from '../../src/analyses/palette.json';

function starGraph(): GraphDocument {
  const graph = new GraphDocument();
  for (const id of ['hub', 'a', 'b', 'c']) {
    graph.addNode(createNode({ id }));
  }
  graph.addLink(createLink({ source: 'a', target: 'hub' }));
  graph.addLink(createLink({ source: 'b', target: 'hub' }));
  graph.addLink(createLink({ source: 'hub', target: 'c' }));
  return graph;
}

describe('HubNodeAnalysis', () => {
  const analysis = new HubNodeAnalysis();

  it('should flag the node with the most links', () => {
    const graph = starGraph();

    analysis.execute(graph);

    expect(graph.nodes.map(node => [node.id, node.properties[IS_HUB_PROPERTY]])).toEqual([
      ['hub', true],
      ['a', false],
      ['b', false],
      ['c', false],
    ]);
  });

  it('should flag every node tied for the maximum', () => {
    const graph = new GraphDocument();
    graph.addNode(createNode({ id: 'x' }));
    graph.addNode(createNode({ id: 'y' }));
    graph.addNode(createNode({ id: 'lonely' }));
    graph.addLink(createLink({ source: 'x', target: 'y' }));

    analysis.execute(graph);

    expect(graph.getNode('x')?.properties[IS_HUB_PROPERTY]).toBe(true);
    expect(graph.getNode('y')?.properties[IS_HUB_PROPERTY]).toBe(true);
    expect(graph.getNode('lonely')?.properties[IS_HUB_PROPERTY]).toBe(false);
  });

  it('should flag nothing in a graph without links', () => {
    const graph = new GraphDocument();
    graph.addNode(createNode({ id: 'x' }));

    analysis.execute(graph);

    expect(graph.getNode('x')?.properties).toEqual({ IsHub: false });
  });

  it('should declare its property and style', () => {
    expect(analysis.properties).toEqual([
      {
        id: 'IsHub',
        dataType: 'System.Boolean',
        label: 'Hub',
        description: 'Node has the highest number of links in the graph',
      },
    ]);
    expect(analysis.styles[0]).toEqual({
      targetType: 'Node',
      groupLabel: 'Hub',
      valueLabel: 'True',
      conditions: [{ expression: "IsHub='True'" }],
      setters: [{ property: 'Background', value: 'Red' }],
    });
  });
});

describe('NodeReferencedAnalysis', () => {
  it('should mark nodes no link targets', () => {
    const graph = starGraph();

    new NodeReferencedAnalysis().execute(graph);

    expect(graph.nodes.map(node => [node.id, node.properties[UNREFERENCED_PROPERTY]])).toEqual([
      ['hub', false],
      ['a', true],
      ['b', true],
      ['c', false],
    ]);
  });
});

describe('CategoryColorAnalysis', () => {
  it('should colour categories without a background in order', () => {
    const graph = new GraphDocument();
    graph.addCategory({ id: 'one' });
    graph.addCategory({ id: 'fixed', background: 'Black' });
    graph.addCategory({ id: 'two' });
    graph.addCategory({ id: 'three' });

    new CategoryColorAnalysis(['Red', 'Blue']).execute(graph);

    expect(graph.categories.map(category => category.background)).toEqual([
      'Red',
      'Black',
      'Blue',
      'Red',
    ]);
  });

  it('should use the bundled palette by default', () => {
    const graph = new GraphDocument();
    graph.addCategory({ id: 'one' });

    new CategoryColorAnalysis().execute(graph);

    expect(graph.getCategory('one')?.background).toBe(defaultPalette[0]);
  });

  it('should reject an empty palette', () => {
    expect(() => new CategoryColorAnalysis([])).toThrow('CategoryColorAnalysis requires at least one colour');
  });
});
