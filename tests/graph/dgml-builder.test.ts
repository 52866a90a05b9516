import { Analysis, HubNodeAnalysis, defineAnalysis } from '../../src/analyses';
import {
  BuilderRegistry,
  CategoryBuilder,
  LinkBuilder,
  NodeBuilder,
  StyleBuilder,
  hasKeys,
  shape,
} from '../../src/builders';
import { DgmlBuilder, assemble, assembleWithReport } from '../../src/graph/dgml-builder';
import { AssemblyError, AssemblyErrorKind } from '../../src/graph/errors';
import { PropertyDataType, createLink, createNode, createStyle } from '../../src/model';
import { DgmlWriter } from '../../src/serialization';

interface IdRecord {
  id: string;
  flag?: boolean;
}

interface LinkRecord {
  link: { from: string; to: string };
}

function isIdRecord(element: unknown): element is IdRecord {
  return hasKeys('id')(element) && typeof element.id === 'string';
}

function isLinkRecord(element: unknown): element is LinkRecord {
  return (
    hasKeys('link')(element) &&
    hasKeys('from', 'to')(element.link) &&
    typeof element.link.from === 'string' &&
    typeof element.link.to === 'string'
  );
}

const idRecord = shape('IdRecord', isIdRecord);
const linkRecord = shape('LinkRecord', isLinkRecord);

const flagProperty = { id: 'flag', dataType: PropertyDataType.BOOLEAN };

function recordRegistry(): BuilderRegistry {
  return new BuilderRegistry({
    nodeBuilders: [new NodeBuilder(idRecord, r => createNode({ id: r.id, label: r.id }))],
    linkBuilders: [
      new LinkBuilder(linkRecord, r => createLink({ source: r.link.from, target: r.link.to })),
    ],
  });
}

const records = [{ id: 'A' }, { id: 'B' }, { link: { from: 'A', to: 'B' } }];

describe('graph assembly', () => {
  it('should build nodes and links from heterogeneous input', () => {
    const graph = assemble(recordRegistry(), [], [records]);

    expect(graph.nodes.map(node => node.id)).toEqual(['A', 'B']);
    expect(graph.links).toEqual([{ source: 'A', target: 'B', properties: {} }]);
  });

  it('should discard a repeated node id', () => {
    const graph = assemble(recordRegistry(), [], [[...records, { id: 'A' }]]);

    expect(graph.nodes.map(node => node.id)).toEqual(['A', 'B']);
    expect(graph.links).toHaveLength(1);
  });

  it('should keep the first node produced for a duplicate id across collections', () => {
    const registry = new BuilderRegistry({
      nodeBuilders: [new NodeBuilder(idRecord, r => createNode({ id: r.id, label: `label of ${r.id}` }))],
    });
    const first = { id: 'A', marker: 'first' };
    const second = { id: 'A', marker: 'second' };
    const labelled = new BuilderRegistry({
      nodeBuilders: [
        new NodeBuilder(shape('Marked', hasKeys('id', 'marker')), r =>
          createNode({ id: String(r.id), label: String(r.marker) })
        ),
      ],
    });

    expect(assemble(registry, [], [[first], [second]]).nodes).toHaveLength(1);
    expect(assemble(labelled, [], [[first], [second]]).nodes[0].label).toBe('first');
    expect(assemble(labelled, [], [[second], [first]]).nodes[0].label).toBe('second');
  });

  it('should prefer the earlier registered rule when two rules produce the same id', () => {
    const registry = new BuilderRegistry({
      nodeBuilders: [
        new NodeBuilder(idRecord, r => createNode({ id: r.id, label: 'from first rule' })),
        new NodeBuilder(idRecord, r => createNode({ id: r.id, label: 'from second rule' })),
      ],
    });

    const { graph, report } = assembleWithReport(registry, [], [[{ id: 'A' }]]);

    expect(graph.nodes).toHaveLength(1);
    expect(graph.nodes[0].label).toBe('from first rule');
    expect(report.duplicatesDiscarded).toBe(1);
  });

  it('should produce an empty graph from an empty registry', () => {
    const graph = assemble(BuilderRegistry.empty(), [], [records]);

    expect(graph).toEqual({ nodes: [], links: [], categories: [], styles: [], properties: [] });
  });

  it('should contribute nothing from an always-rejecting rule', () => {
    const registry = new BuilderRegistry({
      nodeBuilders: [new NodeBuilder(idRecord, r => createNode({ id: r.id }), () => false)],
    });
    const many = Array.from({ length: 500 }, (_, i) => ({ id: `n${i}` }));

    expect(assemble(registry, [], [many]).nodes).toEqual([]);
  });

  it('should let one element match rules of several kinds', () => {
    const registry = new BuilderRegistry({
      nodeBuilders: [new NodeBuilder(idRecord, r => createNode({ id: r.id }))],
      categoryBuilders: [new CategoryBuilder(idRecord, r => ({ id: `c:${r.id}` }))],
    });

    const graph = assemble(registry, [], [[{ id: 'A' }]]);

    expect(graph.nodes.map(node => node.id)).toEqual(['A']);
    expect(graph.categories).toEqual([{ id: 'c:A' }]);
  });

  it('should produce identical documents for identical runs', () => {
    const registry = new BuilderRegistry({
      nodeBuilders: [new NodeBuilder(idRecord, r => createNode({ id: r.id, properties: { flag: r.id === 'A' } }))],
      linkBuilders: [new LinkBuilder(linkRecord, r => createLink({ source: r.link.from, target: r.link.to }))],
      styleBuilders: [new StyleBuilder('Node', n => ({ groupLabel: n.id }))],
    });
    const analyses = [defineAnalysis('flags', () => undefined, { properties: [flagProperty] })];
    const writer = new DgmlWriter();

    const first = writer.write(assemble(registry, analyses, [records]));
    const second = writer.write(assemble(registry, analyses, [records]));

    expect(second).toBe(first);
  });

  it('should not freeze or modify elements the rules hand over', () => {
    const cachedNodes = new Map([
      ['A', createNode({ id: 'A' })],
      ['B', createNode({ id: 'B' })],
    ]);
    const cachedLink = createLink({ source: 'A', target: 'B' });
    const registry = new BuilderRegistry({
      nodeBuilders: [new NodeBuilder(idRecord, r => cachedNodes.get(r.id))],
      linkBuilders: [new LinkBuilder(linkRecord, () => cachedLink)],
    });
    const analyses = [new HubNodeAnalysis()];

    const first = assemble(registry, analyses, [records]);
    const second = assemble(registry, analyses, [records]);

    expect(second).toEqual(first);
    expect(second.nodes.map(node => node.properties.IsHub)).toEqual([true, true]);
    for (const node of cachedNodes.values()) {
      expect(Object.isFrozen(node)).toBe(false);
      expect(node.properties).toEqual({});
    }
    expect(Object.isFrozen(cachedLink)).toBe(false);
  });

  it('should return a frozen graph', () => {
    const graph = assemble(recordRegistry(), [], [records]);

    expect(Object.isFrozen(graph.nodes[0])).toBe(true);
  });

  describe('style rules', () => {
    it('should never produce link styles from node rules or node styles from link rules', () => {
      const registry = new BuilderRegistry({
        nodeBuilders: recordRegistry().nodeBuilders,
        linkBuilders: recordRegistry().linkBuilders,
        styleBuilders: [
          new StyleBuilder('Node', () => ({ groupLabel: 'node style' })),
          new StyleBuilder('Link', () => ({ groupLabel: 'link style' })),
        ],
      });

      const graph = assemble(registry, [], [records]);

      expect(graph.styles.map(style => [style.targetType, style.groupLabel])).toEqual([
        ['Node', 'node style'],
        ['Node', 'node style'],
        ['Link', 'link style'],
      ]);
    });

    it('should run before analyses and see builder-time properties only', () => {
      const flagStyle = new StyleBuilder(
        'Node',
        node => ({
          groupLabel: `flagged ${node.id}`,
          conditions: [{ expression: "flag='true'" }],
          setters: [{ property: 'Background', value: 'Red' }],
        }),
        node => node.properties.flag === true
      );
      const setFlagOnA = defineAnalysis(
        'set-flag',
        graph => {
          graph.setNodeProperty('A', 'flag', true);
        },
        { properties: [flagProperty] }
      );

      const afterAnalysis = assemble(
        new BuilderRegistry({ nodeBuilders: recordRegistry().nodeBuilders, styleBuilders: [flagStyle] }),
        [setFlagOnA],
        [records]
      );
      expect(afterAnalysis.styles).toEqual([]);
      expect(afterAnalysis.nodes[0].properties).toEqual({ flag: true });

      const builderTime = assemble(
        new BuilderRegistry({
          nodeBuilders: [
            new NodeBuilder(idRecord, r => createNode({ id: r.id, properties: { flag: r.id === 'A' } })),
          ],
          styleBuilders: [flagStyle],
        }),
        [],
        [records]
      );
      expect(builderTime.styles.map(style => style.groupLabel)).toEqual(['flagged A']);
    });
  });

  describe('analyses', () => {
    it('should observe the builder output', () => {
      const countNodes = defineAnalysis(
        'count-nodes',
        graph => {
          const count = graph.nodes.length;
          for (const node of graph.nodes) {
            graph.setNodeProperty(node.id, 'NodeCount', count);
          }
        },
        { properties: [{ id: 'NodeCount', dataType: PropertyDataType.INT32 }] }
      );

      const graph = assemble(recordRegistry(), [countNodes], [[{ id: 'only' }]]);

      expect(graph.nodes).toHaveLength(1);
      expect(graph.nodes[0].properties.NodeCount).toBe(1);
    });

    it('should declare analysis properties even when nothing uses them', () => {
      const unused = defineAnalysis('unused', () => undefined, {
        properties: [{ id: 'NeverSet', dataType: PropertyDataType.STRING, label: 'Never set' }],
        styles: [createStyle({ targetType: 'Node', groupLabel: 'never' })],
      });

      const graph = assemble(BuilderRegistry.empty(), [unused], [[]]);

      expect(graph.properties).toEqual([
        { id: 'NeverSet', dataType: PropertyDataType.STRING, label: 'Never set' },
      ]);
      expect(graph.styles).toEqual([
        { targetType: 'Node', groupLabel: 'never', conditions: [], setters: [] },
      ]);
    });

    it('should merge every declaration before the first analysis runs', () => {
      const seen: string[][] = [];
      const first = defineAnalysis('first', graph => {
        seen.push(graph.properties.map(property => property.id));
      }, { properties: [{ id: 'One', dataType: PropertyDataType.STRING }] });
      const second = defineAnalysis('second', () => undefined, {
        properties: [{ id: 'Two', dataType: PropertyDataType.STRING }],
      });

      assemble(BuilderRegistry.empty(), [first, second], []);

      expect(seen).toEqual([['One', 'Two']]);
    });

    it('should run analyses in order, each seeing the previous one', () => {
      const order: string[] = [];
      const addNode: Analysis = defineAnalysis('add-node', graph => {
        order.push('add-node');
        graph.addNode(createNode({ id: 'added' }));
      });
      const countNodes = defineAnalysis('count', graph => {
        order.push(`count:${graph.nodes.length}`);
      });

      assemble(recordRegistry(), [addNode, countNodes], [records]);

      expect(order).toEqual(['add-node', 'count:3']);
    });

    it('should abort the assembly when an analysis fails', () => {
      const failing = defineAnalysis('failing', () => {
        throw new Error('analysis exploded');
      });

      expect(() => assemble(recordRegistry(), [failing], [records])).toThrow(AssemblyError);
      expect(() => assemble(recordRegistry(), [failing], [records])).toThrow(
        'Analysis failing failed: analysis exploded'
      );
    });

    it('should classify analysis failures', () => {
      const failing = defineAnalysis('failing', () => {
        throw new Error('nope');
      });

      let caught: unknown;
      try {
        assemble(recordRegistry(), [failing], [records]);
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(AssemblyError);
      if (caught instanceof AssemblyError) {
        expect(caught.kind).toBe(AssemblyErrorKind.ANALYSIS);
        expect(caught.context).toEqual({ analysis: 'failing' });
      }
    });
  });

  describe('report', () => {
    it('should count processed elements and dangling links', () => {
      const { report } = assembleWithReport(recordRegistry(), [], [
        records,
        [{ link: { from: 'A', to: 'missing' } }, 'ignored'],
      ]);

      expect(report).toMatchObject({
        elementsProcessed: 5,
        nodes: 2,
        links: 2,
        categories: 0,
        styles: 0,
        properties: 0,
        duplicatesDiscarded: 0,
        danglingLinks: 1,
      });
    });
  });
});

describe('DgmlBuilder', () => {
  it('should assemble from rule lists set on the instance', () => {
    const builder = new DgmlBuilder(
      defineAnalysis('title-check', graph => {
        graph.addCategory({ id: `title:${graph.title}` });
      })
    );
    builder.title = 'Records';
    builder.nodeBuilders = [new NodeBuilder(idRecord, r => createNode({ id: r.id }))];
    builder.linkBuilders = [new LinkBuilder(linkRecord, r => createLink({ source: r.link.from, target: r.link.to }))];

    const graph = builder.build(records.slice(0, 2), records.slice(2));

    expect(graph.title).toBe('Records');
    expect(graph.nodes.map(node => node.id)).toEqual(['A', 'B']);
    expect(graph.links).toHaveLength(1);
    expect(graph.categories).toEqual([{ id: 'title:Records' }]);
  });

  it('should report alongside the graph', () => {
    const builder = new DgmlBuilder();
    builder.nodeBuilders = [new NodeBuilder(idRecord, r => createNode({ id: r.id }))];

    const { graph, report } = builder.buildWithReport([{ id: 'A' }, { id: 'A' }]);

    expect(graph.nodes).toHaveLength(1);
    expect(report.elementsProcessed).toBe(2);
    expect(report.duplicatesDiscarded).toBe(1);
  });
});
