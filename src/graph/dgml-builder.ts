import { Analysis } from '../analyses/analysis';
import { BuilderRegistry, BuilderRule, StyleRule } from '../builders';
import { Category, DirectedGraph, Link, Node } from '../model';
import { createComponentLogger } from '../utils/logger';
import { applyAnalyses } from './analysis-hook';
import { DispatchEngine } from './dispatch-engine';
import { GraphDocument } from './graph-document';

const logger = createComponentLogger('dgml-builder');

export interface AssemblyOptions {
  title?: string;
  layout?: string;
}

export interface AssemblyReport {
  elementsProcessed: number;
  nodes: number;
  links: number;
  categories: number;
  styles: number;
  properties: number;
  duplicatesDiscarded: number;
  danglingLinks: number;
  durationMs: number;
}

export interface AssemblyResult {
  graph: DirectedGraph;
  report: AssemblyReport;
}

/**
 * Assembles one graph from the given input collections.
 *
 * Collections are flattened in order. Every element goes through the node, link
 * and category rules; style rules then run over the assembled nodes and links;
 * finally the analyses run. The returned graph is frozen.
 */
export function assembleWithReport(
  registry: BuilderRegistry,
  analyses: readonly Analysis[],
  inputs: Iterable<Iterable<unknown>>,
  options: AssemblyOptions = {}
): AssemblyResult {
  const startTime = Date.now();
  const engine = new DispatchEngine(registry);
  const graph = new GraphDocument();
  graph.title = options.title;
  graph.layout = options.layout;

  logger.debug('Assembling graph', { ...registry.describe(), analyses: analyses.length });

  let elementIndex = 0;
  for (const collection of inputs) {
    for (const element of collection) {
      engine.dispatch(element, elementIndex++, graph);
    }
  }

  engine.applyStyles(graph);
  applyAnalyses(graph, analyses);

  const dangling = graph.danglingLinks();
  if (dangling.length > 0) {
    logger.debug('Graph contains links to unknown nodes', {
      danglingLinks: dangling.length,
      first: `${dangling[0].source} -> ${dangling[0].target}`,
    });
  }

  const result = graph.toGraph();
  const report: AssemblyReport = {
    elementsProcessed: elementIndex,
    nodes: result.nodes.length,
    links: result.links.length,
    categories: result.categories.length,
    styles: result.styles.length,
    properties: result.properties.length,
    duplicatesDiscarded: graph.duplicatesDiscarded,
    danglingLinks: dangling.length,
    durationMs: Date.now() - startTime,
  };

  logger.debug('Graph assembled', report);
  return { graph: result, report };
}

export function assemble(
  registry: BuilderRegistry,
  analyses: readonly Analysis[],
  inputs: Iterable<Iterable<unknown>>,
  options?: AssemblyOptions
): DirectedGraph {
  return assembleWithReport(registry, analyses, inputs, options).graph;
}

/**
 * Configurable front end to {@link assemble}: set the rule lists, pass the
 * analyses to the constructor, then call {@link DgmlBuilder.build}.
 *
 * @example
 * ```typescript
 * const builder = new DgmlBuilder(new HubNodeAnalysis());
 * builder.nodeBuilders = [new NodeBuilder(instanceOf(Service), s => createNode({ id: s.name }))];
 * const graph = builder.build(services);
 * ```
 */
export class DgmlBuilder {
  nodeBuilders: BuilderRule<Node>[] = [];
  linkBuilders: BuilderRule<Link>[] = [];
  categoryBuilders: BuilderRule<Category>[] = [];
  styleBuilders: StyleRule[] = [];
  title?: string;
  layout?: string;

  readonly analyses: readonly Analysis[];

  constructor(...analyses: Analysis[]) {
    this.analyses = analyses;
  }

  build(...inputs: Iterable<unknown>[]): DirectedGraph {
    return this.buildWithReport(...inputs).graph;
  }

  buildWithReport(...inputs: Iterable<unknown>[]): AssemblyResult {
    return assembleWithReport(this.registry(), this.analyses, inputs, {
      title: this.title,
      layout: this.layout,
    });
  }

  private registry(): BuilderRegistry {
    return new BuilderRegistry({
      nodeBuilders: this.nodeBuilders,
      linkBuilders: this.linkBuilders,
      categoryBuilders: this.categoryBuilders,
      styleBuilders: this.styleBuilders,
    });
  }
}
