import { Property, Style } from '../model';
import { GraphDocument } from '../graph/graph-document';

/**
 * Post-processing step run once the base graph is assembled.
 *
 * `properties` and `styles` are merged into the graph before any analysis
 * executes, so `execute` may write custom attributes declared by itself or by
 * any other registered analysis.
 */
export interface Analysis {
  readonly name: string;
  readonly properties: readonly Property[];
  readonly styles: readonly Style[];
  execute(graph: GraphDocument): void;
}

/**
 * Builds an analysis from a plain mutation function.
 */
export function defineAnalysis(
  name: string,
  execute: (graph: GraphDocument) => void,
  declarations: { properties?: Property[]; styles?: Style[] } = {}
): Analysis {
  return {
    name,
    properties: declarations.properties ?? [],
    styles: declarations.styles ?? [],
    execute,
  };
}
