import { Analysis } from '../analyses/analysis';
import { createComponentLogger } from '../utils/logger';
import { AssemblyError, AssemblyErrorKind, describeCause } from './errors';
import { GraphDocument } from './graph-document';

const logger = createComponentLogger('analysis-hook');

/**
 * Merges the schema and style declarations of every analysis into the graph,
 * then runs each analysis in registration order. Each analysis sees the effects
 * of the ones before it.
 */
export function applyAnalyses(graph: GraphDocument, analyses: readonly Analysis[]): void {
  for (const analysis of analyses) {
    for (const property of analysis.properties) {
      graph.addProperty(property);
    }
  }
  for (const analysis of analyses) {
    for (const style of analysis.styles) {
      graph.addStyle(style);
    }
  }

  for (const analysis of analyses) {
    const startTime = Date.now();
    try {
      analysis.execute(graph);
    } catch (error) {
      logger.error('Analysis failed', { analysis: analysis.name, error: describeCause(error) });
      throw new AssemblyError(
        AssemblyErrorKind.ANALYSIS,
        `Analysis ${analysis.name} failed: ${describeCause(error)}`,
        { analysis: analysis.name },
        { cause: error }
      );
    }
    logger.debug('Analysis completed', {
      analysis: analysis.name,
      durationMs: Date.now() - startTime,
    });
  }
}
