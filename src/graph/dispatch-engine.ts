import { BuilderRegistry, BuilderRule, StyleRule } from '../builders';
import { StyleTargetType } from '../model';
import { createComponentLogger } from '../utils/logger';
import { AssemblyError, AssemblyErrorKind, describeCause } from './errors';
import { GraphDocument } from './graph-document';

const logger = createComponentLogger('dispatch-engine');

/**
 * Routes input objects through the registered builder rules and merges the
 * produced elements into a graph document.
 *
 * Rules are evaluated in registration order. A rule applies when its source type
 * accepts the element and its predicate (if any) returns true. Any failure raised
 * by a rule, including while its output sequence is being consumed, aborts the
 * assembly.
 */
export class DispatchEngine {
  constructor(private readonly registry: BuilderRegistry) {}

  /**
   * Rules from `rules` that apply to `element`, in registration order.
   */
  static matchingRules<R extends BuilderRule<unknown>>(element: unknown, rules: readonly R[]): R[] {
    return rules.filter(rule => rule.matches(element));
  }

  /**
   * Runs node, link and category rules for one input object.
   */
  dispatch(element: unknown, elementIndex: number, graph: GraphDocument): void {
    this.run(this.registry.nodeBuilders, element, elementIndex, node => graph.addNode(node));
    this.run(this.registry.linkBuilders, element, elementIndex, link => graph.addLink(link));
    this.run(this.registry.categoryBuilders, element, elementIndex, category =>
      graph.addCategory(category)
    );
  }

  /**
   * Offers every assembled node, then every assembled link, to the style rules
   * targeting that element type. Each produced style is appended.
   */
  applyStyles(graph: GraphDocument): void {
    const nodeRules = this.styleRulesFor('Node');
    const linkRules = this.styleRulesFor('Link');
    if (nodeRules.length === 0 && linkRules.length === 0) return;

    graph.nodes.forEach((node, index) => {
      this.run(nodeRules, node, index, style => graph.addStyle(style));
    });
    graph.links.forEach((link, index) => {
      this.run(linkRules, link, index, style => graph.addStyle(style));
    });

    logger.debug('Style rules applied', {
      nodeRules: nodeRules.length,
      linkRules: linkRules.length,
      styles: graph.styles.length,
    });
  }

  private styleRulesFor(target: StyleTargetType): StyleRule[] {
    return this.registry.styleBuilders.filter(rule => rule.target === target);
  }

  private run<T>(
    rules: readonly BuilderRule<T>[],
    element: unknown,
    elementIndex: number,
    sink: (output: T) => void
  ): void {
    for (const rule of rules) {
      try {
        for (const output of rule.produce(element)) {
          sink(output);
        }
      } catch (error) {
        logger.error('Builder rule failed', {
          ruleKind: rule.kind,
          sourceType: rule.sourceTypeName,
          elementIndex,
          error: describeCause(error),
        });
        throw new AssemblyError(
          AssemblyErrorKind.RULE_INVOCATION,
          `${rule.kind} rule for ${rule.sourceTypeName} failed on element ${elementIndex}: ${describeCause(error)}`,
          { ruleKind: rule.kind, sourceType: rule.sourceTypeName, elementIndex },
          { cause: error }
        );
      }
    }
  }
}
