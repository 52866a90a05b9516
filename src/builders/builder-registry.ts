import { Category, Link, Node } from '../model';
import { BuilderRule } from './element-builder';
import { StyleRule } from './style-builder';

export interface BuilderRuleSet {
  nodeBuilders?: Iterable<BuilderRule<Node>>;
  linkBuilders?: Iterable<BuilderRule<Link>>;
  categoryBuilders?: Iterable<BuilderRule<Category>>;
  styleBuilders?: Iterable<StyleRule>;
}

export interface RegistrySummary {
  nodeBuilders: number;
  linkBuilders: number;
  categoryBuilders: number;
  styleBuilders: number;
}

/**
 * Ordered, read-only lists of builder rules, one list per output element kind.
 *
 * Registration order is the evaluation order and the tie-break for duplicate
 * elements; the registry never reorders rules.
 */
export class BuilderRegistry {
  readonly nodeBuilders: readonly BuilderRule<Node>[];
  readonly linkBuilders: readonly BuilderRule<Link>[];
  readonly categoryBuilders: readonly BuilderRule<Category>[];
  readonly styleBuilders: readonly StyleRule[];

  constructor(rules: BuilderRuleSet = {}) {
    this.nodeBuilders = Object.freeze([...(rules.nodeBuilders ?? [])]);
    this.linkBuilders = Object.freeze([...(rules.linkBuilders ?? [])]);
    this.categoryBuilders = Object.freeze([...(rules.categoryBuilders ?? [])]);
    this.styleBuilders = Object.freeze([...(rules.styleBuilders ?? [])]);
  }

  static empty(): BuilderRegistry {
    return new BuilderRegistry();
  }

  get isEmpty(): boolean {
    return (
      this.nodeBuilders.length === 0 &&
      this.linkBuilders.length === 0 &&
      this.categoryBuilders.length === 0 &&
      this.styleBuilders.length === 0
    );
  }

  describe(): RegistrySummary {
    return {
      nodeBuilders: this.nodeBuilders.length,
      linkBuilders: this.linkBuilders.length,
      categoryBuilders: this.categoryBuilders.length,
      styleBuilders: this.styleBuilders.length,
    };
  }
}
