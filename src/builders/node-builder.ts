import { Node } from '../model';
import { SourceType } from './source-type';
import {
  MultiElementBuilder,
  MultiMapping,
  Predicate,
  SingleElementBuilder,
  SingleMapping,
} from './element-builder';

/**
 * Maps each accepted source object to at most one node.
 *
 * @example
 * ```typescript
 * new NodeBuilder(instanceOf(Service), s => createNode({ id: s.name }), s => s.enabled);
 * ```
 */
export class NodeBuilder<TSource> extends SingleElementBuilder<TSource, Node> {
  readonly kind = 'node' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: SingleMapping<TSource, Node>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}

export class NodesBuilder<TSource> extends MultiElementBuilder<TSource, Node> {
  readonly kind = 'node' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: MultiMapping<TSource, Node>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}
