import { Link } from '../model';
import { SourceType } from './source-type';
import {
  MultiElementBuilder,
  MultiMapping,
  Predicate,
  SingleElementBuilder,
  SingleMapping,
} from './element-builder';

/**
 * Maps each accepted source object to at most one link. Endpoints must already be
 * known to the source object; the rule has no view of the graph being built.
 */
export class LinkBuilder<TSource> extends SingleElementBuilder<TSource, Link> {
  readonly kind = 'link' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: SingleMapping<TSource, Link>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}

export class LinksBuilder<TSource> extends MultiElementBuilder<TSource, Link> {
  readonly kind = 'link' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: MultiMapping<TSource, Link>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}
