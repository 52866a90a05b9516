import { Category } from '../model';
import { SourceType } from './source-type';
import {
  MultiElementBuilder,
  MultiMapping,
  Predicate,
  SingleElementBuilder,
  SingleMapping,
} from './element-builder';

export class CategoryBuilder<TSource> extends SingleElementBuilder<TSource, Category> {
  readonly kind = 'category' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: SingleMapping<TSource, Category>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}

export class CategoriesBuilder<TSource> extends MultiElementBuilder<TSource, Category> {
  readonly kind = 'category' as const;

  constructor(
    sourceType: SourceType<TSource>,
    mapping: MultiMapping<TSource, Category>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, mapping, predicate);
  }
}
