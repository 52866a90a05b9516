import { SourceType } from './source-type';

export type ElementKind = 'node' | 'link' | 'category' | 'style';

export type Cardinality = 'single' | 'multi';

export type Predicate<TSource> = (source: TSource) => boolean;

export type SingleMapping<TSource, TOutput> = (source: TSource) => TOutput | null | undefined;

export type MultiMapping<TSource, TOutput> = (source: TSource) => Iterable<TOutput>;

/**
 * Type-erased view of a builder rule, as stored by the registry and consumed by
 * the dispatch engine.
 */
export interface BuilderRule<TOutput> {
  readonly kind: ElementKind;
  readonly cardinality: Cardinality;
  readonly sourceTypeName: string;
  matches(element: unknown): boolean;
  /**
   * Yields the elements produced for `element`; yields nothing when the rule
   * does not match.
   */
  produce(element: unknown): Iterable<TOutput>;
}

/**
 * Base class for every builder rule variant.
 *
 * A rule accepts an element when its declared source type accepts the runtime
 * value and the optional predicate returns true.
 */
export abstract class ElementBuilder<TSource, TOutput> implements BuilderRule<TOutput> {
  abstract readonly kind: ElementKind;
  abstract readonly cardinality: Cardinality;

  protected constructor(
    readonly sourceType: SourceType<TSource>,
    private readonly predicate?: Predicate<TSource>
  ) {}

  get sourceTypeName(): string {
    return this.sourceType.name;
  }

  matches(element: unknown): boolean {
    return this.accept(element) !== undefined;
  }

  *produce(element: unknown): Iterable<TOutput> {
    const source = this.accept(element);
    if (source === undefined) return;
    yield* this.map(source.value);
  }

  protected abstract map(source: TSource): Iterable<TOutput>;

  private accept(element: unknown): { value: TSource } | undefined {
    if (!this.sourceType.accepts(element)) return undefined;
    if (this.predicate && !this.predicate(element)) return undefined;
    return { value: element };
  }
}

/**
 * Produces at most one element per accepted source.
 */
export abstract class SingleElementBuilder<TSource, TOutput> extends ElementBuilder<TSource, TOutput> {
  readonly cardinality = 'single' as const;

  protected constructor(
    sourceType: SourceType<TSource>,
    private readonly mapping: SingleMapping<TSource, TOutput>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, predicate);
  }

  protected *map(source: TSource): Iterable<TOutput> {
    const result = this.mapping(source);
    if (result !== null && result !== undefined) {
      yield result;
    }
  }
}

/**
 * Produces a lazily consumed, finite sequence of elements per accepted source.
 */
export abstract class MultiElementBuilder<TSource, TOutput> extends ElementBuilder<TSource, TOutput> {
  readonly cardinality = 'multi' as const;

  protected constructor(
    sourceType: SourceType<TSource>,
    private readonly mapping: MultiMapping<TSource, TOutput>,
    predicate?: Predicate<TSource>
  ) {
    super(sourceType, predicate);
  }

  protected map(source: TSource): Iterable<TOutput> {
    return this.mapping(source);
  }
}
