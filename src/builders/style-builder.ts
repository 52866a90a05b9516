import { Link, Node, Style, StyleInit, StyleTargetType, createStyle } from '../model';
import { SourceType, shape } from './source-type';
import {
  BuilderRule,
  MultiElementBuilder,
  MultiMapping,
  Predicate,
  SingleElementBuilder,
  SingleMapping,
} from './element-builder';

export interface StyleSourceMap {
  Node: Node;
  Link: Link;
}

/**
 * Style content returned by a style mapping. The target type is always taken from
 * the rule that produced it.
 */
export type StyleSpec = Omit<StyleInit, 'targetType'>;

/**
 * Style rules run over assembled nodes or links instead of the input objects.
 */
export interface StyleRule extends BuilderRule<Style> {
  readonly kind: 'style';
  readonly target: StyleTargetType;
}

function isNode(element: unknown): element is Node {
  return (
    typeof element === 'object' &&
    element !== null &&
    'id' in element &&
    typeof element.id === 'string' &&
    'categoryRefs' in element &&
    Array.isArray(element.categoryRefs)
  );
}

function isLink(element: unknown): element is Link {
  return (
    typeof element === 'object' &&
    element !== null &&
    'source' in element &&
    typeof element.source === 'string' &&
    'target' in element &&
    typeof element.target === 'string'
  );
}

const styleSourceTypes: { [K in StyleTargetType]: SourceType<StyleSourceMap[K]> } = {
  Node: shape('Node', isNode),
  Link: shape('Link', isLink),
};

function stamp(target: StyleTargetType, spec: StyleSpec): Style {
  return createStyle({ ...spec, targetType: target });
}

/**
 * Produces at most one style for each assembled node or link it accepts.
 *
 * @example
 * ```typescript
 * new StyleBuilder('Node', () => ({ groupLabel: 'Interface', setters: [{ property: 'NodeRadius', value: '16' }] }),
 *   node => nodeHasCategory(node, 'Interface'));
 * ```
 */
export class StyleBuilder<K extends StyleTargetType>
  extends SingleElementBuilder<StyleSourceMap[K], Style>
  implements StyleRule
{
  readonly kind = 'style' as const;

  constructor(
    readonly target: K,
    mapping: SingleMapping<StyleSourceMap[K], StyleSpec>,
    predicate?: Predicate<StyleSourceMap[K]>
  ) {
    super(
      styleSourceTypes[target],
      source => {
        const spec = mapping(source);
        return spec ? stamp(target, spec) : undefined;
      },
      predicate
    );
  }
}

export class StylesBuilder<K extends StyleTargetType>
  extends MultiElementBuilder<StyleSourceMap[K], Style>
  implements StyleRule
{
  readonly kind = 'style' as const;

  constructor(
    readonly target: K,
    mapping: MultiMapping<StyleSourceMap[K], StyleSpec>,
    predicate?: Predicate<StyleSourceMap[K]>
  ) {
    super(
      styleSourceTypes[target],
      function* (source) {
        for (const spec of mapping(source)) {
          yield stamp(target, spec);
        }
      },
      predicate
    );
  }
}
