/**
 * Directed graph document model.
 *
 * Plain data structures mirroring the DGML schema: a graph owns ordered
 * collections of nodes, links, categories, styles and property declarations.
 */

export type PropertyValue = string | number | boolean;

export type ElementProperties = Record<string, PropertyValue>;

export type GroupState = 'Expanded' | 'Collapsed';

export type StyleTargetType = 'Node' | 'Link';

export interface CategoryRef {
  ref: string;
}

export interface Node {
  id: string;
  label?: string;
  category?: string;
  categoryRefs: CategoryRef[];
  group?: GroupState;
  description?: string;
  reference?: string;
  properties: ElementProperties;
}

export interface Link {
  source: string;
  target: string;
  label?: string;
  category?: string;
  description?: string;
  properties: ElementProperties;
}

export interface Category {
  id: string;
  label?: string;
  basedOn?: string;
  background?: string;
  stroke?: string;
  isContainment?: boolean;
}

export interface Condition {
  expression: string;
}

export interface Setter {
  property: string;
  value?: string;
  expression?: string;
}

export interface Style {
  targetType: StyleTargetType;
  groupLabel?: string;
  valueLabel?: string;
  conditions: Condition[];
  setters: Setter[];
}

/**
 * Schema entry declaring a custom attribute so the encoder knows its type.
 */
export interface Property {
  id: string;
  dataType: string;
  label?: string;
  description?: string;
}

export interface DirectedGraph {
  title?: string;
  layout?: string;
  nodes: Node[];
  links: Link[];
  categories: Category[];
  styles: Style[];
  properties: Property[];
}

export const PropertyDataType = {
  BOOLEAN: 'System.Boolean',
  INT32: 'System.Int32',
  DOUBLE: 'System.Double',
  STRING: 'System.String',
} as const;

export type NodeInit = Partial<Omit<Node, 'id'>> & Pick<Node, 'id'>;
export type LinkInit = Partial<Omit<Link, 'source' | 'target'>> & Pick<Link, 'source' | 'target'>;
export type StyleInit = Partial<Omit<Style, 'targetType'>> & Pick<Style, 'targetType'>;

export function createNode(init: NodeInit): Node {
  return {
    ...init,
    categoryRefs: init.categoryRefs ?? [],
    properties: init.properties ?? {},
  };
}

export function createLink(init: LinkInit): Link {
  return {
    ...init,
    properties: init.properties ?? {},
  };
}

export function createStyle(init: StyleInit): Style {
  return {
    ...init,
    conditions: init.conditions ?? [],
    setters: init.setters ?? [],
  };
}

export function createEmptyGraph(): DirectedGraph {
  return {
    nodes: [],
    links: [],
    categories: [],
    styles: [],
    properties: [],
  };
}

/**
 * True when the node's primary category or one of its category refs equals `category`.
 */
export function nodeHasCategory(node: Node, category: string): boolean {
  return node.category === category || node.categoryRefs.some(ref => ref.ref === category);
}

export function linkHasCategory(link: Link, category: string): boolean {
  return link.category === category;
}

export function linkKey(link: Pick<Link, 'source' | 'target' | 'category'>): string {
  return JSON.stringify([link.source, link.target, link.category ?? '']);
}
