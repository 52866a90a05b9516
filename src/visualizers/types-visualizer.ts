import { Analysis, HubNodeAnalysis } from '../analyses';
import {
  CategoryBuilder,
  LinksBuilder,
  NodeBuilder,
  StyleBuilder,
  StyleSpec,
  shape,
} from '../builders';
import { DgmlBuilder } from '../graph/dgml-builder';
import {
  Category,
  DirectedGraph,
  Link,
  Node,
  createLink,
  createNode,
  linkHasCategory,
  nodeHasCategory,
} from '../model';
import { TypeDescriptor } from '../parsers/type-descriptors';

export const TypeCategory = {
  CLASS: 'Class',
  INTERFACE: 'Interface',
  ABSTRACT: 'Abstract',
} as const;

export const RelationCategory = {
  ASSOCIATION: 'Association',
  INHERITANCE: 'Inheritance',
} as const;

export interface TypesVisualizerOptions {
  /** Analyses to run; defaults to a single {@link HubNodeAnalysis}. */
  analyses?: Analysis[];
  title?: string;
}

function isTypeDescriptor(element: unknown): element is TypeDescriptor {
  return (
    typeof element === 'object' &&
    element !== null &&
    'kind' in element &&
    (element.kind === 'class' || element.kind === 'interface') &&
    'name' in element &&
    typeof element.name === 'string' &&
    'namespace' in element &&
    typeof element.namespace === 'string'
  );
}

const typeDescriptor = shape('TypeDescriptor', isTypeDescriptor);

export function makeTypeId(type: Pick<TypeDescriptor, 'namespace' | 'name'>): string {
  return `${type.namespace}.${type.name}`;
}

export function moduleCategoryId(type: Pick<TypeDescriptor, 'module'>): string {
  return `m:${type.module}`;
}

/**
 * Resolves type names against the set of visualized types. A name declared in
 * several modules resolves to the declaration in the referring module when there
 * is one, otherwise to the first declaration seen.
 */
export class TypeIndex {
  private readonly byName = new Map<string, TypeDescriptor[]>();

  constructor(types: readonly TypeDescriptor[]) {
    for (const type of types) {
      const existing = this.byName.get(type.name);
      if (existing) {
        existing.push(type);
      } else {
        this.byName.set(type.name, [type]);
      }
    }
  }

  resolve(name: string | undefined, from?: TypeDescriptor): TypeDescriptor | undefined {
    if (!name) return undefined;
    const candidates = this.byName.get(name);
    if (!candidates) return undefined;
    return candidates.find(candidate => candidate.namespace === from?.namespace) ?? candidates[0];
  }
}

/**
 * Creates a type diagram from class and interface descriptors.
 *
 * Classes are boxes and interfaces ovals; abstract classes get a dashed outline.
 * Inheritance links are dashed green, associations (typed members, constructor
 * parameters and generic arguments of base classes and interfaces) light blue. Each type is
 * placed in the category of its module.
 */
export function visualizeTypes(
  types: readonly TypeDescriptor[],
  options: TypesVisualizerOptions = {}
): DirectedGraph {
  const index = new TypeIndex(types);
  const builder = new DgmlBuilder(...(options.analyses ?? [new HubNodeAnalysis()]));
  builder.title = options.title;

  builder.nodeBuilders = [
    new NodeBuilder(typeDescriptor, classToNode, type => type.kind === 'class'),
    new NodeBuilder(typeDescriptor, interfaceToNode, type => type.kind === 'interface'),
  ];
  builder.linkBuilders = [
    new LinksBuilder(typeDescriptor, type => memberLinks(type, index)),
    new LinksBuilder(typeDescriptor, type => inheritanceLinks(type, index)),
    new LinksBuilder(typeDescriptor, type => genericArgumentLinks(type, index)),
    new LinksBuilder(typeDescriptor, type => constructorInjectionLinks(type, index)),
  ];
  builder.categoryBuilders = [new CategoryBuilder(typeDescriptor, typeToCategory)];
  builder.styleBuilders = [
    new StyleBuilder('Node', interfaceStyle, node => nodeHasCategory(node, TypeCategory.INTERFACE)),
    new StyleBuilder('Node', abstractStyle, node => nodeHasCategory(node, TypeCategory.ABSTRACT)),
    new StyleBuilder('Link', associationStyle, link =>
      linkHasCategory(link, RelationCategory.ASSOCIATION)
    ),
    new StyleBuilder('Link', inheritanceStyle, link =>
      linkHasCategory(link, RelationCategory.INHERITANCE)
    ),
  ];

  return builder.build(types);
}

function classToNode(type: TypeDescriptor): Node {
  const node = createNode({
    id: makeTypeId(type),
    label: type.name,
    category: TypeCategory.CLASS,
    categoryRefs: [{ ref: moduleCategoryId(type) }],
  });
  if (type.isAbstract) {
    node.categoryRefs.push({ ref: TypeCategory.ABSTRACT });
  }
  return node;
}

function interfaceToNode(type: TypeDescriptor): Node {
  return createNode({
    id: makeTypeId(type),
    label: type.name,
    category: TypeCategory.INTERFACE,
    categoryRefs: [{ ref: moduleCategoryId(type) }],
  });
}

function typeToCategory(type: TypeDescriptor): Category {
  return { id: moduleCategoryId(type), label: type.module };
}

function* memberLinks(type: TypeDescriptor, index: TypeIndex): Iterable<Link> {
  for (const member of type.members) {
    const link = makeAssociation(type, member.type, member.name, index);
    if (link) yield link;
  }
}

function* inheritanceLinks(type: TypeDescriptor, index: TypeIndex): Iterable<Link> {
  const baseType = index.resolve(type.baseType?.name, type);
  if (baseType) {
    yield makeInheritanceLink(type, baseType);
  }
  for (const reference of type.interfaces) {
    const implemented = index.resolve(reference.name, type);
    if (implemented) yield makeInheritanceLink(type, implemented);
  }
}

/**
 * Generic arguments of a base class are associated with the type itself; those
 * of an implemented interface are associated with the interface.
 */
function* genericArgumentLinks(type: TypeDescriptor, index: TypeIndex): Iterable<Link> {
  if (type.baseType && index.resolve(type.baseType.name, type)) {
    for (const argument of type.baseType.typeArguments) {
      const link = makeAssociation(type, argument, undefined, index);
      if (link) yield link;
    }
  }
  for (const reference of type.interfaces) {
    const implemented = index.resolve(reference.name, type);
    if (!implemented) continue;
    for (const argument of reference.typeArguments) {
      const link = makeAssociation(implemented, argument, undefined, index);
      if (link) yield link;
    }
  }
}

function* constructorInjectionLinks(type: TypeDescriptor, index: TypeIndex): Iterable<Link> {
  for (const parameter of type.constructorParameters) {
    const link = makeAssociation(type, parameter.type, undefined, index);
    if (link) yield link;
  }
}

function makeAssociation(
  from: TypeDescriptor,
  toName: string | undefined,
  label: string | undefined,
  index: TypeIndex
): Link | undefined {
  const to = index.resolve(toName, from);
  if (!to) return undefined;
  return createLink({
    source: makeTypeId(from),
    target: makeTypeId(to),
    label,
    category: RelationCategory.ASSOCIATION,
  });
}

function makeInheritanceLink(type: TypeDescriptor, baseType: TypeDescriptor): Link {
  return createLink({
    source: makeTypeId(type),
    target: makeTypeId(baseType),
    category: RelationCategory.INHERITANCE,
  });
}

function interfaceStyle(): StyleSpec {
  return {
    groupLabel: TypeCategory.INTERFACE,
    conditions: [{ expression: `HasCategory('${TypeCategory.INTERFACE}')` }],
    setters: [{ property: 'NodeRadius', value: '16' }],
  };
}

function abstractStyle(): StyleSpec {
  return {
    groupLabel: TypeCategory.ABSTRACT,
    conditions: [{ expression: `HasCategory('${TypeCategory.ABSTRACT}')` }],
    setters: [{ property: 'StrokeDashArray', value: '2,2' }],
  };
}

function associationStyle(link: Link): StyleSpec {
  return {
    groupLabel: link.category,
    conditions: [{ expression: `HasCategory('${RelationCategory.ASSOCIATION}')` }],
    setters: [{ property: 'Stroke', value: 'LightBlue' }],
  };
}

function inheritanceStyle(link: Link): StyleSpec {
  return {
    groupLabel: link.category,
    conditions: [{ expression: `HasCategory('${RelationCategory.INHERITANCE}')` }],
    setters: [
      { property: 'StrokeDashArray', value: '2,2' },
      { property: 'Stroke', value: 'Green' },
    ],
  };
}
