import {
  Category,
  DirectedGraph,
  Link,
  Node,
  Property,
  PropertyValue,
  Style,
  linkKey,
} from '../model';

/**
 * Mutable graph under construction.
 *
 * All writes go through this object so the uniqueness rules hold no matter who
 * writes: nodes are unique by id, links by (source, target, category), categories
 * and property declarations by id. A duplicate is discarded and the first
 * element inserted is kept. Styles are appended as they come.
 *
 * Elements are copied on the way in, so objects owned by the caller are never
 * mutated by analyses nor frozen by {@link toGraph}.
 */
export class GraphDocument {
  title?: string;
  layout?: string;

  private readonly nodeIndex = new Map<string, Node>();
  private readonly linkIndex = new Map<string, Link>();
  private readonly categoryIndex = new Map<string, Category>();
  private readonly propertyIndex = new Map<string, Property>();
  private readonly styleList: Style[] = [];
  private discarded = 0;

  get nodes(): readonly Node[] {
    return [...this.nodeIndex.values()];
  }

  get links(): readonly Link[] {
    return [...this.linkIndex.values()];
  }

  get categories(): readonly Category[] {
    return [...this.categoryIndex.values()];
  }

  get styles(): readonly Style[] {
    return [...this.styleList];
  }

  get properties(): readonly Property[] {
    return [...this.propertyIndex.values()];
  }

  /** Number of elements dropped because an equal key was already present. */
  get duplicatesDiscarded(): number {
    return this.discarded;
  }

  addNode(node: Node): boolean {
    return this.insert(this.nodeIndex, node.id, node, copyNode);
  }

  getNode(id: string): Node | undefined {
    return this.nodeIndex.get(id);
  }

  hasNode(id: string): boolean {
    return this.nodeIndex.has(id);
  }

  addLink(link: Link): boolean {
    return this.insert(this.linkIndex, linkKey(link), link, copyLink);
  }

  getLink(source: string, target: string, category?: string): Link | undefined {
    return this.linkIndex.get(linkKey({ source, target, category }));
  }

  linksFrom(nodeId: string): Link[] {
    return this.links.filter(link => link.source === nodeId);
  }

  linksTo(nodeId: string): Link[] {
    return this.links.filter(link => link.target === nodeId);
  }

  addCategory(category: Category): boolean {
    return this.insert(this.categoryIndex, category.id, category, copyCategory);
  }

  getCategory(id: string): Category | undefined {
    return this.categoryIndex.get(id);
  }

  addStyle(style: Style): void {
    this.styleList.push(copyStyle(style));
  }

  addProperty(property: Property): boolean {
    return this.insert(this.propertyIndex, property.id, property, copyProperty);
  }

  getProperty(id: string): Property | undefined {
    return this.propertyIndex.get(id);
  }

  /**
   * Sets a custom attribute on a node. Returns false when the node does not exist.
   */
  setNodeProperty(nodeId: string, name: string, value: PropertyValue): boolean {
    const node = this.nodeIndex.get(nodeId);
    if (!node) return false;
    node.properties[name] = value;
    return true;
  }

  setLinkProperty(link: Pick<Link, 'source' | 'target' | 'category'>, name: string, value: PropertyValue): boolean {
    const existing = this.linkIndex.get(linkKey(link));
    if (!existing) return false;
    existing.properties[name] = value;
    return true;
  }

  /**
   * Links whose source or target names a node that is not in the graph.
   */
  danglingLinks(): Link[] {
    return this.links.filter(
      link => !this.hasNode(link.source) || !this.hasNode(link.target)
    );
  }

  /**
   * Snapshot of the document as a deeply frozen graph. The document itself stays
   * writable.
   */
  toGraph(): DirectedGraph {
    const graph: DirectedGraph = {
      nodes: this.nodes.map(copyNode),
      links: this.links.map(copyLink),
      categories: this.categories.map(copyCategory),
      styles: this.styles.map(copyStyle),
      properties: this.properties.map(copyProperty),
    };
    if (this.title !== undefined) graph.title = this.title;
    if (this.layout !== undefined) graph.layout = this.layout;
    return deepFreeze(graph);
  }

  private insert<T>(index: Map<string, T>, key: string, value: T, copy: (value: T) => T): boolean {
    if (index.has(key)) {
      this.discarded++;
      return false;
    }
    index.set(key, copy(value));
    return true;
  }
}

function copyNode(node: Node): Node {
  return {
    ...node,
    categoryRefs: node.categoryRefs.map(ref => ({ ...ref })),
    properties: { ...node.properties },
  };
}

function copyLink(link: Link): Link {
  return { ...link, properties: { ...link.properties } };
}

function copyCategory(category: Category): Category {
  return { ...category };
}

function copyStyle(style: Style): Style {
  return {
    ...style,
    conditions: style.conditions.map(condition => ({ ...condition })),
    setters: style.setters.map(setter => ({ ...setter })),
  };
}

function copyProperty(property: Property): Property {
  return { ...property };
}

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}
