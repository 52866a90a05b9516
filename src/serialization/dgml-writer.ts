import fs from 'fs/promises';
import path from 'path';
import {
  Category,
  DirectedGraph,
  ElementProperties,
  Link,
  Node,
  Property,
  PropertyValue,
  Style,
} from '../model';
import { AssemblyError, AssemblyErrorKind } from '../graph/errors';
import { createComponentLogger } from '../utils/logger';

const logger = createComponentLogger('dgml-writer');

export const DGML_NAMESPACE = 'http://schemas.microsoft.com/vs/2009/dgml';

/**
 * Attributes understood by DGML viewers without a Property declaration.
 */
const BUILT_IN_PROPERTIES = new Set([
  'Background',
  'Foreground',
  'Stroke',
  'StrokeThickness',
  'StrokeDashArray',
  'Shape',
  'Icon',
  'NodeRadius',
  'FontSize',
  'FontFamily',
  'FontWeight',
  'FontStyle',
  'Visibility',
  'IsVertical',
  'MinWidth',
  'MaxWidth',
  'Opacity',
  'Index',
  'Weight',
  'IsDragSource',
  'IsDropTarget',
]);

const NODE_ATTRIBUTES = new Set(['Id', 'Label', 'Category', 'Group', 'Description', 'Reference']);
const LINK_ATTRIBUTES = new Set(['Source', 'Target', 'Label', 'Category', 'Description']);

// XML 1.0 forbids these even when escaped
const FORBIDDEN_CHARACTERS = /[\u0000-\u0008\u000B\u000C\u000E-\u001F\uFFFE\uFFFF]/;

export interface DgmlWriterOptions {
  indent?: string;
}

type Attributes = Array<[string, PropertyValue | undefined]>;

/**
 * Encodes a finished graph as a DGML document.
 *
 * Custom node and link properties become attributes; each one must be declared
 * in the graph's property list unless it is a built-in DGML attribute. A custom
 * property may not reuse the name of an attribute the element already has.
 */
export class DgmlWriter {
  private readonly indent: string;

  constructor(options: DgmlWriterOptions = {}) {
    this.indent = options.indent ?? '  ';
  }

  write(graph: DirectedGraph): string {
    const declared = new Set(graph.properties.map(property => property.id));
    const lines: string[] = ['<?xml version="1.0" encoding="utf-8"?>'];

    lines.push(
      this.open(0, 'DirectedGraph', [
        ['Title', graph.title],
        ['Layout', graph.layout],
        ['xmlns', DGML_NAMESPACE],
      ])
    );

    this.group(lines, 'Nodes', graph.nodes, node => this.node(node, declared));
    this.group(lines, 'Links', graph.links, link => this.link(link, declared));
    this.group(lines, 'Categories', graph.categories, category => [this.category(category)]);
    this.group(lines, 'Properties', graph.properties, property => [this.property(property)]);
    this.group(lines, 'Styles', graph.styles, style => this.style(style));

    lines.push('</DirectedGraph>');
    return lines.join('\n') + '\n';
  }

  async writeToFile(graph: DirectedGraph, filePath: string): Promise<void> {
    const document = this.write(graph);
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, document, 'utf-8');
    logger.info('DGML document written', { filePath, bytes: Buffer.byteLength(document) });
  }

  private group<T>(lines: string[], name: string, items: readonly T[], render: (item: T) => string[]): void {
    if (items.length === 0) return;
    lines.push(`${this.pad(1)}<${name}>`);
    for (const item of items) {
      lines.push(...render(item));
    }
    lines.push(`${this.pad(1)}</${name}>`);
  }

  private node(node: Node, declared: Set<string>): string[] {
    const attributes: Attributes = [
      ['Id', node.id],
      ['Label', node.label],
      ['Category', node.category],
      ['Group', node.group],
      ['Description', node.description],
      ['Reference', node.reference],
      ...this.custom(node.properties, declared, NODE_ATTRIBUTES, `node ${node.id}`),
    ];

    if (node.categoryRefs.length === 0) {
      return [this.empty(2, 'Node', attributes)];
    }
    return [
      this.open(2, 'Node', attributes),
      ...node.categoryRefs.map(ref => this.empty(3, 'Category', [['Ref', ref.ref]])),
      `${this.pad(2)}</Node>`,
    ];
  }

  private link(link: Link, declared: Set<string>): string[] {
    return [
      this.empty(2, 'Link', [
        ['Source', link.source],
        ['Target', link.target],
        ['Label', link.label],
        ['Category', link.category],
        ['Description', link.description],
        ...this.custom(link.properties, declared, LINK_ATTRIBUTES, `link ${link.source} -> ${link.target}`),
      ]),
    ];
  }

  private category(category: Category): string {
    return this.empty(2, 'Category', [
      ['Id', category.id],
      ['Label', category.label],
      ['BasedOn', category.basedOn],
      ['Background', category.background],
      ['Stroke', category.stroke],
      ['IsContainment', category.isContainment],
    ]);
  }

  private property(property: Property): string {
    return this.empty(2, 'Property', [
      ['Id', property.id],
      ['DataType', property.dataType],
      ['Label', property.label],
      ['Description', property.description],
    ]);
  }

  private style(style: Style): string[] {
    return [
      this.open(2, 'Style', [
        ['TargetType', style.targetType],
        ['GroupLabel', style.groupLabel],
        ['ValueLabel', style.valueLabel],
      ]),
      ...style.conditions.map(condition =>
        this.empty(3, 'Condition', [['Expression', condition.expression]])
      ),
      ...style.setters.map(setter =>
        this.empty(3, 'Setter', [
          ['Property', setter.property],
          ['Value', setter.value],
          ['Expression', setter.expression],
        ])
      ),
      `${this.pad(2)}</Style>`,
    ];
  }

  private custom(
    properties: ElementProperties,
    declared: Set<string>,
    reserved: Set<string>,
    owner: string
  ): Attributes {
    return Object.entries(properties).map(([name, value]): [string, PropertyValue] => {
      if (reserved.has(name)) {
        throw new AssemblyError(
          AssemblyErrorKind.ENCODING,
          `Property ${name} on ${owner} clashes with a standard attribute`,
          { property: name }
        );
      }
      if (!declared.has(name) && !BUILT_IN_PROPERTIES.has(name)) {
        throw new AssemblyError(
          AssemblyErrorKind.ENCODING,
          `Property ${name} on ${owner} has no schema declaration`,
          { property: name }
        );
      }
      return [name, value];
    });
  }

  private open(depth: number, tag: string, attributes: Attributes): string {
    return `${this.pad(depth)}<${tag}${this.attributes(attributes)}>`;
  }

  private empty(depth: number, tag: string, attributes: Attributes): string {
    return `${this.pad(depth)}<${tag}${this.attributes(attributes)} />`;
  }

  private attributes(attributes: Attributes): string {
    return attributes
      .filter((entry): entry is [string, PropertyValue] => entry[1] !== undefined)
      .map(([name, value]) => ` ${name}="${escapeAttribute(formatValue(value))}"`)
      .join('');
  }

  private pad(depth: number): string {
    return this.indent.repeat(depth);
  }
}

export function formatValue(value: PropertyValue): string {
  if (typeof value === 'boolean') return value ? 'True' : 'False';
  return String(value);
}

/**
 * Escapes a value for a double-quoted attribute. Line breaks and tabs become
 * character references so that attribute normalisation keeps them.
 */
export function escapeAttribute(value: string): string {
  const forbidden = FORBIDDEN_CHARACTERS.exec(value);
  if (forbidden) {
    const codePoint = forbidden[0].charCodeAt(0).toString(16).toUpperCase().padStart(4, '0');
    throw new AssemblyError(
      AssemblyErrorKind.ENCODING,
      `Character U+${codePoint} cannot be written to a DGML document`
    );
  }
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/\n/g, '&#10;')
    .replace(/\r/g, '&#13;')
    .replace(/\t/g, '&#9;');
}
