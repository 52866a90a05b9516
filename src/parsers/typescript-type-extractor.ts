import Parser from 'tree-sitter';
import TreeSitterTypeScript from 'tree-sitter-typescript';
import * as fs from 'fs/promises';
import path from 'path';
import { createComponentLogger } from '../utils/logger';
import {
  ExtractionSource,
  MemberDescriptor,
  TypeDescriptor,
  TypeReference,
} from './type-descriptors';

const logger = createComponentLogger('typescript-type-extractor');

const CLASS_NODE_TYPES = new Set(['class_declaration', 'abstract_class_declaration']);

/**
 * Extracts class and interface declarations from TypeScript source.
 *
 * Only the shape needed for a type diagram is kept: heritage clauses, typed
 * properties and typed constructor parameters.
 */
export class TypeScriptTypeExtractor {
  private readonly parser: Parser;

  constructor() {
    this.parser = new Parser();
    this.parser.setLanguage(TreeSitterTypeScript.typescript);
  }

  extract(content: string, source: ExtractionSource): TypeDescriptor[] {
    const tree = this.parser.parse(content);
    const types: TypeDescriptor[] = [];

    const traverse = (node: Parser.SyntaxNode): void => {
      if (CLASS_NODE_TYPES.has(node.type)) {
        const descriptor = this.extractClass(node, source);
        if (descriptor) types.push(descriptor);
      } else if (node.type === 'interface_declaration') {
        const descriptor = this.extractInterface(node, source);
        if (descriptor) types.push(descriptor);
      }

      for (const child of node.namedChildren) {
        traverse(child);
      }
    };

    traverse(tree.rootNode);
    return types;
  }

  /**
   * Reads and extracts every file. The namespace of a type is its file path relative
   * to `rootDir` without extension; its module is the containing directory.
   */
  async extractFromFiles(filePaths: string[], rootDir: string = process.cwd()): Promise<TypeDescriptor[]> {
    const types: TypeDescriptor[] = [];

    for (const filePath of filePaths) {
      const content = await fs.readFile(filePath, 'utf-8');
      const relativePath = path.relative(rootDir, filePath).split(path.sep).join('/');
      const namespace = relativePath.replace(/\.(d\.)?[cm]?tsx?$/, '');
      const directory = path.posix.dirname(namespace);
      const module = directory === '.' ? path.basename(rootDir) : directory;

      const extracted = this.extract(content, { namespace, module });
      logger.debug('Extracted types', { filePath, count: extracted.length });
      types.push(...extracted);
    }

    return types;
  }

  private extractClass(node: Parser.SyntaxNode, source: ExtractionSource): TypeDescriptor | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    let baseType: TypeReference | undefined;
    const interfaces: TypeReference[] = [];

    const heritage = node.namedChildren.find(child => child.type === 'class_heritage');
    for (const clause of heritage?.namedChildren ?? []) {
      if (clause.type === 'extends_clause') {
        baseType = this.extendsReference(clause);
      } else if (clause.type === 'implements_clause') {
        for (const typeNode of clause.namedChildren) {
          const reference = typeReference(typeNode);
          if (reference) interfaces.push(reference);
        }
      }
    }

    const members: MemberDescriptor[] = [];
    const constructorParameters: MemberDescriptor[] = [];
    const body = node.childForFieldName('body');

    for (const member of body?.namedChildren ?? []) {
      if (member.type === 'public_field_definition') {
        const descriptor = memberDescriptor(member);
        if (descriptor) members.push(descriptor);
      } else if (
        member.type === 'method_definition' &&
        member.childForFieldName('name')?.text === 'constructor'
      ) {
        const parameters = member.childForFieldName('parameters');
        for (const parameter of parameters?.namedChildren ?? []) {
          const descriptor = parameterDescriptor(parameter);
          if (descriptor) constructorParameters.push(descriptor);
        }
      }
    }

    return {
      name: nameNode.text,
      namespace: source.namespace,
      module: source.module,
      kind: 'class',
      isAbstract: node.type === 'abstract_class_declaration',
      baseType,
      interfaces,
      members,
      constructorParameters,
    };
  }

  private extractInterface(node: Parser.SyntaxNode, source: ExtractionSource): TypeDescriptor | null {
    const nameNode = node.childForFieldName('name');
    if (!nameNode) return null;

    const interfaces: TypeReference[] = [];
    const extendsClause = node.namedChildren.find(child => child.type === 'extends_type_clause');
    for (const typeNode of extendsClause?.namedChildren ?? []) {
      const reference = typeReference(typeNode);
      if (reference) interfaces.push(reference);
    }

    const members: MemberDescriptor[] = [];
    const body = node.childForFieldName('body');
    for (const member of body?.namedChildren ?? []) {
      if (member.type === 'property_signature') {
        const descriptor = memberDescriptor(member);
        if (descriptor) members.push(descriptor);
      }
    }

    return {
      name: nameNode.text,
      namespace: source.namespace,
      module: source.module,
      kind: 'interface',
      isAbstract: false,
      interfaces,
      members,
      constructorParameters: [],
    };
  }

  private extendsReference(clause: Parser.SyntaxNode): TypeReference | undefined {
    const value = clause.childForFieldName('value') ?? clause.namedChildren[0];
    if (!value) return undefined;
    const typeArguments = clause.childForFieldName('type_arguments')
      ?? clause.namedChildren.find(child => child.type === 'type_arguments');
    return {
      name: lastSegment(value.text),
      typeArguments: typeArgumentNames(typeArguments),
    };
  }
}

function typeReference(typeNode: Parser.SyntaxNode): TypeReference | undefined {
  switch (typeNode.type) {
    case 'type_identifier':
    case 'identifier':
    case 'nested_type_identifier':
      return { name: lastSegment(typeNode.text), typeArguments: [] };
    case 'generic_type': {
      const name = typeNode.childForFieldName('name');
      if (!name) return undefined;
      return {
        name: lastSegment(name.text),
        typeArguments: typeArgumentNames(typeNode.childForFieldName('type_arguments')),
      };
    }
    default:
      return undefined;
  }
}

function typeArgumentNames(typeArguments: Parser.SyntaxNode | null | undefined): string[] {
  if (!typeArguments) return [];
  const names: string[] = [];
  for (const argument of typeArguments.namedChildren) {
    const name = elementTypeName(argument);
    if (name) names.push(name);
  }
  return names;
}

/**
 * Name of the type a member effectively refers to: arrays and generic wrappers
 * resolve to their (first) element type, unions to their first named member.
 */
export function elementTypeName(typeNode: Parser.SyntaxNode): string | undefined {
  switch (typeNode.type) {
    case 'type_annotation':
    case 'parenthesized_type':
    case 'readonly_type': {
      const inner = typeNode.namedChildren[0];
      return inner ? elementTypeName(inner) : undefined;
    }
    case 'type_identifier':
    case 'nested_type_identifier':
      return lastSegment(typeNode.text);
    case 'array_type': {
      const element = typeNode.namedChildren[0];
      return element ? elementTypeName(element) : undefined;
    }
    case 'generic_type': {
      const typeArguments = typeNode.childForFieldName('type_arguments');
      const first = typeArguments?.namedChildren[0];
      if (first) return elementTypeName(first);
      const name = typeNode.childForFieldName('name');
      return name ? lastSegment(name.text) : undefined;
    }
    case 'union_type':
    case 'intersection_type': {
      for (const member of typeNode.namedChildren) {
        const name = elementTypeName(member);
        if (name) return name;
      }
      return undefined;
    }
    default:
      return undefined;
  }
}

function memberDescriptor(member: Parser.SyntaxNode): MemberDescriptor | null {
  const name = member.childForFieldName('name');
  if (!name) return null;
  const type = member.childForFieldName('type');
  return { name: name.text, type: type ? elementTypeName(type) : undefined };
}

function parameterDescriptor(parameter: Parser.SyntaxNode): MemberDescriptor | null {
  if (parameter.type !== 'required_parameter' && parameter.type !== 'optional_parameter') {
    return null;
  }
  const pattern = parameter.childForFieldName('pattern');
  if (!pattern) return null;
  const type = parameter.childForFieldName('type');
  return { name: pattern.text, type: type ? elementTypeName(type) : undefined };
}

function lastSegment(name: string): string {
  const segments = name.split('.');
  return segments[segments.length - 1];
}
