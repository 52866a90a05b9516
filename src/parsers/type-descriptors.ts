export type TypeKind = 'class' | 'interface';

export interface TypeReference {
  name: string;
  typeArguments: string[];
}

/**
 * A member or constructor parameter. `type` is the referenced element type:
 * `Foo[]`, `Array<Foo>` and `Promise<Foo>` all resolve to `Foo`.
 */
export interface MemberDescriptor {
  name: string;
  type?: string;
}

export interface TypeDescriptor {
  name: string;
  /** Declaring module path, e.g. `src/shapes/circle`. */
  namespace: string;
  /** Group the declaring module belongs to, e.g. its directory. */
  module: string;
  kind: TypeKind;
  isAbstract: boolean;
  baseType?: TypeReference;
  interfaces: TypeReference[];
  members: MemberDescriptor[];
  constructorParameters: MemberDescriptor[];
}

export interface ExtractionSource {
  namespace: string;
  module: string;
}
