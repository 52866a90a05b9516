/**
 * Runtime type tags used by builder rules to declare which input objects they accept.
 *
 * Every rule names its accepted type explicitly at registration time; dispatch is
 * a tag check followed by the rule's predicate.
 */

type AnyConstructor<T> = abstract new (...args: never[]) => T;

export interface SourceType<T> {
  readonly name: string;
  accepts(element: unknown): element is T;
}

/**
 * Accepts instances of `ctor` and of any subclass.
 */
export function instanceOf<T>(ctor: AnyConstructor<T>): SourceType<T> {
  return {
    name: ctor.name,
    accepts: (element: unknown): element is T => element instanceof ctor,
  };
}

/**
 * Accepts only objects constructed directly by `ctor`; subclass instances are rejected.
 */
export function exactly<T>(ctor: AnyConstructor<T>): SourceType<T> {
  return {
    name: `=${ctor.name}`,
    accepts: (element: unknown): element is T =>
      typeof element === 'object' &&
      element !== null &&
      Object.getPrototypeOf(element) === ctor.prototype,
  };
}

/**
 * Accepts values satisfying a structural guard. Used for interfaces and object literals,
 * which carry no constructor to test against.
 */
export function shape<T>(name: string, guard: (element: unknown) => element is T): SourceType<T> {
  return { name, accepts: guard };
}

export const anything: SourceType<object> = {
  name: '*',
  accepts: (element: unknown): element is object =>
    (typeof element === 'object' || typeof element === 'function') && element !== null,
};

export const primitive = {
  string: shape('string', (element: unknown): element is string => typeof element === 'string'),
  number: shape('number', (element: unknown): element is number => typeof element === 'number'),
};

/**
 * Guard for objects carrying the given own or inherited keys.
 */
export function hasKeys<K extends string>(
  ...keys: K[]
): (element: unknown) => element is Record<K, unknown> {
  return (element: unknown): element is Record<K, unknown> =>
    typeof element === 'object' && element !== null && keys.every(key => key in element);
}
