/**
 * Failures that abort a graph assembly or its encoding.
 */
export enum AssemblyErrorKind {
  RULE_INVOCATION = 'rule_invocation',
  ANALYSIS = 'analysis',
  ENCODING = 'encoding',
}

export interface AssemblyErrorContext {
  ruleKind?: string;
  sourceType?: string;
  elementIndex?: number;
  analysis?: string;
  property?: string;
}

export class AssemblyError extends Error {
  readonly kind: AssemblyErrorKind;
  readonly context: AssemblyErrorContext;

  constructor(
    kind: AssemblyErrorKind,
    message: string,
    context: AssemblyErrorContext = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'AssemblyError';
    this.kind = kind;
    this.context = context;
  }
}

export function describeCause(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
