import { Span } from "./span.js";

export type CompileErrorKind =
  | "LexError"
  | "SyntaxError"
  | "NameError"
  | "TypeError"
  | "CodegenError";

export interface CompileErrorDetails {
  /** The identifier a NameError is about. */
  identifier?: string;
  /** What the parser was looking for. */
  expected?: string;
  /** What the parser found instead. */
  found?: string;
}

/**
 * The single failure every stage throws. `compile` turns it into a `Result`;
 * any other exception escaping a stage is a compiler bug.
 */
export class CompileError extends Error {
  readonly kind: CompileErrorKind;
  readonly span: Span;
  readonly identifier?: string;
  readonly expected?: string;
  readonly found?: string;

  constructor(
    kind: CompileErrorKind,
    message: string,
    span: Span,
    details: CompileErrorDetails = {}
  ) {
    super(message);
    this.name = "CompileError";
    this.kind = kind;
    this.span = span;
    this.identifier = details.identifier;
    this.expected = details.expected;
    this.found = details.found;
  }
}

export function lexError(message: string, span: Span): CompileError {
  return new CompileError("LexError", message, span);
}

export function syntaxError(
  message: string,
  span: Span,
  expected: string,
  found: string
): CompileError {
  return new CompileError("SyntaxError", message, span, { expected, found });
}

export function nameError(
  message: string,
  span: Span,
  identifier: string
): CompileError {
  return new CompileError("NameError", message, span, { identifier });
}

export function typeError(message: string, span: Span): CompileError {
  return new CompileError("TypeError", message, span);
}

export function codegenError(message: string, span: Span): CompileError {
  return new CompileError("CodegenError", message, span);
}

/**
 * One-line rendering used by the CLI, e.g.
 * `demo.twin:3:7 - [NameError] Undeclared variable 'y'.`
 */
export function formatCompileError(error: CompileError): string {
  const { start, sourceFile } = error.span;
  return `${sourceFile}:${start.line}:${start.column} - [${error.kind}] ${error.message}`;
}
