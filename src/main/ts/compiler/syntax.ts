import { ArithmeticOperator, ComparisonOperator } from "../ast/ast.js";

/**
 * A fragment of an emitted value. Values are built as piece lists so each
 * dialect can pick its own quoting and its own variable reference syntax.
 */
export type Piece = TextPiece | VarPiece | ArithPiece;

export interface TextPiece {
  kind: "text";
  text: string;
}

export interface VarPiece {
  kind: "var";
  name: string;
}

/** Arithmetic in the shared `a + b * c` notation both dialects evaluate. */
export interface ArithPiece {
  kind: "arith";
  text: string;
}

export const text = (value: string): TextPiece => ({ kind: "text", text: value });
export const variable = (name: string): VarPiece => ({ kind: "var", name });
export const arith = (value: string): ArithPiece => ({ kind: "arith", text: value });

export const ARITHMETIC_PRECEDENCE: Record<ArithmeticOperator, number> = {
  "+": 1,
  "-": 1,
  "*": 2,
  "/": 2,
};

// --- Shell ---

export const SHELL_INT_TESTS: Record<ComparisonOperator, string> = {
  "==": "-eq",
  "!=": "-ne",
  "<": "-lt",
  ">": "-gt",
  "<=": "-le",
  ">=": "-ge",
};

export const SHELL_STR_TESTS: Partial<Record<ComparisonOperator, string>> = {
  "==": "=",
  "!=": "!=",
};

/** Characters that keep a meaning inside double quotes. */
function escapeShellText(value: string): string {
  return value.replace(/[\\"$`]/g, (c) => `\\${c}`);
}

/** Renders pieces as one double-quoted shell word. */
export function shellWord(pieces: readonly Piece[]): string {
  const body = pieces
    .map((piece) => {
      switch (piece.kind) {
        case "text":
          return escapeShellText(piece.text);
        case "var":
          return `\${${piece.name}}`;
        case "arith":
          return `$((${piece.text}))`;
      }
    })
    .join("");
  return `"${body}"`;
}

// --- Batch ---

export const BATCH_INT_TESTS: Record<ComparisonOperator, string> = {
  "==": "EQU",
  "!=": "NEQ",
  "<": "LSS",
  ">": "GTR",
  "<=": "LEQ",
  ">=": "GEQ",
};

/** Range of `set /a`. */
export const BATCH_INT_MAX = 2147483647;

/**
 * Renders text and variable pieces as the value part of `set "name=..."`.
 * `%` is always doubled. Once the line holds a `!` (a reference or a literal
 * one), cmd runs its delayed-expansion pass, which eats carets and
 * exclamation marks, so those are escaped as well.
 */
export function batchValue(pieces: readonly (TextPiece | VarPiece)[]): string {
  const delayed = pieces.some(
    (piece) => piece.kind === "var" || piece.text.includes("!")
  );
  return pieces
    .map((piece) =>
      piece.kind === "var"
        ? `!${piece.name}!`
        : escapeBatchText(piece.text, delayed)
    )
    .join("");
}

function escapeBatchText(value: string, delayed: boolean): string {
  const percent = value.replace(/%/g, "%%");
  return delayed ? percent.replace(/[\^!]/g, (c) => `^${c}`) : percent;
}
