import { expect } from "vitest";

import { check, CheckedProgram } from "../../main/ts/checker/checker.js";
import { CompileError } from "../../main/ts/common/errors.js";
import { compile } from "../../main/ts/compiler/compile.js";
import { lineEnding, Target } from "../../main/ts/compiler/target.js";
import { tokenize } from "../../main/ts/lexer/lexer.js";
import { parse } from "../../main/ts/parser/parser.js";

export const SOURCE_FILE = "test.twin";

export const WORKED_EXAMPLE = `
fn add(int x, int y) {
  print("Result: ", x + y);
}

add(1, 2);
add(3, 4);
add(5, 6);

let int x = 0;
while int(x < 100) {
  print("Current value of x: ", x);
  x = x + 1;
}
`;

export const SHADOWING = "{ let int x = 0; { let int x = x + 1; print(x); } print(x); }";

export function parseProgram(source: string) {
  return parse(tokenize(source, SOURCE_FILE), SOURCE_FILE);
}

export function checkProgram(source: string): CheckedProgram {
  return check(parseProgram(source));
}

/** Runs `fn` and returns the CompileError it throws. */
export function compileErrorOf(fn: () => unknown): CompileError {
  try {
    fn();
  } catch (e) {
    if (e instanceof CompileError) return e;
    throw e;
  }
  throw new Error("expected a CompileError");
}

export function compileOrThrow(source: string, target: Target): string {
  const result = compile(source, target, { sourceFile: SOURCE_FILE });
  if (!result.ok) throw result.error;
  return result.value;
}

/** The script split on the target's line ending, without the final empty entry. */
export function scriptLines(source: string, target: Target): string[] {
  const lines = compileOrThrow(source, target).split(lineEnding(target));
  expect(lines.pop()).toBe("");
  return lines;
}

/** Emitted names of every binding the checker created, in creation order. */
export function emitNames(checked: CheckedProgram): string[] {
  return [...new Set(checked.bindings.values())].map((b) => b.emitName);
}
