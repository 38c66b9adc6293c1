import { describe, expect, test } from "vitest";

import { formatCompileError } from "../../main/ts/common/errors.js";
import { isErr, isOk } from "../../main/ts/common/result.js";
import { compile, compileToAll } from "../../main/ts/compiler/compile.js";
import { Target, TARGETS } from "../../main/ts/compiler/target.js";
import {
  compileOrThrow,
  scriptLines,
  SHADOWING,
  SOURCE_FILE,
  WORKED_EXAMPLE,
} from "./helpers.js";

describe("compile", () => {
  test("compiles the add/while example for shell", () => {
    expect(scriptLines(WORKED_EXAMPLE, Target.Shell)).toEqual([
      "#!/bin/sh",
      "",
      "add() {",
      '  local x="$1"',
      '  local y="$2"',
      "  printf '%s\\n' \"Result: $((x + y))\"",
      "}",
      "",
      "add 1 2",
      "add 3 4",
      "add 5 6",
      "x_1=0",
      'while [ "${x_1}" -lt 100 ]; do',
      "  printf '%s\\n' \"Current value of x: ${x_1}\"",
      "  x_1=$((x_1 + 1))",
      "done",
    ]);
  });

  test("compiles the add/while example for batch", () => {
    expect(scriptLines(WORKED_EXAMPLE, Target.Batch)).toEqual([
      "@echo off",
      "setlocal EnableDelayedExpansion",
      "",
      'set "__a1=1"',
      'set "__a2=2"',
      "call :add",
      'set "__a1=3"',
      'set "__a2=4"',
      "call :add",
      'set "__a1=5"',
      'set "__a2=6"',
      "call :add",
      'set /a "x_1=0"',
      ":__while_1",
      "if not !x_1! LSS 100 goto __end_while_1",
      'set "__print=Current value of x: !x_1!"',
      "echo(!__print!",
      'set /a "x_1=x_1 + 1"',
      "goto __while_1",
      ":__end_while_1",
      "exit /b 0",
      "",
      ":add",
      "setlocal",
      'set "x=!__a1!"',
      'set "y=!__a2!"',
      'set /a "__t1=x + y"',
      'set "__print=Result: !__t1!"',
      "echo(!__print!",
      "endlocal",
      "exit /b 0",
    ]);
  });

  test("keeps a shadowed variable distinct from the one it hides", () => {
    expect(scriptLines(SHADOWING, Target.Shell).slice(2)).toEqual([
      "x=0",
      "x_1=$((x + 1))",
      "printf '%s\\n' \"${x_1}\"",
      "printf '%s\\n' \"${x}\"",
    ]);
    expect(scriptLines(SHADOWING, Target.Batch).slice(3)).toEqual([
      'set /a "x=0"',
      'set /a "x_1=x + 1"',
      'set "__print=!x_1!"',
      "echo(!__print!",
      'set "__print=!x!"',
      "echo(!__print!",
      "exit /b 0",
    ]);
  });

  test("produces byte-identical output on recompilation", () => {
    for (const target of TARGETS) {
      expect(compileOrThrow(WORKED_EXAMPLE, target)).toBe(
        compileOrThrow(WORKED_EXAMPLE, target)
      );
    }
  });

  test("accepts functions declared before and after their calls", () => {
    const before = 'fn hello() { print("hi"); } hello();';
    const after = 'hello(); fn hello() { print("hi"); }';

    for (const target of TARGETS) {
      expect(compileOrThrow(after, target)).toBe(compileOrThrow(before, target));
    }
  });

  test("returns an undeclared variable as a NameError", () => {
    const result = compile("print(y);", Target.Shell, { sourceFile: SOURCE_FILE });

    expect(isErr(result)).toBe(true);
    if (result.ok) return;
    expect(result.error.kind).toBe("NameError");
    expect(result.error.identifier).toBe("y");
    expect(formatCompileError(result.error)).toBe(
      "test.twin:1:7 - [NameError] Undeclared variable 'y'."
    );
  });

  test("returns an unterminated string as a LexError at the opening quote", () => {
    const result = compile('print("oops)', Target.Batch, {
      sourceFile: SOURCE_FILE,
    });

    if (result.ok) throw new Error("expected a LexError");
    expect(formatCompileError(result.error)).toBe(
      "test.twin:1:7 - [LexError] Unterminated string literal."
    );
  });

  test("names anonymous input in error spans", () => {
    const result = compile("let = 1;", Target.Shell);

    if (result.ok) throw new Error("expected a SyntaxError");
    expect(formatCompileError(result.error)).toBe(
      "<input>:1:5 - [SyntaxError] Expected variable name, found '='."
    );
  });

  test("normalises path literals per target", () => {
    const source = 'let p = "a/b/c"; let q = "x\\/y";';

    expect(scriptLines(source, Target.Batch).slice(3, 5)).toEqual([
      'set "p=a\\b\\c"',
      'set "q=x/y"',
    ]);
    expect(scriptLines(source, Target.Shell).slice(2)).toEqual([
      'p="a/b/c"',
      'q="x/y"',
    ]);
  });
});

describe("compileToAll", () => {
  test("compiles every target", () => {
    const result = compileToAll(WORKED_EXAMPLE, { sourceFile: SOURCE_FILE });

    if (!isOk(result)) throw result.error;
    expect([...result.value.keys()]).toEqual([Target.Shell, Target.Batch]);
    for (const target of TARGETS) {
      expect(result.value.get(target)).toBe(compileOrThrow(WORKED_EXAMPLE, target));
    }
  });

  test("fails as a whole when one target cannot be emitted", () => {
    const result = compileToAll("let int big = 3000000000;");

    if (result.ok) throw new Error("expected a CodegenError");
    expect(result.error.kind).toBe("CodegenError");
  });
});
