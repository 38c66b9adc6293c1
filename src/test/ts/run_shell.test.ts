import { describe, expect, test } from "vitest";

import { execFileSync } from "child_process";

import { Target } from "../../main/ts/compiler/target.js";
import { compileOrThrow, SHADOWING, WORKED_EXAMPLE } from "./helpers.js";

/** Runs the compiled shell script under `sh` and returns the lines it printed. */
function run(source: string): string[] {
  const output = execFileSync("sh", ["-s"], {
    input: compileOrThrow(source, Target.Shell),
    encoding: "utf8",
  });
  const lines = output.split("\n");
  expect(lines.pop()).toBe("");
  return lines;
}

describe.skipIf(process.platform === "win32")("compiled shell scripts", () => {
  test("print the add results and then the hundred loop values", () => {
    expect(run(WORKED_EXAMPLE)).toEqual([
      "Result: 3",
      "Result: 7",
      "Result: 11",
      ...Array.from({ length: 100 }, (_, i) => `Current value of x: ${i}`),
    ]);
  });

  test("print the shadowing value and then the outer value", () => {
    expect(run(SHADOWING)).toEqual(["1", "0"]);
  });

  test("pass percent signs, carets and bangs to a function unchanged", () => {
    expect(run('fn g(s) { print(s); } g("50% ^Hi!");')).toEqual(["50% ^Hi!"]);
  });
});
