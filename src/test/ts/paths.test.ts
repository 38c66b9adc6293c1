import { describe, expect, test } from "vitest";

import { normalizePathLiteral } from "../../main/ts/compiler/paths.js";
import { Target } from "../../main/ts/compiler/target.js";

describe("normalizePathLiteral", () => {
  test("uses backslashes for batch", () => {
    expect(normalizePathLiteral("a/b/c", Target.Batch)).toBe(String.raw`a\b\c`);
    expect(normalizePathLiteral(String.raw`a\b`, Target.Batch)).toBe(
      String.raw`a\b`
    );
  });

  test("uses forward slashes for shell", () => {
    expect(normalizePathLiteral("a/b/c", Target.Shell)).toBe("a/b/c");
    expect(normalizePathLiteral(String.raw`dir\file.txt`, Target.Shell)).toBe(
      "dir/file.txt"
    );
  });

  test("never rewrites an escaped slash", () => {
    expect(normalizePathLiteral(String.raw`a\/b`, Target.Batch)).toBe("a/b");
    expect(normalizePathLiteral(String.raw`a\/b`, Target.Shell)).toBe("a/b");
  });

  test("decodes an escaped backslash without rewriting it", () => {
    expect(normalizePathLiteral("C:\\\\x", Target.Shell)).toBe("C:\\x");
    expect(normalizePathLiteral("C:\\\\x/y", Target.Batch)).toBe("C:\\x\\y");
  });

  test("decodes escaped quotes", () => {
    expect(normalizePathLiteral(String.raw`say \"hi\"`, Target.Shell)).toBe(
      'say "hi"'
    );
  });

  test("leaves text without separators alone", () => {
    expect(normalizePathLiteral("plain text", Target.Batch)).toBe("plain text");
  });
});
