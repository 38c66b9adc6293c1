import { check } from "../checker/checker.js";
import { CompileError } from "../common/errors.js";
import { andThen, err, map, ok, Result } from "../common/result.js";
import { Program } from "../ast/ast.js";
import { tokenize } from "../lexer/lexer.js";
import { parse } from "../parser/parser.js";
import { emit } from "./emit.js";
import { Target, TARGETS } from "./target.js";

export interface CompileOptions {
  /** Name used in error spans. */
  sourceFile?: string;
}

export type CompileResult = Result<string, CompileError>;

/**
 * Runs a stage, turning the `CompileError` it throws into an `Err`. Anything
 * else is a compiler bug and propagates.
 */
function attempt<T>(stage: () => T): Result<T, CompileError> {
  try {
    return ok(stage());
  } catch (e) {
    if (e instanceof CompileError) return err(e);
    throw e;
  }
}

/** Lexes and parses `source`. */
export function parseSource(
  source: string,
  options: CompileOptions = {}
): Result<Program, CompileError> {
  const sourceFile = options.sourceFile ?? "<input>";
  return attempt(() => parse(tokenize(source, sourceFile), sourceFile));
}

export function compile(
  source: string,
  target: Target,
  options: CompileOptions = {}
): CompileResult {
  return andThen(parseSource(source, options), (program) =>
    attempt(() => emit(check(program), target))
  );
}

/** Compiles for every target; the first error wins. */
export function compileToAll(
  source: string,
  options: CompileOptions = {}
): Result<Map<Target, string>, CompileError> {
  const checked = andThen(parseSource(source, options), (program) =>
    attempt(() => check(program))
  );
  return andThen(checked, (program) =>
    map(
      attempt(() => TARGETS.map((target) => [target, emit(program, target)] as const)),
      (entries) => new Map(entries)
    )
  );
}
