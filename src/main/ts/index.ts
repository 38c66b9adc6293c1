export * from "./ast/ast.js";
export { check, Checker } from "./checker/checker.js";
export type { CheckedProgram, FunctionInfo } from "./checker/checker.js";
export type { Binding, ValueType } from "./checker/scopes.js";
export {
  CompileError,
  formatCompileError,
} from "./common/errors.js";
export type { CompileErrorKind } from "./common/errors.js";
export type { Location, Span } from "./common/span.js";
export { err, isErr, isOk, ok } from "./common/result.js";
export type { Err, Ok, Result } from "./common/result.js";
export { compile, compileToAll, parseSource } from "./compiler/compile.js";
export type { CompileOptions, CompileResult } from "./compiler/compile.js";
export { emit } from "./compiler/emit.js";
export { normalizePathLiteral } from "./compiler/paths.js";
export { fileExtension, parseTarget, Target, TARGETS } from "./compiler/target.js";
export { Lexer, tokenize } from "./lexer/lexer.js";
export { TokenType } from "./lexer/token.js";
export type { Token } from "./lexer/token.js";
export { parse, Parser } from "./parser/parser.js";
