import { describe, expect, test } from "vitest";

import { tokenize } from "../../main/ts/lexer/lexer.js";
import { TokenType } from "../../main/ts/lexer/token.js";
import { compileErrorOf, SOURCE_FILE } from "./helpers.js";

const lex = (source: string) => tokenize(source, SOURCE_FILE);

describe("Lexer", () => {
  test("scans a declaration", () => {
    const tokens = lex("let int x = 10;");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Let,
      TokenType.Int,
      TokenType.Identifier,
      TokenType.Equal,
      TokenType.Integer,
      TokenType.Semicolon,
      TokenType.EOF,
    ]);
    expect(tokens[4].literal).toBe(10);
  });

  test("scans operators and punctuation", () => {
    const tokens = lex("+ - * / = == != < <= > >= |> , ; ( ) { }");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Plus,
      TokenType.Minus,
      TokenType.Star,
      TokenType.Slash,
      TokenType.Equal,
      TokenType.EqualEqual,
      TokenType.BangEqual,
      TokenType.Less,
      TokenType.LessEqual,
      TokenType.Greater,
      TokenType.GreaterEqual,
      TokenType.PipeGreater,
      TokenType.Comma,
      TokenType.Semicolon,
      TokenType.OpenParen,
      TokenType.CloseParen,
      TokenType.OpenBrace,
      TokenType.CloseBrace,
      TokenType.EOF,
    ]);
  });

  test("tells keywords from identifiers", () => {
    const tokens = lex("with shell printx str fn");

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.With,
      TokenType.Identifier,
      TokenType.Identifier,
      TokenType.Str,
      TokenType.Fn,
      TokenType.EOF,
    ]);
  });

  test("skips comments and tracks positions", () => {
    const tokens = lex("// line\n/* block\n b */ 12");

    expect(tokens[0].type).toBe(TokenType.Integer);
    expect(tokens[0].line).toBe(3);
    expect(tokens[0].column).toBe(7);
  });

  test("decodes string escapes and keeps the quotes in the lexeme", () => {
    const source = String.raw`"a\"b\\c\/d\e"`;
    const [token] = lex(source);

    expect(token.type).toBe(TokenType.String);
    expect(token.lexeme).toBe(source);
    expect(token.literal).toBe(String.raw`a"b\c/d\e`);
  });

  test("reports an unterminated string at its opening quote", () => {
    const error = compileErrorOf(() => lex('print("oops)'));

    expect(error.kind).toBe("LexError");
    expect(error.message).toBe("Unterminated string literal.");
    expect(error.span.start.line).toBe(1);
    expect(error.span.start.column).toBe(7);
  });

  test("does not let a string run past the end of the line", () => {
    const error = compileErrorOf(() => lex('let s = "a\nb";'));

    expect(error.kind).toBe("LexError");
    expect(error.span.start.column).toBe(9);
  });

  test("rejects a lone '!'", () => {
    const error = compileErrorOf(() => lex("x ! y"));

    expect(error.message).toBe("Unexpected character '!'.");
    expect(error.span.start.column).toBe(3);
  });

  test("rejects an unterminated block comment", () => {
    const error = compileErrorOf(() => lex("1 /* never closed"));

    expect(error.kind).toBe("LexError");
    expect(error.message).toBe("Unterminated block comment.");
  });

  test("rejects integers beyond the safe range", () => {
    const error = compileErrorOf(() => lex("99999999999999999999"));

    expect(error.message).toBe("Integer literal 99999999999999999999 is too large.");
  });
});
