import { CompileError, syntaxError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { describeToken, Token, TokenType } from "../lexer/token.js";

export class ParserState {
  readonly tokens: Token[];
  current = 0;
  readonly sourceFile: string;
  private lastId = 0;

  constructor(tokens: Token[], sourceFile: string) {
    this.tokens = tokens;
    this.sourceFile = sourceFile;
  }

  nextId(): number {
    this.lastId += 1;
    return this.lastId;
  }

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  consume(type: TokenType, expected: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), expected);
  }

  check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  checkNext(type: TokenType): boolean {
    const next = this.tokens[this.current + 1];
    return next !== undefined && next.type === type;
  }

  advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  peek(): Token {
    return this.tokens[Math.min(this.current, this.tokens.length - 1)];
  }

  previous(): Token {
    return this.tokens[Math.max(this.current - 1, 0)];
  }

  /**
   * `expected` reads as the tail of "Expected ...", e.g. `"';' after expression"`.
   */
  error(token: Token, expected: string): CompileError {
    const found = describeToken(token);
    return syntaxError(
      `Expected ${expected}, found ${found}.`,
      this.tokenSpan(token),
      expected,
      found
    );
  }

  tokenSpan(token: Token): Span {
    return {
      start: { line: token.line, column: token.column, offset: token.offset },
      end: {
        line: token.line,
        column: token.column + token.length,
        offset: token.offset + token.length,
      },
      sourceFile: this.sourceFile,
    };
  }

  span(start: Token, end: Token): Span {
    return {
      start: { line: start.line, column: start.column, offset: start.offset },
      end: {
        line: end.line,
        column: end.column + end.length,
        offset: end.offset + end.length,
      },
      sourceFile: this.sourceFile,
    };
  }

  join(start: Span, end: Span): Span {
    return { start: start.start, end: end.end, sourceFile: this.sourceFile };
  }
}
