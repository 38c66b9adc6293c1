import { lexError } from "../common/errors.js";
import { Location, pointSpan } from "../common/span.js";
import { KEYWORDS, Token, TokenType } from "./token.js";

export class Lexer {
  private source: string;
  private sourceFile: string;
  private tokens: Token[] = [];
  private start = 0;
  private startLine = 1;
  private startColumn = 1;
  private current = 0;
  private line = 1;
  private column = 1;

  constructor(source: string, sourceFile: string) {
    this.source = source;
    this.sourceFile = sourceFile;
  }

  scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.column;
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      lexeme: "",
      line: this.line,
      column: this.column,
      offset: this.current,
      length: 0,
    });
    return this.tokens;
  }

  private scanToken() {
    const c = this.advance();
    switch (c) {
      case "(":
        this.addToken(TokenType.OpenParen);
        break;
      case ")":
        this.addToken(TokenType.CloseParen);
        break;
      case "{":
        this.addToken(TokenType.OpenBrace);
        break;
      case "}":
        this.addToken(TokenType.CloseBrace);
        break;
      case ",":
        this.addToken(TokenType.Comma);
        break;
      case ";":
        this.addToken(TokenType.Semicolon);
        break;
      case "+":
        this.addToken(TokenType.Plus);
        break;
      case "-":
        this.addToken(TokenType.Minus);
        break;
      case "*":
        this.addToken(TokenType.Star);
        break;
      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
        } else if (this.match("*")) {
          this.blockComment();
        } else {
          this.addToken(TokenType.Slash);
        }
        break;
      case "=":
        this.addToken(this.match("=") ? TokenType.EqualEqual : TokenType.Equal);
        break;
      case "!":
        if (!this.match("=")) this.illegal(c);
        this.addToken(TokenType.BangEqual);
        break;
      case "<":
        this.addToken(this.match("=") ? TokenType.LessEqual : TokenType.Less);
        break;
      case ">":
        this.addToken(
          this.match("=") ? TokenType.GreaterEqual : TokenType.Greater
        );
        break;
      case "|":
        if (!this.match(">")) this.illegal(c);
        this.addToken(TokenType.PipeGreater);
        break;
      case " ":
      case "\r":
      case "\t":
      case "\n":
        break;
      case '"':
        this.string();
        break;
      default:
        if (this.isDigit(c)) {
          this.integer();
        } else if (this.isAlpha(c)) {
          this.identifier();
        } else {
          this.illegal(c);
        }
        break;
    }
  }

  private blockComment() {
    while (
      !(this.peek() === "*" && this.peekNext() === "/") &&
      !this.isAtEnd()
    ) {
      this.advance();
    }

    if (this.isAtEnd()) {
      throw lexError("Unterminated block comment.", this.startSpan());
    }

    // Consume "*/"
    this.advance();
    this.advance();
  }

  private identifier() {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.source.substring(this.start, this.current);
    this.addToken(KEYWORDS[text] ?? TokenType.Identifier);
  }

  private integer() {
    while (this.isDigit(this.peek())) this.advance();

    const text = this.source.substring(this.start, this.current);
    const value = Number(text);
    if (!Number.isSafeInteger(value)) {
      throw lexError(
        `Integer literal ${text} is too large.`,
        this.startSpan()
      );
    }
    this.addToken(TokenType.Integer, value);
  }

  private string() {
    let value = "";
    while (this.peek() !== '"') {
      if (this.isAtEnd() || this.peek() === "\n") {
        throw lexError("Unterminated string literal.", this.startSpan());
      }
      const c = this.advance();
      const next = this.peek();
      if (c === "\\" && (next === '"' || next === "\\" || next === "/")) {
        value += this.advance();
      } else {
        value += c;
      }
    }

    // The closing ".
    this.advance();
    this.addToken(TokenType.String, value);
  }

  private match(expected: string): boolean {
    if (this.isAtEnd()) return false;
    if (this.source.charAt(this.current) !== expected) return false;

    this.advance();
    return true;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return "\0";
    return this.source.charAt(this.current + 1);
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    const c = this.source.charAt(this.current++);
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private addToken(type: TokenType, literal?: number | string) {
    const text = this.source.substring(this.start, this.current);
    this.tokens.push({
      type,
      lexeme: text,
      literal,
      line: this.startLine,
      column: this.startColumn,
      offset: this.start,
      length: this.current - this.start,
    });
  }

  private startLocation(): Location {
    return {
      line: this.startLine,
      column: this.startColumn,
      offset: this.start,
    };
  }

  private startSpan() {
    return pointSpan(this.startLocation(), this.sourceFile);
  }

  private illegal(c: string): never {
    throw lexError(`Unexpected character '${c}'.`, this.startSpan());
  }
}

export function tokenize(source: string, sourceFile = "<input>"): Token[] {
  return new Lexer(source, sourceFile).scanTokens();
}
