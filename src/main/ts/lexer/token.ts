export enum TokenType {
  // Keywords
  Let,
  Fn,
  While,
  If,
  Else,
  Print,
  Int,
  Str,
  With,

  // Literals
  Identifier,
  String,
  Integer,

  // Operators
  Plus, // +
  Minus, // -
  Star, // *
  Slash, // /
  Equal, // =
  EqualEqual, // ==
  BangEqual, // !=
  Less, // <
  LessEqual, // <=
  Greater, // >
  GreaterEqual, // >=
  PipeGreater, // |>

  // Punctuation
  Comma, // ,
  Semicolon, // ;
  OpenParen, // (
  CloseParen, // )
  OpenBrace, // {
  CloseBrace, // }

  EOF,
}

export interface Token {
  type: TokenType;
  lexeme: string;
  /** Decoded value: the number of an Integer, the unescaped text of a String. */
  literal?: number | string;
  line: number;
  column: number;
  offset: number;
  length: number;
}

export const KEYWORDS: Readonly<Record<string, TokenType>> = {
  let: TokenType.Let,
  fn: TokenType.Fn,
  while: TokenType.While,
  if: TokenType.If,
  else: TokenType.Else,
  print: TokenType.Print,
  int: TokenType.Int,
  str: TokenType.Str,
  with: TokenType.With,
};

export function describeToken(token: Token): string {
  switch (token.type) {
    case TokenType.EOF:
      return "end of input";
    case TokenType.Identifier:
      return `identifier '${token.lexeme}'`;
    case TokenType.Integer:
      return `integer ${token.lexeme}`;
    case TokenType.String:
      return `string ${token.lexeme}`;
    default:
      return `'${token.lexeme}'`;
  }
}
