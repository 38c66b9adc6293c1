import {
  AssignStmt,
  BlockStmt,
  Condition,
  DeclaredType,
  Expression,
  FnDecl,
  IfStmt,
  Param,
  PrintStmt,
  Program,
  RawStmt,
  Statement,
  TargetName,
  VarDecl,
  WhileStmt,
  WithStmt,
} from "../ast/ast.js";
import { Token, TokenType } from "../lexer/token.js";
import { ExpressionParser } from "./expressions.js";
import { ParserState } from "./state.js";

const TARGET_NAMES: readonly TargetName[] = ["shell", "batch"];

export class Parser {
  private readonly state: ParserState;
  private readonly expressionParser: ExpressionParser;
  private depth = 0;

  constructor(tokens: Token[], sourceFile: string) {
    this.state = new ParserState(tokens, sourceFile);
    this.expressionParser = new ExpressionParser(this.state);
  }

  parse(): Program {
    const statements: Statement[] = [];
    const startToken = this.state.peek();

    while (!this.state.isAtEnd()) {
      statements.push(this.statement());
    }

    return {
      kind: "Program",
      id: this.state.nextId(),
      statements,
      span: this.state.span(startToken, this.state.peek()),
    };
  }

  private statement(): Statement {
    if (this.state.match(TokenType.Fn)) return this.fnDeclaration();
    if (this.state.match(TokenType.Let)) return this.varDeclaration();
    if (this.state.match(TokenType.While)) return this.whileStatement();
    if (this.state.match(TokenType.If)) return this.ifStatement();
    if (this.state.match(TokenType.With)) return this.withStatement();
    if (this.state.match(TokenType.Print)) return this.printStatement();
    if (this.state.match(TokenType.PipeGreater)) return this.rawStatement();
    if (this.state.match(TokenType.OpenBrace)) {
      return this.block(this.state.previous());
    }
    if (
      this.state.check(TokenType.Identifier) &&
      this.state.checkNext(TokenType.Equal)
    ) {
      return this.assignment();
    }
    return this.expressionStatement();
  }

  private fnDeclaration(): FnDecl {
    const start = this.state.previous();
    if (this.depth > 0) {
      throw this.state.error(start, "statement (functions are top-level only)");
    }
    const name = this.state.consume(
      TokenType.Identifier,
      "function name"
    ).lexeme;

    this.state.consume(TokenType.OpenParen, "'(' after function name");
    const params: Param[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        params.push(this.param());
      } while (this.state.match(TokenType.Comma));
    }
    this.state.consume(TokenType.CloseParen, "')' after parameters");

    const body = this.block(
      this.state.consume(TokenType.OpenBrace, "'{' before function body")
    );

    return {
      kind: "FnDecl",
      id: this.state.nextId(),
      name,
      params,
      body,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private param(): Param {
    const start = this.state.peek();
    const declaredType: DeclaredType = this.state.match(TokenType.Int)
      ? "int"
      : "untyped";
    const name = this.state.consume(TokenType.Identifier, "parameter name");
    return {
      kind: "Param",
      id: this.state.nextId(),
      name: name.lexeme,
      declaredType,
      span: this.state.span(start, name),
    };
  }

  private varDeclaration(): VarDecl {
    const start = this.state.previous();
    let declaredType: DeclaredType = "untyped";
    if (this.state.match(TokenType.Int)) {
      declaredType = "int";
    } else {
      this.state.match(TokenType.Str);
    }

    const name = this.state.consume(
      TokenType.Identifier,
      "variable name"
    ).lexeme;
    this.state.consume(TokenType.Equal, "'=' before initializer");
    const initializer = this.expression();
    this.state.consume(
      TokenType.Semicolon,
      "';' after variable declaration"
    );

    return {
      kind: "VarDecl",
      id: this.state.nextId(),
      declaredType,
      name,
      initializer,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private assignment(): AssignStmt {
    const name = this.state.advance();
    this.state.advance(); // '='
    const value = this.expression();
    this.state.consume(TokenType.Semicolon, "';' after assignment");
    return {
      kind: "AssignStmt",
      id: this.state.nextId(),
      name: name.lexeme,
      value,
      span: this.state.span(name, this.state.previous()),
    };
  }

  private whileStatement(): WhileStmt {
    const start = this.state.previous();
    const condition = this.condition();
    const body = this.block(
      this.state.consume(TokenType.OpenBrace, "'{' after while condition")
    );
    return {
      kind: "WhileStmt",
      id: this.state.nextId(),
      condition,
      body,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private ifStatement(): IfStmt {
    const start = this.state.previous();
    const condition = this.condition();
    const thenBranch = this.block(
      this.state.consume(TokenType.OpenBrace, "'{' after if condition")
    );

    let elseBranch: IfStmt | BlockStmt | undefined;
    if (this.state.match(TokenType.Else)) {
      if (this.state.match(TokenType.If)) {
        elseBranch = this.ifStatement();
      } else {
        elseBranch = this.block(
          this.state.consume(TokenType.OpenBrace, "'{' or 'if' after 'else'")
        );
      }
    }

    return {
      kind: "IfStmt",
      id: this.state.nextId(),
      condition,
      thenBranch,
      elseBranch,
      span: this.state.span(start, this.state.previous()),
    };
  }

  /**
   * `int(<expr>)` or `str(<expr>)`: a marker naming how the test compares,
   * not a call.
   */
  private condition(): Condition {
    const marker = this.state.peek();
    let mode: Condition["mode"];
    if (this.state.match(TokenType.Int)) {
      mode = "int";
    } else if (this.state.match(TokenType.Str)) {
      mode = "str";
    } else {
      throw this.state.error(marker, "'int(' or 'str(' condition");
    }

    this.state.consume(TokenType.OpenParen, `'(' after '${marker.lexeme}'`);
    const expression = this.expression();
    const end = this.state.consume(TokenType.CloseParen, "')' after condition");
    return {
      kind: "Condition",
      id: this.state.nextId(),
      mode,
      expression,
      span: this.state.span(marker, end),
    };
  }

  private withStatement(): WithStmt {
    const start = this.state.previous();
    const token = this.state.peek();
    const target = TARGET_NAMES.find(
      (name) => token.type === TokenType.Identifier && token.lexeme === name
    );
    if (target === undefined) {
      throw this.state.error(token, "'shell' or 'batch' after 'with'");
    }
    this.state.advance();

    const body = this.block(
      this.state.consume(TokenType.OpenBrace, "'{' after with target")
    );
    return {
      kind: "WithStmt",
      id: this.state.nextId(),
      target,
      body,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private printStatement(): PrintStmt {
    const start = this.state.previous();
    this.state.consume(TokenType.OpenParen, "'(' after 'print'");
    const { args } = this.expressionParser.parseArguments();
    this.state.consume(TokenType.Semicolon, "';' after print");
    return {
      kind: "PrintStmt",
      id: this.state.nextId(),
      args,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private rawStatement(): RawStmt {
    const start = this.state.previous();
    const text = this.state.consume(TokenType.String, "string after '|>'");
    this.state.consume(TokenType.Semicolon, "';' after raw instruction");
    return {
      kind: "RawStmt",
      id: this.state.nextId(),
      text: typeof text.literal === "string" ? text.literal : "",
      span: this.state.span(start, this.state.previous()),
    };
  }

  private block(openBrace: Token): BlockStmt {
    const statements: Statement[] = [];
    this.depth++;
    while (!this.state.check(TokenType.CloseBrace) && !this.state.isAtEnd()) {
      statements.push(this.statement());
    }
    this.depth--;

    const endToken = this.state.consume(TokenType.CloseBrace, "'}' after block");

    return {
      kind: "BlockStmt",
      id: this.state.nextId(),
      statements,
      span: this.state.span(openBrace, endToken),
    };
  }

  private expressionStatement(): Statement {
    const start = this.state.peek();
    const expression = this.expression();
    if (expression.kind !== "CallExpr") {
      throw this.state.error(start, "statement");
    }
    this.state.consume(TokenType.Semicolon, "';' after expression");
    return {
      kind: "ExpressionStmt",
      id: this.state.nextId(),
      expression,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private expression(): Expression {
    return this.expressionParser.parseExpression();
  }
}

export function parse(tokens: Token[], sourceFile = "<input>"): Program {
  return new Parser(tokens, sourceFile).parse();
}
