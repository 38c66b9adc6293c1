import { BinaryOperator, Expression } from "../ast/ast.js";
import { Token, TokenType } from "../lexer/token.js";
import { ParserState } from "./state.js";

enum Precedence {
  None,
  Equality, // == !=
  Comparison, // < > <= >=
  Term, // + -
  Factor, // * /
  Unary, // -
  Call, // ()
}

const BINARY_OPERATORS: Partial<Record<TokenType, BinaryOperator>> = {
  [TokenType.Plus]: "+",
  [TokenType.Minus]: "-",
  [TokenType.Star]: "*",
  [TokenType.Slash]: "/",
  [TokenType.EqualEqual]: "==",
  [TokenType.BangEqual]: "!=",
  [TokenType.Less]: "<",
  [TokenType.LessEqual]: "<=",
  [TokenType.Greater]: ">",
  [TokenType.GreaterEqual]: ">=",
};

const PRECEDENCE: Partial<Record<TokenType, Precedence>> = {
  [TokenType.EqualEqual]: Precedence.Equality,
  [TokenType.BangEqual]: Precedence.Equality,
  [TokenType.Less]: Precedence.Comparison,
  [TokenType.LessEqual]: Precedence.Comparison,
  [TokenType.Greater]: Precedence.Comparison,
  [TokenType.GreaterEqual]: Precedence.Comparison,
  [TokenType.Plus]: Precedence.Term,
  [TokenType.Minus]: Precedence.Term,
  [TokenType.Star]: Precedence.Factor,
  [TokenType.Slash]: Precedence.Factor,
  [TokenType.OpenParen]: Precedence.Call,
};

export class ExpressionParser {
  constructor(private readonly state: ParserState) {}

  parseExpression(precedence: Precedence = Precedence.None): Expression {
    let left = this.prefix();

    while (precedence < this.getPrecedence(this.state.peek().type)) {
      left = this.infix(left);
    }

    return left;
  }

  /**
   * Comma-separated arguments after an already consumed '('. Shared by user
   * calls and `print`.
   */
  parseArguments(): { args: Expression[]; closeParen: Token } {
    const args: Expression[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        args.push(this.parseExpression());
      } while (this.state.match(TokenType.Comma));
    }
    const closeParen = this.state.consume(
      TokenType.CloseParen,
      "')' after arguments"
    );
    return { args, closeParen };
  }

  private prefix(): Expression {
    if (this.state.isAtEnd()) {
      throw this.state.error(this.state.peek(), "expression");
    }
    const token = this.state.advance();

    switch (token.type) {
      case TokenType.Integer:
        return {
          kind: "IntLiteralExpr",
          id: this.state.nextId(),
          value: typeof token.literal === "number" ? token.literal : 0,
          span: this.state.tokenSpan(token),
        };
      case TokenType.String:
        return {
          kind: "StringLiteralExpr",
          id: this.state.nextId(),
          value: typeof token.literal === "string" ? token.literal : "",
          raw: token.lexeme.slice(1, -1),
          span: this.state.tokenSpan(token),
        };
      case TokenType.Identifier:
        return {
          kind: "IdentifierExpr",
          id: this.state.nextId(),
          name: token.lexeme,
          span: this.state.tokenSpan(token),
        };
      case TokenType.Minus:
        return this.unary(token);
      case TokenType.OpenParen:
        return this.grouping();
      default:
        throw this.state.error(token, "expression");
    }
  }

  private infix(left: Expression): Expression {
    const token = this.state.advance();

    if (token.type === TokenType.OpenParen) return this.call(left, token);

    const operator = BINARY_OPERATORS[token.type];
    if (operator === undefined) {
      throw this.state.error(token, "operator");
    }
    return this.binary(left, operator);
  }

  private unary(operator: Token): Expression {
    const operand = this.parseExpression(Precedence.Unary);
    return {
      kind: "UnaryExpr",
      id: this.state.nextId(),
      operator: "-",
      operand,
      span: this.state.join(this.state.tokenSpan(operator), operand.span),
    };
  }

  private binary(left: Expression, operator: BinaryOperator): Expression {
    const precedence = this.getPrecedence(this.state.previous().type);
    const right = this.parseExpression(precedence);
    return {
      kind: "BinaryExpr",
      id: this.state.nextId(),
      operator,
      left,
      right,
      span: this.state.join(left.span, right.span),
    };
  }

  private grouping(): Expression {
    const expr = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "')' after expression");
    return expr;
  }

  private call(callee: Expression, openParen: Token): Expression {
    if (callee.kind !== "IdentifierExpr") {
      throw this.state.error(openParen, "operator");
    }
    const { args, closeParen } = this.parseArguments();
    return {
      kind: "CallExpr",
      id: this.state.nextId(),
      callee: callee.name,
      args,
      span: this.state.join(callee.span, this.state.tokenSpan(closeParen)),
    };
  }

  private getPrecedence(type: TokenType): Precedence {
    return PRECEDENCE[type] ?? Precedence.None;
  }
}
