import {
  BinaryOperator,
  BlockStmt,
  CallExpr,
  Condition,
  Expression,
  FnDecl,
  IfStmt,
  isComparison,
  Statement,
  WhileStmt,
} from "../ast/ast.js";
import { CheckedProgram } from "../checker/checker.js";
import { Binding, ValueType } from "../checker/scopes.js";
import { codegenError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { normalizePathLiteral } from "./paths.js";
import {
  arith,
  ARITHMETIC_PRECEDENCE,
  BATCH_INT_MAX,
  BATCH_INT_TESTS,
  batchValue,
  Piece,
  SHELL_INT_TESTS,
  SHELL_STR_TESTS,
  shellWord,
  text,
  TextPiece,
  variable,
  VarPiece,
} from "./syntax.js";
import { lineEnding, parseTarget, Target } from "./target.js";

/** A batch `if` test; the condition holds when the test is true, or false if negated. */
interface BatchTest {
  text: string;
  negated: boolean;
}

class ScriptWriter {
  private readonly lines: string[] = [];
  private depth = 0;

  constructor(private readonly indentUnit: string) {}

  get length(): number {
    return this.lines.length;
  }

  line(content: string) {
    this.lines.push(this.indentUnit.repeat(this.depth) + content);
  }

  blank() {
    this.lines.push("");
  }

  indented(body: () => void) {
    this.depth++;
    body();
    this.depth--;
  }

  render(eol: string): string {
    return this.lines.map((l) => l + eol).join("");
  }
}

/**
 * Renders a checked program as one target script. The walk is shared; the
 * dialects part ways only where their syntax does (assignment, arithmetic,
 * tests, calls and quoting).
 */
export class Emitter {
  private readonly out: ScriptWriter;
  private labels = 0;
  private temps = 0;

  constructor(
    private readonly checked: CheckedProgram,
    private readonly target: Target
  ) {
    this.out = new ScriptWriter(target === Target.Shell ? "  " : "");
  }

  emit(): string {
    const statements = this.checked.program.statements;
    const functions = statements.filter(
      (stmt): stmt is FnDecl => stmt.kind === "FnDecl"
    );
    const main = statements.filter((stmt) => stmt.kind !== "FnDecl");

    switch (this.target) {
      case Target.Shell:
        this.out.line("#!/bin/sh");
        this.out.blank();
        for (const fn of functions) {
          this.shellFunction(fn);
          this.out.blank();
        }
        this.statements(main);
        break;
      case Target.Batch:
        this.out.line("@echo off");
        this.out.line("setlocal EnableDelayedExpansion");
        this.out.blank();
        this.statements(main);
        this.out.line("exit /b 0");
        for (const fn of functions) {
          this.out.blank();
          this.batchFunction(fn);
        }
        break;
    }

    return this.out.render(lineEnding(this.target));
  }

  // --- Functions ---

  private shellFunction(fn: FnDecl) {
    this.out.line(`${fn.name}() {`);
    this.out.indented(() => {
      const start = this.out.length;
      this.params(fn).forEach((param, i) => {
        const position = i < 9 ? `$${i + 1}` : `\${${i + 1}}`;
        this.out.line(`local ${param.emitName}="${position}"`);
      });
      this.statements(fn.body.statements);
      if (this.out.length === start) this.out.line(":");
    });
    this.out.line("}");
  }

  /** Arguments arrive in `__a1`, `__a2`, ...; `%1` would mangle `%`, `^` and `!`. */
  private batchFunction(fn: FnDecl) {
    this.out.line(`:${fn.name}`);
    this.out.line("setlocal");
    this.params(fn).forEach((param, i) => {
      this.out.line(`set "${param.emitName}=!${argumentName(i)}!"`);
    });
    this.statements(fn.body.statements);
    this.out.line("endlocal");
    this.out.line("exit /b 0");
  }

  private params(fn: FnDecl): Binding[] {
    const info = this.checked.functions.get(fn.name);
    if (!info) {
      throw codegenError(`Function '${fn.name}' was not checked.`, fn.span);
    }
    return info.params;
  }

  // --- Statements ---

  private statements(statements: readonly Statement[]) {
    for (const stmt of statements) {
      this.statement(stmt);
    }
  }

  private statement(stmt: Statement) {
    // Temporaries only live until the lines of one statement are written.
    this.temps = 0;

    switch (stmt.kind) {
      case "FnDecl":
        throw codegenError(
          `Function '${stmt.name}' must be declared at the top level.`,
          stmt.span
        );
      case "VarDecl":
        return this.assign(
          this.binding(stmt.id, stmt.span),
          stmt.initializer,
          true
        );
      case "AssignStmt":
        return this.assign(this.binding(stmt.id, stmt.span), stmt.value, false);
      case "ExpressionStmt":
        if (stmt.expression.kind !== "CallExpr") {
          throw codegenError("Only calls can be used as statements.", stmt.span);
        }
        return this.call(stmt.expression);
      case "PrintStmt":
        return this.print(stmt.args);
      case "WhileStmt":
        return this.whileStmt(stmt);
      case "IfStmt":
        return this.ifStmt(stmt);
      case "BlockStmt":
        return this.statements(stmt.statements);
      case "WithStmt":
        if (parseTarget(stmt.target) === this.target) {
          this.statements(stmt.body.statements);
        }
        return;
      case "RawStmt":
        return this.out.line(stmt.text);
    }
  }

  private assign(binding: Binding, value: Expression, declaration: boolean) {
    const name = binding.emitName;
    switch (this.target) {
      case Target.Shell: {
        const prefix = declaration && binding.local ? "local " : "";
        const rendered =
          binding.type === "int"
            ? this.shellInteger(value)
            : shellWord(this.pieces(value));
        this.out.line(`${prefix}${name}=${rendered}`);
        return;
      }
      case Target.Batch:
        if (binding.type === "int") {
          this.out.line(`set /a "${name}=${this.arithmetic(value)}"`);
        } else {
          this.batchSet(name, this.pieces(value));
        }
        return;
    }
  }

  private print(args: readonly Expression[]) {
    const pieces = args.flatMap((arg) => this.pieces(arg));
    switch (this.target) {
      case Target.Shell:
        this.out.line(
          pieces.length === 0 ? "printf '\\n'" : `printf '%s\\n' ${shellWord(pieces)}`
        );
        return;
      case Target.Batch:
        if (pieces.length === 0) {
          this.out.line("echo(");
          return;
        }
        // `echo(` prints any value, including an empty one or one that reads as a switch.
        this.batchSet("__print", pieces);
        this.out.line("echo(!__print!");
        return;
    }
  }

  private call(call: CallExpr) {
    switch (this.target) {
      case Target.Shell: {
        const args = call.args.map((arg) =>
          arg.kind === "IntLiteralExpr"
            ? String(arg.value)
            : shellWord(this.pieces(arg))
        );
        this.out.line([call.callee, ...args].join(" "));
        return;
      }
      case Target.Batch: {
        call.args.forEach((arg, i) => {
          this.batchSet(argumentName(i), this.pieces(arg));
        });
        this.out.line(`call :${call.callee}`);
        return;
      }
    }
  }

  private whileStmt(stmt: WhileStmt) {
    switch (this.target) {
      case Target.Shell:
        this.out.line(`while ${this.shellTest(stmt.condition)}; do`);
        this.shellBody(stmt.body);
        this.out.line("done");
        return;
      case Target.Batch: {
        const n = ++this.labels;
        this.out.line(`:__while_${n}`);
        this.jumpUnless(stmt.condition, `__end_while_${n}`);
        this.statements(stmt.body.statements);
        this.out.line(`goto __while_${n}`);
        this.out.line(`:__end_while_${n}`);
        return;
      }
    }
  }

  private ifStmt(stmt: IfStmt) {
    switch (this.target) {
      case Target.Shell:
        return this.shellIf(stmt);
      case Target.Batch:
        return this.batchIf(stmt);
    }
  }

  private shellIf(stmt: IfStmt) {
    let current: IfStmt | undefined = stmt;
    let keyword = "if";
    while (current) {
      this.out.line(`${keyword} ${this.shellTest(current.condition)}; then`);
      this.shellBody(current.thenBranch);

      const next: IfStmt | BlockStmt | undefined = current.elseBranch;
      current = undefined;
      if (next?.kind === "IfStmt") {
        keyword = "elif";
        current = next;
      } else if (next) {
        this.out.line("else");
        this.shellBody(next);
      }
    }
    this.out.line("fi");
  }

  private batchIf(stmt: IfStmt) {
    const n = ++this.labels;
    const end = `__end_if_${n}`;
    const elseLabel = stmt.elseBranch ? `__else_${n}` : end;

    this.jumpUnless(stmt.condition, elseLabel);
    this.statements(stmt.thenBranch.statements);
    if (stmt.elseBranch) {
      this.out.line(`goto ${end}`);
      this.out.line(`:${elseLabel}`);
      if (stmt.elseBranch.kind === "IfStmt") {
        this.temps = 0;
        this.batchIf(stmt.elseBranch);
      } else {
        this.statements(stmt.elseBranch.statements);
      }
    }
    this.out.line(`:${end}`);
  }

  /** Shell bodies cannot be empty, so an empty one becomes `:`. */
  private shellBody(body: BlockStmt) {
    this.out.indented(() => {
      const start = this.out.length;
      this.statements(body.statements);
      if (this.out.length === start) this.out.line(":");
    });
  }

  // --- Conditions ---

  private shellTest(condition: Condition): string {
    const expr = condition.expression;
    if (expr.kind === "BinaryExpr" && isComparison(expr.operator)) {
      const operator =
        condition.mode === "int"
          ? SHELL_INT_TESTS[expr.operator]
          : SHELL_STR_TESTS[expr.operator];
      if (operator === undefined) {
        throw codegenError(
          `str(...) conditions cannot use '${expr.operator}'.`,
          expr.span
        );
      }
      const left = this.shellOperand(expr.left, condition.mode);
      const right = this.shellOperand(expr.right, condition.mode);
      return `[ ${left} ${operator} ${right} ]`;
    }

    return condition.mode === "int"
      ? `[ ${this.shellOperand(expr, "int")} -ne 0 ]`
      : `[ -n ${this.shellOperand(expr, "str")} ]`;
  }

  /**
   * `test` compares decimal text, so integer operands are either literals,
   * `int` variables or arithmetic expansions.
   */
  private shellOperand(expr: Expression, mode: Condition["mode"]): string {
    if (mode === "str") return shellWord(this.pieces(expr));
    if (expr.kind === "IntLiteralExpr") return String(expr.value);
    if (this.isIntVariable(expr)) return shellWord(this.pieces(expr));
    return shellWord([arith(this.arithmetic(expr))]);
  }

  private jumpUnless(condition: Condition, label: string) {
    const test = this.batchTest(condition);
    this.out.line(`if ${test.negated ? "" : "not "}${test.text} goto ${label}`);
  }

  private batchTest(condition: Condition): BatchTest {
    const expr = condition.expression;
    if (expr.kind === "BinaryExpr" && isComparison(expr.operator)) {
      if (condition.mode === "int") {
        const left = this.batchIntOperand(expr.left);
        const right = this.batchIntOperand(expr.right);
        return {
          text: `${left} ${BATCH_INT_TESTS[expr.operator]} ${right}`,
          negated: false,
        };
      }
      if (expr.operator !== "==" && expr.operator !== "!=") {
        throw codegenError(
          `str(...) conditions cannot use '${expr.operator}'.`,
          expr.span
        );
      }
      const left = this.batchStrOperand(expr.left);
      const right = this.batchStrOperand(expr.right);
      return { text: `${left}==${right}`, negated: expr.operator === "!=" };
    }

    return condition.mode === "int"
      ? { text: `${this.batchIntOperand(expr)} NEQ 0`, negated: false }
      : { text: `${this.batchStrOperand(expr)}==""`, negated: true };
  }

  private batchIntOperand(expr: Expression): string {
    if (expr.kind === "IntLiteralExpr") return this.arithmetic(expr);
    if (this.isIntVariable(expr)) return `!${this.nameOf(expr)}!`;
    const temp = this.temp();
    this.out.line(`set /a "${temp}=${this.arithmetic(expr)}"`);
    return `!${temp}!`;
  }

  private batchStrOperand(expr: Expression): string {
    if (expr.kind === "IdentifierExpr") return `"!${this.nameOf(expr)}!"`;
    const temp = this.temp();
    this.batchSet(temp, this.pieces(expr));
    return `"!${temp}!"`;
  }

  // --- Values ---

  /**
   * Flattens a value into pieces. Integer-typed subtrees other than literals
   * and variables stay whole as one arithmetic piece; `+` over untyped values
   * concatenates its sides.
   */
  private pieces(expr: Expression): Piece[] {
    switch (expr.kind) {
      case "IntLiteralExpr":
        return [text(String(expr.value))];
      case "StringLiteralExpr": {
        const value = normalizePathLiteral(expr.raw, this.target);
        if (this.target === Target.Batch && value.includes('"')) {
          throw codegenError(
            "Batch scripts cannot hold a '\"' inside a string value.",
            expr.span
          );
        }
        return [text(value)];
      }
      case "IdentifierExpr":
        return [variable(this.nameOf(expr))];
      case "UnaryExpr":
        return [arith(this.arithmetic(expr))];
      case "BinaryExpr":
        if (this.typeOf(expr) === "int") return [arith(this.arithmetic(expr))];
        return [...this.pieces(expr.left), ...this.pieces(expr.right)];
      case "CallExpr":
        throw codegenError(
          `Call to '${expr.callee}' cannot be used as a value.`,
          expr.span
        );
    }
  }

  /**
   * Shared infix notation. Both `$(( ))` and `set /a` read bare variable
   * names, use C precedence and truncate division.
   */
  private arithmetic(expr: Expression): string {
    switch (expr.kind) {
      case "IntLiteralExpr":
        if (this.target === Target.Batch && expr.value > BATCH_INT_MAX) {
          throw codegenError(
            `Integer literal ${expr.value} does not fit in 32-bit batch arithmetic.`,
            expr.span
          );
        }
        return String(expr.value);
      case "IdentifierExpr":
        return this.nameOf(expr);
      case "UnaryExpr": {
        const operand = this.arithmetic(expr.operand);
        return expr.operand.kind === "IntLiteralExpr" ||
          expr.operand.kind === "IdentifierExpr"
          ? `-${operand}`
          : `-(${operand})`;
      }
      case "BinaryExpr": {
        const precedence = precedenceOf(expr.operator);
        const left = this.arithmetic(expr.left);
        const right = this.arithmetic(expr.right);
        const wrapLeft =
          expr.left.kind === "BinaryExpr" &&
          precedenceOf(expr.left.operator) < precedence;
        const wrapRight =
          expr.right.kind === "BinaryExpr" &&
          precedenceOf(expr.right.operator) <= precedence;
        return `${wrapLeft ? `(${left})` : left} ${expr.operator} ${
          wrapRight ? `(${right})` : right
        }`;
      }
      case "StringLiteralExpr":
        throw codegenError(
          "A string literal cannot be used in arithmetic.",
          expr.span
        );
      case "CallExpr":
        throw codegenError(
          `Call to '${expr.callee}' cannot be used as a value.`,
          expr.span
        );
    }
  }

  private shellInteger(expr: Expression): string {
    return expr.kind === "IntLiteralExpr"
      ? String(expr.value)
      : `$((${this.arithmetic(expr)}))`;
  }

  /**
   * `set "name=value"`, with arithmetic pieces computed into temporaries
   * first. A value that is nothing but arithmetic goes through `set /a`.
   */
  private batchSet(name: string, pieces: readonly Piece[]) {
    const [only] = pieces;
    if (pieces.length === 1 && only.kind === "arith") {
      this.out.line(`set /a "${name}=${only.text}"`);
      return;
    }

    const flat = pieces.map((piece): TextPiece | VarPiece => {
      if (piece.kind !== "arith") return piece;
      const temp = this.temp();
      this.out.line(`set /a "${temp}=${piece.text}"`);
      return variable(temp);
    });
    this.out.line(`set "${name}=${batchValue(flat)}"`);
  }

  // --- Lookups ---

  private temp(): string {
    return `__t${++this.temps}`;
  }

  private isIntVariable(expr: Expression): boolean {
    return (
      expr.kind === "IdentifierExpr" &&
      this.binding(expr.id, expr.span).type === "int"
    );
  }

  private nameOf(expr: { id: number; span: Span }): string {
    return this.binding(expr.id, expr.span).emitName;
  }

  private binding(id: number, span: Span): Binding {
    const binding = this.checked.bindings.get(id);
    if (!binding) throw codegenError("Name was not resolved.", span);
    return binding;
  }

  private typeOf(expr: Expression): ValueType {
    const type = this.checked.types.get(expr.id);
    if (!type) throw codegenError("Expression was not type-checked.", expr.span);
    return type;
  }
}

function argumentName(index: number): string {
  return `__a${index + 1}`;
}

function precedenceOf(operator: BinaryOperator): number {
  return isComparison(operator) ? 0 : ARITHMETIC_PRECEDENCE[operator];
}

export function emit(checked: CheckedProgram, target: Target): string {
  return new Emitter(checked, target).emit();
}
