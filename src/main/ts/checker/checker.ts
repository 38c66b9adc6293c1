import {
  AssignStmt,
  BinaryExpr,
  BlockStmt,
  CallExpr,
  Condition,
  Expression,
  FnDecl,
  IfStmt,
  isComparison,
  Param,
  Program,
  Statement,
  VarDecl,
} from "../ast/ast.js";
import { nameError, typeError } from "../common/errors.js";
import { Span } from "../common/span.js";
import {
  GENERATED_PREFIX,
  isReservedFunctionName,
  NameAllocator,
} from "./names.js";
import { Binding, ScopeStack, ValueType } from "./scopes.js";

export interface FunctionInfo {
  decl: FnDecl;
  /** Filled in when the walk reaches the declaration. */
  params: Binding[];
}

/**
 * The parsed program plus what the checker learned about it, keyed by node id.
 */
export interface CheckedProgram {
  program: Program;
  /** Resolved type of every value expression. */
  types: ReadonlyMap<number, ValueType>;
  /** Binding for every VarDecl, Param, AssignStmt and IdentifierExpr. */
  bindings: ReadonlyMap<number, Binding>;
  functions: ReadonlyMap<string, FunctionInfo>;
}

export class Checker {
  private readonly scopes = new ScopeStack();
  private readonly types = new Map<number, ValueType>();
  private readonly bindings = new Map<number, Binding>();
  private readonly functions = new Map<string, FunctionInfo>();
  private readonly names: NameAllocator;
  private inFunction = false;

  constructor(private readonly program: Program) {
    this.names = new NameAllocator(collectDeclaredNames(program));
  }

  check(): CheckedProgram {
    this.declareFunctions();

    this.scopes.push();
    for (const stmt of this.program.statements) {
      this.statement(stmt);
    }
    this.scopes.pop();

    return {
      program: this.program,
      types: this.types,
      bindings: this.bindings,
      functions: this.functions,
    };
  }

  /**
   * Functions live in one flat namespace registered up front, so a call may
   * come before the declaration.
   */
  private declareFunctions() {
    const seen = new Map<string, FnDecl>();
    for (const stmt of this.program.statements) {
      if (stmt.kind !== "FnDecl") continue;

      this.rejectGeneratedName(stmt.name, stmt.span);
      if (isReservedFunctionName(stmt.name)) {
        throw nameError(
          `Function name '${stmt.name}' is reserved by the target scripts.`,
          stmt.span,
          stmt.name
        );
      }

      const key = stmt.name.toLowerCase();
      const previous = seen.get(key);
      if (previous) {
        const clash =
          previous.name === stmt.name ? "" : ` (clashes with '${previous.name}')`;
        throw nameError(
          `Function '${stmt.name}' is already declared${clash}.`,
          stmt.span,
          stmt.name
        );
      }
      seen.set(key, stmt);
      this.functions.set(stmt.name, { decl: stmt, params: [] });
    }
  }

  // --- Statements ---

  private statement(stmt: Statement) {
    switch (stmt.kind) {
      case "FnDecl":
        return this.fnDecl(stmt);
      case "VarDecl":
        return this.varDecl(stmt);
      case "AssignStmt":
        return this.assignment(stmt);
      case "ExpressionStmt":
        if (stmt.expression.kind !== "CallExpr") {
          throw typeError("Only calls can be used as statements.", stmt.span);
        }
        return this.call(stmt.expression);
      case "PrintStmt":
        for (const arg of stmt.args) this.value(arg);
        return;
      case "WhileStmt":
        this.condition(stmt.condition);
        return this.block(stmt.body);
      case "IfStmt":
        return this.ifStmt(stmt);
      case "BlockStmt":
        return this.block(stmt);
      case "WithStmt":
        return this.block(stmt.body);
      case "RawStmt":
        return;
    }
  }

  private fnDecl(decl: FnDecl) {
    const info = this.functions.get(decl.name);
    if (!info) throw new Error(`function '${decl.name}' was not pre-declared`);

    this.scopes.push(true);
    this.inFunction = true;
    info.params = decl.params.map((param) => this.declareParam(param));
    this.block(decl.body);
    this.inFunction = false;
    this.scopes.pop();
  }

  private declareParam(param: Param): Binding {
    const binding = this.declare(param.id, param.name, param.span, {
      int: param.declaredType === "int",
    });
    this.bindings.set(param.id, binding);
    return binding;
  }

  private varDecl(decl: VarDecl) {
    // The initializer still sees any binding the new one shadows.
    if (decl.declaredType === "int") {
      this.integer(decl.initializer);
    } else {
      this.value(decl.initializer);
    }

    const binding = this.declare(decl.id, decl.name, decl.span, {
      int: decl.declaredType === "int",
    });
    this.bindings.set(decl.id, binding);
  }

  private declare(
    id: number,
    name: string,
    span: Span,
    options: { int: boolean }
  ): Binding {
    this.rejectGeneratedName(name, span);
    const binding: Binding = {
      id,
      name,
      emitName: this.names.allocate(name),
      type: options.int ? "int" : "untyped",
      local: this.inFunction,
    };
    this.scopes.declare(binding);
    return binding;
  }

  private assignment(stmt: AssignStmt) {
    const binding = this.resolve(stmt.name, stmt.span);
    if (binding.type === "int") {
      this.integer(stmt.value);
    } else {
      this.value(stmt.value);
    }
    this.bindings.set(stmt.id, binding);
  }

  private ifStmt(stmt: IfStmt) {
    this.condition(stmt.condition);
    this.block(stmt.thenBranch);
    if (stmt.elseBranch?.kind === "IfStmt") {
      this.ifStmt(stmt.elseBranch);
    } else if (stmt.elseBranch) {
      this.block(stmt.elseBranch);
    }
  }

  private block(block: BlockStmt) {
    this.scopes.push();
    for (const stmt of block.statements) {
      this.statement(stmt);
    }
    this.scopes.pop();
  }

  private call(call: CallExpr) {
    const info = this.functions.get(call.callee);
    if (!info) {
      throw nameError(
        `Undeclared function '${call.callee}'.`,
        call.span,
        call.callee
      );
    }

    const params = info.decl.params;
    if (params.length !== call.args.length) {
      throw typeError(
        `Function '${call.callee}' expects ${plural(params.length, "argument")}, got ${call.args.length}.`,
        call.span
      );
    }

    call.args.forEach((arg, i) => {
      if (params[i].declaredType === "int") {
        this.integer(arg);
      } else {
        this.value(arg);
      }
    });
  }

  /**
   * A comparison is only legal as the outermost operator of a condition.
   * `int(...)` compares integers, `str(...)` compares text for (in)equality.
   * Without a comparison the test is "non-zero" or "non-empty".
   */
  private condition(condition: Condition) {
    const expr = condition.expression;
    if (expr.kind !== "BinaryExpr" || !isComparison(expr.operator)) {
      if (condition.mode === "int") {
        this.integer(expr);
      } else {
        this.value(expr);
      }
      return;
    }

    if (condition.mode === "int") {
      this.integer(expr.left);
      this.integer(expr.right);
      return;
    }

    if (expr.operator !== "==" && expr.operator !== "!=") {
      throw typeError(
        `str(...) conditions only support '==' and '!=', not '${expr.operator}'.`,
        expr.span
      );
    }
    this.value(expr.left);
    this.value(expr.right);
  }

  // --- Expressions ---

  /**
   * Integer context: every leaf is read as an integer and every operator must
   * be arithmetic. Untyped variables are accepted and read numerically.
   */
  private integer(expr: Expression) {
    switch (expr.kind) {
      case "IntLiteralExpr":
        break;
      case "StringLiteralExpr":
        throw typeError(
          "A string literal cannot be used where an integer is expected.",
          expr.span
        );
      case "IdentifierExpr":
        this.bindings.set(expr.id, this.resolve(expr.name, expr.span));
        break;
      case "UnaryExpr":
        this.integer(expr.operand);
        break;
      case "BinaryExpr":
        if (isComparison(expr.operator)) throw this.misplacedComparison(expr);
        this.integer(expr.left);
        this.integer(expr.right);
        break;
      case "CallExpr":
        throw this.callAsValue(expr);
    }
    this.types.set(expr.id, "int");
  }

  /**
   * Value context: the type is computed bottom-up. `+` with an untyped operand
   * concatenates; the other arithmetic operators need integers on both sides.
   */
  private value(expr: Expression): ValueType {
    const type = this.valueType(expr);
    this.types.set(expr.id, type);
    return type;
  }

  private valueType(expr: Expression): ValueType {
    switch (expr.kind) {
      case "IntLiteralExpr":
        return "int";
      case "StringLiteralExpr":
        return "untyped";
      case "IdentifierExpr": {
        const binding = this.resolve(expr.name, expr.span);
        this.bindings.set(expr.id, binding);
        return binding.type;
      }
      case "UnaryExpr":
        if (this.value(expr.operand) !== "int") {
          throw typeError(
            "Unary '-' needs an integer operand; declare it with 'int'.",
            expr.span
          );
        }
        return "int";
      case "BinaryExpr": {
        if (isComparison(expr.operator)) throw this.misplacedComparison(expr);
        const left = this.value(expr.left);
        const right = this.value(expr.right);
        if (left === "int" && right === "int") return "int";
        if (expr.operator === "+") return "untyped";
        throw typeError(
          `Operator '${expr.operator}' needs integer operands; declare them with 'int'.`,
          expr.span
        );
      }
      case "CallExpr":
        throw this.callAsValue(expr);
    }
  }

  private resolve(name: string, span: Span): Binding {
    const binding = this.scopes.lookup(name);
    if (binding) return binding;
    if (this.functions.has(name)) {
      throw typeError(
        `'${name}' is a function and cannot be used as a value.`,
        span
      );
    }
    throw nameError(`Undeclared variable '${name}'.`, span, name);
  }

  private misplacedComparison(expr: BinaryExpr) {
    return typeError(
      `Comparison '${expr.operator}' is only allowed as the outermost operator of an int(...) or str(...) condition.`,
      expr.span
    );
  }

  private callAsValue(expr: CallExpr) {
    return typeError(
      `Call to '${expr.callee}' cannot be used as a value.`,
      expr.span
    );
  }

  private rejectGeneratedName(name: string, span: Span) {
    if (name.startsWith(GENERATED_PREFIX)) {
      throw nameError(
        `Names starting with '${GENERATED_PREFIX}' are reserved for generated code.`,
        span,
        name
      );
    }
  }
}

export function check(program: Program): CheckedProgram {
  return new Checker(program).check();
}

function collectDeclaredNames(program: Program): string[] {
  const names: string[] = [];
  const visit = (stmt: Statement) => {
    switch (stmt.kind) {
      case "FnDecl":
        names.push(...stmt.params.map((p) => p.name));
        stmt.body.statements.forEach(visit);
        break;
      case "VarDecl":
        names.push(stmt.name);
        break;
      case "WhileStmt":
        stmt.body.statements.forEach(visit);
        break;
      case "IfStmt":
        visit(stmt.thenBranch);
        if (stmt.elseBranch) visit(stmt.elseBranch);
        break;
      case "BlockStmt":
        stmt.statements.forEach(visit);
        break;
      case "WithStmt":
        stmt.body.statements.forEach(visit);
        break;
      default:
        break;
    }
  };
  program.statements.forEach(visit);
  return names;
}

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}
