import { describe, expect, test } from "vitest";

import { checkProgram, compileErrorOf, emitNames } from "./helpers.js";

const failure = (source: string) => compileErrorOf(() => checkProgram(source));

describe("Checker", () => {
  describe("scopes", () => {
    test("gives a shadowing declaration its own variable", () => {
      const checked = checkProgram(
        "{ let int x = 0; { let int x = x + 1; print(x); } print(x); }"
      );

      expect(emitNames(checked)).toEqual(["x", "x_1"]);
    });

    test("resolves an initializer against the binding it shadows", () => {
      const checked = checkProgram("let int x = 1; { let int x = x + 1; }");
      const block = checked.program.statements[1];
      if (block.kind !== "BlockStmt") throw new Error("expected a block");
      const inner = block.statements[0];
      if (inner.kind !== "VarDecl" || inner.initializer.kind !== "BinaryExpr") {
        throw new Error("expected 'let int x = x + 1'");
      }

      expect(checked.bindings.get(inner.initializer.left.id)?.emitName).toBe("x");
      expect(checked.bindings.get(inner.id)?.emitName).toBe("x_1");
    });

    test("renames around names declared later in the program", () => {
      const checked = checkProgram("let x = 1; { let x = 2; } let x_1 = 3;");

      expect(emitNames(checked)).toEqual(["x", "x_2", "x_1"]);
    });

    test("treats names that differ only in case as the same variable name", () => {
      const checked = checkProgram("let a = 1; let A = 2;");

      expect(emitNames(checked)).toEqual(["a", "A_1"]);
    });

    test("keeps clear of environment variables the scripts rely on", () => {
      const checked = checkProgram('let PATH = "a"; let home = 1;');

      expect(emitNames(checked)).toEqual(["PATH_1", "home_1"]);
    });

    test("keeps clear of variables the shells set or refuse to assign", () => {
      const checked = checkProgram(
        "let uid = 1; let SECONDS = 2; let euid = 3; let HighestNumaNodeNumber = 4;"
      );

      expect(emitNames(checked)).toEqual([
        "uid_1",
        "SECONDS_1",
        "euid_1",
        "HighestNumaNodeNumber_1",
      ]);
    });

    test("gives a redeclaration in the same scope its own variable", () => {
      const checked = checkProgram('let x = 1; let x = "a" + x; print(x);');
      const second = checked.program.statements[1];
      const print = checked.program.statements[2];
      if (second.kind !== "VarDecl" || second.initializer.kind !== "BinaryExpr") {
        throw new Error("expected 'let x = \"a\" + x'");
      }
      if (print.kind !== "PrintStmt") throw new Error("expected print");

      expect(emitNames(checked)).toEqual(["x", "x_1"]);
      expect(checked.bindings.get(second.initializer.right.id)?.emitName).toBe("x");
      expect(checked.bindings.get(print.args[0].id)?.emitName).toBe("x_1");
    });

    test("gives a redeclaration inside a loop body its own variable", () => {
      const checked = checkProgram(
        'let int i = 0; while int(i < 3) { let x = i; let x = x + "!"; print(x); i = i + 1; }'
      );
      const loop = checked.program.statements[1];
      if (loop.kind !== "WhileStmt") throw new Error("expected a while loop");
      const second = loop.body.statements[1];
      if (second.kind !== "VarDecl" || second.initializer.kind !== "BinaryExpr") {
        throw new Error("expected 'let x = x + \"!\"'");
      }

      expect(emitNames(checked)).toEqual(["i", "x", "x_1"]);
      expect(checked.bindings.get(second.initializer.left.id)?.emitName).toBe("x");
      expect(checked.bindings.get(second.id)?.emitName).toBe("x_1");
    });

    test("marks function bindings as local", () => {
      const checked = checkProgram("fn f(a) { let b = a; } let c = 1;");
      const locals = [...new Set(checked.bindings.values())].map((b) => [
        b.emitName,
        b.local,
      ]);

      expect(locals).toEqual([
        ["a", true],
        ["b", true],
        ["c", false],
      ]);
    });

    test("rejects an undeclared variable", () => {
      const error = failure("print(y);");

      expect(error.kind).toBe("NameError");
      expect(error.identifier).toBe("y");
      expect(error.message).toBe("Undeclared variable 'y'.");
    });

    test("requires declaration before use", () => {
      expect(failure("print(a); let a = 1;").kind).toBe("NameError");
    });

    test("ends a binding with its block", () => {
      expect(failure("{ let a = 1; } print(a);").identifier).toBe("a");
    });

    test("hides top-level variables from function bodies", () => {
      const error = failure("let g = 1; fn f() { print(g); }");

      expect(error.kind).toBe("NameError");
      expect(error.identifier).toBe("g");
    });

    test("reserves the '__' prefix", () => {
      expect(failure("let __x = 1;").message).toBe(
        "Names starting with '__' are reserved for generated code."
      );
    });
  });

  describe("functions", () => {
    test("accepts calls before the declaration", () => {
      const checked = checkProgram('f(); fn f() { print("hi"); }');

      expect([...checked.functions.keys()]).toEqual(["f"]);
    });

    test("rejects a call with the wrong number of arguments", () => {
      const error = failure("fn add(x, y) { } add(1, 2, 3);");

      expect(error.kind).toBe("TypeError");
      expect(error.message).toBe("Function 'add' expects 2 arguments, got 3.");
    });

    test("rejects a call to an unknown function", () => {
      const error = failure("nope(1);");

      expect(error.kind).toBe("NameError");
      expect(error.message).toBe("Undeclared function 'nope'.");
    });

    test("rejects redeclaration regardless of case", () => {
      expect(failure("fn go() { } fn Go() { }").message).toBe(
        "Function 'Go' is already declared (clashes with 'go')."
      );
      expect(failure("fn go() { } fn go() { }").message).toBe(
        "Function 'go' is already declared."
      );
    });

    test("rejects names of commands the scripts use", () => {
      const error = failure("fn Echo() { }");

      expect(error.kind).toBe("NameError");
      expect(error.message).toBe(
        "Function name 'Echo' is reserved by the target scripts."
      );
    });

    test("rejects a call used as a value", () => {
      expect(failure("fn f() { } let x = f();").message).toBe(
        "Call to 'f' cannot be used as a value."
      );
    });

    test("rejects a function name used as a variable", () => {
      expect(failure("fn f() { } print(f);").message).toBe(
        "'f' is a function and cannot be used as a value."
      );
    });
  });

  describe("types", () => {
    test("rejects a string literal in an integer context", () => {
      const error = failure('let int n = "a";');

      expect(error.kind).toBe("TypeError");
      expect(error.message).toBe(
        "A string literal cannot be used where an integer is expected."
      );
    });

    test("checks int parameters like int declarations", () => {
      expect(failure('fn f(int n) { } f("1");').kind).toBe("TypeError");
    });

    test("reads untyped variables as integers in an integer context", () => {
      const checked = checkProgram('let s = "5"; let int n = s * 2;');
      const decl = checked.program.statements[1];
      if (decl.kind !== "VarDecl") throw new Error("expected a declaration");

      expect(checked.types.get(decl.initializer.id)).toBe("int");
    });

    test("types '+' with an untyped operand as concatenation", () => {
      const checked = checkProgram('let int n = 1; let s = "n=" + n; let m = n + 2;');
      const [, concat, sum] = checked.program.statements;
      if (concat.kind !== "VarDecl" || sum.kind !== "VarDecl") {
        throw new Error("expected declarations");
      }

      expect(checked.types.get(concat.initializer.id)).toBe("untyped");
      expect(checked.types.get(sum.initializer.id)).toBe("int");
    });

    test("requires integer operands for '-' outside integer contexts", () => {
      expect(failure('let s = "a"; let t = s - 1;').message).toBe(
        "Operator '-' needs integer operands; declare them with 'int'."
      );
      expect(failure('let s = "a"; print(-s);').message).toBe(
        "Unary '-' needs an integer operand; declare it with 'int'."
      );
    });

    test("only allows a comparison at the top of a condition", () => {
      expect(failure("let int b = 1 < 2;").message).toBe(
        "Comparison '<' is only allowed as the outermost operator of an int(...) or str(...) condition."
      );
      expect(failure("let int a = 1; while int((a < 2) == 1) { }").kind).toBe(
        "TypeError"
      );
    });

    test("limits str(...) conditions to equality", () => {
      expect(failure('let s = "a"; if str(s < "b") { }').message).toBe(
        "str(...) conditions only support '==' and '!=', not '<'."
      );
    });

    test("accepts string comparisons in str(...) conditions", () => {
      expect(() =>
        checkProgram('let s = "a"; if str(s + "x" != "ax") { print(s); }')
      ).not.toThrow();
    });
  });
});
