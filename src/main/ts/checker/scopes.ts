export type ValueType = "int" | "untyped";

export interface Binding {
  /** Id of the declaring VarDecl or Param. */
  id: number;
  name: string;
  /** Unique (case-insensitively) variable name used in the emitted script. */
  emitName: string;
  type: ValueType;
  /** Declared inside a function body, so the script scopes it to the call. */
  local: boolean;
}

interface Frame {
  bindings: Map<string, Binding>;
  /** Lookups do not continue past a function frame. */
  boundary: boolean;
}

/**
 * Lexical scopes as an explicit stack: a frame lives exactly as long as the
 * checker is inside the block that pushed it.
 */
export class ScopeStack {
  private readonly frames: Frame[] = [];

  push(boundary = false) {
    this.frames.push({ bindings: new Map(), boundary });
  }

  pop() {
    this.frames.pop();
  }

  declare(binding: Binding) {
    const top = this.frames[this.frames.length - 1];
    if (!top) throw new Error("declare() called with no open scope");
    top.bindings.set(binding.name, binding);
  }

  lookup(name: string): Binding | undefined {
    for (let i = this.frames.length - 1; i >= 0; i--) {
      const frame = this.frames[i];
      const binding = frame.bindings.get(name);
      if (binding) return binding;
      if (frame.boundary) return undefined;
    }
    return undefined;
  }
}
