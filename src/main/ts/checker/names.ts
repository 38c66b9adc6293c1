/**
 * Environment variables either target reads or sets on its own. A program
 * variable emitted under one of these names would clobber it.
 */
const RESERVED_VARIABLES = new Set<string>([
  "__cd__",
  "cd",
  "cmdcmdline",
  "cmdextversion",
  "comspec",
  "date",
  "env",
  "errorlevel",
  "euid",
  "highestnumanodenumber",
  "home",
  "ifs",
  "lang",
  "lineno",
  "mail",
  "oldpwd",
  "optarg",
  "optind",
  "path",
  "pathext",
  "ppid",
  "prompt",
  "ps1",
  "ps2",
  "ps4",
  "pwd",
  "random",
  "seconds",
  "shell",
  "systemroot",
  "temp",
  "term",
  "time",
  "tmp",
  "uid",
  "user",
  "username",
  "userprofile",
  "windir",
]);

/**
 * Commands and keywords the emitted scripts rely on. A function of the same
 * name would shadow the command (shell) or the label (`:eof` in batch).
 */
const RESERVED_FUNCTIONS = new Set<string>([
  "break",
  "call",
  "case",
  "cd",
  "continue",
  "do",
  "done",
  "echo",
  "elif",
  "else",
  "endlocal",
  "eof",
  "esac",
  "eval",
  "exec",
  "exit",
  "export",
  "false",
  "fi",
  "for",
  "function",
  "goto",
  "if",
  "in",
  "local",
  "printf",
  "read",
  "rem",
  "return",
  "set",
  "setlocal",
  "shift",
  "test",
  "then",
  "trap",
  "true",
  "unset",
  "until",
  "wait",
  "while",
]);

/** Prefix of temporaries and labels the emitter generates. */
export const GENERATED_PREFIX = "__";

export function isReservedFunctionName(name: string): boolean {
  return RESERVED_FUNCTIONS.has(name.toLowerCase());
}

/**
 * Hands out emitted variable names. The first binding of a source name keeps
 * it; later bindings become `name_1`, `name_2`, ... skipping anything a
 * declaration in the program spells, so a rename never lands on a user name.
 * Comparison is case-insensitive because batch variables are.
 */
export class NameAllocator {
  private readonly used = new Set<string>();
  private readonly declared: ReadonlySet<string>;

  constructor(declaredNames: Iterable<string>) {
    this.declared = new Set([...declaredNames].map((n) => n.toLowerCase()));
  }

  allocate(name: string): string {
    if (this.isFree(name, false)) return this.take(name);

    for (let suffix = 1; ; suffix++) {
      const candidate = `${name}_${suffix}`;
      if (this.isFree(candidate, true)) return this.take(candidate);
    }
  }

  private isFree(candidate: string, renamed: boolean): boolean {
    const key = candidate.toLowerCase();
    if (this.used.has(key) || RESERVED_VARIABLES.has(key)) return false;
    return !renamed || !this.declared.has(key);
  }

  private take(name: string): string {
    this.used.add(name.toLowerCase());
    return name;
  }
}
