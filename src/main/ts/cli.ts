import * as fs from "fs";
import * as path from "path";
import { DiagnosticReporter } from "./common/diagnostics.js";
import { compile, compileToAll } from "./compiler/compile.js";
import { fileExtension, parseTarget, Target } from "./compiler/target.js";

const USAGE = `twinshell - compiles .twin programs to POSIX sh and Windows batch

Usage: twinshell compile -i <file> [-o <file>] [-t shell|batch|all]

  -i, --input <file>    source program
  -o, --output <file>   output path (single target only)
  -t, --target <name>   shell, batch or all (default: all)`;

interface CompileCommand {
  input: string;
  output?: string;
  targets: readonly Target[];
}

class UsageError extends Error {}

function parseArgs(args: readonly string[]): CompileCommand {
  const [command, ...rest] = args;
  if (command !== "compile") {
    throw new UsageError(
      command === undefined ? "Missing command." : `Unknown command '${command}'.`
    );
  }

  let input: string | undefined;
  let output: string | undefined;
  let targets: readonly Target[] = [Target.Shell, Target.Batch];

  for (let i = 0; i < rest.length; i++) {
    const flag = rest[i];
    const value = rest[i + 1];
    if (value === undefined) {
      throw new UsageError(`Missing value for '${flag}'.`);
    }
    i++;

    switch (flag) {
      case "-i":
      case "--input":
        input = value;
        break;
      case "-o":
      case "--output":
        output = value;
        break;
      case "-t":
      case "--target": {
        if (value === "all") break;
        const target = parseTarget(value);
        if (!target) throw new UsageError(`Unknown target '${value}'.`);
        targets = [target];
        break;
      }
      default:
        throw new UsageError(`Unknown option '${flag}'.`);
    }
  }

  if (input === undefined) throw new UsageError("Missing -i <file>.");
  if (output !== undefined && targets.length !== 1) {
    throw new UsageError("-o needs a single target (-t shell or -t batch).");
  }
  return { input, output, targets };
}

function defaultOutputPath(inputPath: string, target: Target): string {
  const { dir, name } = path.parse(inputPath);
  return path.join(dir, name + fileExtension(target));
}

/**
 * Runs the command line and returns the exit code: 0 on success, 1 when the
 * program does not compile or cannot be read, 2 on a usage error.
 */
export function main(args: readonly string[]): number {
  if (args.length === 0 || args[0] === "-h" || args[0] === "--help") {
    console.log(USAGE);
    return args.length === 0 ? 2 : 0;
  }

  let command: CompileCommand;
  try {
    command = parseArgs(args);
  } catch (e) {
    if (!(e instanceof UsageError)) throw e;
    console.error(`Error: ${e.message}`);
    console.error(USAGE);
    return 2;
  }

  const absolutePath = path.resolve(command.input);
  if (!fs.existsSync(absolutePath)) {
    console.error(`Error: File not found: ${absolutePath}`);
    return 1;
  }

  console.log(`Compiling ${absolutePath}...`);
  const source = fs.readFileSync(absolutePath, "utf8");
  const options = { sourceFile: absolutePath };

  const [single] = command.targets;
  const result =
    command.targets.length === 1
      ? compile(source, single, options)
      : compileToAll(source, options);

  if (!result.ok) {
    new DiagnosticReporter().reportCompileError(result.error);
    return 1;
  }

  const scripts =
    typeof result.value === "string"
      ? new Map([[single, result.value]])
      : result.value;

  for (const [target, script] of scripts) {
    const outPath = command.output
      ? path.resolve(command.output)
      : defaultOutputPath(absolutePath, target);
    fs.writeFileSync(outPath, script, "utf8");
    console.log(`Wrote ${outPath}`);
  }
  return 0;
}
