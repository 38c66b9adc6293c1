export enum Target {
  Shell = "shell",
  Batch = "batch",
}

export const TARGETS: readonly Target[] = [Target.Shell, Target.Batch];

export function parseTarget(name: string): Target | undefined {
  return TARGETS.find((t) => t === name.toLowerCase());
}

export function fileExtension(target: Target): string {
  switch (target) {
    case Target.Shell:
      return ".sh";
    case Target.Batch:
      return ".bat";
  }
}

/** cmd.exe mis-resolves `goto` labels in LF-only files, so batch gets CRLF. */
export function lineEnding(target: Target): string {
  switch (target) {
    case Target.Shell:
      return "\n";
    case Target.Batch:
      return "\r\n";
  }
}
