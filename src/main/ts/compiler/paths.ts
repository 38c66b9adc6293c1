import { Target } from "./target.js";

function separator(target: Target): string {
  switch (target) {
    case Target.Shell:
      return "/";
    case Target.Batch:
      return "\\";
  }
}

/**
 * Decodes the source text of a string literal (what sits between the quotes)
 * and rewrites every unescaped `/` or `\` to the separator of `target`.
 *
 * `\\` and `\/` decode to a backslash and a slash that are left alone, and
 * `\"` decodes to a quote.
 */
export function normalizePathLiteral(raw: string, target: Target): string {
  const sep = separator(target);
  let out = "";
  for (let i = 0; i < raw.length; i++) {
    const c = raw[i];
    const next = raw[i + 1];
    if (c === "\\" && (next === "\\" || next === "/" || next === '"')) {
      out += next;
      i++;
    } else if (c === "/" || c === "\\") {
      out += sep;
    } else {
      out += c;
    }
  }
  return out;
}
