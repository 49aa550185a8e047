export class Config {
  static readonly LOG_FORMAT = envStr("SITEMARK_LOG_FORMAT", "");
  static readonly HIGHLIGHT_LANGUAGES = envStrCsv(
    "SITEMARK_HIGHLIGHT_LANGUAGES",
    [
      "markup",
      "css",
      "clike",
      "javascript",
      "typescript",
      "jsx",
      "tsx",
      "json",
      "yaml",
      "bash",
      "sql",
      "python",
      "ruby",
      "rust",
      "go",
      "lua",
      "perl",
      "java",
      "c",
      "cpp",
      "diff",
      "docker",
      "makefile",
      "graphql",
      "http",
      "ini",
      "toml",
      "markdown",
    ],
    true,
  );
  static readonly MATH_BACKEND = envChoice("SITEMARK_MATH_BACKEND", ["katex", "none"], "katex");
  static readonly MATH_OUTPUT = envChoice(
    "SITEMARK_MATH_OUTPUT",
    ["mathml", "html", "htmlAndMathml"],
    "mathml",
  );
  static readonly MORE_MARKER = envStr("SITEMARK_MORE_MARKER", "-more-", true);
  static readonly EXTRACT_TITLE = envBool("SITEMARK_EXTRACT_TITLE", true);
}

export function envStr(name: string, def?: string, treatEmptyAsUndefined = false): string {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v;
}

export function envBool(name: string, def?: boolean, treatEmptyAsUndefined = false): boolean {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  const vv = v.toLowerCase();
  if (["1", "true", "yes", "on"].includes(vv)) return true;
  if (["0", "false", "no", "off"].includes(vv)) return false;
  if (def !== undefined) return def;
  throw new Error(`Env var ${name} is not a valid boolean: ${v}`);
}

export function envStrCsv(name: string, def?: string[], treatEmptyAsUndefined = false): string[] {
  const v = process.env[name];
  if (v === undefined || (treatEmptyAsUndefined && v === "")) {
    if (def !== undefined) return def;
    throw new Error(`Env var ${name} not set`);
  }
  return v
    .split(",")
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}

export function envChoice<T extends string>(name: string, choices: readonly T[], def: T): T {
  const v = process.env[name];
  if (v === undefined || v === "") return def;
  const found = choices.find((c) => c === v);
  if (found === undefined) {
    throw new Error(`Env var ${name} must be one of ${choices.join(", ")}: ${v}`);
  }
  return found;
}
