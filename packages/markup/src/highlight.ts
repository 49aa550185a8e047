import Prism from "prismjs";
import loadLanguages from "prismjs/components/";
import { Config } from "./config";
import { UnknownLanguageError } from "./errors";

/** Turns source code into highlighted HTML markup. */
export interface Highlighter {
  /** Throws UnknownLanguageError when `language` has no grammar. */
  highlight(code: string, language: string): string;
}

const ALIASES: Record<string, string> = {
  html: "markup",
  xml: "markup",
  svg: "markup",
  mathml: "markup",
  js: "javascript",
  ts: "typescript",
  sh: "bash",
  shell: "bash",
  yml: "yaml",
  md: "markdown",
  py: "python",
  rs: "rust",
  cplusplus: "cpp",
};

export function mapLang(raw?: string | null): string {
  const k = (raw || "").trim().toLowerCase();
  return ALIASES[k] || k;
}

/**
 * Prism-backed highlighter. Grammars are loaded once, when constructed;
 * afterwards the instance is read-only and can be shared between renders.
 */
export class PrismHighlighter implements Highlighter {
  private readonly languages: ReadonlySet<string>;

  constructor(languages: readonly string[] = Config.HIGHLIGHT_LANGUAGES) {
    const resolved = [...new Set(languages.map((l) => mapLang(l)).filter((l) => l !== ""))];
    loadLanguages(resolved);
    this.languages = new Set(resolved.filter((l) => Prism.languages[l] !== undefined));
  }

  highlight(code: string, language: string): string {
    const lang = mapLang(language);
    const grammar = this.languages.has(lang) ? Prism.languages[lang] : undefined;
    if (!grammar) throw new UnknownLanguageError(language);
    return Prism.highlight(code, grammar, lang);
  }
}
