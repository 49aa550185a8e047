import katex, { type KatexOptions } from "katex";
import { Config } from "./config";
import type { MathKind } from "./ir";

/** Converts TeX source to HTML or MathML markup; throws on invalid input. */
export interface MathRenderer {
  render(source: string, kind: MathKind): string;
}

export type KatexOutput = "html" | "mathml" | "htmlAndMathml";

export class KatexMathRenderer implements MathRenderer {
  private readonly inline: Readonly<KatexOptions>;
  private readonly display: Readonly<KatexOptions>;

  constructor(output: KatexOutput = Config.MATH_OUTPUT) {
    this.inline = { displayMode: false, output, throwOnError: true };
    this.display = { displayMode: true, output, throwOnError: true };
  }

  render(source: string, kind: MathKind): string {
    return katex.renderToString(source, kind === "display" ? this.display : this.inline);
  }
}
