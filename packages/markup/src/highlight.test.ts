import { UnknownLanguageError } from "./errors";
import { mapLang, PrismHighlighter } from "./highlight";

describe("mapLang", () => {
  it("resolves aliases case-insensitively", () => {
    expect(mapLang("JS")).toBe("javascript");
    expect(mapLang(" sh ")).toBe("bash");
    expect(mapLang("go")).toBe("go");
    expect(mapLang(null)).toBe("");
  });
});

describe("PrismHighlighter", () => {
  const highlighter = new PrismHighlighter(["javascript", "go"]);

  it("highlights loaded languages", () => {
    expect(highlighter.highlight("let x = 1;", "js")).toContain('<span class="token keyword">let</span>');
    expect(highlighter.highlight("func main() {}", "go")).toContain('<span class="token keyword">func</span>');
  });

  it("escapes code it highlights", () => {
    expect(highlighter.highlight("a < b", "javascript")).toContain("&lt;");
  });

  it("rejects languages it was not given", () => {
    expect(() => highlighter.highlight("x = 1", "python")).toThrow(UnknownLanguageError);
  });
});
