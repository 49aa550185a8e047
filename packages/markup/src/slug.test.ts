import { slugify } from "./slug";

describe("slugify", () => {
  it("joins words with hyphens", () => {
    expect(slugify("This is a heading test")).toBe("This-is-a-heading-test");
  });

  it("drops punctuation but keeps letters in any script", () => {
    expect(slugify("  What's new, café?  ")).toBe("Whats-new-café");
    expect(slugify("見出し 1")).toBe("見出し-1");
  });

  it("appends a counter to duplicates", () => {
    const used = new Set(["Intro", "Intro-1"]);
    expect(slugify("Intro", used)).toBe("Intro-2");
    expect(slugify("Outro", used)).toBe("Outro");
  });

  it("falls back for text without usable characters", () => {
    expect(slugify("!!!")).toBe("heading");
  });
});
