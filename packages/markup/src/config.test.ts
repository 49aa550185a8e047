import { envBool, envChoice, envStr, envStrCsv } from "./config";

describe("env helpers", () => {
  const saved = { ...process.env };

  afterEach(() => {
    process.env = { ...saved };
  });

  it("reads strings with defaults", () => {
    process.env.SITEMARK_TEST_STR = "value";
    expect(envStr("SITEMARK_TEST_STR")).toBe("value");
    expect(envStr("SITEMARK_TEST_UNSET", "def")).toBe("def");
    expect(() => envStr("SITEMARK_TEST_UNSET")).toThrow("Env var SITEMARK_TEST_UNSET not set");
    process.env.SITEMARK_TEST_STR = "";
    expect(envStr("SITEMARK_TEST_STR", "def", true)).toBe("def");
  });

  it("reads booleans", () => {
    process.env.SITEMARK_TEST_BOOL = "Yes";
    expect(envBool("SITEMARK_TEST_BOOL")).toBe(true);
    process.env.SITEMARK_TEST_BOOL = "off";
    expect(envBool("SITEMARK_TEST_BOOL", true)).toBe(false);
  });

  it("reads comma separated lists", () => {
    process.env.SITEMARK_TEST_CSV = " go, ,python ,";
    expect(envStrCsv("SITEMARK_TEST_CSV")).toEqual(["go", "python"]);
  });

  it("accepts only listed choices", () => {
    process.env.SITEMARK_TEST_CHOICE = "none";
    expect(envChoice("SITEMARK_TEST_CHOICE", ["katex", "none"], "katex")).toBe("none");
    process.env.SITEMARK_TEST_CHOICE = "mathjax";
    expect(() => envChoice("SITEMARK_TEST_CHOICE", ["katex", "none"], "katex")).toThrow(
      "Env var SITEMARK_TEST_CHOICE must be one of katex, none: mathjax",
    );
    delete process.env.SITEMARK_TEST_CHOICE;
    expect(envChoice("SITEMARK_TEST_CHOICE", ["katex", "none"], "katex")).toBe("katex");
  });
});
