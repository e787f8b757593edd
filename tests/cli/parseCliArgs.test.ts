import { describe, expect, it } from "vitest";
import { getHelpText, parseCliArgs } from "../../src/cli";

describe("parseCliArgs", () => {
  it("parses convert with its options", () => {
    expect(
      parseCliArgs([
        "convert",
        "in/a.json",
        "--force",
        "--meta",
        "batch=may",
        "--meta",
        "query=a=b",
        "--valid-languages",
        "en, de,",
        "--config",
        "config.json",
        "in/b.json",
      ]),
    ).toEqual({
      command: "convert",
      paths: ["in/a.json", "in/b.json"],
      force: true,
      meta: { batch: "may", query: "a=b" },
      validLanguages: ["en", "de"],
      configPath: "config.json",
    });
  });

  it("ignores malformed metadata pairs", () => {
    const parsed = parseCliArgs(["convert", "a.json", "--meta", "=value", "--meta", "novalue"]);

    expect(parsed).not.toBe("help");
    if (parsed !== "help") {
      expect(parsed.meta).toEqual({});
    }
  });

  it("parses status without paths", () => {
    expect(parseCliArgs(["status"])).toEqual({
      command: "status",
      paths: [],
      force: false,
      meta: {},
      validLanguages: undefined,
      configPath: undefined,
    });
  });

  it("falls back to help", () => {
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["crawl"])).toBe("help");
    expect(parseCliArgs(["convert"])).toBe("help");
    expect(parseCliArgs(["status", "--help"])).toBe("help");
  });
});

describe("getHelpText", () => {
  it("starts with the usage line", () => {
    expect(getHelpText().split("\n").slice(0, 2)).toEqual(["Usage:", "  layout-converter <command> [options]"]);
  });
});
