import { describe, expect, test } from "vitest";
import type { BuildReport } from "./build/builder";
import { DataFragmentError, RenderError } from "./errors";
import { formatBuildErrors, formatSummary, formatWarnings, logReport, type Logger } from "./warn";

const plain = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, "");

function report(overrides: Partial<BuildReport> = {}): BuildReport {
  return {
    tag: "debug",
    rendered: 0,
    skipped: 0,
    failed: 0,
    warnings: [],
    errors: [],
    documents: 0,
    assets: 0,
    books: 0,
    files: [],
    pages: [],
    escalated: false,
    ...overrides,
  };
}

function captureLogger() {
  const lines: Array<[keyof Logger, string]> = [];
  const logger: Logger = {
    info: (message) => lines.push(["info", plain(message)]),
    warn: (message) => lines.push(["warn", plain(message)]),
    error: (message) => lines.push(["error", plain(message)]),
    debug: (message) => lines.push(["debug", plain(message)]),
  };
  return { logger, lines };
}

describe("formatWarnings", () => {
  test("lists each warning under a counted header", () => {
    const text = formatWarnings("Warnings", [
      { code: "missing-layout", message: 'Layout "base.njk" not found', path: "a.md" },
      { code: "release-live", message: "Live reload is enabled for a release build" },
    ]);
    expect(plain(text)).toBe(
      "⚠️ [pagewright] Warnings (2)\n" +
        '  - Layout "base.njk" not found\n' +
        "  - Live reload is enabled for a release build"
    );
  });
});

describe("formatBuildErrors", () => {
  test("names the failed unit and indents continuation lines", () => {
    const text = formatBuildErrors([
      { path: "about.md", error: new RenderError("about.md", "Cannot render about.md:\nunexpected token") },
      { path: "blog/post.md", error: new DataFragmentError("blog/_data.yml", "bad indentation") },
    ]);
    expect(plain(text)).toBe(
      "✖ [pagewright] Failed (2)\n" +
        "  - about.md: Cannot render about.md:\n" +
        "    unexpected token\n" +
        "  - blog/post.md: bad indentation"
    );
  });
});

describe("formatSummary", () => {
  test("counts every outcome", () => {
    const text = formatSummary(
      report({ tag: "release", rendered: 3, skipped: 2, failed: 1, warnings: [{ code: "invalid-flag", message: "x" }] })
    );
    expect(plain(text)).toBe("[pagewright] release: 3 rendered, 2 skipped, 1 warned, 1 failed");
  });
});

describe("logReport", () => {
  test("a clean pass logs only the summary", () => {
    const { logger, lines } = captureLogger();
    logReport(logger, report({ rendered: 1 }));
    expect(lines).toEqual([["info", "[pagewright] debug: 1 rendered, 0 skipped, 0 warned, 0 failed"]]);
  });

  test("warnings and errors come before the summary", () => {
    const { logger, lines } = captureLogger();
    logReport(
      logger,
      report({
        failed: 1,
        warnings: [{ code: "invalid-flag", message: "draft must be a boolean" }],
        errors: [{ path: "a.md", error: new RenderError("a.md", "boom") }],
      })
    );
    expect(lines.map(([level]) => level)).toEqual(["warn", "error", "info"]);
    expect(lines[1]?.[1]).toBe("✖ [pagewright] Failed (1)\n  - a.md: boom");
  });
});
