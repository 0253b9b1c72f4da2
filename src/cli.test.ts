import { afterEach, describe, expect, test } from "vitest";
import { existsSync } from "fs";
import { resolve } from "path";
import { main, USAGE } from "./cli";
import { FixtureProject } from "./testing/fixtures";
import type { Logger } from "./warn";

const plain = (text: string) => text.replace(/\u001b\[[0-9;]*m/g, "");

function captureLogger() {
  const info: string[] = [];
  const errors: string[] = [];
  const logger: Logger = {
    info: (message) => info.push(plain(message)),
    warn: () => {},
    error: (message) => errors.push(plain(message)),
    debug: () => {},
  };
  return { logger, info, errors };
}

describe("cli", () => {
  let project: FixtureProject | null = null;

  afterEach(async () => {
    await project?.dispose();
    project = null;
  });

  test("build renders the project in the working directory", async () => {
    project = await FixtureProject.create("cli-site", { "index.md": "# Hello\n" });
    const { logger, info } = captureLogger();

    expect(await main(["build"], { cwd: project.root, logger })).toBe(0);
    expect(await project.read("index.html")).toBe("<h1>Hello</h1>\n");
    expect(info).toEqual(["[pagewright] debug: 1 rendered, 0 skipped, 0 warned, 0 failed"]);
  });

  test("--tag and --no-clean-urls shape the destination", async () => {
    project = await FixtureProject.create("cli-tag", { "docs/a.md": "A\n" });
    const { logger } = captureLogger();

    expect(await main(["build", "--tag", "preview", "--no-clean-urls"], { cwd: project.root, logger })).toBe(0);
    expect(existsSync(resolve(project.root, "build/preview/docs/a.html"))).toBe(true);
  });

  test("document failures make the exit code nonzero", async () => {
    project = await FixtureProject.create("cli-fail", {
      "ok.md": "Fine\n",
      "bad.md": "---\ncontent: nope\n---\n",
    });
    const { logger, errors } = captureLogger();

    expect(await main(["build"], { cwd: project.root, logger })).toBe(1);
    expect(errors).toHaveLength(1);
    expect(errors[0]).toContain("  - bad.md: ");
  });

  test("a pass where every document fails is reported as a failed build", async () => {
    project = await FixtureProject.create("cli-escalate", { "bad.md": "---\ncontext: 1\n---\n" });
    const { logger, errors } = captureLogger();

    expect(await main(["build"], { cwd: project.root, logger })).toBe(1);
    expect(errors[errors.length - 1]).toBe("Every unit of the debug build failed");
  });

  test("a missing source directory is fatal", async () => {
    project = await FixtureProject.create("cli-empty");
    const { logger, errors } = captureLogger();

    expect(await main(["build"], { cwd: resolve(project.root, "elsewhere"), logger })).toBe(1);
    expect(errors).toHaveLength(1);
  });

  test("--help prints usage", async () => {
    const { logger, info } = captureLogger();
    expect(await main(["--help"], { cwd: "/", logger })).toBe(0);
    expect(info).toEqual([USAGE]);
  });

  test("unknown commands and options are rejected", async () => {
    const { logger, errors } = captureLogger();
    expect(await main(["publish"], { cwd: "/", logger })).toBe(1);
    expect(errors[0]).toBe(`Unknown command "publish"\n${USAGE}`);

    expect(await main(["build", "--bogus"], { cwd: "/", logger })).toBe(1);
    expect(await main([], { cwd: "/", logger })).toBe(1);
  });

  test("dev rejects an invalid port before starting", async () => {
    const { logger, errors } = captureLogger();
    expect(await main(["dev", "--port", "http"], { cwd: "/", logger })).toBe(1);
    expect(errors).toEqual(['Invalid --port "http"']);
  });
});
