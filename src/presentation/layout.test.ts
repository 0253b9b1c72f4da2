import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { AncestorIndex } from "../build/ancestors";
import { DestinationPlanner } from "../build/destination";
import { scanSource } from "../content/scan";
import { DataResolver } from "../data/resolve";
import { LayoutValidationError } from "../errors";
import { FixtureProject } from "../testing/fixtures";
import { LayoutResolver } from "./layout";

describe("LayoutResolver", () => {
  let project: FixtureProject;
  let index: AncestorIndex;
  let data: DataResolver;
  let layouts: LayoutResolver;

  beforeAll(async () => {
    project = await FixtureProject.create("layouts", {
      "layout.njk": "<main>{{ content }}</main>",
      "page.md": "Root page\n",
      "solo.md": "---\nstandalone: true\n---\nSolo\n",
      "docs/layout.njk": "<div>{{ content }}</div>",
      "docs/guide.md": "Guide\n",
      "docs/api/layout.njk": "---\ninherit: true\n---\n<section>{{ content }}</section>",
      "docs/api/ref.md": "Ref\n",
      "docs/api/solo.md": "---\nstandalone: true\n---\n",
      "notes/layout.njk": "---\ninherit: maybe\n---\n<aside>{{ content }}</aside>",
      "notes/n.md": "Note\n",
      "templates/wide.njk": "---\ninherit: true\n---\n<div class=\"wide\">{{ content }}</div>",
      "special.md": "---\nlayout: templates/wide.njk\n---\n",
      "missing.md": "---\nlayout: templates/nope.njk\n---\n",
      "loop.md": "---\nlayout: page.md\n---\n",
    });

    const scan = await scanSource(project.options());
    index = new AncestorIndex(scan.entries);
    const documents = scan.entries.filter((entry) => entry.kind === "document").map((entry) => entry.relativePath);
    data = new DataResolver({
      index,
      planner: new DestinationPlanner(documents, "clean"),
      globals: {},
      siteName: "layouts",
    });
    layouts = new LayoutResolver(index);
  });

  afterAll(async () => {
    await project.dispose();
  });

  async function chainFor(path: string): Promise<string[]> {
    const entry = index.byPath.get(path);
    if (!entry) throw new Error(`missing fixture ${path}`);
    const { chain } = await layouts.resolve(await data.resolve(entry));
    return chain.map((layout) => layout.source.path);
  }

  test("takes the nearest layout and stops there by default", async () => {
    expect(await chainFor("page.md")).toEqual(["layout.njk"]);
    expect(await chainFor("docs/guide.md")).toEqual(["docs/layout.njk"]);
  });

  test("inherit: true continues to the next ancestor layout", async () => {
    expect(await chainFor("docs/api/ref.md")).toEqual(["docs/api/layout.njk", "docs/layout.njk"]);
  });

  test("standalone documents get an empty chain", async () => {
    expect(await chainFor("solo.md")).toEqual([]);
    expect(await chainFor("docs/api/solo.md")).toEqual([]);
  });

  test("a non-boolean inherit stops the walk with a warning", async () => {
    expect(await chainFor("notes/n.md")).toEqual(["notes/layout.njk"]);
    expect(index.warnings.map((warning) => warning.path)).toContain("notes/layout.njk");
  });

  test("an explicit layout comes first and may inherit the directory layout", async () => {
    expect(await chainFor("special.md")).toEqual(["templates/wide.njk", "layout.njk"]);
  });

  test("a missing explicit layout falls back with a warning", async () => {
    const entry = index.byPath.get("missing.md");
    if (!entry) throw new Error("missing fixture");
    const result = await layouts.resolve(await data.resolve(entry));
    expect(result.chain.map((layout) => layout.source.path)).toEqual(["layout.njk"]);
    expect(result.warnings.map((warning) => warning.code)).toEqual(["missing-layout"]);
  });

  test("a document cannot be used as a layout", async () => {
    await expect(chainFor("loop.md")).rejects.toBeInstanceOf(LayoutValidationError);
  });
});
