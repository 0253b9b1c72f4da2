import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { AncestorIndex } from "../build/ancestors";
import { DestinationPlanner } from "../build/destination";
import { scanSource } from "../content/scan";
import { DataFragmentError, ReservedKeyError } from "../errors";
import { FixtureProject } from "../testing/fixtures";
import { DataResolver, inferTitle } from "./resolve";

describe("inferTitle", () => {
  test("humanizes the file stem", () => {
    expect(inferTitle("about.md", "site")).toBe("About");
    expect(inferTitle("docs/getting-started_guide.md", "site")).toBe("Getting Started Guide");
  });

  test("index documents take their directory name", () => {
    expect(inferTitle("blog/index.md", "site")).toBe("Blog");
    expect(inferTitle("index.html", "my-project")).toBe("My Project");
  });
});

describe("DataResolver", () => {
  let project: FixtureProject;
  let resolver: DataResolver;
  let index: AncestorIndex;

  beforeAll(async () => {
    project = await FixtureProject.create("data-site", {
      "_data.yml": [
        "author: Root",
        "site:",
        "  name: Example",
        "  lang: en",
        "pages:",
        "  about:",
        "    tagline: from pages",
        "",
      ].join("\n"),
      "index.md": "# Home\n",
      "about.md": "---\ntitle: About us\n---\nAbout\n",
      "about.yml": "tagline: from fragment\ncolor: blue\n",
      "blog/_data.yml": "author: Blog Team\nsite:\n  name: Blog\n",
      "blog/index.md": "Posts\n",
      "blog/post.md": "---\ndraft: true\nstandalone: yes\n---\nBody\n",
      "guides/_data.yml": "standalone: true\n",
      "guides/page.md": "---\nstandalone: maybe\n---\nGuide\n",
      "broken/_data.yml": "key: [unclosed\n",
      "broken/page.md": "Broken\n",
      "reserved.md": "---\ncontent: nope\n---\n",
      "explicit.md": "---\nlayout: /templates/wide.njk\ncleanUrl: false\n---\n",
    });

    const options = project.options();
    const scan = await scanSource(options);
    index = new AncestorIndex(scan.entries);
    const documents = scan.entries.filter((entry) => entry.kind === "document").map((entry) => entry.relativePath);
    resolver = new DataResolver({
      index,
      planner: new DestinationPlanner(documents, "clean"),
      globals: { generator: "pagewright", author: "Config" },
      siteName: DataResolver.siteNameFor(project.root),
    });
  });

  afterAll(async () => {
    await project.dispose();
  });

  function entry(path: string) {
    const found = index.byPath.get(path);
    if (!found) throw new Error(`missing fixture ${path}`);
    return found;
  }

  test("a root key is overridden in a subdirectory only", async () => {
    const post = await resolver.resolve(entry("blog/index.md"));
    const home = await resolver.resolve(entry("index.md"));
    expect(post.data.author).toBe("Blog Team");
    expect(post.data.site).toEqual({ name: "Blog", lang: "en" });
    expect(home.data.author).toBe("Root");
    expect(home.data.generator).toBe("pagewright");
  });

  test("pages overrides, the own fragment and frontmatter apply in that order", async () => {
    const about = await resolver.resolve(entry("about.md"));
    expect(about.data.tagline).toBe("from fragment");
    expect(about.data.color).toBe("blue");
    expect(about.title).toBe("About us");
    expect(about.dependencies.map((dep) => dep.path)).toEqual(["_data.yml", "about.yml"]);
    expect(about.data.pages).toBeUndefined();
  });

  test("titles are inferred when absent", async () => {
    expect((await resolver.resolve(entry("blog/index.md"))).title).toBe("Blog");
    expect((await resolver.resolve(entry("index.md"))).title).toBe("Data Site");
  });

  test("non-boolean flags are ignored with a warning", async () => {
    const post = await resolver.resolve(entry("blog/post.md"));
    expect(post.draft).toBe(true);
    expect(post.standalone).toBe(false);
    expect(post.warnings.map((warning) => warning.code)).toEqual(["invalid-flag"]);
  });

  test("an invalid flag falls back to the inherited boolean", async () => {
    const page = await resolver.resolve(entry("guides/page.md"));
    expect(page.standalone).toBe(true);
    expect(page.warnings).toEqual([
      { code: "invalid-flag", message: '"standalone" in guides/page.md must be a boolean; ignoring it', path: "guides/page.md" },
    ]);
  });

  test("layout and cleanUrl come from the resolved data", async () => {
    const explicit = await resolver.resolve(entry("explicit.md"));
    expect(explicit.layout).toBe("templates/wide.njk");
    expect(explicit.destination).toBe("explicit.html");
    expect((await resolver.resolve(entry("about.md"))).destination).toBe("about/index.html");
  });

  test("a reserved key fails the document", async () => {
    await expect(resolver.resolve(entry("reserved.md"))).rejects.toBeInstanceOf(ReservedKeyError);
  });

  test("a malformed directory fragment fails documents beneath it", async () => {
    await expect(resolver.resolve(entry("broken/page.md"))).rejects.toBeInstanceOf(DataFragmentError);
  });

  test("each directory fragment is loaded once per pass", async () => {
    await Promise.all([resolver.resolve(entry("blog/index.md")), resolver.resolve(entry("blog/post.md"))]);
    const first = index.data.get("blog");
    expect(index.data.get("blog")).toBe(first);
  });
});
