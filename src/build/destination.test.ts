import { describe, expect, test } from "vitest";
import { DestinationPlanner, hrefFor } from "./destination";

describe("DestinationPlanner", () => {
  const documents = ["index.md", "about.md", "about/index.md", "docs/a.html", "blog/post.md", "blog/index.html"];

  test("clean URLs give every page its own directory", () => {
    const planner = new DestinationPlanner(documents, "clean");
    expect(planner.plan("blog/post.md", "document")).toBe("blog/post/index.html");
    expect(planner.plan("docs/a.html", "document")).toBe("docs/a/index.html");
  });

  test("extension-preserving policy keeps the stem", () => {
    const planner = new DestinationPlanner(documents, "preserve");
    expect(planner.plan("about.md", "document")).toBe("about.html");
    expect(planner.plan("docs/a.html", "document")).toBe("docs/a.html");
  });

  test("index documents always map to their directory index", () => {
    for (const policy of ["clean", "preserve"] as const) {
      const planner = new DestinationPlanner(documents, policy);
      expect(planner.plan("index.md", "document")).toBe("index.html");
      expect(planner.plan("about/index.md", "document")).toBe("about/index.html");
      expect(planner.plan("blog/index.html", "document")).toBe("blog/index.html");
    }
  });

  test("a page whose directory has an index is demoted to stem.html", () => {
    const planner = new DestinationPlanner(documents, "clean");
    expect(planner.hasIndexFor("", "about")).toBe(true);
    expect(planner.plan("about.md", "document")).toBe("about.html");
  });

  test("a per-document flag overrides the policy", () => {
    expect(new DestinationPlanner(documents, "clean").plan("blog/post.md", "document", false)).toBe("blog/post.html");
    expect(new DestinationPlanner(documents, "preserve").plan("blog/post.md", "document", true)).toBe(
      "blog/post/index.html"
    );
  });

  test("assets keep their path", () => {
    const planner = new DestinationPlanner(documents, "clean");
    expect(planner.plan("css/site.css", "passthrough")).toBe("css/site.css");
  });
});

describe("hrefFor", () => {
  test("directory indexes link to the directory", () => {
    expect(hrefFor("index.html")).toBe("/");
    expect(hrefFor("about/index.html")).toBe("/about/");
    expect(hrefFor("about.html")).toBe("/about.html");
  });
});
