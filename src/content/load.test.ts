import { afterAll, beforeAll, describe, expect, test } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { resolve } from "path";
import { DataFragmentError } from "../errors";
import { parseDataFragment, readDataFragment, readTemplateFile } from "./load";

describe("source loading", () => {
  let dir: string;

  beforeAll(async () => {
    dir = await mkdtemp(resolve(tmpdir(), "pagewright-load-"));
    await writeFile(resolve(dir, "post.md"), "---\ntitle: Hello\ndate: 2024-03-05\ntags: [a, b]\n---\nBody\n");
    await writeFile(resolve(dir, "plain.html"), "<p>No frontmatter</p>");
    await writeFile(resolve(dir, "broken.md"), "---\ntitle: [unclosed\n---\nBody\n");
    await writeFile(resolve(dir, "data.yml"), "menu:\n  - Home\n  - About\n");
  });

  afterAll(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test("splits frontmatter from the body", async () => {
    const source = await readTemplateFile(resolve(dir, "post.md"), "post.md");
    expect(source.frontmatter).toEqual({ title: "Hello", date: "2024-03-05T00:00:00.000Z", tags: ["a", "b"] });
    expect(source.body).toBe("Body\n");
  });

  test("a file without frontmatter is all body", async () => {
    const source = await readTemplateFile(resolve(dir, "plain.html"), "plain.html");
    expect(source).toEqual({ frontmatter: {}, body: "<p>No frontmatter</p>" });
  });

  test("malformed frontmatter names the file", async () => {
    const result = readTemplateFile(resolve(dir, "broken.md"), "broken.md");
    await expect(result).rejects.toBeInstanceOf(DataFragmentError);
    await expect(readTemplateFile(resolve(dir, "broken.md"), "broken.md")).rejects.toThrow(
      /^Malformed frontmatter in broken\.md: /
    );
  });

  test("data fragments parse to tables", async () => {
    expect(await readDataFragment(resolve(dir, "data.yml"), "data.yml")).toEqual({ menu: ["Home", "About"] });
    expect(parseDataFragment("", "empty.yml")).toEqual({});
    expect(parseDataFragment("# only a comment\n", "empty.yml")).toEqual({});
  });

  test("fragments must be well-formed tables", () => {
    expect(() => parseDataFragment("key: [unclosed\n", "bad.yml")).toThrow(/^Malformed data fragment bad\.yml: /);
    expect(() => parseDataFragment("- a\n- b\n", "list.yml")).toThrow("Expected a table of key/value pairs");
    expect(() => parseDataFragment("- a\n", "list.yml")).toThrow(DataFragmentError);
  });
});
