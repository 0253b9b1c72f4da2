import matter from "gray-matter";
import { readFile } from "fs/promises";
import { parse as parseYaml } from "yaml";
import { toDataTable, type DataTable } from "../data/value";
import { DataFragmentError, errorMessage } from "../errors";

export interface TemplateSource {
  frontmatter: DataTable;
  body: string;
}

/**
 * Read a document or layout and split off its YAML frontmatter.
 * `origin` is the source-relative path used in error messages.
 */
export async function readTemplateFile(filePath: string, origin: string): Promise<TemplateSource> {
  const raw = await readFile(filePath, "utf8");
  let parsed: matter.GrayMatterFile<string>;
  try {
    // An options object keeps gray-matter from serving a cached result for identical input.
    parsed = matter(raw, {});
  } catch (err) {
    throw new DataFragmentError(origin, `Malformed frontmatter in ${origin}: ${errorMessage(err)}`, { cause: err });
  }
  return { frontmatter: toDataTable(parsed.data, origin), body: parsed.content };
}

/** Parse a YAML data fragment; an empty file is an empty table. */
export function parseDataFragment(text: string, origin: string): DataTable {
  let data: unknown;
  try {
    data = parseYaml(text);
  } catch (err) {
    throw new DataFragmentError(origin, `Malformed data fragment ${origin}: ${errorMessage(err)}`, { cause: err });
  }
  return toDataTable(data, origin);
}

export async function readDataFragment(filePath: string, origin: string): Promise<DataTable> {
  return parseDataFragment(await readFile(filePath, "utf8"), origin);
}
