import { readdir, stat } from "fs/promises";
import { isAbsolute, relative, resolve, sep } from "path";
import type { BuildOptions } from "../config";
import { SourceRootError, type BuildWarning } from "../errors";
import { BOOK_MARKER, classify } from "./classify";
import { IgnoreRules } from "./ignore";
import type { BookProject, SourceEntry } from "./model";

export interface ScanResult {
  entries: SourceEntry[];
  books: BookProject[];
  warnings: BuildWarning[];
}

export type ScanOptions = Pick<BuildOptions, "source" | "templates" | "target" | "ignore" | "configFile" | "book">;

export function toPosix(path: string): string {
  return sep === "/" ? path : path.split(sep).join("/");
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/** Walk the source tree and classify every file that survives the ignore rules. */
export async function scanSource(opts: ScanOptions): Promise<ScanResult> {
  const source = resolve(opts.source);
  const templates = resolve(opts.templates);
  const excluded = new Set([resolve(opts.target)]);
  if (opts.configFile) excluded.add(resolve(opts.configFile));
  // The shared book theme is compiler input, not site content.
  if (opts.book.theme) excluded.add(resolve(opts.book.theme));

  try {
    const info = await stat(source);
    if (!info.isDirectory()) {
      throw new SourceRootError(`Source root is not a directory: ${source}`);
    }
  } catch (err) {
    if (err instanceof SourceRootError) throw err;
    throw new SourceRootError(`Source root is unreadable: ${source}`, { cause: err });
  }

  const result: ScanResult = { entries: [], books: [], warnings: [] };
  await walk(source, "", IgnoreRules.fromPatterns(opts.ignore));
  return result;

  async function walk(dir: string, relativeDir: string, parentRules: IgnoreRules): Promise<void> {
    const rules = await parentRules.descend(dir, relativeDir);
    const dirents = await readdir(dir, { withFileTypes: true });
    const names = dirents.map((d) => d.name).sort();
    const siblings = new Set(names);

    if (siblings.has(BOOK_MARKER)) {
      result.books.push({ root: dir, relativePath: relativeDir, marker: resolve(dir, BOOK_MARKER) });
      return;
    }

    const inTemplates = isWithin(templates, dir);

    for (const name of names) {
      const absolutePath = resolve(dir, name);
      if (excluded.has(absolutePath)) continue;

      const relativePath = relativeDir ? `${relativeDir}/${name}` : name;
      const info = await stat(absolutePath);

      if (info.isDirectory()) {
        if (rules.ignores(relativePath, true)) continue;
        await walk(absolutePath, relativePath, rules);
        continue;
      }

      if (!info.isFile()) continue;

      const classification = classify({
        relativePath,
        siblings,
        inTemplates,
        ignored: rules.ignores(relativePath, false),
      });

      if (classification.warning) result.warnings.push(classification.warning);
      if (classification.kind === "ignored") continue;

      result.entries.push({
        absolutePath,
        relativePath,
        kind: classification.kind,
        mtimeMs: info.mtimeMs,
        format: classification.format,
        owner: classification.owner,
        collidesWith: classification.collidesWith,
      });
    }
  }
}
