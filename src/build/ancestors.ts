import { posix } from "path";
import { DIRECTORY_DATA_FILES, LAYOUT_FILE } from "../content/classify";
import { readDataFragment, readTemplateFile } from "../content/load";
import type { SourceEntry } from "../content/model";
import { isDataTable, type DataTable } from "../data/value";
import { DataFragmentError, type BuildWarning } from "../errors";

/**
 * Memoises one async load per directory for a build pass. The first caller
 * starts the load and every later caller awaits the same promise, so each
 * directory is read exactly once even when documents resolve concurrently.
 */
export class DirectoryCache<T> {
  private readonly entries = new Map<string, Promise<T>>();
  private readonly load: (dir: string) => Promise<T>;

  constructor(load: (dir: string) => Promise<T>) {
    this.load = load;
  }

  get(dir: string): Promise<T> {
    let pending = this.entries.get(dir);
    if (!pending) {
      pending = this.load(dir);
      this.entries.set(dir, pending);
    }
    return pending;
  }

  get size(): number {
    return this.entries.size;
  }
}

export interface Dependency {
  /** Source-relative path */
  path: string;
  mtimeMs: number;
}

export interface DirectoryData {
  source: Dependency;
  data: DataTable;
  /** Per-document overrides keyed by a path relative to the fragment's directory */
  pages: Record<string, DataTable>;
}

export interface LayoutTemplate {
  source: Dependency;
  absolutePath: string;
  body: string;
  /** Continue to the next ancestor layout after this one */
  inherit: boolean;
}

/** `a/b/c.md` -> ["", "a", "a/b"], root first */
export function ancestorDirectories(relativePath: string): string[] {
  const dir = posix.dirname(relativePath);
  if (dir === ".") return [""];
  const parts = dir.split("/");
  return ["", ...parts.map((_, i) => parts.slice(0, i + 1).join("/"))];
}

export function joinRelative(dir: string, name: string): string {
  return dir ? `${dir}/${name}` : name;
}

/**
 * Source entries indexed by path, plus the per-directory data and layout
 * caches that DataResolver and LayoutResolver share within one pass.
 */
export class AncestorIndex {
  readonly byPath: ReadonlyMap<string, SourceEntry>;
  readonly fragmentsByOwner: ReadonlyMap<string, SourceEntry>;
  readonly warnings: BuildWarning[] = [];
  readonly data: DirectoryCache<DirectoryData | null>;
  readonly layouts: DirectoryCache<LayoutTemplate | null>;
  readonly templates = new DirectoryCache<LayoutTemplate>((path) => this.loadTemplate(path));

  constructor(entries: SourceEntry[]) {
    this.byPath = new Map(entries.map((entry) => [entry.relativePath, entry]));
    this.fragmentsByOwner = new Map(
      entries.filter((entry) => entry.kind === "data" && entry.owner).map((entry) => [entry.owner ?? "", entry])
    );
    this.data = new DirectoryCache((dir) => this.loadDirectoryData(dir));
    this.layouts = new DirectoryCache(async (dir) => {
      const entry = this.byPath.get(joinRelative(dir, LAYOUT_FILE));
      return entry?.kind === "layout" ? this.templates.get(entry.relativePath) : null;
    });
  }

  private async loadDirectoryData(dir: string): Promise<DirectoryData | null> {
    const entry = DIRECTORY_DATA_FILES.map((name) => this.byPath.get(joinRelative(dir, name))).find(
      (candidate) => candidate?.kind === "data"
    );
    if (!entry) return null;

    const { pages, ...data } = await readDataFragment(entry.absolutePath, entry.relativePath);
    const overrides: Record<string, DataTable> = {};
    if (pages !== undefined) {
      if (!isDataTable(pages)) {
        throw new DataFragmentError(entry.relativePath, `"pages" in ${entry.relativePath} must be a table`);
      }
      for (const [key, value] of Object.entries(pages)) {
        if (!isDataTable(value)) {
          throw new DataFragmentError(entry.relativePath, `"pages.${key}" in ${entry.relativePath} must be a table`);
        }
        overrides[key] = value;
      }
    }

    return {
      source: { path: entry.relativePath, mtimeMs: entry.mtimeMs },
      data,
      pages: overrides,
    };
  }

  /** Load any template file (layout or partial) by source-relative path */
  private async loadTemplate(relativePath: string): Promise<LayoutTemplate> {
    const entry = this.byPath.get(relativePath);
    if (!entry) {
      throw new DataFragmentError(relativePath, `Layout ${relativePath} does not exist`);
    }

    const { frontmatter, body } = await readTemplateFile(entry.absolutePath, entry.relativePath);
    let inherit = false;
    if (frontmatter.inherit !== undefined) {
      if (typeof frontmatter.inherit === "boolean") {
        inherit = frontmatter.inherit;
      } else {
        this.warnings.push({
          code: "invalid-flag",
          message: `"inherit" in ${relativePath} must be a boolean; ignoring it`,
          path: relativePath,
        });
      }
    }

    return {
      source: { path: entry.relativePath, mtimeMs: entry.mtimeMs },
      absolutePath: entry.absolutePath,
      body,
      inherit,
    };
  }
}
