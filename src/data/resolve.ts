import { basename, posix } from "path";
import { INDEX_STEM } from "../content/classify";
import { readDataFragment, readTemplateFile } from "../content/load";
import type { SourceEntry } from "../content/model";
import { ancestorDirectories, type AncestorIndex, type Dependency } from "../build/ancestors";
import type { DestinationPlanner } from "../build/destination";
import { ReservedKeyError, type BuildWarning } from "../errors";
import { humanize } from "../presentation/text";
import { mergeData, type DataTable } from "./value";

/** Keys the renderer fills in itself */
export const RESERVED_KEYS = ["context", "content"] as const;

export interface ResolvedContext {
  document: SourceEntry;
  data: DataTable;
  title: string;
  standalone: boolean;
  draft: boolean;
  /** Explicit layout path relative to the source root */
  layout?: string;
  /** Destination path relative to the destination root */
  destination: string;
  /** Template body with frontmatter removed */
  body: string;
  /** Data fragments that fed `data` */
  dependencies: Dependency[];
  warnings: BuildWarning[];
}

export interface DataResolverOptions {
  index: AncestorIndex;
  planner: DestinationPlanner;
  /** Global data from the project config */
  globals: DataTable;
  /** Project directory name, used as the title of the root index */
  siteName: string;
}

function assertNoReservedKeys(data: DataTable, document: string, origin: string): void {
  for (const key of RESERVED_KEYS) {
    if (key in data) throw new ReservedKeyError(document, key, origin);
  }
}

/** Title from the file name; index documents take their directory's name */
export function inferTitle(relativePath: string, siteName: string): string {
  const stem = posix.basename(relativePath, posix.extname(relativePath));
  if (stem !== INDEX_STEM) return humanize(stem);
  const dir = posix.dirname(relativePath);
  return humanize(dir === "." ? siteName : posix.basename(dir));
}

/** Keys a directory's `pages` table may use for a document in or below it */
function overrideKeys(document: string, dir: string): string[] {
  const local = dir ? document.slice(dir.length + 1) : document;
  const stemmed = local.slice(0, local.length - posix.extname(local).length);
  return local === stemmed ? [local] : [local, stemmed];
}

export class DataResolver {
  private readonly options: DataResolverOptions;

  constructor(options: DataResolverOptions) {
    this.options = options;
  }

  static siteNameFor(projectRoot: string): string {
    return basename(projectRoot);
  }

  async resolve(document: SourceEntry): Promise<ResolvedContext> {
    const { index, globals } = this.options;
    const path = document.relativePath;
    const warnings: BuildWarning[] = [];
    const dependencies: Dependency[] = [];
    const layers: DataTable[] = [];
    const overrides: DataTable[] = [];

    assertNoReservedKeys(globals, path, "the project config data");
    layers.push(globals);

    for (const dir of ancestorDirectories(path)) {
      const fragment = await index.data.get(dir);
      if (!fragment) continue;
      dependencies.push(fragment.source);
      assertNoReservedKeys(fragment.data, path, fragment.source.path);
      layers.push(fragment.data);

      for (const key of overrideKeys(path, dir)) {
        const override = fragment.pages[key];
        if (!override) continue;
        assertNoReservedKeys(override, path, `${fragment.source.path} pages.${key}`);
        overrides.push(override);
      }
    }

    const own = index.fragmentsByOwner.get(path);
    if (own) {
      const data = await readDataFragment(own.absolutePath, own.relativePath);
      assertNoReservedKeys(data, path, own.relativePath);
      overrides.push(data);
      dependencies.push({ path: own.relativePath, mtimeMs: own.mtimeMs });
    }

    const { frontmatter, body } = await readTemplateFile(document.absolutePath, path);
    assertNoReservedKeys(frontmatter, path, `the frontmatter of ${path}`);

    const data = mergeData(...layers, ...overrides, frontmatter);
    const nearestFirst = [frontmatter, ...overrides.slice().reverse(), ...layers.slice().reverse()];

    // A non-boolean value is skipped; the nearest valid boolean below it applies.
    const flag = (key: string): boolean | undefined => {
      let invalid = false;
      let found: boolean | undefined;
      for (const layer of nearestFirst) {
        const value = layer[key];
        if (value === undefined) continue;
        if (typeof value === "boolean") {
          found = value;
          break;
        }
        invalid = true;
      }
      if (invalid) {
        warnings.push({ code: "invalid-flag", message: `"${key}" in ${path} must be a boolean; ignoring it`, path });
      }
      return found;
    };

    const standalone = flag("standalone") ?? false;
    const draft = flag("draft") ?? false;
    const cleanUrl = flag("cleanUrl");

    let layout: string | undefined;
    if (data.layout !== undefined) {
      if (typeof data.layout === "string" && data.layout.length > 0) {
        layout = data.layout.replace(/^\/+/, "");
      } else {
        warnings.push({ code: "invalid-flag", message: `"layout" in ${path} must be a path; ignoring it`, path });
      }
    }

    const title =
      typeof data.title === "string" || typeof data.title === "number"
        ? String(data.title)
        : inferTitle(path, this.options.siteName);

    return {
      document,
      data: { ...data, title },
      title,
      standalone,
      draft,
      layout,
      destination: this.options.planner.plan(path, "document", cleanUrl),
      body,
      dependencies,
      warnings,
    };
  }
}
