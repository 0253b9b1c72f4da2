import { posix } from "path";
import { DOCUMENT_EXTENSIONS, INDEX_STEM } from "../content/classify";
import type { SourceKind } from "../content/model";
import { joinRelative } from "./ancestors";

export type UrlPolicy = "clean" | "preserve";

/**
 * Maps source paths to destination paths. Constructed with the set of every
 * document in the pass so the clean-URL conflict rule is decided from the
 * scan, not from whatever happens to exist on disk.
 */
export class DestinationPlanner {
  private readonly documents: ReadonlySet<string>;
  private readonly policy: UrlPolicy;

  constructor(documents: Iterable<string>, policy: UrlPolicy) {
    this.documents = new Set(documents);
    this.policy = policy;
  }

  /** True when `<dir>/<stem>/index.md` (or `.html`) is a document of this pass */
  hasIndexFor(dir: string, stem: string): boolean {
    const base = joinRelative(joinRelative(dir, stem), INDEX_STEM);
    return DOCUMENT_EXTENSIONS.some((ext) => this.documents.has(`${base}${ext}`));
  }

  /**
   * `cleanUrl` overrides the planner's policy for one document.
   */
  plan(relativePath: string, kind: SourceKind, cleanUrl?: boolean): string {
    if (kind !== "document") {
      return relativePath;
    }

    const dir = posix.dirname(relativePath) === "." ? "" : posix.dirname(relativePath);
    const stem = posix.basename(relativePath, posix.extname(relativePath));

    if (stem === INDEX_STEM) {
      return joinRelative(dir, "index.html");
    }

    const clean = cleanUrl ?? this.policy === "clean";
    if (!clean || this.hasIndexFor(dir, stem)) {
      return joinRelative(dir, `${stem}.html`);
    }

    return joinRelative(joinRelative(dir, stem), "index.html");
  }
}

/** Site-relative link for a destination path: `about/index.html` -> `/about/` */
export function hrefFor(destination: string): string {
  if (destination === "index.html") return "/";
  if (destination.endsWith("/index.html")) {
    return `/${destination.slice(0, -"index.html".length)}`;
  }
  return `/${destination}`;
}
