import { createHash } from "crypto";
import { mkdir, readFile, rename, stat, writeFile } from "fs/promises";
import { dirname, resolve } from "path";
import { z } from "zod";
import { isMissing } from "../content/ignore";
import { DestinationError, ManifestCorruptError, errorMessage, type BuildWarning } from "../errors";
import type { Dependency } from "./ancestors";

export const MANIFEST_FILE = ".pagewright-manifest.json";
const MANIFEST_VERSION = 1;

const dependencySchema = z.object({
  path: z.string(),
  mtimeMs: z.number(),
});

const entrySchema = z.object({
  source: z.string(),
  mtimeMs: z.number(),
  destination: z.string(),
  hash: z.string().optional(),
  dependencies: z.array(dependencySchema).default([]),
});

const manifestSchema = z.object({
  version: z.literal(MANIFEST_VERSION),
  tag: z.string(),
  renderKey: z.string().default(""),
  entries: z.array(entrySchema),
});

export type ManifestEntry = z.infer<typeof entrySchema>;

export interface ManifestOptions {
  /** Destination root for the tag */
  destination: string;
  tag: string;
  force: boolean;
  /** Digest of the build-wide render inputs; a change makes every entry stale */
  renderKey?: string;
}

export async function hashFile(path: string): Promise<string> {
  const content = await readFile(path);
  return createHash("sha256").update(content).digest("hex");
}

function canonical(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonical);
  if (value !== null && typeof value === "object") {
    return Object.fromEntries(
      Object.entries(value)
        .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
        .map(([key, item]) => [key, canonical(item)])
    );
  }
  return value;
}

/** SHA-256 of `inputs` serialized with sorted keys */
export function renderKeyFor(inputs: Record<string, unknown>): string {
  return createHash("sha256").update(JSON.stringify(canonical(inputs))).digest("hex");
}

function sameDependencies(a: Dependency[], b: Dependency[]): boolean {
  if (a.length !== b.length) return false;
  const previous = new Map(a.map((dep) => [dep.path, dep.mtimeMs]));
  return b.every((dep) => previous.get(dep.path) === dep.mtimeMs);
}

/**
 * Source-to-destination records for one output tag. Renders stage entries
 * with `record`; `save` is the single write at the end of the pass.
 */
export class BuildManifest {
  readonly path: string;
  private readonly options: ManifestOptions;
  private readonly previous: Map<string, ManifestEntry>;
  private readonly staged = new Map<string, ManifestEntry>();
  /** The saved render key differs from this pass's */
  readonly inputsChanged: boolean;

  private constructor(options: ManifestOptions, entries: ManifestEntry[], savedKey = options.renderKey ?? "") {
    this.options = options;
    this.inputsChanged = savedKey !== (options.renderKey ?? "");
    this.path = resolve(options.destination, MANIFEST_FILE);
    this.previous = new Map(entries.map((entry) => [entry.source, entry]));
  }

  static empty(options: ManifestOptions): BuildManifest {
    return new BuildManifest(options, []);
  }

  /**
   * A missing file is an empty manifest. An unreadable or invalid one is fatal,
   * unless `force` is set, in which case it is discarded with a warning.
   */
  static async load(options: ManifestOptions): Promise<{ manifest: BuildManifest; warning?: BuildWarning }> {
    const path = resolve(options.destination, MANIFEST_FILE);
    let raw: string;
    try {
      raw = await readFile(path, "utf8");
    } catch (err) {
      if (isMissing(err)) return { manifest: BuildManifest.empty(options) };
      throw new ManifestCorruptError(`Cannot read manifest ${path}`, { cause: err });
    }

    try {
      const parsed = manifestSchema.parse(JSON.parse(raw));
      if (parsed.tag !== options.tag) {
        throw new Error(`manifest belongs to tag "${parsed.tag}"`);
      }
      return { manifest: new BuildManifest(options, parsed.entries, parsed.renderKey) };
    } catch (err) {
      if (!options.force) {
        throw new ManifestCorruptError(`Manifest ${path} is corrupt: ${errorMessage(err)}`, { cause: err });
      }
      return {
        manifest: BuildManifest.empty(options),
        warning: { code: "manifest-discarded", message: `Discarded corrupt manifest ${path}` },
      };
    }
  }

  get(source: string): ManifestEntry | undefined {
    return this.staged.get(source) ?? this.previous.get(source);
  }

  get size(): number {
    return this.entries().length;
  }

  /**
   * Whether `candidate` must be rendered. With a hash on the candidate the
   * source comparison uses content instead of modification time.
   */
  async isStale(candidate: ManifestEntry): Promise<boolean> {
    if (this.options.force || this.inputsChanged) return true;

    const previous = this.previous.get(candidate.source);
    if (!previous) return true;
    if (previous.destination !== candidate.destination) return true;

    if (candidate.hash !== undefined) {
      if (previous.hash !== candidate.hash) return true;
    } else if (previous.mtimeMs !== candidate.mtimeMs) {
      return true;
    }

    if (!sameDependencies(previous.dependencies, candidate.dependencies)) return true;

    try {
      await stat(resolve(this.options.destination, candidate.destination));
    } catch (err) {
      if (isMissing(err)) return true;
      throw err;
    }
    return false;
  }

  record(entry: ManifestEntry): void {
    this.staged.set(entry.source, entry);
  }

  /** Entries as they will be saved: staged entries win over previous ones */
  entries(): ManifestEntry[] {
    const merged = new Map(this.previous);
    for (const [source, entry] of this.staged) merged.set(source, entry);
    return Array.from(merged.values()).sort((a, b) => (a.source < b.source ? -1 : a.source > b.source ? 1 : 0));
  }

  /** Forget entries whose source no longer exists */
  prune(sources: ReadonlySet<string>): void {
    for (const source of Array.from(this.previous.keys())) {
      if (!sources.has(source)) this.previous.delete(source);
    }
    for (const source of Array.from(this.staged.keys())) {
      if (!sources.has(source)) this.staged.delete(source);
    }
  }

  async save(): Promise<void> {
    const body = {
      version: MANIFEST_VERSION,
      tag: this.options.tag,
      renderKey: this.options.renderKey ?? "",
      entries: this.entries(),
    };
    const temp = `${this.path}.tmp`;
    try {
      await mkdir(dirname(this.path), { recursive: true });
      await writeFile(temp, `${JSON.stringify(body, null, 2)}\n`);
      await rename(temp, this.path);
    } catch (err) {
      throw new DestinationError(`Cannot write manifest ${this.path}`, { cause: err });
    }
  }
}
