import { existsSync } from "fs";
import { basename, resolve } from "path";
import { pathToFileURL } from "url";
import { z } from "zod";
import { toDataTable, type DataTable } from "./data/value";
import { ConfigError, DataFragmentError, type BuildWarning } from "./errors";

export const STALENESS_VALUES = ["mtime", "hash"] as const;
export type Staleness = (typeof STALENESS_VALUES)[number];

export const DEBUG_TAG = "debug";
export const RELEASE_TAG = "release";
export const DEFAULT_PORT = 8080;
export const DEFAULT_DEBOUNCE_MS = 50;

export interface PagewrightConfig {
  /** Source directory, relative to the project root */
  source?: string;
  /** Build directory; each output tag writes into its own subdirectory */
  target?: string;
  /** Reserved partials directory, relative to the source directory */
  templates?: string;
  /** Write `about.md` as `about/index.html` */
  cleanUrls?: boolean;
  /** Global template data (lowest precedence) */
  data?: Record<string, unknown>;
  /** Extra gitignore-style patterns; `!pattern` force-includes */
  ignore?: string[];
  /** Documents rendered at once */
  concurrency?: number;
  /** How unchanged sources are detected between builds */
  staleness?: Staleness;
  /** Locale used by the `date` filter */
  dateLocale?: string;
  /** Request path (`/old/`) to the location a generated page forwards to */
  redirect?: Record<string, string>;
  book?: {
    /** Theme directory (relative to the source directory) shared by every book */
    theme?: string;
    /** Book compiler executable */
    command?: string;
  };
  live?: {
    port?: number;
    /** Quiet period before a burst of file changes triggers a rebuild */
    debounceMs?: number;
  };
}

const configSchema = z
  .object({
    source: z.string().min(1),
    target: z.string().min(1),
    templates: z.string().min(1),
    cleanUrls: z.boolean(),
    data: z.record(z.unknown()),
    ignore: z.array(z.string()),
    concurrency: z.number().int().positive(),
    staleness: z.enum(STALENESS_VALUES),
    dateLocale: z.string(),
    redirect: z.record(z.string().startsWith("/", "must start with /"), z.string().min(1)),
    book: z.object({ theme: z.string().optional(), command: z.string().optional() }).strict(),
    live: z
      .object({
        port: z.number().int().min(0).max(65535).optional(),
        debounceMs: z.number().int().nonnegative().optional(),
      })
      .strict(),
  })
  .partial()
  .passthrough();

/** Identity helper for type-safe config files */
export function defineConfig(config: PagewrightConfig): PagewrightConfig {
  return config;
}

export const CONFIG_FILENAMES = ["pagewright.config.ts", "pagewright.config.mjs", "pagewright.config.js"];

export function findConfigFile(cwd: string): string | null {
  for (const name of CONFIG_FILENAMES) {
    const candidate = resolve(cwd, name);
    if (existsSync(candidate)) return candidate;
  }
  return null;
}

export interface LoadedConfig {
  config: PagewrightConfig;
  /** Absolute path of the config file, null when none exists */
  path: string | null;
  warnings: BuildWarning[];
}

/** Validate a raw config object; unknown keys are reported, not rejected. */
export function parseConfig(raw: unknown, origin = "config"): { config: PagewrightConfig; warnings: BuildWarning[] } {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `  - ${issue.path.join(".") || "(root)"}: ${issue.message}`);
    throw new ConfigError(`Invalid ${origin}:\n${issues.join("\n")}`);
  }

  const known = new Set(Object.keys(configSchema.shape));
  const { data: parsed } = result;
  const warnings: BuildWarning[] = Object.keys(parsed)
    .filter((key) => !known.has(key))
    .map((key): BuildWarning => ({ code: "unknown-config-key", message: `Unknown key "${key}" in ${origin}` }));

  return { config: pickKnown(parsed), warnings };
}

function pickKnown(parsed: z.infer<typeof configSchema>): PagewrightConfig {
  return {
    source: parsed.source,
    target: parsed.target,
    templates: parsed.templates,
    cleanUrls: parsed.cleanUrls,
    data: parsed.data,
    ignore: parsed.ignore,
    concurrency: parsed.concurrency,
    staleness: parsed.staleness,
    dateLocale: parsed.dateLocale,
    redirect: parsed.redirect,
    book: parsed.book,
    live: parsed.live,
  };
}

/** Load config from cwd, returns empty config if no config file exists */
export async function loadConfig(cwd: string): Promise<LoadedConfig> {
  const configPath = findConfigFile(cwd);
  if (!configPath) {
    return { config: {}, path: null, warnings: [] };
  }

  let mod: { default?: unknown };
  try {
    // Cache-bust dynamic import so config edits apply during long-running dev sessions.
    const cacheBust = `${Date.now()}-${Math.random().toString(36).slice(2)}`;
    const configUrl = `${pathToFileURL(configPath).href}?v=${cacheBust}`;
    mod = await import(configUrl);
  } catch (err) {
    throw new ConfigError(`Failed to load ${basename(configPath)}`, { cause: err });
  }

  const { config, warnings } = parseConfig(mod.default ?? {}, basename(configPath));
  return { config, path: configPath, warnings };
}

export interface BuildOptions {
  /** Project root; relative config paths resolve against it */
  root: string;
  source: string;
  /** Build root; the tag directory lives beneath it */
  target: string;
  /** Destination root for this tag */
  destination: string;
  templates: string;
  tag: string;
  release: boolean;
  live: boolean;
  force: boolean;
  cleanUrls: boolean;
  concurrency: number;
  staleness: Staleness;
  data: DataTable;
  ignore: string[];
  dateLocale?: string;
  redirects: Record<string, string>;
  verbose: boolean;
  /** Absolute config file path, always excluded from the scan */
  configFile: string | null;
  book: { theme?: string; command: string };
  /** Dev server settings */
  server: { port: number; debounceMs: number };
}

export interface BuildOverrides {
  tag?: string;
  release?: boolean;
  live?: boolean;
  force?: boolean;
  cleanUrls?: boolean;
  verbose?: boolean;
}

function globalData(data: Record<string, unknown> | undefined): DataTable {
  if (!data) return {};
  try {
    return toDataTable(data, "config data");
  } catch (err) {
    if (err instanceof DataFragmentError) {
      throw new ConfigError(`Invalid config data: ${err.message}`);
    }
    throw err;
  }
}

/** Combine config values, CLI overrides and built-in defaults */
export function resolveBuildOptions(
  root: string,
  loaded: Pick<LoadedConfig, "config" | "path">,
  overrides: BuildOverrides
): BuildOptions {
  const { config } = loaded;
  const release = overrides.release ?? overrides.tag === RELEASE_TAG;
  const tag = overrides.tag ?? (release ? RELEASE_TAG : DEBUG_TAG);
  const source = resolve(root, config.source ?? "site");
  const target = resolve(root, config.target ?? "build");

  return {
    root,
    source,
    target,
    destination: resolve(target, tag),
    templates: resolve(source, config.templates ?? "templates"),
    tag,
    release,
    live: overrides.live ?? false,
    force: overrides.force ?? false,
    cleanUrls: overrides.cleanUrls ?? config.cleanUrls ?? true,
    concurrency: config.concurrency ?? 8,
    staleness: config.staleness ?? "mtime",
    data: globalData(config.data),
    ignore: config.ignore ?? [],
    dateLocale: config.dateLocale,
    redirects: config.redirect ?? {},
    verbose: overrides.verbose ?? false,
    configFile: loaded.path,
    book: {
      theme: config.book?.theme ? resolve(source, config.book.theme) : undefined,
      command: config.book?.command ?? "mdbook",
    },
    server: {
      port: config.live?.port ?? DEFAULT_PORT,
      debounceMs: config.live?.debounceMs ?? DEFAULT_DEBOUNCE_MS,
    },
  };
}
