import { existsSync } from "fs";
import { copyFile, mkdir, readFile, writeFile } from "fs/promises";
import { basename, dirname, resolve } from "path";
import type { BuildOptions } from "../config";
import type { SourceEntry } from "../content/model";
import { scanSource } from "../content/scan";
import { DataResolver } from "../data/resolve";
import {
  DestinationError,
  FileCollisionError,
  PagewrightError,
  RenderError,
  errorMessage,
  isFatal,
  type BuildWarning,
} from "../errors";
import { LayoutResolver } from "../presentation/layout";
import { Renderer } from "../render";
import { BookDelegate, isDraftBook, type BookCompiler } from "../renderers/book";
import { silentLogger, type Logger } from "../warn";
import { AncestorIndex, type Dependency } from "./ancestors";
import { DestinationPlanner } from "./destination";
import { BuildManifest, hashFile, renderKeyFor, type ManifestEntry } from "./manifest";
import { mapConcurrent } from "./pool";
import { planRedirects, redirectPage, type RedirectPlan } from "./redirect";

export interface BuildDependencies {
  logger?: Logger;
  bookCompiler?: BookCompiler;
}

/** A document, asset or book that failed, with the error that stopped it */
export interface BuildFailure {
  /** Source-relative path of the failed unit */
  path: string;
  error: PagewrightError;
}

export interface PageRecord {
  source: string;
  destination: string;
}

export interface BuildReport {
  tag: string;
  rendered: number;
  /** Up to date, or drafts left out of a release */
  skipped: number;
  failed: number;
  warnings: BuildWarning[];
  errors: BuildFailure[];
  /** Documents found by the scan */
  documents: number;
  /** Passthrough assets found by the scan */
  assets: number;
  books: number;
  /** Destination paths written by this pass */
  files: string[];
  /** Documents rendered by this pass */
  pages: PageRecord[];
  /** Every unit of the pass failed */
  escalated: boolean;
}

type Outcome = "rendered" | "skipped";

function comparePaths(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function asDocumentError(path: string, err: unknown): PagewrightError {
  if (err instanceof PagewrightError) return err;
  return new RenderError(path, errorMessage(err), { cause: err });
}

/**
 * One build pass: scan, plan, render stale documents, copy stale assets,
 * delegate books, then save the manifest once every unit has settled.
 * Per-document failures are collected in the report; fatal errors reject.
 */
export async function build(options: BuildOptions, deps: BuildDependencies = {}): Promise<BuildReport> {
  const logger = deps.logger ?? silentLogger;
  const scan = await scanSource(options);

  try {
    await mkdir(options.destination, { recursive: true });
  } catch (err) {
    throw new DestinationError(`Cannot create destination ${options.destination}`, { cause: err });
  }

  const report: BuildReport = {
    tag: options.tag,
    rendered: 0,
    skipped: 0,
    failed: 0,
    warnings: [...scan.warnings],
    errors: [],
    documents: 0,
    assets: 0,
    books: scan.books.length,
    files: [],
    pages: [],
    escalated: false,
  };

  if (options.release && options.live) {
    report.warnings.push({
      code: "release-live",
      message: `Live reload is enabled for the release tag "${options.tag}"`,
    });
  }

  const renderKey = renderKeyFor({
    live: options.live,
    release: options.release,
    dateLocale: options.dateLocale ?? null,
    templates: options.templates,
    data: options.data,
  });
  const loaded = await BuildManifest.load({
    destination: options.destination,
    tag: options.tag,
    force: options.force,
    renderKey,
  });
  if (loaded.warning) report.warnings.push(loaded.warning);
  const manifest = loaded.manifest;

  const documents = scan.entries.filter((entry) => entry.kind === "document");
  const assets = scan.entries.filter((entry) => entry.kind === "passthrough");
  const partials = scan.entries
    .filter((entry) => entry.kind === "partial")
    .map((entry): Dependency => ({ path: entry.relativePath, mtimeMs: entry.mtimeMs }));
  report.documents = documents.length;
  report.assets = assets.length;

  const planner = new DestinationPlanner(
    documents.map((entry) => entry.relativePath),
    options.cleanUrls ? "clean" : "preserve"
  );
  const claimed = new Set([
    ...documents.map((entry) => planner.plan(entry.relativePath, entry.kind)),
    ...assets.map((entry) => planner.plan(entry.relativePath, entry.kind)),
  ]);
  const index = new AncestorIndex(scan.entries);
  const dataResolver = new DataResolver({
    index,
    planner,
    globals: options.data,
    siteName: DataResolver.siteNameFor(options.root),
  });
  const layoutResolver = new LayoutResolver(index);
  const renderer = new Renderer({
    templatesDir: options.templates,
    tag: options.tag,
    release: options.release,
    live: options.live,
    dateLocale: options.dateLocale,
  });

  async function candidateFor(entry: SourceEntry, destination: string, dependencies: Dependency[]): Promise<ManifestEntry> {
    return {
      source: entry.relativePath,
      mtimeMs: entry.mtimeMs,
      destination,
      hash: options.staleness === "hash" ? await hashFile(entry.absolutePath) : undefined,
      dependencies,
    };
  }

  async function renderDocument(entry: SourceEntry): Promise<Outcome> {
    const path = entry.relativePath;
    if (entry.collidesWith) throw new FileCollisionError(path, entry.collidesWith);

    const resolved = await dataResolver.resolve(entry);
    report.warnings.push(...resolved.warnings);
    if (resolved.draft && options.release) {
      logger.debug(`draft ${path}`);
      return "skipped";
    }

    claimed.add(resolved.destination);

    const layouts = await layoutResolver.resolve(resolved);
    report.warnings.push(...layouts.warnings);

    const dependencies = [...resolved.dependencies, ...layouts.chain.map((layout) => layout.source), ...partials];
    const candidate = await candidateFor(entry, resolved.destination, dependencies);
    if (!(await manifest.isStale(candidate))) {
      logger.debug(`noop ${path}`);
      return "skipped";
    }

    const html = await renderer.render(resolved, layouts.chain);
    const output = resolve(options.destination, resolved.destination);
    await mkdir(dirname(output), { recursive: true });
    await writeFile(output, html);

    manifest.record(candidate);
    report.files.push(resolved.destination);
    report.pages.push({ source: path, destination: resolved.destination });
    logger.debug(`${path} -> ${resolved.destination}`);
    return "rendered";
  }

  async function copyAsset(entry: SourceEntry): Promise<Outcome> {
    const destination = planner.plan(entry.relativePath, entry.kind);
    const candidate = await candidateFor(entry, destination, []);
    if (!(await manifest.isStale(candidate))) {
      logger.debug(`noop ${entry.relativePath}`);
      return "skipped";
    }

    const output = resolve(options.destination, destination);
    await mkdir(dirname(output), { recursive: true });
    await copyFile(entry.absolutePath, output);

    manifest.record(candidate);
    report.files.push(destination);
    logger.debug(`${entry.relativePath} -> ${destination}`);
    return "rendered";
  }

  async function writeRedirect(plan: RedirectPlan): Promise<Outcome> {
    const output = resolve(options.destination, plan.destination);
    const html = redirectPage(plan.to);
    const existing = existsSync(output) ? await readFile(output, "utf8") : null;
    if (existing === html) {
      logger.debug(`noop ${plan.from}`);
      return "skipped";
    }

    await mkdir(dirname(output), { recursive: true });
    await writeFile(output, html);
    report.files.push(plan.destination);
    logger.debug(`${plan.from} => ${plan.to}`);
    return "rendered";
  }

  const fatal: unknown[] = [];
  const settle = async (path: string, work: () => Promise<Outcome>): Promise<void> => {
    try {
      report[await work()] += 1;
    } catch (err) {
      if (isFatal(err)) {
        fatal.push(err);
        return;
      }
      report.failed += 1;
      report.errors.push({ path, error: asDocumentError(path, err) });
    }
  };

  const units = [
    ...documents.map((entry) => () => settle(entry.relativePath, () => renderDocument(entry))),
    ...assets.map((entry) => () => settle(entry.relativePath, () => copyAsset(entry))),
  ];
  await mapConcurrent(units, options.concurrency, (unit) => unit());

  const delegate = new BookDelegate(options, deps.bookCompiler);
  for (const book of scan.books) {
    await settle(book.relativePath, async () => {
      if (options.release && (await isDraftBook(book))) return "skipped";
      const result = await delegate.build(book);
      report.warnings.push(...result.warnings);
      report.files.push(...result.files);
      logger.debug(`book ${book.relativePath || basename(book.root)} (${result.files.length} files)`);
      return "rendered";
    });
  }

  if (fatal.length === 0) {
    for (const file of report.files) claimed.add(file);
    const redirects = planRedirects(options.redirects, claimed);
    for (const error of redirects.errors) {
      report.failed += 1;
      report.errors.push({ path: error.from, error });
    }
    for (const plan of redirects.plans) {
      await settle(plan.from, () => writeRedirect(plan));
    }
  }

  report.warnings.push(...index.warnings);
  if (fatal.length > 0) throw fatal[0];

  manifest.prune(new Set([...documents, ...assets].map((entry) => entry.relativePath)));
  await manifest.save();

  report.files.sort();
  report.pages.sort((a, b) => comparePaths(a.source, b.source));
  report.errors.sort((a, b) => comparePaths(a.path, b.path));
  report.escalated = report.failed > 0 && report.rendered === 0 && report.skipped === 0;
  return report;
}
