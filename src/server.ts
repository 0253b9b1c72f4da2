import { readFile, stat } from "fs/promises";
import { createServer, type IncomingMessage, type ServerResponse } from "http";
import { extname, isAbsolute, relative, resolve } from "path";
import { build, type BuildReport } from "./build/builder";
import { hrefFor } from "./build/destination";
import {
  DEBUG_TAG,
  loadConfig,
  resolveBuildOptions,
  type BuildOptions,
  type BuildOverrides,
} from "./config";
import { toPosix } from "./content/scan";
import { errorMessage } from "./errors";
import { LIVE_RELOAD_SCRIPT_PATH } from "./render";
import type { BookCompiler } from "./renderers/book";
import { LIVE_RELOAD_CLIENT } from "./live/client-script";
import { ReloadCoordinator } from "./live/coordinator";
import { BuildScheduler } from "./live/scheduler";
import { watchSource, type SourceWatcher } from "./live/watch";
import { formatWarnings, logReport, silentLogger, type Logger } from "./warn";

const CONTENT_TYPES: Record<string, string> = {
  ".html": "text/html; charset=utf-8",
  ".css": "text/css; charset=utf-8",
  ".js": "text/javascript; charset=utf-8",
  ".json": "application/json; charset=utf-8",
  ".svg": "image/svg+xml",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".gif": "image/gif",
  ".webp": "image/webp",
  ".ico": "image/x-icon",
  ".woff": "font/woff",
  ".woff2": "font/woff2",
  ".txt": "text/plain; charset=utf-8",
  ".xml": "application/xml; charset=utf-8",
};

export interface DevServerOptions {
  /** Project root holding the config file */
  root: string;
  /** Defaults to the configured `live.port`; 0 picks a free port */
  port?: number;
  host?: string;
  overrides?: BuildOverrides;
  logger?: Logger;
  bookCompiler?: BookCompiler;
  /** Watch the source tree; on by default */
  watch?: boolean;
}

export interface DevServer {
  readonly port: number;
  readonly url: string;
  readonly coordinator: ReloadCoordinator;
  readonly scheduler: BuildScheduler;
  /** Report of the last finished pass, null when it failed fatally */
  readonly lastReport: BuildReport | null;
  /** Queue a pass for the given absolute paths and wait for it */
  rebuild(changed?: Iterable<string>): Promise<void>;
  stop(): Promise<void>;
}

/** The single rendered page to navigate to, when exactly one document changed */
export function reloadTarget(
  options: Pick<BuildOptions, "source">,
  report: BuildReport,
  changed: ReadonlySet<string>
): string | undefined {
  if (changed.size !== 1) return undefined;
  const [path] = changed;
  if (path === undefined) return undefined;
  const source = toPosix(relative(options.source, path));
  const page = report.pages.find((item) => item.source === source);
  return page ? hrefFor(page.destination) : undefined;
}

/** Map a request path onto a file below `root`; null when it escapes it */
export async function resolveStaticPath(root: string, pathname: string): Promise<string | null> {
  let decoded: string;
  try {
    decoded = decodeURIComponent(pathname);
  } catch {
    return null;
  }
  const candidate = resolve(root, `.${decoded}`);
  const rel = relative(root, candidate);
  if (rel.startsWith("..") || isAbsolute(rel)) return null;

  const info = await stat(candidate).catch(() => null);
  if (info?.isFile()) return candidate;
  if (info?.isDirectory()) {
    const index = resolve(candidate, "index.html");
    const indexInfo = await stat(index).catch(() => null);
    return indexInfo?.isFile() ? index : null;
  }
  return null;
}

export async function startDevServer(opts: DevServerOptions): Promise<DevServer> {
  const logger = opts.logger ?? silentLogger;
  const overrides: BuildOverrides = { tag: DEBUG_TAG, ...opts.overrides, live: true };

  async function loadOptions(): Promise<BuildOptions> {
    const loaded = await loadConfig(opts.root);
    if (loaded.warnings.length > 0) logger.warn(formatWarnings("Config warnings", loaded.warnings));
    return resolveBuildOptions(opts.root, loaded, overrides);
  }

  let options = await loadOptions();
  const requestedPort = opts.port ?? options.server.port;
  let lastReport: BuildReport | null = null;
  const coordinator = new ReloadCoordinator(logger);

  async function runPass(changed: ReadonlySet<string>): Promise<void> {
    coordinator.broadcast({ type: "start" });
    coordinator.broadcast({ type: "notify", message: "Building...", error: false });

    try {
      if (options.configFile && changed.has(options.configFile)) {
        logger.info("Config change detected, reloading...");
        options = await loadOptions();
      }
      const report = await build(options, { logger, bookCompiler: opts.bookCompiler });
      lastReport = report;
      logReport(logger, report);

      if (report.failed > 0) {
        const first = report.errors[0];
        const detail = first ? `\n${first.path}: ${first.error.message}` : "";
        coordinator.broadcast({ type: "notify", message: `${report.failed} failed${detail}`, error: true });
        return;
      }

      const count = report.files.length;
      coordinator.broadcast({ type: "notify", message: `Built ${count} file(s)`, error: false });
      const href = reloadTarget(options, report, changed);
      coordinator.broadcast(href ? { type: "reload", href } : { type: "reload" });
    } catch (err) {
      lastReport = null;
      logger.error(`Build failed: ${errorMessage(err)}`);
      coordinator.broadcast({ type: "notify", message: errorMessage(err), error: true });
    }
  }

  const scheduler = new BuildScheduler(runPass, (err) => logger.error(`Build failed: ${errorMessage(err)}`));
  await scheduler.request();

  async function handle(req: IncomingMessage, res: ServerResponse): Promise<void> {
    const url = new URL(req.url ?? "/", "http://localhost");

    if (url.pathname === LIVE_RELOAD_SCRIPT_PATH) {
      res.writeHead(200, { "Content-Type": CONTENT_TYPES[".js"], "Cache-Control": "no-store" });
      res.end(LIVE_RELOAD_CLIENT);
      return;
    }

    const file = await resolveStaticPath(options.destination, url.pathname);
    if (!file) {
      res.writeHead(404, { "Content-Type": CONTENT_TYPES[".txt"] });
      res.end("Not found");
      return;
    }

    const body = await readFile(file);
    res.writeHead(200, {
      "Content-Type": CONTENT_TYPES[extname(file).toLowerCase()] ?? "application/octet-stream",
      "Cache-Control": "no-store",
    });
    res.end(body);
  }

  const server = createServer((req, res) => {
    handle(req, res).catch((err: unknown) => {
      logger.error(`Request ${req.url ?? ""} failed: ${errorMessage(err)}`);
      if (!res.headersSent) res.writeHead(500, { "Content-Type": CONTENT_TYPES[".txt"] });
      res.end("Internal error");
    });
  });
  coordinator.attach(server);

  await new Promise<void>((resolveListen, reject) => {
    server.once("error", reject);
    server.listen(requestedPort, opts.host ?? "127.0.0.1", () => {
      server.off("error", reject);
      resolveListen();
    });
  });

  const address = server.address();
  const port = typeof address === "object" && address !== null ? address.port : requestedPort;
  const url = `http://${opts.host ?? "127.0.0.1"}:${port}`;

  let watcher: SourceWatcher | null = null;
  if (opts.watch ?? true) {
    const paths = [options.source];
    if (options.configFile) paths.push(options.configFile);
    watcher = watchSource(
      {
        paths,
        exclude: [options.target],
        debounceMs: options.server.debounceMs,
        onError: (err) => logger.error(`Watcher error: ${errorMessage(err)}`),
      },
      (changed) => {
        scheduler.request(changed).catch((err: unknown) => logger.error(errorMessage(err)));
      }
    );
  }

  logger.info(`Dev server running at ${url}`);

  return {
    port,
    url,
    coordinator,
    scheduler,
    get lastReport() {
      return lastReport;
    },
    rebuild: (changed = []) => scheduler.request(changed),
    async stop() {
      await watcher?.close();
      await scheduler.idle();
      await coordinator.close();
      server.closeAllConnections();
      await new Promise<void>((resolveClose, reject) => {
        server.close((err) => (err ? reject(err) : resolveClose()));
      });
    },
  };
}
