import { watch, type FSWatcher } from "chokidar";
import { isAbsolute, relative, resolve } from "path";
import { DEFAULT_DEBOUNCE_MS } from "../config";

/**
 * Collects paths and flushes them as one batch once no new path has
 * arrived for `delayMs`.
 */
export class ChangeBuffer {
  private readonly delayMs: number;
  private readonly flush: (paths: Set<string>) => void;
  private paths = new Set<string>();
  private timer: ReturnType<typeof setTimeout> | null = null;

  constructor(delayMs: number, flush: (paths: Set<string>) => void) {
    this.delayMs = delayMs;
    this.flush = flush;
  }

  get size(): number {
    return this.paths.size;
  }

  add(path: string): void {
    this.paths.add(path);
    if (this.timer) clearTimeout(this.timer);
    this.timer = setTimeout(() => this.emit(), this.delayMs);
  }

  private emit(): void {
    this.timer = null;
    const batch = this.paths;
    this.paths = new Set();
    if (batch.size > 0) this.flush(batch);
  }

  cancel(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.paths.clear();
  }
}

export interface WatchOptions {
  /** Files and directories to watch */
  paths: string[];
  /** Directories whose changes are never reported, such as the build root */
  exclude: string[];
  debounceMs?: number;
  onError?: (err: unknown) => void;
}

export interface SourceWatcher {
  close(): Promise<void>;
}

function isWithin(parent: string, child: string): boolean {
  const rel = relative(parent, child);
  return rel === "" || (!rel.startsWith("..") && !isAbsolute(rel));
}

/** Watch `paths` and report absolute changed paths in debounced batches */
export function watchSource(options: WatchOptions, onChange: (paths: Set<string>) => void): SourceWatcher {
  const exclude = options.exclude.map((dir) => resolve(dir));
  const buffer = new ChangeBuffer(options.debounceMs ?? DEFAULT_DEBOUNCE_MS, onChange);

  const watcher: FSWatcher = watch(options.paths, {
    ignoreInitial: true,
    ignored: (path: string) => exclude.some((dir) => isWithin(dir, resolve(path))),
  });

  const record = (path: string) => buffer.add(resolve(path));
  watcher.on("add", record);
  watcher.on("change", record);
  watcher.on("unlink", record);
  watcher.on("addDir", record);
  watcher.on("unlinkDir", record);
  watcher.on("error", (err) => options.onError?.(err));

  return {
    async close() {
      buffer.cancel();
      await watcher.close();
    },
  };
}
