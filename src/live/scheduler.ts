export type PassRunner = (changed: ReadonlySet<string>) => Promise<void>;

/**
 * Runs build passes one at a time. Requests made while a pass is running are
 * merged and served by exactly one follow-up pass.
 */
export class BuildScheduler {
  private readonly run: PassRunner;
  private readonly onError: (err: unknown) => void;
  private running: Promise<void> | null = null;
  private pending: Set<string> | null = null;
  private count = 0;

  constructor(run: PassRunner, onError: (err: unknown) => void) {
    this.run = run;
    this.onError = onError;
  }

  /** Passes started so far */
  get passes(): number {
    return this.count;
  }

  get busy(): boolean {
    return this.running !== null;
  }

  /** Resolves once a pass that includes `changed` has finished */
  request(changed: Iterable<string> = []): Promise<void> {
    this.pending ??= new Set();
    for (const path of changed) this.pending.add(path);
    if (!this.running) this.running = this.drain();
    return this.running;
  }

  /** Resolves when no pass is running or queued */
  async idle(): Promise<void> {
    while (this.running) await this.running;
  }

  private async drain(): Promise<void> {
    try {
      while (this.pending) {
        const changed = this.pending;
        this.pending = null;
        this.count += 1;
        try {
          await this.run(changed);
        } catch (err) {
          this.onError(err);
        }
      }
    } finally {
      this.running = null;
    }
  }
}
