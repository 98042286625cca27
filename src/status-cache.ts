import type { GitStatus, ProjectPath, StatusUpdate } from "./types.ts";

export type StatusProbe = (projectPath: ProjectPath, signal: AbortSignal) => Promise<GitStatus>;

export type StatusCacheOptions = {
  probe: StatusProbe;
  concurrency?: number;
  timeoutMs?: number;
};

const UNAVAILABLE: GitStatus = { state: "unavailable" };

/**
 * Runs status probes off the render path. Callers `request` paths and later
 * `poll` for whatever finished; nothing here ever blocks on a probe.
 *
 * A path is in at most one of `queued`/`running` at a time, and once its
 * result lands it stays `settled` until `invalidate`, so repeated requests
 * never start a second probe for the same directory.
 */
export class StatusCache {
  private readonly probe: StatusProbe;
  private readonly concurrency: number;
  private readonly timeoutMs: number;

  private readonly queue: ProjectPath[] = [];
  private readonly pending = new Set<ProjectPath>();
  private readonly settled = new Map<ProjectPath, GitStatus>();
  private completed: StatusUpdate[] = [];
  private readonly inFlight = new Set<AbortController>();
  private running = 0;
  private probesStarted = 0;
  private closed = false;

  constructor(opts: StatusCacheOptions) {
    this.probe = opts.probe;
    this.concurrency = Math.max(1, opts.concurrency ?? 4);
    this.timeoutMs = Math.max(1, opts.timeoutMs ?? 3000);
  }

  request(projectPath: ProjectPath): void {
    if (this.closed) return;
    if (this.pending.has(projectPath) || this.settled.has(projectPath)) return;
    this.pending.add(projectPath);
    this.queue.push(projectPath);
    this.pump();
  }

  poll(): StatusUpdate[] {
    if (!this.completed.length) return [];
    const out = this.completed;
    this.completed = [];
    return out;
  }

  invalidate(projectPath: ProjectPath): void {
    this.settled.delete(projectPath);
  }

  get(projectPath: ProjectPath): GitStatus | undefined {
    return this.settled.get(projectPath);
  }

  /** Drops queued paths and aborts running probes; later requests are ignored. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    for (const projectPath of this.queue.splice(0)) this.pending.delete(projectPath);
    for (const controller of this.inFlight) controller.abort();
    this.inFlight.clear();
  }

  isClosed(): boolean {
    return this.closed;
  }

  isPending(projectPath: ProjectPath): boolean {
    return this.pending.has(projectPath);
  }

  stats(): { running: number; queued: number; started: number } {
    return { running: this.running, queued: this.queue.length, started: this.probesStarted };
  }

  private pump(): void {
    while (!this.closed && this.running < this.concurrency && this.queue.length) {
      const next = this.queue.shift();
      if (next === undefined) break;
      this.running++;
      this.probesStarted++;
      void this.run(next).then(
        (status) => this.finish(next, status),
        () => this.finish(next, UNAVAILABLE),
      );
    }
  }

  private finish(projectPath: ProjectPath, status: GitStatus): void {
    this.running--;
    this.pending.delete(projectPath);
    this.settled.set(projectPath, status);
    this.completed.push({ path: projectPath, status });
    this.pump();
  }

  private async run(projectPath: ProjectPath): Promise<GitStatus> {
    const controller = new AbortController();
    this.inFlight.add(controller);
    let timer: ReturnType<typeof setTimeout> | undefined;
    // Settles on timeout or on close(), whichever aborts first.
    const aborted = new Promise<GitStatus>((resolve) => {
      controller.signal.addEventListener("abort", () => resolve(UNAVAILABLE), { once: true });
      timer = setTimeout(() => controller.abort(), this.timeoutMs);
    });

    try {
      return await Promise.race([
        this.probe(projectPath, controller.signal).catch((): GitStatus => UNAVAILABLE),
        aborted,
      ]);
    } finally {
      if (timer) clearTimeout(timer);
      this.inFlight.delete(controller);
    }
  }
}
