import fs from "node:fs/promises";
import type { RunConfig } from "./pipeline/config.js";
import type { RunManager } from "./run_manager.js";
import { artifactAbsPath, nowIso, toErrorMessage } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineFn = (
  input: { runId: string; title: string; config: RunConfig },
  runs: RunManager,
  options: PipelineOptions
) => Promise<void>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status === "running") return false;

    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  cancel(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort(new Error("Cancelled"));
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() }).catch((err: unknown) => {
        console.error(`Failed to persist cancellation of ${runId}: ${toErrorMessage(err)}`);
      });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      this.start(next).catch((err: unknown) => {
        console.error(`Run ${next} could not be finalized: ${toErrorMessage(err)}`);
      });
    }
  }

  private async start(runId: string): Promise<void> {
    const run = this.runs.getRun(runId);
    if (!run) return;

    const controller = new AbortController();
    this.running.set(runId, controller);

    try {
      await this.runs.setRunStatus(runId, "running");
      await this.pipeline({ runId: run.runId, title: run.title, config: run.config }, this.runs, {
        signal: controller.signal
      });
      await this.runs.setRunStatus(runId, "done", { finishedAt: nowIso() });
    } catch (err) {
      const aborted = controller.signal.aborted;
      const msg = aborted ? "Cancelled" : toErrorMessage(err);
      this.runs.error(runId, msg);
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });

      if (aborted) {
        await fs.writeFile(artifactAbsPath(runId, "CANCELLED.txt"), `Cancelled at ${nowIso()}\n`).catch((markerErr: unknown) => {
          this.runs.log(runId, `Could not write cancellation marker: ${toErrorMessage(markerErr)}`);
        });
      }
    } finally {
      this.running.delete(runId);
      this.drain();
    }
  }
}
