import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import type { RunConfig } from "./pipeline/config.js";
import { ensureDir, nowIso, outputRootAbs, runOutputDirAbs, slug, tryReadJsonFile, writeJsonFile } from "./pipeline/utils.js";

export const STEP_ORDER = ["STORY", "ASSETS", "VIDEO"] as const;

export type StepName = (typeof STEP_ORDER)[number];

export type StepRecord = {
  name: StepName;
  status: "queued" | "running" | "done" | "error";
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  artifacts: string[];
};

export type RunStatus = {
  runId: string;
  title: string;
  config: RunConfig;
  status: "queued" | "running" | "done" | "error";
  startedAt: string;
  finishedAt?: string;
  steps: Record<StepName, StepRecord>;
  outputFolder: string;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "title" | "status" | "startedAt" | "finishedAt">;

export type RunEventType = "step_started" | "step_finished" | "artifact_written" | "log" | "error";

const RUN_EVENT_TYPES: readonly RunEventType[] = ["step_started", "step_finished", "artifact_written", "log", "error"];

const RUN_ID_SLUG_MAX = 48;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function queuedStep(name: StepName): StepRecord {
  return { name, status: "queued", artifacts: [] };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // An unheard "error" event would otherwise throw.
  emitter.on("error", () => undefined);
  return emitter;
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stepName of STEP_ORDER) {
    const step = recoveredSteps[stepName];
    if (!step) continue;
    if (step.status === "running" || step.status === "queued") {
      recoveredSteps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? "Recovered after server restart while run was active.",
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    steps: recoveredSteps
  };
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runId = ent.name;
      const runJsonPath = path.join(runOutputDirAbs(runId), "run.json");
      const data = await tryReadJsonFile<RunStatus>(runJsonPath);
      if (!data) continue;
      const recovered = recoverStaleLoadedRun(data);
      if (recovered !== data) {
        await writeJsonFile(runJsonPath, recovered);
      }
      this.runs.set(runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({ runId: r.runId, title: r.title, status: r.status, startedAt: r.startedAt, finishedAt: r.finishedAt }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    return await fs
      .stat(runOutputDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
  }

  private async nextRunId(title: string): Promise<string> {
    const titleSlug = slug(title).slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "") || "untitled";
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${titleSlug}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(title: string, config: RunConfig): Promise<RunStatus> {
    const runId = await this.nextRunId(title);
    const run: RunInternal = {
      runId,
      title,
      config,
      status: "queued",
      startedAt: nowIso(),
      steps: { STORY: queuedStep("STORY"), ASSETS: queuedStep("ASSETS"), VIDEO: queuedStep("VIDEO") },
      outputFolder: path.join("output", runId),
      emitter: newEmitter()
    };

    await ensureDir(runOutputDirAbs(runId));
    await this.persist(run);

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<Partial<RunStatus>, "finishedAt">): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    await this.persist(r);
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.startedAt = nowIso();
    await this.persist(r);
    r.emitter.emit("step_started", { step, at: s.startedAt });
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: RunEventType, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => [type, (payload: unknown) => onEvent(type, payload)] as const);
    for (const [type, fn] of handlers) r.emitter.on(type, fn);

    return () => {
      for (const [type, fn] of handlers) r.emitter.off(type, fn);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return pub;
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }
}
