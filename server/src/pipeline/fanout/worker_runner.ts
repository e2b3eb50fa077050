import { fork } from "node:child_process";
import { existsSync } from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { ConfigurationError } from "../errors.js";
import type { NoticeFn, ProducerParams } from "../tools/types.js";
import { abortReasonMessage } from "../utils.js";
import { WorkerNoticeSchema, WorkerResponseSchema, type WorkerRequest } from "./protocol.js";

export type WorkerRuntimeOptions = {
  entryPath?: string;
  execArgv?: string[];
};

type WorkerRuntime = {
  entryPath: string;
  execArgv: string[];
};

export type ChildModalityTask = {
  modality: string;
  tool: string;
  cfg: Record<string, unknown>;
  params: ProducerParams;
  timeoutMs: number;
  signal?: AbortSignal;
  /** Receives the producer's notices as the child reports them. */
  notify?: NoticeFn;
};

type SpawnLogs = {
  stdout: string;
  stderr: string;
};

function childEntryAbsPath(): string {
  const thisDir = path.dirname(fileURLToPath(import.meta.url));
  const tsPath = path.join(thisDir, "worker_process.ts");
  if (existsSync(tsPath)) return tsPath;
  return path.join(thisDir, "worker_process.js");
}

let runtime: WorkerRuntime | null = null;

function sameRuntime(a: WorkerRuntime, b: WorkerRuntime): boolean {
  return a.entryPath === b.entryPath && a.execArgv.length === b.execArgv.length && a.execArgv.every((arg, i) => arg === b.execArgv[i]);
}

/**
 * Fixes how workers are started for the life of the process. Repeating the call with the same
 * settings is a no-op; changing them after the first call is an error.
 */
export function configureWorkerRuntime(options: WorkerRuntimeOptions = {}): WorkerRuntime {
  const next: WorkerRuntime = {
    entryPath: options.entryPath ?? childEntryAbsPath(),
    execArgv: options.execArgv ?? [...process.execArgv]
  };
  if (!runtime) {
    runtime = next;
    return runtime;
  }
  if (!sameRuntime(runtime, next)) {
    throw new ConfigurationError(`Worker runtime already configured (entry=${runtime.entryPath}); it cannot be changed`);
  }
  return runtime;
}

export function resetWorkerRuntime(): void {
  runtime = null;
}

export async function runModalityInChild(task: ChildModalityTask): Promise<unknown> {
  if (task.signal?.aborted) throw new Error(abortReasonMessage(task.signal));

  const { entryPath, execArgv } = runtime ?? configureWorkerRuntime();
  const requestId = `${Date.now()}-${Math.random().toString(36).slice(2, 10)}`;
  const payload: WorkerRequest = {
    requestId,
    modality: task.modality,
    tool: task.tool,
    cfg: task.cfg,
    params: task.params,
    timeoutMs: task.timeoutMs
  };

  const child = fork(entryPath, [], {
    stdio: ["ignore", "pipe", "pipe", "ipc"],
    env: process.env,
    execArgv
  });

  const logs: SpawnLogs = { stdout: "", stderr: "" };
  child.stdout?.on("data", (buf: Buffer | string) => {
    logs.stdout += String(buf);
  });
  child.stderr?.on("data", (buf: Buffer | string) => {
    logs.stderr += String(buf);
  });

  return await new Promise<unknown>((resolve, reject) => {
    let settled = false;
    const settle = (fn: () => void) => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      task.signal?.removeEventListener("abort", onAbort);
      fn();
    };
    const logDetail = () => [logs.stderr.trim(), logs.stdout.trim()].filter(Boolean).join("\n");

    // The child enforces timeoutMs itself; the parent only kills it once the grace period is gone too.
    const timeout = setTimeout(() => {
      settle(() => {
        child.kill("SIGKILL");
        reject(new Error(`Worker timeout for ${task.modality} after ${task.timeoutMs}ms`));
      });
    }, Math.max(10_000, task.timeoutMs + 1_000));

    const onAbort = () => {
      settle(() => {
        child.kill("SIGKILL");
        reject(new Error(abortReasonMessage(task.signal)));
      });
    };
    task.signal?.addEventListener("abort", onAbort, { once: true });

    child.on("message", (msg: unknown) => {
      const notice = WorkerNoticeSchema.safeParse(msg);
      if (notice.success) {
        if (!settled && notice.data.requestId === requestId) task.notify?.(notice.data.notice);
        return;
      }
      const parsed = WorkerResponseSchema.safeParse(msg);
      if (!parsed.success || parsed.data.requestId !== requestId) return;
      const response = parsed.data;
      settle(() => {
        if (response.ok) {
          resolve(response.output);
          return;
        }
        const details = [response.error, response.details, logDetail()].filter(Boolean).join("\n");
        reject(new Error(details || `Worker failed for ${task.modality}`));
      });
    });

    child.on("error", (err) => {
      settle(() => reject(err));
    });

    child.on("exit", (code, signal) => {
      settle(() => {
        const detail = logDetail();
        reject(
          new Error(
            `Worker exited before response for ${task.modality} (code=${String(code)} signal=${String(signal)}).${detail ? ` ${detail}` : ""}`
          )
        );
      });
    });

    child.send(payload);
  });
}
