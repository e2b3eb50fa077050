import path from "node:path";
import type { RunConfig } from "../config.js";
import { initProducer } from "../tools/registry.js";
import type { ModalityProducer, NoticeFn, ProducerParams, ToolConfig } from "../tools/types.js";
import { ensureDir, signalWithTimeout, throwIfAborted, toErrorMessage } from "../utils.js";
import { runModalityInChild } from "./worker_runner.js";

export const MODALITIES = ["image", "speech"] as const;
export type Modality = (typeof MODALITIES)[number];

export type ModalityOutcome = { ok: true; output: unknown } | { ok: false; error: string };

/** One entry per launched modality, written once by its worker and read only after the join. */
export type ResultTable = Map<Modality, ModalityOutcome>;

export type ModalityTask = {
  modality: Modality;
  tool: string;
  cfg: Record<string, unknown>;
  params: ProducerParams;
  producer: ModalityProducer;
  timeoutMs: number;
  /** Notices from the producer, already tagged with the modality. */
  notify: NoticeFn;
};

export type TaskLauncher = (task: ModalityTask, signal: AbortSignal) => Promise<unknown>;

export type FanOutInput = {
  pages: string[];
  config: RunConfig;
  storyDir: string;
  notify: NoticeFn;
  signal?: AbortSignal;
  launch?: TaskLauncher;
};

export function isModalityEnabled(config: RunConfig, modality: Modality): boolean {
  return modality === "image" ? config.enable_image : config.enable_speech;
}

export function modalityToolConfig(config: RunConfig, modality: Modality): ToolConfig {
  return modality === "image" ? config.image_generation : config.speech_generation;
}

export const inlineLauncher: TaskLauncher = (task, signal) =>
  task.producer.call(task.params, signalWithTimeout(signal, task.timeoutMs));

export const childProcessLauncher: TaskLauncher = (task, signal) =>
  runModalityInChild({
    modality: task.modality,
    tool: task.tool,
    cfg: task.cfg,
    params: task.params,
    timeoutMs: task.timeoutMs,
    signal,
    notify: task.notify
  });

function buildTasks(input: FanOutInput): ModalityTask[] {
  const { config, notify, pages, storyDir } = input;
  const tasks: ModalityTask[] = [];
  for (const modality of MODALITIES) {
    if (!isModalityEnabled(config, modality)) {
      notify(`Skipping ${modality} generation`);
      continue;
    }
    const toolConfig = modalityToolConfig(config, modality);
    const modalityNotify: NoticeFn = (message) => notify(`[${modality}] ${message}`);
    // Resolving here surfaces unknown tools before any worker starts.
    const producer = initProducer(toolConfig, { notify: modalityNotify });
    tasks.push({
      modality,
      tool: toolConfig.tool,
      cfg: structuredClone(toolConfig.cfg),
      params: { ...structuredClone(toolConfig.params), pages: [...pages], save_path: path.join(storyDir, modality) },
      producer,
      timeoutMs: config.worker_timeout_ms,
      notify: modalityNotify
    });
  }
  return tasks;
}

/**
 * Runs every enabled modality in its own worker and waits for all of them. A worker failure is
 * recorded in the table; only cancellation of the run itself rejects.
 */
export async function runModalityFanOut(input: FanOutInput): Promise<ResultTable> {
  throwIfAborted(input.signal);
  const tasks = buildTasks(input);
  for (const task of tasks) await ensureDir(task.params.save_path);

  const launch = input.launch ?? (input.config.worker_isolation === "inline" ? inlineLauncher : childProcessLauncher);
  const siblings = new AbortController();
  const taskSignal = input.signal ? AbortSignal.any([input.signal, siblings.signal]) : siblings.signal;
  const table: ResultTable = new Map();

  await Promise.allSettled(
    tasks.map(async (task) => {
      input.notify(`Starting ${task.modality} worker (${task.tool})`);
      try {
        const output = await launch(task, taskSignal);
        table.set(task.modality, { ok: true, output });
        input.notify(`${task.modality} worker finished`);
      } catch (err) {
        const error = toErrorMessage(err);
        table.set(task.modality, { ok: false, error });
        input.notify(`[modality-failed] ${task.modality}: ${error}`);
        if (input.config.cancel_siblings_on_failure && !siblings.signal.aborted) {
          siblings.abort(new Error(`Cancelled after ${task.modality} failed`));
        }
      }
    })
  );

  throwIfAborted(input.signal);
  return table;
}

export function resultTableToJson(table: ResultTable): Record<string, ModalityOutcome> {
  const out: Record<string, ModalityOutcome> = {};
  for (const modality of MODALITIES) {
    const outcome = table.get(modality);
    if (outcome) out[modality] = outcome;
  }
  return out;
}
