import { setDefaultOpenAIKey } from "@openai/agents";
import type { PipelineOptions } from "../executor.js";
import type { RunManager, StepName } from "../run_manager.js";
import type { RunConfig } from "./config.js";
import { isModalityEnabled, MODALITIES, resultTableToJson, runModalityFanOut, type Modality } from "./fanout/scheduler.js";
import { buildScriptManifest, extractImageAssets, SCRIPT_MANIFEST_FILENAME, writeScriptManifest } from "./manifest.js";
import { VIDEO_TIMELINE_FILENAME } from "./modalities/video_composer.js";
import { registerBuiltinTools } from "./tools/builtin_tools.js";
import { initProducer, initStoryWriter } from "./tools/registry.js";
import type { NoticeFn, StoryDraft } from "./tools/types.js";
import { artifactAbsPath, runOutputDirAbs, throwIfAborted, toErrorMessage, writeJsonFile } from "./utils.js";

export type StoryRunInput = {
  runId: string;
  title: string;
  config: RunConfig;
};

export const STORY_DISABLED_PAGES = [
  "Story generation is disabled for this run. Placeholder page 1.",
  "Story generation is disabled for this run. Placeholder page 2.",
  "Story generation is disabled for this run. Placeholder page 3."
];

/**
 * Story first, then every enabled modality in parallel workers, then the optional storyboard.
 * Each stage only starts once the previous one has finished.
 */
export async function runStoryPipeline(input: StoryRunInput, runs: RunManager, options: PipelineOptions): Promise<void> {
  const { runId, config } = input;
  const { signal } = options;
  const storyDir = runOutputDirAbs(runId);

  const openAiKey = process.env.OPENAI_API_KEY?.trim();
  if (openAiKey) setDefaultOpenAIKey(openAiKey);
  registerBuiltinTools();

  const notifier = (step: StepName): NoticeFn => (message) => runs.log(runId, message, step);

  // Resolve every tool up front so a misconfigured run fails before any work is done.
  const storyWriter = config.enable_story ? initStoryWriter(config.story_writer, { notify: notifier("STORY") }) : null;
  const composer = config.enable_video ? initProducer(config.video_compose, { notify: notifier("VIDEO") }) : null;

  async function runStep<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
    throwIfAborted(signal);
    await runs.startStep(runId, step);
    try {
      const out = await fn();
      await runs.finishStep(runId, step, true);
      return out;
    } catch (err) {
      await runs.finishStep(runId, step, false, toErrorMessage(err));
      throw err;
    }
  }

  async function writeJsonArtifact(step: StepName, name: string, obj: unknown): Promise<void> {
    await writeJsonFile(artifactAbsPath(runId, name), obj);
    await runs.addArtifact(runId, step, name);
  }

  const draft = await runStep<StoryDraft>("STORY", async () => {
    let out: StoryDraft;
    if (storyWriter) {
      out = await storyWriter.call(structuredClone(config.story_writer.params), signal);
    } else {
      runs.log(runId, "[skip] story generation disabled; using placeholder pages", "STORY");
      out = { pages: [...STORY_DISABLED_PAGES], placeholderPages: STORY_DISABLED_PAGES.map((_page, idx) => idx) };
    }
    await writeJsonArtifact("STORY", "pages.json", { pages: out.pages, placeholder_pages: out.placeholderPages });
    runs.log(runId, `Story ready: ${out.pages.length} pages (${out.placeholderPages.length} placeholders)`, "STORY");
    return out;
  });

  await runStep("ASSETS", async () => {
    const table = await runModalityFanOut({
      pages: draft.pages,
      config,
      storyDir,
      signal,
      notify: notifier("ASSETS")
    });
    await writeJsonArtifact("ASSETS", "result_table.json", resultTableToJson(table));

    const enabled: Record<Modality, boolean> = { image: isModalityEnabled(config, "image"), speech: isModalityEnabled(config, "speech") };
    const manifest = buildScriptManifest(draft, table, enabled, notifier("ASSETS"));
    await writeScriptManifest(storyDir, manifest);
    await runs.addArtifact(runId, "ASSETS", SCRIPT_MANIFEST_FILENAME);

    const images = extractImageAssets(table);
    const failed = MODALITIES.filter((m) => manifest.modalities[m] === "failed");
    runs.log(
      runId,
      `Assets ready: ${images.length} images${failed.length ? `; failed modalities: ${failed.join(", ")}` : ""}`,
      "ASSETS"
    );
  });

  await runStep("VIDEO", async () => {
    if (!composer) {
      runs.log(runId, "[skip] video composition disabled", "VIDEO");
      return;
    }
    const params = { ...structuredClone(config.video_compose.params), pages: [...draft.pages], save_path: storyDir };
    await composer.call(params, signal);
    await runs.addArtifact(runId, "VIDEO", VIDEO_TIMELINE_FILENAME);
  });
}
