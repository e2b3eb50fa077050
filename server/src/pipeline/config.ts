import fs from "node:fs/promises";
import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { ToolConfigSchema, type ToolConfig } from "./tools/types.js";

export const DEFAULT_WORKER_TIMEOUT_MS = 30 * 60_000;

export const RunConfigSchema = z.object({
  enable_story: z.boolean().default(true),
  enable_image: z.boolean().default(true),
  enable_speech: z.boolean().default(true),
  enable_video: z.boolean().default(true),
  story_writer: ToolConfigSchema.default({ tool: "qa_outline_story_writer" }),
  image_generation: ToolConfigSchema.default({ tool: "gemini_image" }),
  speech_generation: ToolConfigSchema.default({ tool: "gemini_tts" }),
  video_compose: ToolConfigSchema.default({ tool: "storyboard_compose" }),
  worker_isolation: z.enum(["process", "inline"]).default("process"),
  worker_timeout_ms: z.number().int().min(1_000).max(6 * 60 * 60_000).default(DEFAULT_WORKER_TIMEOUT_MS),
  cancel_siblings_on_failure: z.boolean().default(false)
});

export type RunConfig = z.output<typeof RunConfigSchema>;
export type RunConfigInput = z.input<typeof RunConfigSchema>;

export function parseRunConfig(raw: unknown): RunConfig {
  const parsed = RunConfigSchema.safeParse(raw ?? {});
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "config"}: ${i.message}`).join("; ");
    throw new ConfigurationError(`Invalid run config: ${detail}`);
  }
  return parsed.data;
}

export async function loadRunConfigFile(filePath: string): Promise<RunConfig> {
  let raw: unknown;
  try {
    raw = JSON.parse(await fs.readFile(filePath, "utf8"));
  } catch (err) {
    throw new ConfigurationError(`Failed to load run config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return parseRunConfig(raw);
}

const FAKE_TOOLS: Record<string, string> = {
  openai_text: "fake_text",
  gemini_image: "fake_image",
  gemini_tts: "fake_tts"
};

function withFakeLlm(tool: ToolConfig): ToolConfig {
  const llm = tool.cfg.llm;
  const cfg = typeof llm === "string" && FAKE_TOOLS[llm] ? { ...tool.cfg, llm: FAKE_TOOLS[llm] } : tool.cfg;
  return { ...tool, tool: FAKE_TOOLS[tool.tool] ?? tool.tool, cfg };
}

/**
 * Offline variant of a run config: every backend-bound tool is swapped for its fake and workers run
 * inline. Story writers default to `openai_text`, so they get an explicit fake llm.
 */
export function toFakeRunConfig(config: RunConfig): RunConfig {
  const storyWriter = withFakeLlm(config.story_writer);
  return {
    ...config,
    story_writer: typeof storyWriter.cfg.llm === "string" ? storyWriter : { ...storyWriter, cfg: { ...storyWriter.cfg, llm: "fake_text" } },
    image_generation: withFakeLlm(config.image_generation),
    speech_generation: withFakeLlm(config.speech_generation),
    video_compose: withFakeLlm(config.video_compose),
    worker_isolation: "inline"
  };
}
