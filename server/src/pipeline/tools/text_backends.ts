import { Agent, Runner } from "@openai/agents";
import { z } from "zod";
import { BackendCallFailure } from "../errors.js";
import {
  CHAPTER_WRITER_SYSTEM,
  DATA_ANALYST_SYSTEM,
  DIRECT_WRITER_SYSTEM,
  ILLUSTRATION_PROMPT_SYSTEM,
  OUTLINE_WRITER_SYSTEM
} from "../prompts.js";
import { tryParseJson } from "../output_checks.js";
import { toErrorMessage } from "../utils.js";
import { parseToolCfg } from "./registry.js";
import type { TextGeneration, TextGenerationOptions, TextGenerator, ToolContext } from "./types.js";

const DEFAULT_MODEL = "gpt-4.1-mini";

export function configuredTextModel(): string {
  const env = process.env.SWS_MODEL;
  return env && env.trim().length > 0 ? env.trim() : DEFAULT_MODEL;
}

const TextBackendCfgSchema = z.object({
  system_prompt: z.string().default(""),
  model: z.string().trim().min(1).optional(),
  temperature: z.number().min(0).max(2).optional(),
  max_turns: z.number().int().min(1).max(10).default(1)
});

type TextBackendCfg = z.infer<typeof TextBackendCfgSchema>;

export class OpenAiTextGenerator implements TextGenerator {
  readonly kind = "text";
  private readonly agent: Agent;

  constructor(private readonly cfg: TextBackendCfg) {
    this.agent = new Agent({
      name: "Story Text Generator",
      instructions: cfg.system_prompt,
      model: cfg.model ?? configuredTextModel()
    });
  }

  async call(prompt: string, options: TextGenerationOptions = {}): Promise<TextGeneration> {
    const temperature = options.temperature ?? this.cfg.temperature;
    const runner = new Runner({
      modelSettings: {
        ...(temperature === undefined ? {} : { temperature }),
        ...(options.seed === undefined ? {} : { providerData: { seed: options.seed } })
      }
    });

    try {
      const result = await runner.run(this.agent, prompt, { maxTurns: this.cfg.max_turns, signal: options.signal });
      const text = typeof result.finalOutput === "string" ? result.finalOutput.trim() : "";
      return { text, success: text.length > 0 };
    } catch (err) {
      if (options.signal?.aborted) throw err;
      throw new BackendCallFailure(`OpenAI text generation failed: ${toErrorMessage(err)}`, err);
    }
  }
}

function fakeSummary(): string {
  return JSON.stringify({
    data_key_points: ["The material describes a sequence of related events."],
    main_themes: ["change over time"],
    recommended_story_flow: "Follow the material from its opening facts to its conclusion."
  });
}

function fakeOutline(): string {
  return JSON.stringify({
    story_title: "A Story Told by the Data",
    story_outline: [
      { chapter_title: "Setting the Scene", chapter_summary: "What the material starts from." },
      { chapter_title: "The Turning Point", chapter_summary: "Where the numbers change direction." },
      { chapter_title: "What It Means", chapter_summary: "The conclusions the material supports." }
    ]
  });
}

function fakeChapterPages(prompt: string): string {
  const request = z
    .object({
      current_chapter: z.object({ chapter_title: z.string(), chapter_summary: z.string() }),
      completed_story: z.array(z.string())
    })
    .safeParse(tryParseJson(prompt));
  if (!request.success) return "[]";
  const { current_chapter: chapter, completed_story: written } = request.data;
  return JSON.stringify([
    `${chapter.chapter_title}. ${chapter.chapter_summary}`,
    `Page ${written.length + 2} continues ${chapter.chapter_title.toLowerCase()} with the details behind it.`
  ]);
}

function fakeDirectPages(): string {
  return JSON.stringify([
    "The material opens with its basic facts.",
    "A first trend becomes visible.",
    "The trend meets a counterexample.",
    "The numbers settle into a pattern.",
    "The story closes on what the pattern means."
  ]);
}

/**
 * Deterministic text backend for fake mode and tests. The response shape is picked from the
 * system prompt the backend was built with.
 */
export class FakeTextGenerator implements TextGenerator {
  readonly kind = "text";

  constructor(private readonly cfg: TextBackendCfg) {}

  async call(prompt: string): Promise<TextGeneration> {
    switch (this.cfg.system_prompt) {
      case DATA_ANALYST_SYSTEM:
        return { text: fakeSummary(), success: true };
      case OUTLINE_WRITER_SYSTEM:
        return { text: fakeOutline(), success: true };
      case CHAPTER_WRITER_SYSTEM:
        return { text: fakeChapterPages(prompt), success: true };
      case DIRECT_WRITER_SYSTEM:
        return { text: fakeDirectPages(), success: true };
      case ILLUSTRATION_PROMPT_SYSTEM: {
        const pageText = prompt.split("\n").slice(1).join(" ").trim();
        return { text: `Soft watercolor illustration: ${pageText.slice(0, 120)}`, success: true };
      }
      default:
        return { text: "Mock text response", success: true };
    }
  }
}

export function createOpenAiTextGenerator(cfg: Record<string, unknown>, _ctx: ToolContext): TextGenerator {
  return new OpenAiTextGenerator(parseToolCfg("openai_text", TextBackendCfgSchema, cfg));
}

export function createFakeTextGenerator(cfg: Record<string, unknown>, _ctx: ToolContext): TextGenerator {
  return new FakeTextGenerator(parseToolCfg("fake_text", TextBackendCfgSchema, cfg));
}
