import fs from "node:fs/promises";
import { z } from "zod";
import { ConstructionError, SourceReadError } from "./errors.js";
import {
  isOutline,
  isPageList,
  parseDataSummary,
  parseOutline,
  parsePageList,
  type DataSummary,
  type Outline
} from "./output_checks.js";
import {
  CHAPTER_WRITER_SYSTEM,
  DATA_ANALYST_SYSTEM,
  DIRECT_WRITER_SYSTEM,
  OUTLINE_WRITER_SYSTEM,
  chapterPrompt,
  directStoryPrompt,
  outlinePrompt,
  summaryPrompt
} from "./prompts.js";
import { initTextGenerator, isRegisteredTool, parseToolCfg } from "./tools/registry.js";
import type { StoryDraft, StoryWriter, TextGenerator, ToolContext } from "./tools/types.js";
import { fileExists, inputRootAbs, randomSeed, resolveInputPath, throwIfAborted } from "./utils.js";
import { ValidatedGenerationClient, type GenerationResult } from "./validated_client.js";

export const DEFAULT_SUMMARY: DataSummary = {
  data_key_points: ["Based on the provided material"],
  main_themes: ["A data-driven story"],
  recommended_story_flow: "Follow the logic of the material"
};

export const DEFAULT_OUTLINE: Outline = {
  story_title: "A Data-Driven Story",
  story_outline: [
    { chapter_title: "Data Overview", chapter_summary: "Introduce the material and its main findings" },
    { chapter_title: "Key Analysis", chapter_summary: "Examine the key information in the material" },
    { chapter_title: "Conclusions and Applications", chapter_summary: "Summarize what the material implies in practice" }
  ]
};

export const DIRECT_WRITER_FALLBACK_PAGES = [
  "Data overview: an introduction to the material provided",
  "Key findings: the main trends in the material",
  "Closer reading: what the material means",
  "In practice: the real-world relevance of the material",
  "Summary and outlook: what the material teaches"
];

export const EMPTY_SOURCE_NOTICE = "No material was provided; please supply concrete data.";

export function chapterPlaceholderPages(chapterIndex: number, chapterTitle: string): string[] {
  return [`Chapter ${chapterIndex + 1}: ${chapterTitle}`, "Data-based analysis content"];
}

const SourceParamsSchema = z.union([
  z.string(),
  z
    .object({
      file_path: z.string().trim().min(1).optional(),
      data_content: z.string().optional()
    })
    .passthrough()
]);

async function readSourceFile(filePath: string): Promise<string> {
  try {
    return await fs.readFile(filePath, "utf8");
  } catch (err) {
    throw new SourceReadError(filePath, err);
  }
}

/** The `file_path` of story params when it resolves outside the input root, else null. */
export function sourcePathOutsideInputRoot(params: unknown): string | null {
  const parsed = SourceParamsSchema.safeParse(params ?? "");
  if (!parsed.success || typeof parsed.data === "string" || !parsed.data.file_path) return null;
  return resolveInputPath(parsed.data.file_path) ? null : parsed.data.file_path;
}

/**
 * Resolves the story source material. Accepts `{ file_path }`, `{ data_content }`, or a string
 * that is either a path to an existing file or the material itself. Paths resolve against the
 * input root (`SWS_INPUT_DIR`) and are never read from outside it.
 */
export async function readStorySource(params: unknown): Promise<string> {
  const parsed = SourceParamsSchema.safeParse(params ?? "");
  if (!parsed.success) return JSON.stringify(params);

  const source = parsed.data;
  if (typeof source === "string") {
    const filePath = source.trim().length > 0 ? resolveInputPath(source) : null;
    if (filePath && (await fileExists(filePath))) return readSourceFile(filePath);
    return source;
  }
  if (source.file_path) {
    const filePath = resolveInputPath(source.file_path);
    if (!filePath) throw new SourceReadError(source.file_path, new Error(`path is outside the input folder ${inputRootAbs()}`));
    return readSourceFile(filePath);
  }
  if (typeof source.data_content === "string") return source.data_content;
  return JSON.stringify(source);
}

export type TextGeneratorFactory = (systemPrompt: string) => TextGenerator;

const WriterCfgSchema = z.object({
  llm: z.string().trim().min(1).default("openai_text"),
  temperature: z.number().min(0).max(2).default(1),
  num_outline: z.number().int().min(1).max(20).default(4),
  max_retries: z.number().int().min(0).max(10).default(3),
  chapter_retries: z.number().int().min(0).max(10).default(3)
});

export type WriterCfg = z.infer<typeof WriterCfgSchema>;

function registryGeneratorFactory(llm: string, ctx: ToolContext): TextGeneratorFactory {
  if (!isRegisteredTool(llm)) throw new ConstructionError(`Unknown capability: ${llm} (story writer llm)`);
  return (systemPrompt) => initTextGenerator({ tool: llm, cfg: { system_prompt: systemPrompt } }, ctx);
}

/**
 * Two-stage writer: summarize the material, derive a chapter outline, then expand each chapter
 * into pages. Every generation failure degrades to deterministic placeholder content.
 */
export class OutlineStoryWriter implements StoryWriter {
  readonly kind = "story_writer";
  private readonly cfg: WriterCfg;
  private readonly makeGenerator: TextGeneratorFactory;

  constructor(cfg: Record<string, unknown>, private readonly ctx: ToolContext, deps?: { textGenerator?: TextGeneratorFactory }) {
    this.cfg = parseToolCfg("qa_outline_story_writer", WriterCfgSchema, cfg);
    this.makeGenerator = deps?.textGenerator ?? registryGeneratorFactory(this.cfg.llm, ctx);
  }

  private client(systemPrompt: string, label: string): ValidatedGenerationClient {
    return new ValidatedGenerationClient(this.makeGenerator(systemPrompt), this.ctx.notify, label);
  }

  async generateDataSummary(dataContent: string, signal?: AbortSignal): Promise<DataSummary> {
    const result = await this.client(DATA_ANALYST_SYSTEM, "summary").generate(summaryPrompt(dataContent), { signal });
    const summary = result.accepted ? parseDataSummary(result.payload) : null;
    if (summary) return summary;
    this.ctx.notify("[fallback] summary could not be parsed; using the default summary");
    return DEFAULT_SUMMARY;
  }

  async generateOutline(dataContent: string, signal?: AbortSignal): Promise<Outline> {
    const summary = await this.generateDataSummary(dataContent, signal);
    const result = await this.client(OUTLINE_WRITER_SYSTEM, "outline").generate(
      outlinePrompt(dataContent, summary, this.cfg.num_outline),
      { acceptancePredicate: isOutline, maxRetries: this.cfg.max_retries, signal }
    );
    const outline = result.accepted ? parseOutline(result.payload) : null;
    if (outline) return outline;
    this.ctx.notify(`[fallback] outline generation failed after ${result.attempts} attempts; using the default outline`);
    return DEFAULT_OUTLINE;
  }

  async generateStoryFromOutline(outline: Outline, dataContent: string, signal?: AbortSignal): Promise<StoryDraft> {
    const client = this.client(CHAPTER_WRITER_SYSTEM, "chapter");
    const pages: string[] = [];
    const placeholderPages: number[] = [];

    for (const [idx, chapter] of outline.story_outline.entries()) {
      throwIfAborted(signal);
      this.ctx.notify(`Writing chapter ${idx + 1}/${outline.story_outline.length}: ${chapter.chapter_title}`);
      const prompt = chapterPrompt(dataContent, chapter, pages);
      const options = {
        acceptancePredicate: isPageList,
        maxRetries: this.cfg.max_retries,
        temperature: this.cfg.temperature,
        signal
      };

      let result: GenerationResult = await client.generate(prompt, options);
      for (let retry = 0; !result.accepted && retry < this.cfg.chapter_retries; retry++) {
        result = await client.generate(prompt, { ...options, seed: randomSeed() });
      }

      const chapterPages = result.accepted ? parsePageList(result.payload) : null;
      if (chapterPages) {
        pages.push(...chapterPages.map((page) => page.trim()));
        continue;
      }

      this.ctx.notify(`[fallback] chapter ${idx + 1} ("${chapter.chapter_title}") used placeholder pages`);
      for (const page of chapterPlaceholderPages(idx, chapter.chapter_title)) {
        placeholderPages.push(pages.length);
        pages.push(page);
      }
    }

    return { pages, placeholderPages };
  }

  async call(params: unknown, signal?: AbortSignal): Promise<StoryDraft> {
    const dataContent = await readStorySource(params);
    const outline = await this.generateOutline(dataContent, signal);
    this.ctx.notify(`Outline ready: "${outline.story_title}" with ${outline.story_outline.length} chapters`);
    return this.generateStoryFromOutline(outline, dataContent, signal);
  }
}

/** Writes the whole story in one validated call. */
export class DirectStoryWriter implements StoryWriter {
  readonly kind = "story_writer";
  private readonly cfg: WriterCfg;
  private readonly makeGenerator: TextGeneratorFactory;

  constructor(cfg: Record<string, unknown>, private readonly ctx: ToolContext, deps?: { textGenerator?: TextGeneratorFactory }) {
    this.cfg = parseToolCfg("data_driven_story_writer", WriterCfgSchema, cfg);
    this.makeGenerator = deps?.textGenerator ?? registryGeneratorFactory(this.cfg.llm, ctx);
  }

  async call(params: unknown, signal?: AbortSignal): Promise<StoryDraft> {
    let dataContent = await readStorySource(params);
    if (!dataContent.trim()) dataContent = EMPTY_SOURCE_NOTICE;

    const client = new ValidatedGenerationClient(this.makeGenerator(DIRECT_WRITER_SYSTEM), this.ctx.notify, "story");
    const result = await client.generate(directStoryPrompt(dataContent), {
      acceptancePredicate: isPageList,
      maxRetries: this.cfg.max_retries,
      temperature: this.cfg.temperature,
      signal
    });

    const pages = result.accepted ? parsePageList(result.payload) : null;
    if (pages) return { pages: pages.map((page) => page.trim()), placeholderPages: [] };

    this.ctx.notify("[fallback] story generation failed; using the default story pages");
    return {
      pages: [...DIRECT_WRITER_FALLBACK_PAGES],
      placeholderPages: DIRECT_WRITER_FALLBACK_PAGES.map((_page, idx) => idx)
    };
  }
}

export function createOutlineStoryWriter(cfg: Record<string, unknown>, ctx: ToolContext): StoryWriter {
  return new OutlineStoryWriter(cfg, ctx);
}

export function createDirectStoryWriter(cfg: Record<string, unknown>, ctx: ToolContext): StoryWriter {
  return new DirectStoryWriter(cfg, ctx);
}
