import path from "node:path";
import { z } from "zod";
import { ConstructionError } from "../errors.js";
import { ILLUSTRATION_PROMPT_SYSTEM, illustrationPrompt } from "../prompts.js";
import { initTextGenerator, isRegisteredTool, parseToolCfg } from "../tools/registry.js";
import type { ModalityProducer, ProducerParams, TextGenerator, ToolContext } from "../tools/types.js";
import { ensureDir, throwIfAborted, toErrorMessage, writeBinaryFile } from "../utils.js";
import { ValidatedGenerationClient } from "../validated_client.js";
import { configuredImageModel, generateGeminiImage, type RenderedImage } from "./gemini.js";

export type ImageRenderer = (prompt: string, signal?: AbortSignal) => Promise<RenderedImage>;

export type ImageResult = {
  modality: "image";
  prompts: string[];
  /** Rendered file per page index; null where rendering failed. */
  generation_results: Array<string | null>;
};

const ImageCfgSchema = z.object({
  llm: z.string().trim().min(1).default("openai_text"),
  model: z.string().trim().min(1).optional(),
  style: z.string().default("")
});

type ImageCfg = z.infer<typeof ImageCfgSchema>;

function extensionFor(mimeType: string): string {
  if (mimeType === "image/jpeg") return "jpg";
  if (mimeType === "image/webp") return "webp";
  return "png";
}

/**
 * Derives one illustration prompt per page, then renders each prompt to `<save_path>/p<n>.<ext>`.
 * A page whose prompt cannot be generated is illustrated from its own text.
 */
export class ImageProducer implements ModalityProducer {
  readonly kind = "producer";

  constructor(
    private readonly cfg: ImageCfg,
    private readonly ctx: ToolContext,
    private readonly promptWriter: TextGenerator,
    private readonly render: ImageRenderer
  ) {}

  private async promptFor(client: ValidatedGenerationClient, pages: string[], idx: number, signal?: AbortSignal): Promise<string> {
    const result = await client.generate(illustrationPrompt(pages[idx], idx, pages.length), { signal });
    const prompt = result.accepted ? result.payload.trim() : "";
    if (prompt) return this.cfg.style ? `${prompt}. Style: ${this.cfg.style}` : prompt;
    this.ctx.notify(`[fallback] page ${idx + 1}: illustration prompt unavailable, using the page text`);
    return pages[idx];
  }

  async call(params: ProducerParams, signal?: AbortSignal): Promise<ImageResult> {
    const { pages, save_path: savePath } = params;
    await ensureDir(savePath);

    const client = new ValidatedGenerationClient(this.promptWriter, this.ctx.notify, "image-prompt");
    const prompts: string[] = [];
    const generationResults: Array<string | null> = [];

    for (let idx = 0; idx < pages.length; idx++) {
      throwIfAborted(signal);
      const prompt = await this.promptFor(client, pages, idx, signal);
      prompts.push(prompt);

      try {
        const image = await this.render(prompt, signal);
        const filePath = path.join(savePath, `p${idx + 1}.${extensionFor(image.mimeType)}`);
        await writeBinaryFile(filePath, image.data);
        generationResults.push(filePath);
        this.ctx.notify(`Rendered image ${idx + 1}/${pages.length}`);
      } catch (err) {
        throwIfAborted(signal);
        this.ctx.notify(`[backend-failure] image ${idx + 1}/${pages.length}: ${toErrorMessage(err)}`);
        generationResults.push(null);
      }
    }

    return { modality: "image", prompts, generation_results: generationResults };
  }
}

function parseImageCfg(tool: string, cfg: Record<string, unknown>): ImageCfg {
  const parsed = parseToolCfg(tool, ImageCfgSchema, cfg);
  if (!isRegisteredTool(parsed.llm)) throw new ConstructionError(`Unknown capability: ${parsed.llm} (${tool} llm)`);
  return parsed;
}

function promptWriterFor(cfg: ImageCfg, ctx: ToolContext): TextGenerator {
  return initTextGenerator({ tool: cfg.llm, cfg: { system_prompt: ILLUSTRATION_PROMPT_SYSTEM } }, ctx);
}

export function createGeminiImageProducer(rawCfg: Record<string, unknown>, ctx: ToolContext): ModalityProducer {
  const cfg = parseImageCfg("gemini_image", rawCfg);
  const model = cfg.model ?? configuredImageModel();
  return new ImageProducer(cfg, ctx, promptWriterFor(cfg, ctx), (prompt, signal) => generateGeminiImage(prompt, model, signal));
}

// 1x1 transparent PNG.
const PLACEHOLDER_PNG = Buffer.from(
  "iVBORw0KGgoAAAANSUhEUgAAAAEAAAABCAQAAAC1HAwCAAAAC0lEQVR42mNkYAAAAAYAAjCB0C8AAAAASUVORK5CYII=",
  "base64"
);

export function createFakeImageProducer(rawCfg: Record<string, unknown>, ctx: ToolContext): ModalityProducer {
  const cfg = parseImageCfg("fake_image", { llm: "fake_text", ...rawCfg });
  return new ImageProducer(cfg, ctx, promptWriterFor(cfg, ctx), async () => ({ data: PLACEHOLDER_PNG, mimeType: "image/png" }));
}
