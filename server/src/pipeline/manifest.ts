import path from "node:path";
import { z } from "zod";
import { PartialResultError } from "./errors.js";
import type { Modality, ResultTable } from "./fanout/scheduler.js";
import type { NoticeFn, StoryDraft } from "./tools/types.js";
import { writeJsonFile } from "./utils.js";

export const SCRIPT_MANIFEST_FILENAME = "script_data.json";

export type ManifestPage = {
  story: string;
  image_prompt?: string;
  placeholder?: true;
};

export type ModalityStatus = "ok" | "failed" | "disabled";

export type ScriptManifest = {
  pages: ManifestPage[];
  modalities: Record<Modality, ModalityStatus>;
};

const ImageOutputSchema = z.object({
  prompts: z.array(z.string()),
  generation_results: z.array(z.string().nullable()).optional()
});

type ImageOutput = z.infer<typeof ImageOutputSchema>;

/** Returns the image output when the image worker succeeded with a usable shape, else a PartialResultError. */
function readImageOutput(table: ResultTable): ImageOutput | PartialResultError {
  const outcome = table.get("image");
  if (!outcome) return new PartialResultError("image", "image modality produced no result");
  if (!outcome.ok) return new PartialResultError("image", `image modality failed: ${outcome.error}`);
  const parsed = ImageOutputSchema.safeParse(outcome.output);
  if (!parsed.success) return new PartialResultError("image", "image modality output has no prompts list");
  return parsed.data;
}

export function buildScriptManifest(
  draft: StoryDraft,
  table: ResultTable,
  enabled: Record<Modality, boolean>,
  notify: NoticeFn = () => undefined
): ScriptManifest {
  let prompts: string[] = [];
  if (enabled.image) {
    const image = readImageOutput(table);
    if (image instanceof PartialResultError) {
      notify(`[partial-result] ${image.message}; manifest has no image prompts`);
    } else {
      prompts = image.prompts;
    }
  }

  const placeholders = new Set(draft.placeholderPages);
  const pages = draft.pages.map((story, idx): ManifestPage => {
    const page: ManifestPage = { story };
    const prompt = prompts[idx];
    if (typeof prompt === "string") page.image_prompt = prompt;
    if (placeholders.has(idx)) page.placeholder = true;
    return page;
  });

  const status = (modality: Modality): ModalityStatus => {
    if (!enabled[modality]) return "disabled";
    return table.get(modality)?.ok ? "ok" : "failed";
  };

  return { pages, modalities: { image: status("image"), speech: status("speech") } };
}

export async function writeScriptManifest(storyDir: string, manifest: ScriptManifest): Promise<string> {
  const filePath = path.join(storyDir, SCRIPT_MANIFEST_FILENAME);
  await writeJsonFile(filePath, manifest);
  return filePath;
}

/** Rendered image paths in page order; empty when the image modality did not succeed. */
export function extractImageAssets(table: ResultTable): string[] {
  const image = readImageOutput(table);
  if (image instanceof PartialResultError) return [];
  return (image.generation_results ?? []).filter((p): p is string => typeof p === "string");
}
