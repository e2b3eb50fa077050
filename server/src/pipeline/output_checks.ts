import { z } from "zod";

export const ChapterSchema = z
  .object({
    chapter_title: z.string(),
    chapter_summary: z.string()
  })
  .strict();

export const OutlineSchema = z
  .object({
    story_title: z.string(),
    story_outline: z.array(ChapterSchema)
  })
  .strict();

export const PageListSchema = z.array(z.string());

export const DataSummarySchema = z.object({
  data_key_points: z.union([z.array(z.string()), z.string()]),
  main_themes: z.union([z.array(z.string()), z.string()]),
  recommended_story_flow: z.union([z.array(z.string()), z.string()])
});

export type Chapter = z.infer<typeof ChapterSchema>;
export type Outline = z.infer<typeof OutlineSchema>;
export type DataSummary = z.infer<typeof DataSummarySchema>;

export type AcceptancePredicate = (payload: string) => boolean;

/**
 * Removes a surrounding markdown code fence (```json ... ```), if any.
 * Model output is never evaluated, only parsed as JSON.
 */
export function stripCodeFence(payload: string): string {
  const trimmed = payload.trim();
  const fenced = /^```[a-zA-Z]*\s*\n?([\s\S]*?)\n?\s*```$/.exec(trimmed);
  return fenced ? fenced[1].trim() : trimmed;
}

export function tryParseJson(payload: string): unknown {
  try {
    return JSON.parse(stripCodeFence(payload));
  } catch {
    return undefined;
  }
}

function parseWith<T>(schema: z.ZodType<T>, payload: string): T | null {
  const raw = tryParseJson(payload);
  if (raw === undefined) return null;
  const parsed = schema.safeParse(raw);
  return parsed.success ? parsed.data : null;
}

export function parseOutline(payload: string): Outline | null {
  return parseWith(OutlineSchema, payload);
}

export function parsePageList(payload: string): string[] | null {
  return parseWith(PageListSchema, payload);
}

export function parseDataSummary(payload: string): DataSummary | null {
  return parseWith(DataSummarySchema, payload);
}

export const isOutline: AcceptancePredicate = (payload) => parseOutline(payload) !== null;

export const isPageList: AcceptancePredicate = (payload) => parsePageList(payload) !== null;
