import type { Chapter, DataSummary } from "./output_checks.js";

export const DATA_ANALYST_SYSTEM = `You are a data analyst.
Analyse the material you are given, extract its key information and main trends.
Return ONLY valid JSON.`;

export const OUTLINE_WRITER_SYSTEM = `You are a data storyteller who writes story outlines.
Stay faithful to the provided material: no invented facts, no speculation.
Return ONLY valid JSON.`;

export const CHAPTER_WRITER_SYSTEM = `You are a data storyteller who writes story pages for one chapter at a time.
Every page must be grounded in the provided material and continue the story written so far.
Return ONLY a JSON array of strings, one string per page.`;

export const DIRECT_WRITER_SYSTEM = `You are a data storyteller.
Write a coherent story from the provided material, split into pages; each page holds one idea or data point.
Return ONLY a JSON array of strings, one string per page.`;

export const ILLUSTRATION_PROMPT_SYSTEM = `You are an illustration director.
Given one page of a story, write a single concise image-generation prompt describing the scene.
Return only the prompt text.`;

function listText(value: string | string[]): string {
  return Array.isArray(value) ? value.join("; ") : value;
}

export function summaryPrompt(dataContent: string): string {
  return `Analyse the following material and produce a short summary.

MATERIAL:
${dataContent}

Return a JSON object with exactly these fields:
- "data_key_points": key findings or trends
- "main_themes": main themes covered
- "recommended_story_flow": suggested story flow, following the logic of the material`;
}

export function outlinePrompt(dataContent: string, summary: DataSummary, chapterCount: number): string {
  return `Write a story outline from the material below.

SUMMARY:
- Key points: ${listText(summary.data_key_points)}
- Main themes: ${listText(summary.main_themes)}
- Recommended flow: ${listText(summary.recommended_story_flow)}

FULL MATERIAL:
${dataContent}

Produce ${chapterCount} chapters, each grounded in a specific part of the material.
Return JSON with exactly two keys: "story_title" and "story_outline".
"story_outline" is an array whose items have exactly two keys: "chapter_title" and "chapter_summary".`;
}

export function chapterPrompt(dataContent: string, chapter: Chapter, completedStory: string[]): string {
  return JSON.stringify({
    data_content: dataContent,
    current_chapter: chapter,
    completed_story: completedStory
  });
}

export function directStoryPrompt(dataContent: string): string {
  return `Write a coherent story from the material below, split into pages.

MATERIAL:
${dataContent}

Write 5-8 pages. Each page should:
1. rest on a specific part of the material
2. be short and clear
3. follow on logically from the previous page
4. avoid speculation

Never write more than 8 pages.
Return a JSON array of strings.`;
}

export function illustrationPrompt(pageText: string, pageIndex: number, pageCount: number): string {
  return `Page ${pageIndex + 1} of ${pageCount}:\n${pageText}`;
}
