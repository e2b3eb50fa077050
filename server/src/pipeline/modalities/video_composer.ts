import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import { parseToolCfg } from "../tools/registry.js";
import type { ModalityProducer, ProducerParams, ToolContext } from "../tools/types.js";
import { throwIfAborted, writeJsonFile } from "../utils.js";

export const VIDEO_TIMELINE_FILENAME = "video_timeline.json";

export type TimelineClip = {
  page: number;
  story: string;
  image: string | null;
  audio: string | null;
  start_s: number;
  duration_s: number;
};

export type VideoTimeline = {
  fps: number;
  total_duration_s: number;
  clips: TimelineClip[];
};

const ComposeCfgSchema = z.object({
  fps: z.number().int().min(1).max(60).default(24),
  words_per_second: z.number().positive().default(2.5),
  min_clip_s: z.number().positive().default(3)
});

type ComposeCfg = z.infer<typeof ComposeCfgSchema>;

async function filesByStem(dir: string): Promise<Map<string, string>> {
  const entries = await fs.readdir(dir, { withFileTypes: true }).catch(() => []);
  const out = new Map<string, string>();
  for (const ent of entries) {
    if (!ent.isFile()) continue;
    const stem = path.parse(ent.name).name;
    if (!out.has(stem)) out.set(stem, path.join(dir, ent.name));
  }
  return out;
}

function roundSeconds(value: number): number {
  return Math.round(value * 100) / 100;
}

/**
 * Lays the story out as a storyboard timeline: one clip per page, pairing it with the image and
 * narration produced for that page. Encoding the timeline into a video file happens elsewhere.
 */
export class StoryboardComposer implements ModalityProducer {
  readonly kind = "producer";

  constructor(
    private readonly cfg: ComposeCfg,
    private readonly ctx: ToolContext
  ) {}

  async call(params: ProducerParams, signal?: AbortSignal): Promise<VideoTimeline> {
    const { pages, save_path: storyDir } = params;
    const images = await filesByStem(path.join(storyDir, "image"));
    const audio = await filesByStem(path.join(storyDir, "speech"));

    const clips: TimelineClip[] = [];
    let cursor = 0;
    for (const [idx, story] of pages.entries()) {
      throwIfAborted(signal);
      const words = story.split(/\s+/).filter(Boolean).length;
      const duration = roundSeconds(Math.max(this.cfg.min_clip_s, words / this.cfg.words_per_second));
      const stem = `p${idx + 1}`;
      clips.push({
        page: idx,
        story,
        image: images.get(stem) ?? null,
        audio: audio.get(stem) ?? null,
        start_s: cursor,
        duration_s: duration
      });
      cursor = roundSeconds(cursor + duration);
    }

    const timeline: VideoTimeline = { fps: this.cfg.fps, total_duration_s: cursor, clips };
    await writeJsonFile(path.join(storyDir, VIDEO_TIMELINE_FILENAME), timeline);
    this.ctx.notify(`Storyboard timeline written: ${clips.length} clips, ${cursor}s`);
    return timeline;
  }
}

export function createStoryboardComposer(rawCfg: Record<string, unknown>, ctx: ToolContext): ModalityProducer {
  return new StoryboardComposer(parseToolCfg("storyboard_compose", ComposeCfgSchema, rawCfg), ctx);
}
