import path from "node:path";
import { z } from "zod";
import { BackendCallFailure } from "../errors.js";
import { parseToolCfg } from "../tools/registry.js";
import type { ModalityProducer, ProducerParams, ToolContext } from "../tools/types.js";
import { ensureDir, signalWithTimeout, throwIfAborted, toErrorMessage, writeBinaryFile } from "../utils.js";
import { configuredTtsModel, GEMINI_PCM_SAMPLE_RATE, pcmToWav, synthesizeGeminiSpeech } from "./gemini.js";

export const SUPPORTED_VOICES = ["Kore", "Puck", "Charon", "Aoede", "Fenrir", "Leda", "Orus", "Zephyr"] as const;
export const DEFAULT_VOICE = "Kore";

/** Returns a complete WAV file for the given text. */
export type SpeechSynthesizer = (text: string, voice: string, signal: AbortSignal) => Promise<Buffer>;

export type SpeechResult = {
  modality: "speech";
  status: "success";
  generated_files: number;
  skipped_pages: number[];
  voice: string;
};

const SpeechCfgSchema = z.object({
  model: z.string().trim().min(1).optional(),
  timeout_ms: z.number().int().min(1_000).max(600_000).default(30_000)
});

type SpeechCfg = z.infer<typeof SpeechCfgSchema>;

function isSupportedVoice(voice: string): boolean {
  return SUPPORTED_VOICES.some((v) => v === voice);
}

/**
 * Narrates every non-empty page to `<save_path>/p<n>.wav`. Each page is one blocking synthesis
 * call bounded by `timeout_ms` and the caller's signal.
 */
export class SpeechProducer implements ModalityProducer {
  readonly kind = "producer";

  constructor(
    private readonly cfg: SpeechCfg,
    private readonly ctx: ToolContext,
    private readonly synthesize: SpeechSynthesizer
  ) {}

  private async synthesizePage(text: string, voice: string, filePath: string, signal?: AbortSignal): Promise<void> {
    const pageSignal = signalWithTimeout(signal, this.cfg.timeout_ms);
    let audio: Buffer;
    try {
      audio = await this.synthesize(text, voice, pageSignal);
    } catch (err) {
      throwIfAborted(signal);
      if (pageSignal.aborted) {
        throw new BackendCallFailure(`Speech synthesis timed out after ${this.cfg.timeout_ms}ms: ${path.basename(filePath)}`, err);
      }
      throw err;
    }
    if (audio.length === 0) throw new BackendCallFailure(`Speech synthesis returned no audio: ${path.basename(filePath)}`);
    await writeBinaryFile(filePath, audio);
  }

  async call(params: ProducerParams, signal?: AbortSignal): Promise<SpeechResult> {
    const { pages, save_path: savePath } = params;
    await ensureDir(savePath);

    let voice = typeof params.voice === "string" && params.voice.trim() ? params.voice.trim() : DEFAULT_VOICE;
    if (!isSupportedVoice(voice)) {
      this.ctx.notify(`Voice ${voice} may not be supported; using default voice ${DEFAULT_VOICE}`);
      voice = DEFAULT_VOICE;
    }

    this.ctx.notify(`Starting speech synthesis for ${pages.length} pages`);
    const skipped: number[] = [];
    let generated = 0;

    for (let idx = 0; idx < pages.length; idx++) {
      throwIfAborted(signal);
      const text = pages[idx].trim();
      if (!text) {
        this.ctx.notify(`[skip] page ${idx + 1}: empty text, no narration`);
        skipped.push(idx);
        continue;
      }

      this.ctx.notify(`Narrating page ${idx + 1}/${pages.length}`);
      try {
        await this.synthesizePage(text, voice, path.join(savePath, `p${idx + 1}.wav`), signal);
      } catch (err) {
        this.ctx.notify(`[backend-failure] speech page ${idx + 1}: ${toErrorMessage(err)}`);
        throw err;
      }
      generated += 1;
    }

    this.ctx.notify(`Speech synthesis finished: ${generated} files`);
    return { modality: "speech", status: "success", generated_files: generated, skipped_pages: skipped, voice };
  }
}

export function createGeminiSpeechProducer(rawCfg: Record<string, unknown>, ctx: ToolContext): ModalityProducer {
  const cfg = parseToolCfg("gemini_tts", SpeechCfgSchema, rawCfg);
  const model = cfg.model ?? configuredTtsModel();
  return new SpeechProducer(cfg, ctx, async (text, voice, signal) => {
    const pcm = await synthesizeGeminiSpeech(text, voice, model, signal);
    return pcmToWav(pcm, GEMINI_PCM_SAMPLE_RATE);
  });
}

export function createFakeSpeechProducer(rawCfg: Record<string, unknown>, ctx: ToolContext): ModalityProducer {
  const cfg = parseToolCfg("fake_tts", SpeechCfgSchema, rawCfg);
  // 100 ms of silence per page.
  return new SpeechProducer(cfg, ctx, async () => pcmToWav(Buffer.alloc(GEMINI_PCM_SAMPLE_RATE / 5), GEMINI_PCM_SAMPLE_RATE));
}
