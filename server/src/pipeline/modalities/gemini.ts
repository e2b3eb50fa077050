import { GoogleGenAI, Modality } from "@google/genai";
import { BackendCallFailure, ConfigurationError } from "../errors.js";
import { toErrorMessage } from "../utils.js";

const DEFAULT_IMAGE_MODEL = "gemini-2.5-flash-image";
const DEFAULT_TTS_MODEL = "gemini-2.5-flash-preview-tts";

/** Gemini TTS returns raw 16-bit mono PCM at this rate. */
export const GEMINI_PCM_SAMPLE_RATE = 24_000;

export function configuredImageModel(): string {
  const env = process.env.SWS_IMAGE_MODEL;
  return env && env.trim().length > 0 ? env.trim() : DEFAULT_IMAGE_MODEL;
}

export function configuredTtsModel(): string {
  const env = process.env.SWS_TTS_MODEL;
  return env && env.trim().length > 0 ? env.trim() : DEFAULT_TTS_MODEL;
}

let client: GoogleGenAI | null = null;

function getAI(): GoogleGenAI {
  if (client) return client;
  const apiKey = process.env.GEMINI_API_KEY?.trim();
  if (!apiKey) throw new ConfigurationError("Missing required env var: GEMINI_API_KEY");
  client = new GoogleGenAI({ apiKey });
  return client;
}

export type RenderedImage = {
  data: Buffer;
  mimeType: string;
};

export async function generateGeminiImage(prompt: string, model: string, signal?: AbortSignal): Promise<RenderedImage> {
  const ai = getAI();
  try {
    const response = await ai.models.generateContent({
      model,
      contents: { parts: [{ text: prompt }] },
      config: { abortSignal: signal }
    });

    for (const part of response.candidates?.[0]?.content?.parts ?? []) {
      if (part.inlineData?.data) {
        return { data: Buffer.from(part.inlineData.data, "base64"), mimeType: part.inlineData.mimeType ?? "image/png" };
      }
    }
    throw new Error("No image data found in response");
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new BackendCallFailure(`Gemini image generation failed: ${toErrorMessage(err)}`, err);
  }
}

export async function synthesizeGeminiSpeech(
  text: string,
  voiceName: string,
  model: string,
  signal?: AbortSignal
): Promise<Buffer> {
  const ai = getAI();
  try {
    const response = await ai.models.generateContent({
      model,
      contents: [{ parts: [{ text }] }],
      config: {
        abortSignal: signal,
        responseModalities: [Modality.AUDIO],
        speechConfig: {
          voiceConfig: {
            prebuiltVoiceConfig: { voiceName }
          }
        }
      }
    });

    const base64Audio = response.candidates?.[0]?.content?.parts?.[0]?.inlineData?.data;
    if (!base64Audio) {
      const textError = response.candidates?.[0]?.content?.parts?.[0]?.text;
      throw new Error(textError ? `Model returned text instead of audio: ${textError}` : "No audio data generated");
    }
    return Buffer.from(base64Audio, "base64");
  } catch (err) {
    if (signal?.aborted) throw err;
    throw new BackendCallFailure(`Gemini speech synthesis failed: ${toErrorMessage(err)}`, err);
  }
}

/** Wraps raw little-endian 16-bit PCM in a WAV container. */
export function pcmToWav(pcm: Buffer, sampleRate: number, numChannels = 1): Buffer {
  const header = Buffer.alloc(44);
  header.write("RIFF", 0, "ascii");
  header.writeUInt32LE(36 + pcm.length, 4);
  header.write("WAVE", 8, "ascii");
  header.write("fmt ", 12, "ascii");
  header.writeUInt32LE(16, 16);
  header.writeUInt16LE(1, 20);
  header.writeUInt16LE(numChannels, 22);
  header.writeUInt32LE(sampleRate, 24);
  header.writeUInt32LE(sampleRate * numChannels * 2, 28);
  header.writeUInt16LE(numChannels * 2, 32);
  header.writeUInt16LE(16, 34);
  header.write("data", 36, "ascii");
  header.writeUInt32LE(pcm.length, 40);
  return Buffer.concat([header, pcm]);
}
