import { createFakeImageProducer, createGeminiImageProducer } from "../modalities/image_producer.js";
import { createFakeSpeechProducer, createGeminiSpeechProducer } from "../modalities/speech_producer.js";
import { createStoryboardComposer } from "../modalities/video_composer.js";
import { createDirectStoryWriter, createOutlineStoryWriter } from "../story_writer.js";
import { isRegisteredTool, registerTool } from "./registry.js";
import { createFakeTextGenerator, createOpenAiTextGenerator } from "./text_backends.js";
import type { ToolFactory } from "./types.js";

export const BUILTIN_TOOLS: Record<string, ToolFactory> = {
  openai_text: createOpenAiTextGenerator,
  fake_text: createFakeTextGenerator,
  qa_outline_story_writer: createOutlineStoryWriter,
  data_driven_story_writer: createDirectStoryWriter,
  gemini_image: createGeminiImageProducer,
  fake_image: createFakeImageProducer,
  gemini_tts: createGeminiSpeechProducer,
  fake_tts: createFakeSpeechProducer,
  storyboard_compose: createStoryboardComposer
};

/** Registers every built-in tool once; the driver and the worker entry both call this. */
export function registerBuiltinTools(): void {
  for (const [name, factory] of Object.entries(BUILTIN_TOOLS)) {
    if (!isRegisteredTool(name)) registerTool(name, factory);
  }
}
