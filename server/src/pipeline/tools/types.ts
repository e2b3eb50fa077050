import { z } from "zod";

export const ToolConfigSchema = z.object({
  tool: z.string().trim().min(1),
  cfg: z.record(z.unknown()).default({}),
  params: z.record(z.unknown()).default({})
});

export type ToolConfig = z.infer<typeof ToolConfigSchema>;

export type NoticeFn = (message: string) => void;

export type ToolContext = {
  notify: NoticeFn;
};

export type TextGenerationOptions = {
  seed?: number;
  temperature?: number;
  signal?: AbortSignal;
};

export type TextGeneration = {
  text: string;
  success: boolean;
};

export interface TextGenerator {
  readonly kind: "text";
  call(prompt: string, options?: TextGenerationOptions): Promise<TextGeneration>;
}

export type StoryDraft = {
  pages: string[];
  /** Indices of pages filled with placeholder text after generation gave up. */
  placeholderPages: number[];
};

export interface StoryWriter {
  readonly kind: "story_writer";
  call(params: unknown, signal?: AbortSignal): Promise<StoryDraft>;
}

export type ProducerParams = Record<string, unknown> & {
  pages: string[];
  save_path: string;
};

export interface ModalityProducer {
  readonly kind: "producer";
  call(params: ProducerParams, signal?: AbortSignal): Promise<unknown>;
}

export type Capability = TextGenerator | StoryWriter | ModalityProducer;

export type CapabilityKind = Capability["kind"];

export type ToolFactory = (cfg: Record<string, unknown>, ctx: ToolContext) => Capability;

export const consoleNotice: NoticeFn = (message) => {
  console.log(message);
};
