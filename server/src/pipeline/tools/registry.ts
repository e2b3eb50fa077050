import type { z } from "zod";
import { ConstructionError } from "../errors.js";
import {
  consoleNotice,
  type Capability,
  type CapabilityKind,
  type ModalityProducer,
  type StoryWriter,
  type TextGenerator,
  type ToolContext,
  type ToolFactory
} from "./types.js";

const factories = new Map<string, ToolFactory>();

export function registerTool(name: string, factory: ToolFactory): void {
  const key = name.trim();
  if (!key) throw new ConstructionError("Tool name must not be empty.", "INVALID_CAPABILITY");
  if (factories.has(key)) throw new ConstructionError(`Tool already registered: ${key}`, "INVALID_CAPABILITY");
  factories.set(key, factory);
}

export function isRegisteredTool(name: string): boolean {
  return factories.has(name);
}

export function registeredToolNames(): string[] {
  return [...factories.keys()].sort();
}

export function initToolInstance(
  config: { tool: string; cfg?: Record<string, unknown> },
  ctx: ToolContext = { notify: consoleNotice }
): Capability {
  const factory = factories.get(config.tool);
  if (!factory) {
    throw new ConstructionError(`Unknown capability: ${config.tool}. Registered: ${registeredToolNames().join(", ") || "(none)"}`);
  }
  return factory(config.cfg ?? {}, ctx);
}

function kindMismatch(tool: string, actual: CapabilityKind, expected: CapabilityKind): ConstructionError {
  return new ConstructionError(`Tool ${tool} is a ${actual} capability, expected ${expected}`, "INVALID_CAPABILITY");
}

export function initTextGenerator(config: { tool: string; cfg?: Record<string, unknown> }, ctx?: ToolContext): TextGenerator {
  const cap = initToolInstance(config, ctx);
  if (cap.kind !== "text") throw kindMismatch(config.tool, cap.kind, "text");
  return cap;
}

export function initStoryWriter(config: { tool: string; cfg?: Record<string, unknown> }, ctx?: ToolContext): StoryWriter {
  const cap = initToolInstance(config, ctx);
  if (cap.kind !== "story_writer") throw kindMismatch(config.tool, cap.kind, "story_writer");
  return cap;
}

export function initProducer(config: { tool: string; cfg?: Record<string, unknown> }, ctx?: ToolContext): ModalityProducer {
  const cap = initToolInstance(config, ctx);
  if (cap.kind !== "producer") throw kindMismatch(config.tool, cap.kind, "producer");
  return cap;
}

/** Validates a tool's `cfg` block; a bad block is a construction failure. */
export function parseToolCfg<S extends z.ZodTypeAny>(tool: string, schema: S, cfg: Record<string, unknown>): z.output<S> {
  const parsed = schema.safeParse(cfg);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "cfg"}: ${i.message}`).join("; ");
    throw new ConstructionError(`Invalid cfg for ${tool}: ${detail}`, "INVALID_CAPABILITY");
  }
  return parsed.data;
}
