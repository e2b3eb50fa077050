import { setDefaultOpenAIKey } from "@openai/agents";
import { registerBuiltinTools } from "../tools/builtin_tools.js";
import { initProducer } from "../tools/registry.js";
import type { NoticeFn } from "../tools/types.js";
import { WorkerRequestSchema, type ParsedWorkerRequest, type WorkerMessage } from "./protocol.js";

function send(payload: WorkerMessage): void {
  if (!process.send) return;
  process.send(payload);
}

export async function runWorkerRequest(
  req: ParsedWorkerRequest,
  notify: NoticeFn = (message) => console.log(`[${req.modality}] ${message}`)
): Promise<unknown> {
  const openAiKey = process.env.OPENAI_API_KEY?.trim();
  if (openAiKey) setDefaultOpenAIKey(openAiKey);

  registerBuiltinTools();
  const producer = initProducer({ tool: req.tool, cfg: req.cfg }, { notify });
  return await producer.call(req.params, AbortSignal.timeout(req.timeoutMs));
}

export function registerWorkerMessageHandler(args?: {
  sendFn?: (payload: WorkerMessage) => void;
  exitFn?: (code: number) => void;
}): void {
  const sendFn = args?.sendFn ?? send;
  const exitFn = args?.exitFn ?? ((code: number) => process.exit(code));

  process.on("message", (message: unknown) => {
    const parsed = WorkerRequestSchema.safeParse(message);
    if (!parsed.success) {
      const requestId =
        message && typeof message === "object" && "requestId" in message && typeof message.requestId === "string"
          ? message.requestId
          : "unknown";
      sendFn({ requestId, ok: false, error: "Invalid worker request payload.", details: parsed.error.message });
      exitFn(1);
      return;
    }

    const req = parsed.data;
    runWorkerRequest(req, (notice) => sendFn({ requestId: req.requestId, notice })).then(
      (output) => {
        sendFn({ requestId: req.requestId, ok: true, output });
        exitFn(0);
      },
      (err: unknown) => {
        const details = err instanceof Error ? `${err.name}: ${err.message}\n${err.stack ?? ""}` : String(err);
        sendFn({ requestId: req.requestId, ok: false, error: `Worker for ${req.modality} failed.`, details });
        exitFn(1);
      }
    );
  });
}

if (process.env.SWS_WORKER_LISTENER !== "off") {
  registerWorkerMessageHandler();
}
