import { z } from "zod";

export const ProducerParamsSchema = z
  .object({
    pages: z.array(z.string()),
    save_path: z.string().min(1)
  })
  .passthrough();

export const WorkerRequestSchema = z.object({
  requestId: z.string().min(1),
  modality: z.string().min(1),
  tool: z.string().min(1),
  cfg: z.record(z.unknown()).default({}),
  params: ProducerParamsSchema,
  timeoutMs: z.number().int().positive()
});

export type WorkerRequest = z.input<typeof WorkerRequestSchema>;
export type ParsedWorkerRequest = z.output<typeof WorkerRequestSchema>;

export const WorkerResponseSchema = z.discriminatedUnion("ok", [
  z.object({
    requestId: z.string(),
    ok: z.literal(true),
    output: z.unknown()
  }),
  z.object({
    requestId: z.string(),
    ok: z.literal(false),
    error: z.string(),
    details: z.string().optional()
  })
]);

export type WorkerResponse = z.infer<typeof WorkerResponseSchema>;

/** Progress notice sent by a worker while it runs; any number precede its response. */
export const WorkerNoticeSchema = z
  .object({
    requestId: z.string(),
    notice: z.string()
  })
  .strict();

export type WorkerNotice = z.infer<typeof WorkerNoticeSchema>;

export type WorkerMessage = WorkerResponse | WorkerNotice;
