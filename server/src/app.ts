import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import { z } from "zod";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import { parseRunConfig, RunConfigSchema, type RunConfig } from "./pipeline/config.js";
import { sourcePathOutsideInputRoot } from "./pipeline/story_writer.js";
import { registeredToolNames } from "./pipeline/tools/registry.js";
import { ARTIFACT_SUBDIRS, isSafeArtifactName, resolveArtifactPathAbs, runOutputDirAbs } from "./pipeline/utils.js";

type ArtifactFolder = "root" | (typeof ARTIFACT_SUBDIRS)[number];

type ArtifactInfo = { name: string; size: number; mtimeMs: number; folder: ArtifactFolder };

const CreateRunBodySchema = z
  .object({
    title: z.string().trim().min(1).max(200),
    config: RunConfigSchema.optional()
  })
  .strict()
  .superRefine((body, ctx) => {
    const outside = body.config ? sourcePathOutsideInputRoot(body.config.story_writer.params) : null;
    if (outside) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ["config", "story_writer", "params", "file_path"],
        message: `file_path must stay inside the input folder: ${outside}`
      });
    }
  });

const CONTENT_TYPES: Record<string, string> = {
  ".json": "application/json; charset=utf-8",
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".webp": "image/webp",
  ".wav": "audio/wav",
  ".txt": "text/plain; charset=utf-8"
};

function hasEnv(name: string): boolean {
  return Boolean(process.env[name] && process.env[name]?.trim().length);
}

/** The part of the executor the HTTP surface drives. */
export type RunControl = Pick<RunExecutor, "enqueue" | "cancel">;

export type AppOptions = {
  /** Reported by /api/health; "fake" when backends are swapped for offline fakes. */
  pipelineMode?: "live" | "fake";
  /** Used for runs created without a config. */
  defaultConfig?: RunConfig;
};

export function createApp(runs: RunManager, executor: RunControl, options: AppOptions = {}) {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "2mb" }));

  app.get("/api/health", (_req, res) => {
    res.json({
      ok: true,
      pipelineMode: options.pipelineMode ?? "live",
      hasOpenAiKey: hasEnv("OPENAI_API_KEY"),
      hasGeminiKey: hasEnv("GEMINI_API_KEY"),
      tools: registeredToolNames()
    });
  });

  app.post("/api/runs", async (req, res) => {
    const parsed = CreateRunBodySchema.safeParse(req.body);
    if (!parsed.success) {
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    const config = parsed.data.config ?? options.defaultConfig ?? parseRunConfig({});
    const run = await runs.createRun(parsed.data.title, config);
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    const run = runs.getRun(runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(runOutputDirAbs(runId), false);
    archive.finalize().catch((err: unknown) => {
      runs.error(runId, `zip finalize failed: ${err instanceof Error ? err.message : String(err)}`);
    });
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const root = runOutputDirAbs(runId);
    const scanDirs: Array<{ dir: string; folder: ArtifactFolder }> = [
      { dir: root, folder: "root" },
      ...ARTIFACT_SUBDIRS.map((sub) => ({ dir: path.join(root, sub), folder: sub }))
    ];
    const infos: ArtifactInfo[] = [];

    for (const scan of scanDirs) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile() || ent.name === "run.json") continue;
        const st = await fs.stat(path.join(scan.dir, ent.name)).catch(() => null);
        if (!st) continue;
        infos.push({ name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder });
      }
    }

    res.json(infos.sort((a, b) => b.mtimeMs - a.mtimeMs));
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const runId = req.params.runId;
    const name = req.params.name;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    if (!runs.getRun(runId)) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    const data = await fs.readFile(filePath);
    res.setHeader("Content-Type", CONTENT_TYPES[path.extname(name).toLowerCase()] ?? "application/octet-stream");
    res.send(data);
  });

  return app;
}
