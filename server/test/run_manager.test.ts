import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { RunManager, STEP_ORDER, type RunStatus } from "../src/run_manager.js";
import { parseRunConfig } from "../src/pipeline/config.js";
import { runOutputDirAbs } from "../src/pipeline/utils.js";

const config = parseRunConfig({});

let tmpOut = "";

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "sws-out-"));
  process.env.SWS_OUTPUT_DIR = tmpOut;
});

afterEach(async () => {
  delete process.env.SWS_OUTPUT_DIR;
  await fs.rm(tmpOut, { recursive: true, force: true });
});

async function readRunJson(runId: string): Promise<RunStatus> {
  const raw = await fs.readFile(path.join(runOutputDirAbs(runId), "run.json"), "utf8");
  return JSON.parse(raw);
}

describe("RunManager", () => {
  it("createRun writes run.json and initializes steps", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("Story 1", config);

    expect(run.runId).toMatch(/^story-1-[a-z0-9]{8}$/);
    expect(run.title).toBe("Story 1");
    expect(run.config.worker_isolation).toBe("process");
    expect(run.outputFolder).toBe(path.join("output", run.runId));

    const onDisk = await readRunJson(run.runId);
    expect(onDisk.runId).toBe(run.runId);
    expect(onDisk.config.enable_speech).toBe(true);

    expect(Object.keys(onDisk.steps)).toEqual(["STORY", "ASSETS", "VIDEO"]);
    for (const s of STEP_ORDER) {
      expect(onDisk.steps[s]).toEqual({ name: s, status: "queued", artifacts: [] });
    }
  });

  it("falls back to an untitled run id when the title has no usable characters", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("!!!", config);
    expect(run.runId).toMatch(/^untitled-[a-z0-9]{8}$/);
  });

  it("emits step + artifact events to subscribers", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("story 2", config);

    const events: Array<{ type: string; payload: unknown }> = [];
    const unsub = runs.subscribe(run.runId, (type, payload) => {
      events.push({ type, payload });
    });
    expect(unsub).toBeTypeOf("function");

    await runs.startStep(run.runId, "STORY");
    await runs.addArtifact(run.runId, "STORY", "pages.json");
    await runs.finishStep(run.runId, "STORY", true);

    unsub?.();

    expect(events.map((e) => e.type)).toEqual(["step_started", "artifact_written", "step_finished"]);
    expect(events[1]?.payload).toMatchObject({ step: "STORY", name: "pages.json" });
  });

  it("error events never crash the process when unobserved", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("story 3", config);
    expect(() => runs.error(run.runId, "boom")).not.toThrow();
  });

  it("initFromDisk loads prior runs", async () => {
    const runs1 = new RunManager();
    const r1 = await runs1.createRun("story 4", config);
    await runs1.setRunStatus(r1.runId, "done", { finishedAt: "2026-01-01T00:00:00.000Z" });

    const runs2 = new RunManager();
    await runs2.initFromDisk();

    const loaded = runs2.getRun(r1.runId);
    expect(loaded?.title).toBe("story 4");
    expect(loaded?.status).toBe("done");
    expect(loaded?.finishedAt).toBe("2026-01-01T00:00:00.000Z");
  });

  it("initFromDisk marks runs left active by a restart as errored", async () => {
    const runs1 = new RunManager();
    const r1 = await runs1.createRun("story 5", config);
    await runs1.setRunStatus(r1.runId, "running");
    await runs1.startStep(r1.runId, "STORY");
    await runs1.finishStep(r1.runId, "STORY", true);
    await runs1.startStep(r1.runId, "ASSETS");

    const runs2 = new RunManager();
    await runs2.initFromDisk();

    const loaded = runs2.getRun(r1.runId);
    expect(loaded?.status).toBe("error");
    expect(loaded?.finishedAt).toBeTypeOf("string");
    expect(loaded?.steps.STORY.status).toBe("done");
    expect(loaded?.steps.ASSETS.status).toBe("error");
    expect(loaded?.steps.ASSETS.error).toBe("Recovered after server restart while run was active.");
    expect(loaded?.steps.VIDEO.status).toBe("error");

    const onDisk = await readRunJson(r1.runId);
    expect(onDisk.status).toBe("error");
  });

  it("initFromDisk skips non-directories and invalid/missing run.json files", async () => {
    const runs1 = new RunManager();
    const r1 = await runs1.createRun("story ok", config);

    await fs.writeFile(path.join(tmpOut, "not_a_dir.txt"), "x\n", "utf8");
    await fs.mkdir(path.join(tmpOut, "orphan"), { recursive: true });
    await fs.mkdir(path.join(tmpOut, "bad"), { recursive: true });
    await fs.writeFile(path.join(tmpOut, "bad", "run.json"), "{not json", "utf8");

    const runs2 = new RunManager();
    await runs2.initFromDisk();

    expect(runs2.getRun(r1.runId)?.title).toBe("story ok");
    expect(runs2.getRun("orphan")).toBeNull();
    expect(runs2.getRun("bad")).toBeNull();
  });

  it("listRuns sorts newest first", async () => {
    const runs1 = new RunManager();
    const older = await runs1.createRun("older", config);
    const newer = await runs1.createRun("newer", config);

    for (const [runId, startedAt] of [
      [older.runId, "2020-01-01T00:00:00.000Z"],
      [newer.runId, "2020-01-02T00:00:00.000Z"]
    ]) {
      const data = await readRunJson(runId);
      await fs.writeFile(path.join(runOutputDirAbs(runId), "run.json"), JSON.stringify({ ...data, status: "done", startedAt }));
    }

    const runs2 = new RunManager();
    await runs2.initFromDisk();
    expect(runs2.listRuns().map((r) => r.runId)).toEqual([newer.runId, older.runId]);
    expect(runs2.listRuns()[0]).toEqual({
      runId: newer.runId,
      title: "newer",
      status: "done",
      startedAt: "2020-01-02T00:00:00.000Z",
      finishedAt: undefined
    });
  });

  it("finishStep records error details and emits error events only when error is provided", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("story", config);

    const types: string[] = [];
    const unsub = runs.subscribe(run.runId, (type) => types.push(type));

    await runs.startStep(run.runId, "STORY");
    await runs.finishStep(run.runId, "STORY", false, "boom");
    expect(runs.getRun(run.runId)?.steps.STORY.error).toBe("boom");

    await runs.startStep(run.runId, "ASSETS");
    await runs.finishStep(run.runId, "ASSETS", false);

    unsub?.();

    expect(types).toEqual(["step_started", "step_finished", "error", "step_started", "step_finished"]);
    expect(runs.getRun(run.runId)?.steps.ASSETS.error).toBeUndefined();
  });

  it("addArtifact de-dupes artifacts and persists", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("story", config);

    await runs.addArtifact(run.runId, "ASSETS", "script_data.json");
    await runs.addArtifact(run.runId, "ASSETS", "script_data.json");
    expect(runs.getRun(run.runId)?.steps.ASSETS.artifacts).toEqual(["script_data.json"]);
    expect((await readRunJson(run.runId)).steps.ASSETS.artifacts).toEqual(["script_data.json"]);
  });

  it("unsubscribe stops delivery", async () => {
    const runs = new RunManager();
    const run = await runs.createRun("story", config);

    const events: string[] = [];
    const unsub = runs.subscribe(run.runId, (type) => events.push(type));
    runs.log(run.runId, "hi", "STORY");
    unsub?.();
    runs.log(run.runId, "bye");
    expect(events).toEqual(["log"]);
  });

  it("subscribe returns null for missing runs and mutators are no-ops for missing IDs", async () => {
    const runs = new RunManager();
    expect(runs.subscribe("missing", () => undefined)).toBeNull();
    expect(() => runs.log("missing", "x")).not.toThrow();
    expect(() => runs.error("missing", "x")).not.toThrow();
    await expect(runs.setRunStatus("missing", "done")).resolves.toBeUndefined();
    await expect(runs.startStep("missing", "STORY")).resolves.toBeUndefined();
    await expect(runs.finishStep("missing", "STORY", true)).resolves.toBeUndefined();
    await expect(runs.addArtifact("missing", "STORY", "a.json")).resolves.toBeUndefined();
  });
});
