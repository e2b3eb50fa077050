import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";

const setDefaultOpenAIKeyMock = vi.hoisted(() => vi.fn());

vi.mock("@openai/agents", async (importOriginal) => ({
  ...(await importOriginal<typeof import("@openai/agents")>()),
  setDefaultOpenAIKey: setDefaultOpenAIKeyMock
}));

async function loadModule() {
  vi.resetModules();
  process.env.SWS_WORKER_LISTENER = "off";
  return await import("../src/pipeline/fanout/worker_process.js");
}

function withIsolatedMessageListeners(fn: () => void): void {
  const previous = process.listeners("message");
  process.removeAllListeners("message");
  try {
    fn();
  } finally {
    process.removeAllListeners("message");
    for (const handler of previous) process.on("message", handler);
  }
}

let tmp = "";

beforeEach(async () => {
  setDefaultOpenAIKeyMock.mockReset();
  process.env.OPENAI_API_KEY = "test-secret";
  tmp = await fs.mkdtemp(path.join(os.tmpdir(), "sws-worker-"));
});

afterEach(async () => {
  delete process.env.SWS_WORKER_LISTENER;
  delete process.env.OPENAI_API_KEY;
  await fs.rm(tmp, { recursive: true, force: true });
});

describe("modality worker process", () => {
  it("runWorkerRequest resolves the tool by name and runs it", async () => {
    const mod = await loadModule();
    const savePath = path.join(tmp, "speech");

    const out = await mod.runWorkerRequest({
      requestId: "r1",
      modality: "speech",
      tool: "fake_tts",
      cfg: {},
      params: { pages: ["One.", "Two."], save_path: savePath },
      timeoutMs: 10_000
    });

    expect(out).toEqual({ modality: "speech", status: "success", generated_files: 2, skipped_pages: [], voice: "Kore" });
    expect((await fs.readdir(savePath)).sort()).toEqual(["p1.wav", "p2.wav"]);
    expect(setDefaultOpenAIKeyMock).toHaveBeenCalledWith("test-secret");
  });

  it("runWorkerRequest rejects for an unknown tool", async () => {
    const mod = await loadModule();
    await expect(
      mod.runWorkerRequest({
        requestId: "r2",
        modality: "image",
        tool: "no_such_tool",
        cfg: {},
        params: { pages: [], save_path: tmp },
        timeoutMs: 10_000
      })
    ).rejects.toThrow(/^Unknown capability: no_such_tool\. Registered: /);
  });

  it("answers an invalid payload with an error and exits 1", async () => {
    const mod = await loadModule();
    const sendFn = vi.fn();
    const exitFn = vi.fn();

    withIsolatedMessageListeners(() => {
      mod.registerWorkerMessageHandler({ sendFn, exitFn });
      process.emit("message", null, undefined);
      process.emit("message", { requestId: "r3", tool: "fake_tts" }, undefined);
    });

    expect(sendFn).toHaveBeenNthCalledWith(1, {
      requestId: "unknown",
      ok: false,
      error: "Invalid worker request payload.",
      details: expect.any(String)
    });
    expect(sendFn).toHaveBeenNthCalledWith(2, expect.objectContaining({ requestId: "r3", ok: false }));
    expect(exitFn).toHaveBeenCalledWith(1);
  });

  it("forwards producer notices, then sends the output and exits 0", async () => {
    const mod = await loadModule();
    const sendFn = vi.fn();
    const exitFn = vi.fn();

    withIsolatedMessageListeners(() => {
      mod.registerWorkerMessageHandler({ sendFn, exitFn });
      process.emit(
        "message",
        {
          requestId: "r4",
          modality: "speech",
          tool: "fake_tts",
          params: { pages: ["Only page."], save_path: path.join(tmp, "speech") },
          timeoutMs: 10_000
        },
        undefined
      );
    });

    await vi.waitFor(() => expect(exitFn).toHaveBeenCalled());
    expect(sendFn.mock.calls.map(([payload]: unknown[]) => payload)).toEqual([
      { requestId: "r4", notice: "Starting speech synthesis for 1 pages" },
      { requestId: "r4", notice: "Narrating page 1/1" },
      { requestId: "r4", notice: "Speech synthesis finished: 1 files" },
      {
        requestId: "r4",
        ok: true,
        output: { modality: "speech", status: "success", generated_files: 1, skipped_pages: [], voice: "Kore" }
      }
    ]);
    expect(exitFn).toHaveBeenCalledWith(0);
  });

  it("reports a producer failure with the error name and exits 1", async () => {
    const mod = await loadModule();
    const sendFn = vi.fn();
    const exitFn = vi.fn();

    withIsolatedMessageListeners(() => {
      mod.registerWorkerMessageHandler({ sendFn, exitFn });
      process.emit(
        "message",
        { requestId: "r5", modality: "image", tool: "no_such_tool", params: { pages: [], save_path: tmp }, timeoutMs: 10_000 },
        undefined
      );
    });

    await vi.waitFor(() => expect(exitFn).toHaveBeenCalled());
    expect(sendFn).toHaveBeenCalledWith({
      requestId: "r5",
      ok: false,
      error: "Worker for image failed.",
      details: expect.stringMatching(/^ConstructionError: Unknown capability: no_such_tool\./)
    });
    expect(exitFn).toHaveBeenCalledWith(1);
  });
});
