import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";
import type { PipelineFn } from "./executor.js";
import { findRepoRoot } from "./pipeline/utils.js";

const repoRoot = findRepoRoot(path.dirname(fileURLToPath(import.meta.url)));

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { runStoryPipeline } = await import("./pipeline/story_pipeline.js");
const { loadRunConfigFile, toFakeRunConfig } = await import("./pipeline/config.js");
const { configureWorkerRuntime } = await import("./pipeline/fanout/worker_runner.js");
const { registerBuiltinTools } = await import("./pipeline/tools/builtin_tools.js");

function portFromEnv(): number {
  const port = process.env.PORT ? Number(process.env.PORT) : 5050;
  return Number.isFinite(port) && port > 0 ? port : 5050;
}

function useFakePipeline(): boolean {
  return process.env.SWS_PIPELINE_MODE?.trim().toLowerCase() === "fake";
}

registerBuiltinTools();
configureWorkerRuntime();

const defaultConfigPath = process.env.SWS_DEFAULT_CONFIG?.trim();
const defaultConfig = defaultConfigPath ? await loadRunConfigFile(path.resolve(repoRoot, defaultConfigPath)) : undefined;
if (defaultConfigPath) console.log(`default run config: ${defaultConfigPath}`);

const runs = new RunManager();
await runs.initFromDisk();

const fakePipeline = useFakePipeline();
if (fakePipeline) {
  console.log("server pipeline mode: fake (SWS_PIPELINE_MODE=fake)");
}

const routedPipeline: PipelineFn = async (input, runs, options) => {
  const config = fakePipeline ? toFakeRunConfig(input.config) : input.config;
  await runStoryPipeline({ ...input, config }, runs, options);
};

const maxConcurrentRuns = process.env.MAX_CONCURRENT_RUNS ? Number(process.env.MAX_CONCURRENT_RUNS) : 1;
const executor = new RunExecutor(runs, routedPipeline, {
  concurrency: Number.isFinite(maxConcurrentRuns) && maxConcurrentRuns > 0 ? maxConcurrentRuns : 1
});
const app = createApp(runs, executor, { pipelineMode: fakePipeline ? "fake" : "live", defaultConfig });

const port = portFromEnv();
app.listen(port, () => {
  console.log(`server listening on http://localhost:${port}`);
});
