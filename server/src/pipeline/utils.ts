import { existsSync } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export function nowIso(): string {
  return new Date().toISOString();
}

/** Nearest folder at or above `startDir` that holds a package.json. */
export function findRepoRoot(startDir: string): string {
  let dir = path.resolve(startDir);
  for (;;) {
    if (existsSync(path.join(dir, "package.json"))) return dir;
    const parent = path.dirname(dir);
    if (parent === dir) return path.resolve(startDir, "../../..");
    dir = parent;
  }
}

export function repoRoot(): string {
  return findRepoRoot(path.dirname(fileURLToPath(import.meta.url)));
}

export function outputRootAbs(): string {
  const env = process.env.SWS_OUTPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "output");
}

/** Folder story sources may be read from; paths outside it are refused. */
export function inputRootAbs(): string {
  const env = process.env.SWS_INPUT_DIR;
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), "input");
}

/** Resolves `candidate` against the input root, or null when it would land outside it. */
export function resolveInputPath(candidate: string): string | null {
  const root = inputRootAbs();
  const resolved = path.resolve(root, candidate);
  const rel = path.relative(root, resolved);
  if (rel === "" || rel === ".." || rel.startsWith(`..${path.sep}`) || path.isAbsolute(rel)) return null;
  return resolved;
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), runId);
}

export function artifactAbsPath(runId: string, name: string): string {
  return path.join(runOutputDirAbs(runId), name);
}

/** Run subfolders that hold per-modality output, searched after the run folder itself. */
export const ARTIFACT_SUBDIRS = ["image", "speech"] as const;

export async function resolveArtifactPathAbs(runId: string, name: string): Promise<string | null> {
  const candidates = [artifactAbsPath(runId, name), ...ARTIFACT_SUBDIRS.map((dir) => path.join(runOutputDirAbs(runId), dir, name))];
  for (const candidate of candidates) {
    if (await fileExists(candidate)) return candidate;
  }
  return null;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

export async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  try {
    await fs.writeFile(tmpPath, data);
    await fs.rename(tmpPath, filePath);
  } catch (err) {
    await fs.rm(tmpPath, { force: true });
    throw err;
  }
}

export async function writeBinaryFile(filePath: string, data: Buffer): Promise<void> {
  await atomicWrite(filePath, data);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile<T>(filePath: string): Promise<T> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw) as T;
}

export async function tryReadJsonFile<T>(filePath: string): Promise<T | null> {
  try {
    return await readJsonFile<T>(filePath);
  } catch {
    return null;
  }
}

export function isSafeArtifactName(name: string): boolean {
  // Prevent path traversal and keep filenames predictable.
  if (name.includes("/") || name.includes("\\") || name.includes("..")) return false;
  return /^[A-Za-z0-9._-]+$/.test(name);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function toErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function abortReasonMessage(signal: AbortSignal | undefined): string {
  const reason = signal?.reason;
  if (reason instanceof Error && reason.message.trim().length > 0) return reason.message;
  if (typeof reason === "string" && reason.trim().length > 0) return reason;
  return "Cancelled";
}

export function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) throw new Error(abortReasonMessage(signal));
}

export function randomSeed(): number {
  return Math.floor(Math.random() * 100_000);
}

/** Combines a caller signal with a deadline; whichever fires first aborts. */
export function signalWithTimeout(signal: AbortSignal | undefined, timeoutMs: number): AbortSignal {
  const deadline = AbortSignal.timeout(timeoutMs);
  return signal ? AbortSignal.any([signal, deadline]) : deadline;
}
