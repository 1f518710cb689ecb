// Backup bundle layout on disk:
//   <root>/<YYYYMMDD-HHMMSS>/metadata.json
//   <root>/<id>/target/...   target artifacts, mirroring their absolute paths
//   <root>/<id>/host/...     host artifacts
// Every file is created exclusively ("wx") so a bundle, once written, is never modified.
import fs from "node:fs/promises";
import path from "node:path";
import { z } from "zod";
import type { BundleMetadata } from "../types/bundle.js";
import { BaselineError, BaselineErrorCode } from "../shared/errors.js";

export const METADATA_FILE = "metadata.json";
const BUNDLE_ID = /^\d{8}-\d{6}$/;

/** Creation time at second resolution, UTC: 20261018-174105. */
export function bundleId(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getUTCFullYear()}${pad(date.getUTCMonth() + 1)}${pad(date.getUTCDate())}` +
    `-${pad(date.getUTCHours())}${pad(date.getUTCMinutes())}${pad(date.getUTCSeconds())}`
  );
}

const relativeFile = z
  .string()
  .regex(/^(target|host)\/[^\0]+$/, "must live under target/ or host/")
  .refine((p) => !p.split("/").includes(".."), "must not contain '..'");

const captureSchema = z.object({
  name: z.string().min(1),
  scope: z.enum(["host", "target"]),
  kind: z.enum(["file", "directory", "state", "snapshot"]),
  path: z.string(),
  status: z.enum(["present", "absent", "failed"]),
  bundleFile: relativeFile.optional(),
  files: z.array(z.string().regex(/^[^/\\\0]+$/)).optional(),
  error: z.string().optional(),
});

const metadataSchema = z.object({
  formatVersion: z.literal(1),
  id: z.string().regex(BUNDLE_ID),
  createdAt: z.string(),
  targetId: z.string().min(1),
  creator: z.string(),
  hostId: z.string(),
  includesHostArtifacts: z.boolean(),
  artifacts: z.array(captureSchema),
});

export async function writeBundleFile(bundlePath: string, relative: string, content: string | Buffer): Promise<void> {
  const file = path.join(bundlePath, ...relative.split("/"));
  await fs.mkdir(path.dirname(file), { recursive: true });
  await fs.writeFile(file, content, { flag: "wx" });
}

export async function readBundleFile(bundlePath: string, relative: string): Promise<Buffer | null> {
  try {
    return await fs.readFile(path.join(bundlePath, ...relative.split("/")));
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;
  }
}

export async function writeMetadata(bundlePath: string, metadata: BundleMetadata): Promise<void> {
  await fs.writeFile(path.join(bundlePath, METADATA_FILE), JSON.stringify(metadata, null, 2) + "\n", { flag: "wx" });
}

/** Metadata for a bundle, or null when the file is missing. Malformed metadata is BUNDLE_INVALID. */
export async function readMetadata(bundlePath: string): Promise<BundleMetadata | null> {
  let raw: string;
  try {
    raw = await fs.readFile(path.join(bundlePath, METADATA_FILE), "utf-8");
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return null;
    throw err;  // propagate permission errors
  }
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new BaselineError(BaselineErrorCode.BUNDLE_INVALID, `metadata.json is not valid JSON in ${bundlePath}`, { bundlePath });
  }
  const parsed = metadataSchema.safeParse(json);
  if (!parsed.success) {
    throw new BaselineError(BaselineErrorCode.BUNDLE_INVALID, `metadata.json failed validation in ${bundlePath}`, {
      bundlePath,
      issues: parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`),
    });
  }
  return parsed.data;
}

export interface BundleSummary {
  readonly id: string;
  readonly path: string;
  readonly metadata: BundleMetadata | null;
}

/** Bundles under `root`, newest first. Unreadable metadata is reported as null. */
export async function listBundles(root: string): Promise<BundleSummary[]> {
  let entries: string[];
  try {
    entries = await fs.readdir(root);
  } catch (err) {
    if ((err as NodeJS.ErrnoException).code === "ENOENT") return [];
    throw err;
  }
  const ids = entries.filter((e) => BUNDLE_ID.test(e)).sort().reverse();
  const summaries: BundleSummary[] = [];
  for (const id of ids) {
    const bundlePath = path.join(root, id);
    let metadata: BundleMetadata | null = null;
    try {
      metadata = await readMetadata(bundlePath);
    } catch (err) {
      if (!(err instanceof BaselineError)) throw err;
    }
    summaries.push({ id, path: bundlePath, metadata });
  }
  return summaries;
}

export async function latestBundle(root: string): Promise<string> {
  const [newest] = await listBundles(root);
  if (!newest) {
    throw new BaselineError(BaselineErrorCode.BUNDLE_NOT_FOUND, `No backup bundles found under ${root}`, { root });
  }
  return newest.path;
}
