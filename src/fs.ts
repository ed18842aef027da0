import { getDirFilenames } from "@beenotung/tslib/fs";
import type { Stats } from "fs";
import { copyFile, lstat, mkdir, stat, writeFile } from "fs/promises";
import { basename, extname, join } from "path";

import { DatasetIoError } from "./errors";
import { toBaseName } from "./label";

/** tried in this order when the declared file name is not found as is */
export const IMAGE_EXTENSIONS = ["jpg", "jpeg", "png", "bmp", "tiff", "tif"];

export async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (error) {
    if (isNotFoundError(error)) return false;
    throw new DatasetIoError("scan", path, error);
  }
}

function isNotFoundError(error: unknown): boolean {
  return (
    error instanceof Error &&
    "code" in error &&
    (error.code === "ENOENT" || error.code === "ENOTDIR")
  );
}

/**
 * All files under `dir`, depth first, entries of each directory in sorted
 * order. Symbolic links are listed but never followed into.
 */
export async function scanFiles(dir: string): Promise<string[]> {
  let filenames: string[];
  try {
    filenames = await getDirFilenames(dir);
  } catch (error) {
    throw new DatasetIoError("scan", dir, error);
  }

  const files: string[] = [];
  for (const filename of filenames.sort()) {
    const file = join(dir, filename);
    let stats: Stats;
    try {
      stats = await lstat(file);
    } catch (error) {
      throw new DatasetIoError("scan", file, error);
    }
    if (stats.isDirectory()) {
      files.push(...(await scanFiles(file)));
    } else {
      files.push(file);
    }
  }
  return files;
}

function isJsonFile(file: string): boolean {
  return extname(file) === ".json";
}

/** annotation documents under the input root, sorted by path */
export async function findAnnotationFiles(input_dir: string): Promise<string[]> {
  return (await scanFiles(input_dir)).filter(isJsonFile);
}

// ==================== Image Resolution ====================

/** file name -> first path found with that name */
export type ImageIndex = Map<string, string>;

/** one scan of the input root, queried by {@link resolveImage} for every image */
export async function buildImageIndex(input_dir: string): Promise<ImageIndex> {
  const index: ImageIndex = new Map();
  for (const file of await scanFiles(input_dir)) {
    const filename = basename(file);
    if (!index.has(filename)) {
      index.set(filename, file);
    }
  }
  return index;
}

/**
 * Find the physical file for a declared image name.
 *
 * The exact base name wins. Otherwise the stem is retried with each of
 * {@link IMAGE_EXTENSIONS}. Returns `undefined` when nothing matches.
 */
export function resolveImage(
  index: ImageIndex,
  declared_name: string
): string | undefined {
  const base_name = toBaseName(declared_name);
  const exact = index.get(base_name);
  if (exact) return exact;

  const stem = basename(base_name, extname(base_name));
  for (const ext of IMAGE_EXTENSIONS) {
    const file = index.get(`${stem}.${ext}`);
    if (file) return file;
  }
  return undefined;
}

// ==================== File Utilities ====================

export async function makeDir(dir: string): Promise<void> {
  try {
    await mkdir(dir, { recursive: true });
  } catch (error) {
    throw new DatasetIoError("mkdir", dir, error);
  }
}

export async function saveTextFile(file: string, content: string) {
  try {
    await writeFile(file, content);
  } catch (error) {
    throw new DatasetIoError("write", file, error);
  }
}

export async function copyImageFile(src_file: string, dest_file: string) {
  try {
    await copyFile(src_file, dest_file);
  } catch (error) {
    throw new DatasetIoError("copy", `${src_file} -> ${dest_file}`, error);
  }
}
