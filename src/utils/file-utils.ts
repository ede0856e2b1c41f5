import { existsSync } from "fs";
import { readdir } from "fs/promises";
import { basename, extname } from "path";
import { SUPPORTED_VIDEO_FORMATS } from "@/config/constants";

type VideoExtension = (typeof SUPPORTED_VIDEO_FORMATS)[number];

function isSupportedExtension(ext: string): ext is VideoExtension {
  return SUPPORTED_VIDEO_FORMATS.some((format) => format === ext);
}

export function isVideoFile(filePath: string): boolean {
  return isSupportedExtension(extname(filePath).toLowerCase());
}

/**
 * Dot-prefixed entries such as macOS `._clip.mp4` resource forks.
 */
export function isHiddenFile(filePath: string): boolean {
  return basename(filePath).startsWith(".");
}

/**
 * Base name without extension: `clips/a/clip_01.mp4` -> `clip_01`.
 */
export function fileStem(filePath: string): string {
  const name = basename(filePath);
  return name.slice(0, name.length - extname(name).length);
}

export function fileExists(filePath: string): boolean {
  return existsSync(filePath);
}

/**
 * File names in a directory matching a predicate, sorted lexicographically.
 */
export async function listSortedFiles(
  directory: string,
  predicate: (name: string) => boolean = () => true,
): Promise<string[]> {
  const entries = await readdir(directory, { withFileTypes: true });
  return entries
    .filter((entry) => entry.isFile() && predicate(entry.name))
    .map((entry) => entry.name)
    .sort();
}

export function zeroPad(value: number, digits: number): string {
  return value.toString().padStart(digits, "0");
}

export function formatBytes(bytes: number): string {
  if (bytes === 0) return "0 Bytes";

  const k = 1024;
  const sizes = ["Bytes", "KB", "MB", "GB", "TB"];
  const i = Math.floor(Math.log(bytes) / Math.log(k));

  return `${parseFloat((bytes / Math.pow(k, i)).toFixed(2))} ${sizes[i]}`;
}
