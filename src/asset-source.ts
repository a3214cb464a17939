import { readFile } from "fs/promises";
import { basename, extname, isAbsolute, resolve, sep } from "path";

import { projectDir } from "./tools/state";
import type { LocalAsset } from "./types";

const MIME_TYPES: Record<string, string> = {
  ".png": "image/png",
  ".jpg": "image/jpeg",
  ".jpeg": "image/jpeg",
  ".webp": "image/webp",
  ".mp4": "video/mp4",
  ".mov": "video/quicktime",
  ".wav": "audio/wav",
  ".mp3": "audio/mpeg",
  ".json": "application/json; charset=utf-8",
};

export function detectMimeType(filePath: string): string {
  return MIME_TYPES[extname(filePath).toLowerCase()] ?? "application/octet-stream";
}

/** Where the bytes behind a local asset key come from. */
export interface AssetSource {
  read(projectId: string, assetKey: string): Promise<LocalAsset>;
}

/**
 * Resolves an asset key (a path relative to the project directory) to an
 * absolute path. Returns null for keys that escape the project directory.
 */
export function resolveProjectAssetPath(root: string, assetKey: string): string | null {
  if (assetKey.length === 0 || isAbsolute(assetKey)) {
    return null;
  }
  const projectRoot = resolve(root);
  const candidate = resolve(projectRoot, assetKey);
  const projectRootPrefix = `${projectRoot}${sep}`;
  if (!candidate.startsWith(projectRootPrefix)) {
    return null;
  }
  return candidate;
}

export class FileAssetSource implements AssetSource {
  constructor(private readonly projectsDir: string) {}

  async read(projectId: string, assetKey: string): Promise<LocalAsset> {
    const filePath = resolveProjectAssetPath(projectDir(this.projectsDir, projectId), assetKey);
    if (!filePath) {
      throw new Error(`Asset key escapes project directory: ${assetKey}`);
    }
    const bytes = await readFile(filePath);
    return {
      key: assetKey,
      fileName: basename(filePath),
      mimeType: detectMimeType(filePath),
      bytes,
    };
  }
}
