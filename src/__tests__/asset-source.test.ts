import { mkdir, mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join, resolve } from "path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { detectMimeType, FileAssetSource, resolveProjectAssetPath } from "../asset-source";

describe("resolveProjectAssetPath", () => {
  it("resolves keys inside the project directory", () => {
    expect(resolveProjectAssetPath("/srv/p1", "frames/shot-1.png")).toBe(resolve("/srv/p1/frames/shot-1.png"));
  });

  it("rejects empty, absolute and escaping keys", () => {
    expect(resolveProjectAssetPath("/srv/p1", "")).toBeNull();
    expect(resolveProjectAssetPath("/srv/p1", "/etc/passwd")).toBeNull();
    expect(resolveProjectAssetPath("/srv/p1", "../p2/secret.png")).toBeNull();
    expect(resolveProjectAssetPath("/srv/p1", "frames/../../p2.png")).toBeNull();
  });
});

describe("detectMimeType", () => {
  it("maps known extensions and falls back to octet-stream", () => {
    expect(detectMimeType("a.JPG")).toBe("image/jpeg");
    expect(detectMimeType("clip.mp4")).toBe("video/mp4");
    expect(detectMimeType("notes.xyz")).toBe("application/octet-stream");
  });
});

describe("FileAssetSource", () => {
  let projectsDir: string;

  beforeEach(async () => {
    projectsDir = await mkdtemp(join(tmpdir(), "render-assets-"));
    await mkdir(join(projectsDir, "p1", "cast"), { recursive: true });
    await writeFile(join(projectsDir, "p1", "cast", "hero.png"), "hero-bytes");
  });

  afterEach(async () => {
    await rm(projectsDir, { recursive: true, force: true });
  });

  it("reads an asset with its file name and type", async () => {
    const asset = await new FileAssetSource(projectsDir).read("p1", "cast/hero.png");

    expect(asset.key).toBe("cast/hero.png");
    expect(asset.fileName).toBe("hero.png");
    expect(asset.mimeType).toBe("image/png");
    expect(asset.bytes.toString()).toBe("hero-bytes");
  });

  it("refuses keys outside the project", async () => {
    await expect(new FileAssetSource(projectsDir).read("p1", "../p2/x.png")).rejects.toThrow(
      "Asset key escapes project directory: ../p2/x.png",
    );
  });
});
