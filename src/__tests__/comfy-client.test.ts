import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { ComfyClient, ComfyImageProvider, ComfyVideoProvider, dimensionsFor } from "../comfy-client";
import { HttpError } from "../errors";

type FetchCall = { url: string; init?: RequestInit };

let calls: FetchCall[];
let responses: Array<(call: FetchCall) => Response>;

function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}

function bodyOf(call: FetchCall): unknown {
  return JSON.parse(String(call.init?.body));
}

beforeEach(() => {
  calls = [];
  responses = [];
  vi.spyOn(console, "log").mockImplementation(() => undefined);
  vi.spyOn(console, "warn").mockImplementation(() => undefined);
  vi.stubGlobal(
    "fetch",
    vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
      const call = { url: String(input), init };
      calls.push(call);
      const next = responses.shift();
      if (!next) {
        throw new Error(`Unexpected fetch ${call.url}`);
      }
      return next(call);
    }),
  );
});

afterEach(() => {
  vi.unstubAllGlobals();
  vi.restoreAllMocks();
});

function client(): ComfyClient {
  return new ComfyClient({ baseUrl: "http://comfy.test/", token: "test-token", pollIntervalMs: 0 });
}

describe("ComfyClient", () => {
  it("uploads an asset as multipart form data", async () => {
    responses.push(() => jsonResponse({ id: "asset-7" }));

    const url = await client().upload(
      { key: "cast/hero.png", fileName: "hero.png", mimeType: "image/png", bytes: Buffer.from("png") },
      new AbortController().signal,
    );

    expect(url).toBe("http://comfy.test/assets/asset-7/file");
    expect(calls[0].url).toBe("http://comfy.test/assets/upload");
    expect(calls[0].init?.method).toBe("POST");
    expect(calls[0].init?.headers).toEqual({ Authorization: "Bearer test-token" });
    expect(calls[0].init?.body).toBeInstanceOf(FormData);
  });

  it("raises an HttpError with the status when an upload is refused", async () => {
    responses.push(() => new Response("too large", { status: 413, statusText: "Payload Too Large" }));

    const promise = client().upload(
      { key: "a.png", fileName: "a.png", mimeType: "image/png", bytes: Buffer.from("a") },
      new AbortController().signal,
    );
    await expect(promise).rejects.toBeInstanceOf(HttpError);
    await expect(promise).rejects.toMatchObject({ status: 413, body: "too large" });
  });

  it("probes with HEAD and distinguishes gone from broken", async () => {
    responses.push(
      () => new Response(null, { status: 200 }),
      () => new Response(null, { status: 404 }),
      () => new Response(null, { status: 503 }),
    );
    const comfy = client();
    const signal = new AbortController().signal;

    await expect(comfy.probe("http://comfy.test/assets/a/file", signal)).resolves.toBe(true);
    await expect(comfy.probe("http://comfy.test/assets/b/file", signal)).resolves.toBe(false);
    await expect(comfy.probe("http://comfy.test/assets/c/file", signal)).rejects.toMatchObject({ status: 503 });
    expect(calls.map((call) => call.init?.method)).toEqual(["HEAD", "HEAD", "HEAD"]);
  });

  it("cancels the remote job when polling is aborted", async () => {
    const controller = new AbortController();
    responses.push(
      () => jsonResponse({ job_id: "job-9" }),
      () => {
        controller.abort(new Error("timed out"));
        return jsonResponse({ status: "running" });
      },
      () => jsonResponse({}),
    );

    await expect(client().runToAsset("text_to_image", { prompt: "x" }, controller.signal)).rejects.toThrow();
    expect(calls.map((call) => call.url)).toEqual([
      "http://comfy.test/workflows/text_to_image/run",
      "http://comfy.test/jobs/job-9",
      "http://comfy.test/jobs/job-9/cancel",
    ]);
  });
});

describe("ComfyImageProvider", () => {
  it("runs image_edit with at most four references and polls to completion", async () => {
    responses.push(
      () => jsonResponse({ job_id: "job-1" }),
      () => jsonResponse({ status: "running" }),
      () => jsonResponse({ status: "completed", output_asset_ids: ["out-1"] }),
    );

    const output = await new ComfyImageProvider(client()).submit(
      {
        kind: "image-render",
        projectId: "p1",
        targetId: "shot-1",
        payload: {
          prompt: "castle at dusk",
          aspect: "square",
          referenceUrls: ["r1", "r2", "r3", "r4", "r5"],
        },
      },
      new AbortController().signal,
    );

    expect(output).toEqual({ assetUrl: "http://comfy.test/assets/out-1/file", model: "comfyui/image_edit" });
    expect(calls[0].url).toBe("http://comfy.test/workflows/image_edit/run");
    expect(bodyOf(calls[0])).toEqual({
      prompt: "castle at dusk",
      width: 1024,
      height: 1024,
      reference_image_urls: ["r1", "r2", "r3", "r4"],
    });
  });

  it("uses text_to_image without references", async () => {
    responses.push(
      () => jsonResponse({ job_id: "job-2" }),
      () => jsonResponse({ status: "completed", output_asset_ids: ["out-2"] }),
    );

    const output = await new ComfyImageProvider(client()).submit(
      {
        kind: "image-render",
        projectId: "p1",
        targetId: "shot-2",
        payload: { prompt: "forest", aspect: "vertical", referenceUrls: [] },
      },
      new AbortController().signal,
    );

    expect(output.model).toBe("comfyui/text_to_image");
    expect(bodyOf(calls[0])).toEqual({ prompt: "forest", width: 1080, height: 1920 });
  });

  it("fails when the job fails", async () => {
    responses.push(
      () => jsonResponse({ job_id: "job-3" }),
      () => jsonResponse({ status: "failed" }),
    );

    await expect(
      new ComfyImageProvider(client()).submit(
        {
          kind: "image-render",
          projectId: "p1",
          targetId: "shot-3",
          payload: { prompt: "x", aspect: "horizontal", referenceUrls: [] },
        },
        new AbortController().signal,
      ),
    ).rejects.toThrow("Job job-3 failed");
  });
});

describe("ComfyVideoProvider", () => {
  it("sends frame URLs and a frame count for the duration", async () => {
    responses.push(
      () => jsonResponse({ job_id: "job-4" }),
      () => jsonResponse({ status: "completed", output_asset_ids: ["clip-1"] }),
    );

    const output = await new ComfyVideoProvider(client()).submit(
      {
        kind: "video-render",
        projectId: "p1",
        targetId: "shot-1",
        payload: { prompt: "slow push in", startFrameUrl: "https://cdn.test/start", durationSeconds: 5 },
      },
      new AbortController().signal,
    );

    expect(output).toEqual({ assetUrl: "http://comfy.test/assets/clip-1/file", model: "comfyui/frame_to_video" });
    expect(bodyOf(calls[0])).toEqual({
      prompt: "slow push in",
      start_image_url: "https://cdn.test/start",
      width: 640,
      height: 640,
      length: 81,
      fps: 16,
    });
  });
});

describe("dimensionsFor", () => {
  it("maps aspect ratios to pixel sizes", () => {
    expect(dimensionsFor("horizontal")).toEqual({ width: 1920, height: 1080 });
  });
});
