import { RequestInit, Response } from "undici";
import { describe, expect, it } from "vitest";
import { VisionServiceError } from "../src/errors";
import { FetchFn } from "../src/rpc/agentClient";
import { createDetectorClient, createVisionClient } from "../src/rpc/visionClient";
import { element } from "./fakes";

const detector = { url: "http://localhost:9000/", timeoutMs: 30_000 };

function respondWith(body: unknown, status = 200) {
  const requests: Array<{ url: string; init: RequestInit }> = [];
  const fetchFn: FetchFn = async (url, init) => {
    requests.push({ url, init });
    return new Response(JSON.stringify(body), { status });
  };
  return { fetchFn, requests };
}

describe("detector client", () => {
  it("posts the screenshot as base64 and normalizes corner boxes", async () => {
    const { fetchFn, requests } = respondWith({
      elements: [
        { bbox: [30, 40, 10, 20], text: "Play", confidence: 0.8, type: "button" },
        { bbox: { x: 1, y: 2, width: 3, height: 4 } },
      ],
    });

    const elements = await createDetectorClient(detector, fetchFn).detect(Buffer.from("img"));

    expect(requests[0]?.url).toBe("http://localhost:9000/detect");
    expect(requests[0]?.init.body).toBe(JSON.stringify({ image: "aW1n" }));
    expect(elements).toEqual([
      { bbox: { x: 10, y: 20, width: 20, height: 20 }, text: "Play", confidence: 0.8, type: "button" },
      { bbox: { x: 1, y: 2, width: 3, height: 4 }, text: "", confidence: 1, type: "unknown" },
    ]);
  });

  it("rejects malformed detections", async () => {
    const { fetchFn } = respondWith({ elements: [{ bbox: [1, 2, 3] }] });

    await expect(createDetectorClient(detector, fetchFn).detect(Buffer.from("img"))).rejects.toBeInstanceOf(
      VisionServiceError,
    );
  });

  it("reports service errors", async () => {
    const { fetchFn } = respondWith({ error: "model not loaded" }, 503);

    await expect(createDetectorClient(detector, fetchFn).detect(Buffer.from("img"))).rejects.toThrow(
      "Vision service returned 503",
    );
  });

  it("wraps transport failures", async () => {
    const fetchFn: FetchFn = async () => {
      throw new TypeError("fetch failed");
    };

    await expect(createDetectorClient(detector, fetchFn).detect(Buffer.from("img"))).rejects.toThrow(
      "Vision service request failed: fetch failed",
    );
  });
});

describe("static vision client", () => {
  it("returns copies of the configured elements", async () => {
    const configured = [element("Play")];
    const vision = createVisionClient({ kind: "static", elements: configured });

    const [first] = await vision.detect(Buffer.alloc(0));
    if (first) {
      first.bbox.x = 999;
    }

    expect(await vision.detect(Buffer.alloc(0))).toEqual(configured);
  });
});
