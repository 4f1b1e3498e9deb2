import { fetch as undiciFetch } from "undici";
import { z } from "zod";
import { VisionServiceError, errorMessage } from "../errors";
import { DetectedElement } from "../types/session";
import { FetchFn } from "./agentClient";

export interface VisionClient {
  detect(image: Buffer): Promise<DetectedElement[]>;
}

export const detectedElementSchema = z.object({
  bbox: z.object({
    x: z.number(),
    y: z.number(),
    width: z.number().nonnegative(),
    height: z.number().nonnegative(),
  }),
  text: z.string(),
  confidence: z.number(),
  type: z.string(),
});

export type VisionBackendConfig =
  | { kind: "detector"; url: string; timeoutMs: number }
  | { kind: "static"; elements: DetectedElement[] };

// Detectors report boxes either as corner tuples or as origin plus size.
const wireBboxSchema = z.union([
  z
    .tuple([z.number(), z.number(), z.number(), z.number()])
    .transform(([x1, y1, x2, y2]) => ({
      x: Math.min(x1, x2),
      y: Math.min(y1, y2),
      width: Math.abs(x2 - x1),
      height: Math.abs(y2 - y1),
    })),
  detectedElementSchema.shape.bbox,
]);

const detectResponseSchema = z.object({
  elements: z.array(
    z.object({
      bbox: wireBboxSchema,
      text: z.string().default(""),
      confidence: z.number().default(1),
      type: z.string().default("unknown"),
    }),
  ),
});

export function createDetectorClient(
  config: { url: string; timeoutMs: number },
  fetchFn: FetchFn = undiciFetch,
): VisionClient {
  const endpoint = `${config.url.replace(/\/+$/, "")}/detect`;

  return {
    async detect(image: Buffer): Promise<DetectedElement[]> {
      let body: unknown;
      try {
        const response = await fetchFn(endpoint, {
          method: "POST",
          headers: { "content-type": "application/json" },
          body: JSON.stringify({ image: image.toString("base64") }),
          signal: AbortSignal.timeout(config.timeoutMs),
        });
        if (!response.ok) {
          throw new VisionServiceError(`Vision service returned ${response.status}`);
        }
        body = await response.json();
      } catch (error) {
        if (error instanceof VisionServiceError) {
          throw error;
        }
        throw new VisionServiceError(`Vision service request failed: ${errorMessage(error)}`, { cause: error });
      }

      const parsed = detectResponseSchema.safeParse(body);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        throw new VisionServiceError(
          `Malformed detection at ${issue ? issue.path.join(".") : "<root>"}: ${issue?.message ?? "invalid"}`,
        );
      }
      return parsed.data.elements;
    },
  };
}

/** Fixed detections, for dry runs against agents without a vision service. */
export function createStaticVisionClient(elements: DetectedElement[]): VisionClient {
  return {
    async detect(): Promise<DetectedElement[]> {
      return elements.map((element) => ({ ...element, bbox: { ...element.bbox } }));
    },
  };
}

export function createVisionClient(config: VisionBackendConfig, fetchFn?: FetchFn): VisionClient {
  switch (config.kind) {
    case "detector":
      return createDetectorClient(config, fetchFn);
    case "static":
      return createStaticVisionClient(config.elements);
  }
}
