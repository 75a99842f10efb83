import { DetectorResponseSchema, type RawDetection } from "@pavewise/contracts";

import { DetectionError } from "../../engine/ai/errors";
import type { DetectOptions, Detector } from "../../engine/workflows/detections";

export type HttpDetectorOptions = {
  baseUrl: string;
  timeoutMs?: number;
  fetchImpl?: typeof fetch;
};

/**
 * Object-detection sidecar over HTTP. POST /detect with `{ imageReference }`
 * returns `{ detections: [{ label, confidence, bbox, areaPixels }], modelId? }`.
 */
export class HttpDetector implements Detector {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly fetchImpl: typeof fetch;

  constructor(options: HttpDetectorOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? 20_000;
    this.fetchImpl = options.fetchImpl ?? fetch;
  }

  async detect(imageReference: string, options: DetectOptions = {}): Promise<RawDetection[]> {
    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort("timeout"), this.timeoutMs);
    const onAbort = (): void => controller.abort(options.signal?.reason);
    if (options.signal?.aborted) {
      onAbort();
    }
    options.signal?.addEventListener("abort", onAbort, { once: true });

    try {
      const body = await this.post(imageReference, controller.signal);
      const parsed = DetectorResponseSchema.safeParse(body);
      if (!parsed.success) {
        throw new DetectionError(`Detector returned an unexpected payload for ${imageReference}`, parsed.error);
      }
      return parsed.data.detections;
    } finally {
      clearTimeout(timeoutId);
      options.signal?.removeEventListener("abort", onAbort);
    }
  }

  // The signal stays live until the body is read, so a stalled body still times out.
  private async post(imageReference: string, signal: AbortSignal): Promise<unknown> {
    let response: Response;
    try {
      response = await this.fetchImpl(`${this.baseUrl}/detect`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ imageReference }),
        signal,
      });
    } catch (error) {
      throw new DetectionError(`Detector request failed for ${imageReference}`, error);
    }

    if (!response.ok) {
      const text = await response.text().catch((error: unknown) => {
        throw new DetectionError(`Detector request failed for ${imageReference}`, error);
      });
      throw new DetectionError(`Detector rejected ${imageReference} (${response.status}): ${text}`);
    }

    return response.json().catch((error: unknown) => {
      throw new DetectionError(
        signal.aborted
          ? `Detector request failed for ${imageReference}`
          : `Detector returned invalid JSON for ${imageReference}`,
        error,
      );
    });
  }
}
