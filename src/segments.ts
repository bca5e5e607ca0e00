import { promises as fs } from "node:fs";
import pLimit from "p-limit";
import { DEFAULT_CONFIG, type DownloaderConfig } from "./config.js";
import { DownloadError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { resolveSegmentUrl } from "./reference.js";
import {
  createWorkingArea,
  destroyWorkingArea,
  listSegmentFiles,
  type SegmentFile,
  slotPath,
  type WorkingArea,
} from "./workspace.js";

type SkipReason = "size_limit" | "network";

interface SkippedSegment {
  index: number;
  url: string;
  reason: SkipReason;
  detail: string;
}

interface Acquisition {
  area: WorkingArea;
  files: SegmentFile[];
  skipped: SkippedSegment[];
}

interface AcquireOptions {
  fetchImpl?: typeof fetch;
  logger?: Logger;
  config?: Pick<DownloaderConfig, "maxSegmentBytes" | "requestTimeoutMs" | "concurrency" | "origin">;
  workspaceRoot?: string;
  onProgress?: (completed: number, total: number) => void;
}

type SegmentOutcome = { ok: true; bytes: number } | { ok: false; reason: SkipReason; detail: string };

class SizeLimitExceeded extends Error {}

/** The declared body size, or undefined when the header is absent or not a byte count. */
function declaredLength(headers: Headers): number | undefined {
  const raw = headers.get("content-length")?.trim();
  if (raw === undefined || !/^\d+$/.test(raw)) {
    return undefined;
  }
  return Number(raw);
}

async function streamToFile(
  body: ReadableStream<Uint8Array>,
  filePath: string,
  maxBytes: number,
): Promise<number> {
  const reader = body.getReader();
  const handle = await fs.open(filePath, "w");
  let downloaded = 0;
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) {
        break;
      }
      const chunk: Uint8Array = value;
      downloaded += chunk.byteLength;
      if (downloaded > maxBytes) {
        await reader.cancel();
        throw new SizeLimitExceeded(`download exceeded ${maxBytes} bytes`);
      }
      await handle.write(chunk);
    }
  } finally {
    await handle.close();
  }
  return downloaded;
}

async function fetchSegment(
  url: string,
  target: string,
  headers: Record<string, string>,
  fetchImpl: typeof fetch,
  config: NonNullable<AcquireOptions["config"]>,
): Promise<SegmentOutcome> {
  let response: Response;
  try {
    response = await fetchImpl(url, {
      headers,
      signal: AbortSignal.timeout(config.requestTimeoutMs),
    });
  } catch (error) {
    return { ok: false, reason: "network", detail: errorMessage(error) };
  }

  if (!response.ok) {
    await response.body?.cancel();
    return { ok: false, reason: "network", detail: `HTTP ${response.status}` };
  }

  const declared = declaredLength(response.headers);
  if (declared !== undefined && declared > config.maxSegmentBytes) {
    await response.body?.cancel();
    return {
      ok: false,
      reason: "size_limit",
      detail: `declared size ${declared} exceeds ${config.maxSegmentBytes} bytes`,
    };
  }
  if (!response.body) {
    return { ok: false, reason: "network", detail: "empty response body" };
  }

  try {
    const bytes = await streamToFile(response.body, target, config.maxSegmentBytes);
    return { ok: true, bytes };
  } catch (error) {
    // never leave a truncated slot behind
    await fs.rm(target, { force: true });
    return {
      ok: false,
      reason: error instanceof SizeLimitExceeded ? "size_limit" : "network",
      detail: errorMessage(error),
    };
  }
}

/**
 * Downloads every segment into a numbered slot of a fresh working area.
 * A failed or oversized segment is skipped and recorded; it never aborts the
 * batch, so the result may hold fewer files than `segments` (or none).
 */
async function acquireSegments(
  segments: readonly string[],
  baseUrl: string,
  headers: Record<string, string>,
  options: AcquireOptions = {},
): Promise<Acquisition> {
  if (segments.length === 0) {
    throw new DownloadError("no_segments", "no segments to download");
  }

  const logger = options.logger ?? silentLogger;
  const fetchImpl = options.fetchImpl ?? fetch;
  const config = options.config ?? DEFAULT_CONFIG;
  const origin = config.origin ?? new URL(baseUrl).origin;

  const area = await createWorkingArea({
    segmentCount: segments.length,
    root: options.workspaceRoot,
  });

  try {
    const skipped: SkippedSegment[] = [];
    const limit = pLimit(config.concurrency);
    let completed = 0;

    await Promise.all(
      segments.map((ref, index) =>
        limit(async () => {
          const url = resolveSegmentUrl(ref, baseUrl, origin);
          logger.debug(`Downloading segment ${index + 1}/${segments.length}`);
          const outcome = await fetchSegment(url, slotPath(area, index), headers, fetchImpl, config);
          if (!outcome.ok) {
            logger.warn(`Skipping segment ${index + 1}`, { url, reason: outcome.reason, detail: outcome.detail });
            skipped.push({ index, url, reason: outcome.reason, detail: outcome.detail });
          } else {
            logger.debug(`Segment ${index + 1} saved`, { bytes: outcome.bytes });
          }
          completed += 1;
          options.onProgress?.(completed, segments.length);
        }),
      ),
    );

    const files = await listSegmentFiles(area);
    return { area, files, skipped: skipped.sort((a, b) => a.index - b.index) };
  } catch (error) {
    await destroyWorkingArea(area, logger);
    throw error;
  }
}

export { acquireSegments };
export type { Acquisition, AcquireOptions, SkippedSegment, SkipReason };
