import { DownloadError } from "./errors.js";

interface DownloaderConfig {
  maxSegments: number;
  maxSegmentBytes: number;
  requestTimeoutMs: number;
  assemblyTimeoutMs: number;
  transcriptionTimeoutMs: number;
  maxPlaylistHops: number;
  concurrency: number;
  /** Origin for segment paths rooted at `/`; the playlist's own origin when unset. */
  origin?: string;
  headers: Readonly<Record<string, string>>;
}

const DEFAULT_HEADERS: Readonly<Record<string, string>> = Object.freeze({
  "User-Agent":
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10.15; rv:137.0) Gecko/20100101 Firefox/137.0",
  Accept: "*/*",
  "Accept-Language": "en-US,en;q=0.5",
});

const DEFAULT_CONFIG: Readonly<DownloaderConfig> = Object.freeze({
  maxSegments: 1000,
  maxSegmentBytes: 10 * 1024 * 1024,
  requestTimeoutMs: 30_000,
  assemblyTimeoutMs: 300_000,
  transcriptionTimeoutMs: 600_000,
  maxPlaylistHops: 5,
  concurrency: 1,
  headers: DEFAULT_HEADERS,
});

type NumericKey = {
  [K in keyof DownloaderConfig]-?: DownloaderConfig[K] extends number ? K : never;
}[keyof DownloaderConfig];

const ENV_KEYS: ReadonlyArray<[string, NumericKey]> = [
  ["HLSGRAB_MAX_SEGMENTS", "maxSegments"],
  ["HLSGRAB_MAX_SEGMENT_BYTES", "maxSegmentBytes"],
  ["HLSGRAB_TIMEOUT_MS", "requestTimeoutMs"],
  ["HLSGRAB_ASSEMBLY_TIMEOUT_MS", "assemblyTimeoutMs"],
  ["HLSGRAB_MAX_PLAYLIST_HOPS", "maxPlaylistHops"],
  ["HLSGRAB_CONCURRENCY", "concurrency"],
];

function parsePositiveInt(name: string, raw: string): number {
  const trimmed = raw.trim();
  if (!/^\d+$/.test(trimmed) || Number(trimmed) < 1) {
    throw new DownloadError("invalid_config", `${name} must be a positive integer, got "${raw}"`);
  }
  return Number(trimmed);
}

function parseOrigin(name: string, raw: string): string {
  let parsed: URL;
  try {
    parsed = new URL(raw.trim());
  } catch (error) {
    throw new DownloadError("invalid_config", `${name} is not a URL: "${raw}"`, { cause: error });
  }
  if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
    throw new DownloadError("invalid_config", `${name} must use http or https`);
  }
  return parsed.origin;
}

/**
 * Builds the effective configuration: defaults, then `HLSGRAB_*` environment
 * variables, then explicit overrides (CLI flags).
 */
function loadConfig(
  env: Record<string, string | undefined> = {},
  overrides: Partial<DownloaderConfig> = {},
): DownloaderConfig {
  const config: DownloaderConfig = { ...DEFAULT_CONFIG };

  for (const [name, key] of ENV_KEYS) {
    const raw = env[name];
    if (raw !== undefined && raw.trim() !== "") {
      config[key] = parsePositiveInt(name, raw);
    }
  }

  const origin = env.HLSGRAB_ORIGIN;
  if (origin !== undefined && origin.trim() !== "") {
    config.origin = parseOrigin("HLSGRAB_ORIGIN", origin);
  }

  const merged = { ...config, ...overrides };
  if (!Number.isInteger(merged.concurrency) || merged.concurrency < 1) {
    throw new DownloadError("invalid_config", "concurrency must be a positive integer");
  }
  return merged;
}

export { DEFAULT_CONFIG, DEFAULT_HEADERS, loadConfig };
export type { DownloaderConfig };
