import { Parser } from "m3u8-parser";
import { DEFAULT_CONFIG, type DownloaderConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { isValidUrl, playlistDirectory, resolveSegmentUrl } from "./reference.js";

const SEGMENT_EXTENSION = ".ts";
const PLAYLIST_EXTENSION = ".m3u8";
const PREVIEW_LENGTH = 500;

interface ResolveOptions {
  fetchImpl?: typeof fetch;
  logger?: Logger;
  config?: Pick<DownloaderConfig, "maxSegments" | "maxPlaylistHops" | "requestTimeoutMs" | "origin">;
}

interface ResolvedPlaylist {
  /** The playlist that listed the segments; segment paths are relative to it. */
  url: string;
  segments: string[];
}

interface PlaylistScan {
  segments: string[];
  nested?: string;
  live: boolean;
}

function referenceLines(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line.length > 0 && !line.startsWith("#"));
}

/**
 * Segment lines are those ending in `.ts`. With none, the playlist is taken
 * as a master playlist: the first `.m3u8` line, or failing that the first
 * `#EXT-X-STREAM-INF` variant the parser finds, is the nested playlist.
 */
function scanPlaylist(content: string): PlaylistScan {
  const lines = referenceLines(content);
  const parser = new Parser();
  parser.push(content);
  parser.end();
  const { manifest } = parser;
  const live = manifest.endList !== true;

  const segments = lines.filter((line) => line.endsWith(SEGMENT_EXTENSION));
  if (segments.length > 0) {
    return { segments, live };
  }

  const nested =
    lines.find((line) => line.endsWith(PLAYLIST_EXTENSION)) ?? manifest.playlists?.[0]?.uri;
  return { segments: [], nested, live: false };
}

async function fetchPlaylistText(
  url: string,
  headers: Record<string, string>,
  fetchImpl: typeof fetch,
  timeoutMs: number,
): Promise<string> {
  const response = await fetchImpl(url, {
    headers,
    signal: AbortSignal.timeout(timeoutMs),
  });
  if (!response.ok) {
    throw new Error(`HTTP ${response.status} for ${url}`);
  }
  return response.text();
}

async function resolveFrom(
  url: string,
  headers: Record<string, string>,
  hopsLeft: number,
  visited: Set<string>,
  options: Required<ResolveOptions>,
): Promise<ResolvedPlaylist> {
  const { logger, config } = options;
  const none: ResolvedPlaylist = { url, segments: [] };

  if (!isValidUrl(url)) {
    logger.error("Invalid m3u8 URL provided", { url });
    return none;
  }
  visited.add(url);

  let scan: PlaylistScan;
  try {
    const content = await fetchPlaylistText(url, headers, options.fetchImpl, config.requestTimeoutMs);
    logger.debug("M3U8 playlist content", { url, preview: content.slice(0, PREVIEW_LENGTH) });
    scan = scanPlaylist(content);
  } catch (error) {
    logger.error("Error downloading m3u8 playlist", { url, reason: errorMessage(error) });
    return none;
  }

  if (scan.segments.length > 0) {
    if (scan.live) {
      logger.warn("Playlist has no end marker; only the segments listed now will be fetched", {
        url,
      });
    }
    if (scan.segments.length > config.maxSegments) {
      logger.debug("Truncating segment list", {
        found: scan.segments.length,
        kept: config.maxSegments,
      });
    }
    return { url, segments: scan.segments.slice(0, config.maxSegments) };
  }

  logger.warn("No .ts segments found in the playlist", { url });
  if (!scan.nested) {
    return none;
  }

  const origin = config.origin ?? new URL(url).origin;
  const nestedUrl = resolveSegmentUrl(scan.nested, playlistDirectory(url), origin);
  if (hopsLeft <= 0) {
    logger.error("Nested playlist limit reached", { url: nestedUrl, limit: config.maxPlaylistHops });
    return none;
  }
  if (visited.has(nestedUrl)) {
    logger.error("Nested playlist refers back to an earlier playlist", { url: nestedUrl });
    return none;
  }

  logger.info(`Found master playlist URL: ${nestedUrl}`);
  return resolveFrom(nestedUrl, headers, hopsLeft - 1, visited, options);
}

/**
 * Fetches a playlist and returns its segment references in playback order,
 * following master playlists for at most `maxPlaylistHops` hops, together
 * with the URL of the playlist that listed them. Fails closed: any network
 * or parse problem yields an empty segment list.
 */
async function resolvePlaylist(
  url: string,
  headers: Record<string, string>,
  options: ResolveOptions = {},
): Promise<ResolvedPlaylist> {
  const resolved: Required<ResolveOptions> = {
    fetchImpl: options.fetchImpl ?? fetch,
    logger: options.logger ?? silentLogger,
    config: options.config ?? DEFAULT_CONFIG,
  };
  return resolveFrom(url, headers, resolved.config.maxPlaylistHops, new Set(), resolved);
}

export { resolvePlaylist, scanPlaylist, SEGMENT_EXTENSION };
export type { PlaylistScan, ResolvedPlaylist, ResolveOptions };
