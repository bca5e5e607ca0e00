import { DownloadError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

interface PlaylistReference {
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
}

interface CapturedRequest {
  url?: string;
  headers: Record<string, string>;
}

const ABSOLUTE_URL = /^https?:\/\//i;
const SEGMENT_MARKER = "/seg-";

const HEADER_FLAGS = new Set(["-H", "--header"]);
const HEADER_ALIASES = new Map([
  ["-A", "User-Agent"],
  ["--user-agent", "User-Agent"],
  ["-e", "Referer"],
  ["--referer", "Referer"],
  ["-b", "Cookie"],
  ["--cookie", "Cookie"],
]);
// curl flags whose next token is an argument, never the URL
const VALUE_FLAGS = new Set([
  ...HEADER_FLAGS,
  ...HEADER_ALIASES.keys(),
  "-X",
  "--request",
  "-d",
  "--data",
  "--data-raw",
  "--data-binary",
  "-u",
  "--user",
  "-o",
  "--output",
  "-x",
  "--proxy",
]);
const DOUBLE_QUOTE_ESCAPES = new Set(["$", "`", '"', "\\"]);

function isValidUrl(url: string): boolean {
  try {
    const parsed = new URL(url);
    return (parsed.protocol === "http:" || parsed.protocol === "https:") && parsed.host !== "";
  } catch {
    return false;
  }
}

function createPlaylistReference(
  url: string,
  headers: Record<string, string> = {},
): PlaylistReference {
  if (!isValidUrl(url)) {
    throw new DownloadError("invalid_reference", `not an http(s) playlist URL: "${url}"`);
  }
  return Object.freeze({ url, headers: Object.freeze({ ...headers }) });
}

/**
 * Splits a shell command line the way a POSIX shell would for a plain
 * `curl ...` invocation. Throws on an unterminated quote or a dangling
 * backslash.
 */
function tokenizeCommand(text: string): string[] {
  const tokens: string[] = [];
  let current = "";
  let inToken = false;
  let quote: "'" | '"' | null = null;

  for (let i = 0; i < text.length; i += 1) {
    const ch = text[i];

    if (quote === "'") {
      if (ch === "'") {
        quote = null;
      } else {
        current += ch;
      }
      continue;
    }

    if (quote === '"') {
      const next = text[i + 1];
      if (ch === '"') {
        quote = null;
      } else if (ch === "\\" && next === "\n") {
        i += 1;
      } else if (ch === "\\" && next !== undefined && DOUBLE_QUOTE_ESCAPES.has(next)) {
        current += next;
        i += 1;
      } else {
        current += ch;
      }
      continue;
    }

    if (ch === "\\") {
      const next = text[i + 1];
      if (next === undefined) {
        throw new Error("dangling backslash at end of command");
      }
      if (next === "\r" && text[i + 2] === "\n") {
        i += 2;
        continue;
      }
      i += 1;
      if (next !== "\n") {
        current += next;
        inToken = true;
      }
      continue;
    }

    if (ch === "'" || ch === '"') {
      quote = ch;
      inToken = true;
      continue;
    }

    if (/\s/.test(ch)) {
      if (inToken) {
        tokens.push(current);
        current = "";
        inToken = false;
      }
      continue;
    }

    current += ch;
    inToken = true;
  }

  if (quote !== null) {
    throw new Error(`unterminated ${quote} quote`);
  }
  if (inToken) {
    tokens.push(current);
  }
  return tokens;
}

function parseHeaderLine(raw: string): [string, string] | undefined {
  const line = raw.trim().replace(/^['"]+|['"]+$/g, "");
  const idx = line.indexOf(":");
  if (idx === -1) {
    return undefined;
  }
  const name = line.slice(0, idx).trim();
  if (name === "") {
    return undefined;
  }
  return [name, line.slice(idx + 1).trim()];
}

/**
 * Extracts the URL and headers from a captured `curl` command ("Copy as cURL"
 * in browser dev tools). Never throws: a command that cannot be tokenized
 * yields no URL and no headers.
 */
function parseCapturedRequest(text: string, logger: Logger = silentLogger): CapturedRequest {
  let tokens: string[];
  try {
    tokens = tokenizeCommand(text.trim());
  } catch (error) {
    logger.error("Error parsing captured request", { reason: errorMessage(error) });
    return { url: undefined, headers: {} };
  }
  if (tokens[0] === "curl") {
    tokens = tokens.slice(1);
  }

  let url: string | undefined;
  const headers: Record<string, string> = {};

  for (let i = 0; i < tokens.length; i += 1) {
    const token = tokens[i];

    if (token === "--url") {
      url ??= tokens[i + 1];
      i += 1;
      continue;
    }

    if (VALUE_FLAGS.has(token)) {
      const value = tokens[i + 1];
      i += 1;
      if (value === undefined) {
        continue;
      }
      if (HEADER_FLAGS.has(token)) {
        const header = parseHeaderLine(value);
        if (header) {
          headers[header[0]] = header[1];
        }
        continue;
      }
      const alias = HEADER_ALIASES.get(token);
      if (alias) {
        headers[alias] = value.trim();
      }
      continue;
    }

    if (!token.startsWith("-")) {
      url ??= token;
    }
  }

  return { url, headers };
}

/**
 * A captured request is often for one segment (`.../index.m3u8/seg-12-v1.ts`)
 * rather than for the playlist; drop the segment part to get the playlist.
 */
function derivePlaylistUrl(url: string): string {
  const idx = url.lastIndexOf(SEGMENT_MARKER);
  return idx === -1 ? url : url.slice(0, idx);
}

/** Origin plus the path up to (not including) its last `/`; query and fragment dropped. */
function playlistDirectory(url: string): string {
  const parsed = new URL(url);
  const path = parsed.pathname;
  return parsed.origin + path.slice(0, path.lastIndexOf("/"));
}

function resolveSegmentUrl(ref: string, baseUrl: string, origin: string): string {
  if (ABSOLUTE_URL.test(ref)) {
    return ref;
  }
  if (ref.startsWith("//")) {
    return new URL(ref, origin).toString();
  }
  if (ref.startsWith("/")) {
    return origin + ref;
  }
  return `${baseUrl}/${ref}`;
}

export {
  createPlaylistReference,
  derivePlaylistUrl,
  isValidUrl,
  parseCapturedRequest,
  playlistDirectory,
  resolveSegmentUrl,
  tokenizeCommand,
};
export type { CapturedRequest, PlaylistReference };
