import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG, DEFAULT_HEADERS, loadConfig } from "../src/config.js";
import { DownloadError } from "../src/errors.js";

describe("loadConfig", () => {
  it("falls back to the defaults", () => {
    const config = loadConfig();

    expect(config).toEqual(DEFAULT_CONFIG);
    expect(config.maxSegments).toBe(1000);
    expect(config.maxSegmentBytes).toBe(10 * 1024 * 1024);
    expect(config.requestTimeoutMs).toBe(30_000);
    expect(config.assemblyTimeoutMs).toBe(300_000);
    expect(config.headers).toBe(DEFAULT_HEADERS);
    expect(config.origin).toBeUndefined();
  });

  it("sends a browser-like header set by default", () => {
    expect(Object.keys(DEFAULT_HEADERS)).toEqual(["User-Agent", "Accept", "Accept-Language"]);
    expect(DEFAULT_HEADERS.Accept).toBe("*/*");
    expect(DEFAULT_HEADERS["Accept-Language"]).toBe("en-US,en;q=0.5");
  });

  it("reads HLSGRAB_* environment variables", () => {
    const config = loadConfig({
      HLSGRAB_MAX_SEGMENTS: "50",
      HLSGRAB_MAX_SEGMENT_BYTES: " 2048 ",
      HLSGRAB_TIMEOUT_MS: "1500",
      HLSGRAB_CONCURRENCY: "4",
      HLSGRAB_MAX_PLAYLIST_HOPS: "",
      HLSGRAB_ORIGIN: "https://media.example.com/some/path",
    });

    expect(config.maxSegments).toBe(50);
    expect(config.maxSegmentBytes).toBe(2048);
    expect(config.requestTimeoutMs).toBe(1500);
    expect(config.concurrency).toBe(4);
    expect(config.maxPlaylistHops).toBe(5);
    expect(config.origin).toBe("https://media.example.com");
  });

  it("lets explicit overrides win over the environment", () => {
    expect(loadConfig({ HLSGRAB_CONCURRENCY: "4" }, { concurrency: 2 }).concurrency).toBe(2);
  });

  it("rejects malformed values", () => {
    expect(() => loadConfig({ HLSGRAB_MAX_SEGMENTS: "ten" })).toThrow(
      'HLSGRAB_MAX_SEGMENTS must be a positive integer, got "ten"',
    );
    expect(() => loadConfig({ HLSGRAB_TIMEOUT_MS: "0" })).toThrow(DownloadError);
    expect(() => loadConfig({ HLSGRAB_ORIGIN: "ftp://media.example.com" })).toThrow(
      "HLSGRAB_ORIGIN must use http or https",
    );
    expect(() => loadConfig({}, { concurrency: 0 })).toThrow("concurrency must be a positive integer");
  });
});
