import { describe, expect, it } from "vitest";

import { DEFAULT_CONFIG } from "../src/config.js";
import { resolvePlaylist, scanPlaylist } from "../src/playlist.js";
import { calledUrls, fakeFetch, spyLogger } from "./helpers.js";

const MEDIA_PLAYLIST = [
  "#EXTM3U",
  "#EXT-X-TARGETDURATION:10",
  "#EXTINF:10.0,",
  "segment1.ts",
  "#EXTINF:10.0,",
  "segment2.ts",
  "notes.txt",
  "#EXTINF:10.0,",
  "segment3.ts",
  "#EXT-X-ENDLIST",
  "",
].join("\n");

const PLAYLIST_URL = "https://example.com/video.m3u8";

describe("scanPlaylist", () => {
  it("keeps segment lines in file order", () => {
    expect(scanPlaylist(MEDIA_PLAYLIST)).toEqual({
      segments: ["segment1.ts", "segment2.ts", "segment3.ts"],
      live: false,
    });
  });

  it("handles CRLF line endings", () => {
    expect(scanPlaylist("#EXTM3U\r\n#EXTINF:4,\r\na.ts\r\n#EXT-X-ENDLIST\r\n").segments).toEqual([
      "a.ts",
    ]);
  });

  it("reports a nested playlist when there are no segments", () => {
    const scan = scanPlaylist("#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=1280000\nlow/index.m3u8\n");
    expect(scan.segments).toEqual([]);
    expect(scan.nested).toBe("low/index.m3u8");
  });
});

describe("resolvePlaylist", () => {
  it("returns the segment entries of a media playlist", async () => {
    const fetchMock = fakeFetch({ [PLAYLIST_URL]: MEDIA_PLAYLIST });

    const { url, segments } = await resolvePlaylist(PLAYLIST_URL, { "X-Token": "abc" }, { fetchImpl: fetchMock });

    expect(url).toBe(PLAYLIST_URL);
    expect(segments).toEqual(["segment1.ts", "segment2.ts", "segment3.ts"]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
    const init = fetchMock.mock.calls[0]?.[1];
    expect(init?.headers).toEqual({ "X-Token": "abc" });
    expect(init?.signal).toBeInstanceOf(AbortSignal);
  });

  it("truncates to the maximum segment count", async () => {
    const lines = Array.from({ length: 1001 }, (_, i) => `segment${i}.ts`);
    const fetchMock = fakeFetch({ [PLAYLIST_URL]: lines.join("\n") });

    const { segments } = await resolvePlaylist(PLAYLIST_URL, {}, { fetchImpl: fetchMock });
    expect(segments).toHaveLength(1000);
    expect(segments[999]).toBe("segment999.ts");

    const { segments: few } = await resolvePlaylist(PLAYLIST_URL, {}, {
      fetchImpl: fetchMock,
      config: { ...DEFAULT_CONFIG, maxSegments: 2 },
    });
    expect(few).toEqual(["segment0.ts", "segment1.ts"]);
  });

  it("returns nothing for an invalid URL without fetching", async () => {
    const fetchMock = fakeFetch({});
    expect((await resolvePlaylist("ftp://example.com/a.m3u8", {}, { fetchImpl: fetchMock })).segments).toEqual([]);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it("fails closed on HTTP and network errors", async () => {
    const logger = spyLogger();
    const failing = fakeFetch({ [PLAYLIST_URL]: () => new Response("nope", { status: 500 }) });
    expect((await resolvePlaylist(PLAYLIST_URL, {}, { fetchImpl: failing, logger })).segments).toEqual([]);

    const throwing = fakeFetch({
      [PLAYLIST_URL]: () => {
        throw new TypeError("fetch failed");
      },
    });
    expect((await resolvePlaylist(PLAYLIST_URL, {}, { fetchImpl: throwing, logger })).segments).toEqual([]);
    expect(logger.error).toHaveBeenCalledTimes(2);
  });

  it("follows a master playlist relative to its directory", async () => {
    const fetchMock = fakeFetch({
      "https://example.com/v/master.m3u8":
        "#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=1280000\nlow/index.m3u8\n",
      "https://example.com/v/low/index.m3u8": "#EXTINF:4,\na.ts\n#EXTINF:4,\nb.ts\n#EXT-X-ENDLIST\n",
    });

    const resolved = await resolvePlaylist("https://example.com/v/master.m3u8", {}, { fetchImpl: fetchMock });

    expect(resolved).toEqual({ url: "https://example.com/v/low/index.m3u8", segments: ["a.ts", "b.ts"] });
    expect(calledUrls(fetchMock)).toEqual([
      "https://example.com/v/master.m3u8",
      "https://example.com/v/low/index.m3u8",
    ]);
  });

  it("follows a variant whose URI has no playlist extension", async () => {
    const fetchMock = fakeFetch({
      "https://example.com/v/master.m3u8":
        "#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=800000\nchunklist?id=1\n",
      "https://example.com/v/chunklist?id=1": "#EXTINF:4,\na.ts\n#EXT-X-ENDLIST\n",
    });

    const resolved = await resolvePlaylist("https://example.com/v/master.m3u8", {}, { fetchImpl: fetchMock });

    expect(resolved).toEqual({ url: "https://example.com/v/chunklist?id=1", segments: ["a.ts"] });
  });

  it("follows an absolute nested playlist URL as given", async () => {
    const fetchMock = fakeFetch({
      [PLAYLIST_URL]: "#EXTM3U\nhttps://media.example.org/hls/720p.m3u8\n",
      "https://media.example.org/hls/720p.m3u8": "#EXTINF:4,\nx.ts\n#EXT-X-ENDLIST\n",
    });

    expect(await resolvePlaylist(PLAYLIST_URL, {}, { fetchImpl: fetchMock })).toEqual({
      url: "https://media.example.org/hls/720p.m3u8",
      segments: ["x.ts"],
    });
  });

  it("stops at a playlist that refers to itself", async () => {
    const fetchMock = fakeFetch({ [PLAYLIST_URL]: "#EXTM3U\nvideo.m3u8\n" });

    expect((await resolvePlaylist(PLAYLIST_URL, {}, { fetchImpl: fetchMock })).segments).toEqual([]);
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it("stops when the nested playlist budget runs out", async () => {
    const fetchMock = fakeFetch({
      "https://example.com/a.m3u8": "b.m3u8\n",
      "https://example.com/b.m3u8": "c.m3u8\n",
      "https://example.com/c.m3u8": "#EXTINF:4,\nc.ts\n",
    });
    const config = { ...DEFAULT_CONFIG, maxPlaylistHops: 1 };

    expect((await resolvePlaylist("https://example.com/a.m3u8", {}, { fetchImpl: fetchMock, config })).segments).toEqual([]);
    expect(calledUrls(fetchMock)).toEqual(["https://example.com/a.m3u8", "https://example.com/b.m3u8"]);
  });
});
