import { mkdtempSync } from "node:fs";
import { readFile, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { Writable } from "node:stream";
import { vi } from "vitest";

import type { Assembler, AssemblyRequest } from "../src/assemble.js";
import type { Logger } from "../src/logger.js";

type Route = string | ((init?: RequestInit) => Response | Promise<Response>);

export function tempDir(prefix: string): string {
  return mkdtempSync(join(tmpdir(), `hlsgrab-${prefix}-`));
}

export function spyLogger() {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() } satisfies Logger;
}

export function requestUrl(input: string | URL | Request): string {
  if (typeof input === "string") return input;
  if (input instanceof URL) return input.toString();
  return input.url;
}

/** A fetch that answers from a URL -> body table and 404s everything else. */
export function fakeFetch(routes: Record<string, Route>) {
  return vi.fn(async (input: string | URL | Request, init?: RequestInit): Promise<Response> => {
    const route = routes[requestUrl(input)];
    if (route === undefined) return new Response("not found", { status: 404 });
    return typeof route === "string" ? new Response(route) : route(init);
  });
}

export function calledUrls(fetchMock: ReturnType<typeof fakeFetch>): string[] {
  return fetchMock.mock.calls.map(([input]) => requestUrl(input));
}

/** Stands in for ffmpeg: concatenates the slot files into the output path. */
export function fakeAssembler() {
  const requests: AssemblyRequest[] = [];
  const assemble = vi.fn(async (request: AssemblyRequest) => {
    requests.push(request);
    const parts = await Promise.all(request.segments.map((segment) => readFile(segment.path)));
    await writeFile(request.outputPath, Buffer.concat(parts));
  });
  const assembler: Assembler = { assemble };
  return { assembler, assemble, requests };
}

export function collectStream() {
  const chunks: string[] = [];
  const stream = new Writable({
    write(chunk: Buffer | string, _encoding, callback) {
      chunks.push(chunk.toString());
      callback();
    },
  });
  return { stream, text: () => chunks.join("") };
}
