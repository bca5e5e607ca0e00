import { promises as fs } from "node:fs";
import path from "node:path";
import type { Assembler } from "./assemble.js";
import { DEFAULT_CONFIG, type DownloaderConfig } from "./config.js";
import { DownloadError, toDownloadError } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { type OutputDescriptor, partialOutputPath, resolveOutput } from "./output.js";
import { resolvePlaylist } from "./playlist.js";
import { createPlaylistReference, type PlaylistReference, playlistDirectory } from "./reference.js";
import { type Acquisition, acquireSegments, type SkippedSegment } from "./segments.js";
import { DEFAULT_MODEL, generateTranscript, type Transcriber } from "./transcribe.js";
import { destroyWorkingArea } from "./workspace.js";

interface DownloadRequest {
  playlistUrl: string;
  outputName: string;
  outputDir: string;
  /** Replaces the default request headers when non-empty. */
  headers?: Record<string, string>;
  transcript?: boolean;
  transcriptModel?: string;
}

interface PipelineDeps {
  assembler: Assembler;
  transcriber?: Transcriber;
  fetchImpl?: typeof fetch;
  logger?: Logger;
  config?: DownloaderConfig;
  workspaceRoot?: string;
  onProgress?: (completed: number, total: number) => void;
}

type DownloadResult =
  | {
      ok: true;
      output: OutputDescriptor;
      transcriptPath: string | null;
      downloaded: number;
      skipped: SkippedSegment[];
    }
  | { ok: false; error: DownloadError };

function requestHeaders(
  reference: PlaylistReference,
  config: Pick<DownloaderConfig, "headers">,
): Record<string, string> {
  return Object.keys(reference.headers).length > 0 ? { ...reference.headers } : { ...config.headers };
}

async function fileExists(filePath: string): Promise<boolean> {
  const stat = await fs.stat(filePath).catch(() => null);
  return stat?.isFile() ?? false;
}

/**
 * Playlist URL in, one combined video (and optionally its transcript) out.
 * Never throws: every failure is logged and returned. The working area is
 * removed on every path once it exists.
 */
async function downloadVideo(request: DownloadRequest, deps: PipelineDeps): Promise<DownloadResult> {
  const logger = deps.logger ?? silentLogger;
  const config = deps.config ?? DEFAULT_CONFIG;
  const fail = (error: DownloadError): DownloadResult => {
    logger.error(error.message, { code: error.code });
    return { ok: false, error };
  };

  let reference: PlaylistReference;
  try {
    reference = createPlaylistReference(request.playlistUrl, request.headers);
  } catch (error) {
    return fail(toDownloadError(error, "invalid_reference"));
  }

  const headers = requestHeaders(reference, config);
  const playlist = await resolvePlaylist(reference.url, headers, {
    fetchImpl: deps.fetchImpl,
    logger,
    config,
  });
  const { segments } = playlist;
  if (segments.length === 0) {
    return fail(new DownloadError("resolution_failure", "No segments found in the m3u8 playlist"));
  }

  const baseUrl = playlistDirectory(playlist.url);
  logger.info(`Base URL for segments: ${baseUrl}`);
  const output = resolveOutput(request.outputName, request.outputDir);

  let acquisition: Acquisition;
  try {
    acquisition = await acquireSegments(segments, baseUrl, headers, {
      fetchImpl: deps.fetchImpl,
      logger,
      config,
      workspaceRoot: deps.workspaceRoot,
      onProgress: deps.onProgress,
    });
  } catch (error) {
    return fail(toDownloadError(error, "acquisition_setup_failed"));
  }

  const { area, files, skipped } = acquisition;
  try {
    logger.info(`Downloaded ${files.length}/${segments.length} segments`);
    if (files.length === 0) {
      return fail(new DownloadError("assembly_failed", "none of the segments could be downloaded"));
    }

    logger.info("Combining segments into a single video file...");
    // the assembler writes a fresh file; an existing output is only replaced by the rename
    const partialPath = partialOutputPath(output.path, path.basename(area.dir));
    try {
      await fs.mkdir(output.directory, { recursive: true });
      await deps.assembler.assemble({ segments: files, outputPath: partialPath, workDir: area.dir });
      if (!(await fileExists(partialPath))) {
        throw new DownloadError("assembly_failed", `the assembler produced no file for ${output.path}`);
      }
      await fs.rename(partialPath, output.path);
    } catch (error) {
      await fs.rm(partialPath, { force: true });
      return fail(toDownloadError(error, "assembly_failed"));
    }
    logger.info(`Video has been successfully saved as '${output.path}'`);

    let transcriptPath: string | null = null;
    if (request.transcript) {
      if (deps.transcriber) {
        transcriptPath = await generateTranscript(output.path, request.transcriptModel ?? DEFAULT_MODEL, {
          transcriber: deps.transcriber,
          logger,
        });
      } else {
        logger.error("Transcript requested but no transcriber is configured");
      }
      if (transcriptPath) {
        logger.info(`Transcript has been saved as '${transcriptPath}'`);
      }
    }

    return { ok: true, output, transcriptPath, downloaded: files.length, skipped };
  } finally {
    await destroyWorkingArea(area, logger);
  }
}

export { downloadVideo };
export type { DownloadRequest, DownloadResult, PipelineDeps };
