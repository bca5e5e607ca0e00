import { promises as fs } from "node:fs";
import path from "node:path";
import { DEFAULT_CONFIG } from "./config.js";
import { DownloadError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { partialOutputPath } from "./output.js";
import { type CommandRunner, runCommand } from "./process.js";
import type { SegmentFile } from "./workspace.js";

interface AssemblyRequest {
  /** Slot files in playback order. */
  segments: readonly SegmentFile[];
  outputPath: string;
  /** Scratch directory the assembler may write into (the working area). */
  workDir: string;
}

interface Assembler {
  assemble(request: AssemblyRequest): Promise<void>;
}

interface FfmpegAssemblerOptions {
  ffmpegPath?: string;
  timeoutMs?: number;
  run?: CommandRunner;
  logger?: Logger;
}

const CONCAT_LIST = "file_list.txt";
const STDERR_TAIL = 2000;

function quoteConcatPath(filePath: string): string {
  return `'${filePath.replace(/'/g, "'\\''")}'`;
}

/** Input for ffmpeg's concat demuxer: one `file '<absolute path>'` line per segment. */
function buildConcatList(segments: readonly SegmentFile[]): string {
  return segments
    .map((segment) => `file ${quoteConcatPath(path.resolve(segment.path))}\n`)
    .join("");
}

class FfmpegAssembler implements Assembler {
  private readonly ffmpegPath: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;
  private readonly logger: Logger;

  constructor(options: FfmpegAssemblerOptions = {}) {
    this.ffmpegPath = options.ffmpegPath ?? "ffmpeg";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.assemblyTimeoutMs;
    this.run = options.run ?? runCommand;
    this.logger = options.logger ?? silentLogger;
  }

  async assemble(request: AssemblyRequest): Promise<void> {
    if (request.segments.length === 0) {
      throw new DownloadError("assembly_failed", "no segment files to combine");
    }

    const listPath = path.join(request.workDir, CONCAT_LIST);
    await fs.writeFile(listPath, buildConcatList(request.segments), "utf8");
    await fs.mkdir(path.dirname(request.outputPath), { recursive: true });

    // ffmpeg writes beside the target; the target is only replaced on success
    const partialPath = path.resolve(partialOutputPath(request.outputPath, path.basename(request.workDir)));
    const args = [
      "-f",
      "concat",
      "-safe",
      "0",
      "-i",
      path.resolve(listPath),
      "-c",
      "copy",
      "-y",
      partialPath,
    ];
    this.logger.debug("Running ffmpeg", { args });

    let failure: string | undefined;
    try {
      const result = await this.run(this.ffmpegPath, args, { timeoutMs: this.timeoutMs });
      if (result.timedOut) {
        failure = `ffmpeg timed out after ${this.timeoutMs} ms`;
      } else if (result.exitCode !== 0) {
        failure = `ffmpeg exited with code ${result.exitCode}: ${result.stderr.slice(-STDERR_TAIL)}`;
      }
    } catch (error) {
      failure = errorMessage(error);
    }

    if (failure === undefined) {
      try {
        await fs.rename(partialPath, request.outputPath);
        return;
      } catch (error) {
        failure = `could not move ffmpeg output into place: ${errorMessage(error)}`;
      }
    }

    await fs.rm(partialPath, { force: true });
    throw new DownloadError("assembly_failed", failure);
  }
}

export { buildConcatList, CONCAT_LIST, FfmpegAssembler };
export type { Assembler, AssemblyRequest, FfmpegAssemblerOptions };
