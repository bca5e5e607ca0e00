import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { DEFAULT_CONFIG } from "./config.js";
import { DownloadError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";
import { MEDIA_EXTENSION } from "./output.js";
import { type CommandRunner, runCommand } from "./process.js";

const MODEL_SIZES = ["tiny", "base", "small", "medium", "large"] as const;

type ModelSize = (typeof MODEL_SIZES)[number];

const DEFAULT_MODEL: ModelSize = "medium";
const TRANSCRIPT_SUFFIX = "_transcript.txt";

interface Transcriber {
  transcribe(mediaPath: string, model: ModelSize): Promise<string>;
}

interface WhisperCliOptions {
  whisperPath?: string;
  timeoutMs?: number;
  run?: CommandRunner;
}

interface TranscriptOptions {
  transcriber: Transcriber;
  logger?: Logger;
}

function isModelSize(value: string): value is ModelSize {
  return (MODEL_SIZES as readonly string[]).includes(value);
}

function transcriptPathFor(mediaPath: string): string {
  const { dir, name } = path.parse(mediaPath);
  return path.join(dir, `${name}${TRANSCRIPT_SUFFIX}`);
}

/** Runs the `whisper` command line tool and reads back its plain-text output. */
class WhisperCliTranscriber implements Transcriber {
  private readonly whisperPath: string;
  private readonly timeoutMs: number;
  private readonly run: CommandRunner;

  constructor(options: WhisperCliOptions = {}) {
    this.whisperPath = options.whisperPath ?? "whisper";
    this.timeoutMs = options.timeoutMs ?? DEFAULT_CONFIG.transcriptionTimeoutMs;
    this.run = options.run ?? runCommand;
  }

  async transcribe(mediaPath: string, model: ModelSize): Promise<string> {
    const outputDir = await fs.mkdtemp(path.join(tmpdir(), "hlsgrab_whisper_"));
    try {
      const result = await this.run(
        this.whisperPath,
        [
          path.resolve(mediaPath),
          "--model",
          model,
          "--output_format",
          "txt",
          "--output_dir",
          outputDir,
          "--verbose",
          "False",
        ],
        { timeoutMs: this.timeoutMs },
      );
      if (result.timedOut) {
        throw new Error(`whisper timed out after ${this.timeoutMs} ms`);
      }
      if (result.exitCode !== 0) {
        throw new Error(`whisper exited with code ${result.exitCode}: ${result.stderr.trim()}`);
      }
      const { name } = path.parse(mediaPath);
      return await fs.readFile(path.join(outputDir, `${name}.txt`), "utf8");
    } finally {
      await fs.rm(outputDir, { recursive: true, force: true });
    }
  }
}

async function requireFile(filePath: string): Promise<void> {
  const stat = await fs.stat(filePath).catch(() => null);
  if (!stat?.isFile()) {
    throw new DownloadError("transcription_failed", `video file not found: ${filePath}`);
  }
}

/**
 * Transcribes `videoPath` into `<stem>_transcript.txt` beside it. Returns the
 * transcript path, or null when the file is missing, the model is unknown, or
 * the transcriber fails. The transcriber is not called in the first two cases.
 */
async function generateTranscript(
  videoPath: string,
  model: string,
  options: TranscriptOptions,
): Promise<string | null> {
  const logger = options.logger ?? silentLogger;
  try {
    await requireFile(videoPath);
    if (!isModelSize(model)) {
      throw new DownloadError(
        "transcription_failed",
        `invalid model size "${model}"; must be one of: ${MODEL_SIZES.join(", ")}`,
      );
    }

    logger.info(`Generating transcript with whisper (${model})...`);
    const text = await options.transcriber.transcribe(videoPath, model);
    const transcriptPath = transcriptPathFor(videoPath);
    logger.info(`Saving transcript to ${transcriptPath}`);
    await fs.writeFile(transcriptPath, text, "utf8");
    return transcriptPath;
  } catch (error) {
    logger.error("Error generating transcript", { video: videoPath, reason: errorMessage(error) });
    return null;
  }
}

/** Transcribes every `.mp4` directly inside `dir`, one after another. */
async function transcribeDirectory(
  dir: string,
  model: string,
  options: TranscriptOptions,
): Promise<string[]> {
  const logger = options.logger ?? silentLogger;
  const entries = await fs.readdir(dir, { withFileTypes: true });
  const videos = entries
    .filter((entry) => entry.isFile() && entry.name.toLowerCase().endsWith(MEDIA_EXTENSION))
    .map((entry) => entry.name)
    .sort();

  const transcripts: string[] = [];
  for (const video of videos) {
    logger.info(`Processing ${video}...`);
    const transcript = await generateTranscript(path.join(dir, video), model, options);
    if (transcript) {
      transcripts.push(transcript);
    }
  }
  return transcripts;
}

export {
  DEFAULT_MODEL,
  generateTranscript,
  isModelSize,
  MODEL_SIZES,
  transcribeDirectory,
  transcriptPathFor,
  WhisperCliTranscriber,
};
export type { ModelSize, Transcriber, TranscriptOptions, WhisperCliOptions };
