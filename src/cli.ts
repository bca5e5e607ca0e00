import { createInterface } from "node:readline/promises";
import Progress from "cli-progress";
import { Command, CommanderError, InvalidArgumentError, Option } from "commander";
import { type Assembler, FfmpegAssembler } from "./assemble.js";
import { type DownloaderConfig, loadConfig } from "./config.js";
import { downloadVideo } from "./core.js";
import { errorMessage } from "./errors.js";
import { createLogger, type Logger } from "./logger.js";
import { ensureMediaExtension } from "./output.js";
import { derivePlaylistUrl, parseCapturedRequest } from "./reference.js";
import {
  DEFAULT_MODEL,
  MODEL_SIZES,
  transcribeDirectory,
  type Transcriber,
  WhisperCliTranscriber,
} from "./transcribe.js";

type Prompt = (question: string) => Promise<string>;

interface CliDeps {
  env: Record<string, string | undefined>;
  fetch: typeof fetch;
  stdin: NodeJS.ReadableStream;
  stdout: NodeJS.WritableStream;
  stderr: NodeJS.WritableStream;
  prompt?: Prompt;
  logger?: Logger;
  assembler?: Assembler;
  transcriber?: Transcriber;
}

interface DownloadOptions {
  outputName?: string;
  outputDir: string;
  curl?: boolean;
  transcript?: boolean;
  transcriptModel: string;
  concurrency?: number;
  verbose?: boolean;
}

interface TranscribeOptions {
  model: string;
  verbose?: boolean;
}

const DEFAULT_OUTPUT_DIR = "downloads";
const FALLBACK_NAME = "video";

function parseConcurrency(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return parsed;
}

function isTty(stream: NodeJS.WritableStream): boolean {
  return "isTTY" in stream && stream.isTTY === true;
}

function createPrompter(
  stdin: NodeJS.ReadableStream,
  stderr: NodeJS.WritableStream,
): { ask: Prompt; close: () => void } {
  let session: { rl: ReturnType<typeof createInterface>; ended: Promise<string> } | undefined;
  let closed = false;

  const open = () => {
    const rl = createInterface({ input: stdin, output: stderr, terminal: isTty(stderr) });
    // end of input answers every pending and later question with an empty line
    const ended = new Promise<string>((resolve) =>
      rl.once("close", () => {
        closed = true;
        resolve("");
      }),
    );
    return { rl, ended };
  };

  const ask: Prompt = async (question) => {
    if (closed) {
      return "";
    }
    session ??= open();
    return Promise.race([session.rl.question(question), session.ended]);
  };

  const close = () => {
    closed = true;
    session?.rl.close();
  };

  return { ask, close };
}

async function askOutputName(prompt: Prompt): Promise<string> {
  const answer = (await prompt("Enter a name for the output video file (without extension): ")).trim();
  return ensureMediaExtension(answer || FALLBACK_NAME);
}

function progressReporter(
  enabled: boolean,
  stream: NodeJS.WritableStream,
): { onProgress?: (completed: number, total: number) => void; stop: () => void } {
  if (!enabled) {
    return { stop: () => {} };
  }
  const bar = new Progress.SingleBar({
    format: "    [{bar}] {percentage}% | {value}/{total} segments",
    barCompleteChar: "=",
    barIncompleteChar: "-",
    hideCursor: true,
    barsize: 20,
    stream,
  });
  let started = false;
  return {
    onProgress: (completed, total) => {
      if (!started) {
        bar.start(total, 0);
        started = true;
      }
      bar.update(completed);
    },
    stop: () => {
      if (started) {
        bar.stop();
        started = false;
      }
    },
  };
}

async function downloadOne(
  input: string,
  options: DownloadOptions,
  context: {
    deps: CliDeps;
    logger: Logger;
    config: DownloaderConfig;
    prompt: Prompt;
  },
): Promise<boolean> {
  const { deps, logger, config } = context;

  let playlistUrl = input;
  let headers: Record<string, string> | undefined;
  if (options.curl) {
    const parsed = parseCapturedRequest(input, logger);
    if (!parsed.url) {
      logger.error("Could not extract URL from curl command");
      return false;
    }
    playlistUrl = derivePlaylistUrl(parsed.url);
    headers = parsed.headers;
    logger.info(`Using m3u8 URL: ${playlistUrl}`);
  }

  const outputName = options.outputName ?? (await askOutputName(context.prompt));
  const progress = progressReporter(isTty(deps.stderr) && !options.verbose, deps.stderr);
  try {
    const result = await downloadVideo(
      {
        playlistUrl,
        outputName,
        outputDir: options.outputDir,
        headers,
        transcript: options.transcript,
        transcriptModel: options.transcriptModel,
      },
      {
        assembler: deps.assembler ?? new FfmpegAssembler({ timeoutMs: config.assemblyTimeoutMs, logger }),
        transcriber:
          deps.transcriber ?? new WhisperCliTranscriber({ timeoutMs: config.transcriptionTimeoutMs }),
        fetchImpl: deps.fetch,
        logger,
        config,
        onProgress: progress.onProgress,
      },
    );
    progress.stop();
    if (!result.ok) {
      return false;
    }
    deps.stdout.write(`${result.output.path}\n`);
    if (result.transcriptPath) {
      deps.stdout.write(`${result.transcriptPath}\n`);
    }
    return true;
  } finally {
    progress.stop();
  }
}

function buildProgram(deps: CliDeps, prompt: Prompt, setExitCode: (code: number) => void): Command {
  const program = new Command();
  const loggerFor = (verbose?: boolean): Logger => deps.logger ?? createLogger({ verbose });

  program
    .name("hlsgrab")
    .description("Download an HLS (m3u8) video into a single mp4 file")
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.stdout.write(text),
      writeErr: (text) => deps.stderr.write(text),
    });

  program
    .command("download", { isDefault: true })
    .description("download a playlist URL or a captured curl command")
    .argument("[input]", "URL of the m3u8 playlist or curl command; prompts when omitted")
    .option("-o, --output-name <name>", "name for the output video file (can include extension)")
    .option("-d, --output-dir <dir>", "directory where videos will be saved", DEFAULT_OUTPUT_DIR)
    .option("-c, --curl", "input is a curl command")
    .option("-t, --transcript", "generate a transcript for the video")
    .addOption(
      new Option("--transcript-model <size>", "whisper model size for transcription")
        .choices(MODEL_SIZES)
        .default(DEFAULT_MODEL),
    )
    .option("-j, --concurrency <n>", "segments to download at once", parseConcurrency)
    .option("-v, --verbose", "enable verbose logging")
    .action(async (input: string | undefined, options: DownloadOptions) => {
      const logger = loggerFor(options.verbose);
      let config: DownloaderConfig;
      try {
        config = loadConfig(
          deps.env,
          options.concurrency === undefined ? {} : { concurrency: options.concurrency },
        );
      } catch (error) {
        logger.error(errorMessage(error));
        setExitCode(1);
        return;
      }
      const context = { deps, logger, config, prompt };

      if (input !== undefined) {
        setExitCode((await downloadOne(input, options, context)) ? 0 : 1);
        return;
      }

      deps.stderr.write("hlsgrab <url>\ntype nothing to exit\n");
      let failures = 0;
      for (;;) {
        deps.stderr.write("\n");
        const url = (await prompt("url> ")).trim();
        if (!url) {
          break;
        }
        if (!(await downloadOne(url, options, context))) {
          failures += 1;
        }
      }
      setExitCode(failures > 0 ? 1 : 0);
    });

  program
    .command("transcribe")
    .description("transcribe every .mp4 in a directory")
    .argument("[dir]", "directory holding the videos", DEFAULT_OUTPUT_DIR)
    .addOption(
      new Option("-m, --model <size>", "whisper model size").choices(MODEL_SIZES).default("base"),
    )
    .option("-v, --verbose", "enable verbose logging")
    .action(async (dir: string, options: TranscribeOptions) => {
      const logger = loggerFor(options.verbose);
      let config: DownloaderConfig;
      try {
        config = loadConfig(deps.env);
      } catch (error) {
        logger.error(errorMessage(error));
        setExitCode(1);
        return;
      }
      const transcriber =
        deps.transcriber ?? new WhisperCliTranscriber({ timeoutMs: config.transcriptionTimeoutMs });
      try {
        const transcripts = await transcribeDirectory(dir, options.model, { transcriber, logger });
        for (const transcript of transcripts) {
          deps.stdout.write(`${transcript}\n`);
        }
        setExitCode(0);
      } catch (error) {
        logger.error(`Could not read ${dir}`, { reason: errorMessage(error) });
        setExitCode(1);
      }
    });

  return program;
}

/** Parses `argv` (arguments only, without node and script) and returns the exit code. */
async function runCli(argv: string[], deps: CliDeps): Promise<number> {
  const prompter = deps.prompt
    ? { ask: deps.prompt, close: () => {} }
    : createPrompter(deps.stdin, deps.stderr);
  let exitCode = 0;
  const program = buildProgram(deps, prompter.ask, (code) => {
    exitCode = code;
  });

  try {
    await program.parseAsync(argv, { from: "user" });
  } catch (error) {
    if (error instanceof CommanderError) {
      return error.exitCode;
    }
    throw error;
  } finally {
    prompter.close();
  }
  return exitCode;
}

export { runCli };
export type { CliDeps };
