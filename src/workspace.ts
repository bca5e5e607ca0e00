import { promises as fs } from "node:fs";
import { tmpdir } from "node:os";
import path from "node:path";
import { DownloadError, errorMessage } from "./errors.js";
import { type Logger, silentLogger } from "./logger.js";

interface WorkingArea {
  readonly dir: string;
  readonly indexWidth: number;
}

interface SegmentFile {
  index: number;
  path: string;
}

interface WorkingAreaOptions {
  segmentCount: number;
  root?: string;
  prefix?: string;
}

const WORKSPACE_PREFIX = "hlsgrab_segments_";
const SLOT_EXTENSION = ".ts";
const MIN_INDEX_WIDTH = 3;
const SLOT_PATTERN = /^segment_(\d+)\.ts$/;

function slotFilename(index: number, width: number): string {
  return `segment_${index.toString().padStart(width, "0")}${SLOT_EXTENSION}`;
}

function slotPath(area: WorkingArea, index: number): string {
  return path.join(area.dir, slotFilename(index, area.indexWidth));
}

async function createWorkingArea(options: WorkingAreaOptions): Promise<WorkingArea> {
  const root = options.root ?? tmpdir();
  const prefix = options.prefix ?? WORKSPACE_PREFIX;
  const lastIndex = Math.max(options.segmentCount - 1, 0);
  try {
    const dir = await fs.mkdtemp(path.join(root, prefix));
    return Object.freeze({
      dir,
      indexWidth: Math.max(MIN_INDEX_WIDTH, lastIndex.toString().length),
    });
  } catch (error) {
    throw new DownloadError(
      "acquisition_setup_failed",
      `could not create a working directory under ${root}: ${errorMessage(error)}`,
      { cause: error },
    );
  }
}

/** Slot files present on disk, by ascending index. Missing indices are skipped. */
async function listSegmentFiles(area: WorkingArea): Promise<SegmentFile[]> {
  const entries = await fs.readdir(area.dir);
  const files: SegmentFile[] = [];
  for (const entry of entries) {
    const match = SLOT_PATTERN.exec(entry);
    if (match) {
      files.push({ index: Number(match[1]), path: path.join(area.dir, entry) });
    }
  }
  return files.sort((a, b) => a.index - b.index);
}

/** Removes the area and everything in it. Removing an area that is already gone succeeds. */
async function destroyWorkingArea(area: WorkingArea, logger: Logger = silentLogger): Promise<boolean> {
  try {
    await fs.rm(area.dir, { recursive: true, force: true });
  } catch (error) {
    logger.error("Error cleaning up temporary files", { dir: area.dir, reason: errorMessage(error) });
    return false;
  }
  logger.info(`Cleaned up temporary files in ${area.dir}`);
  return true;
}

export {
  createWorkingArea,
  destroyWorkingArea,
  listSegmentFiles,
  slotFilename,
  slotPath,
  WORKSPACE_PREFIX,
};
export type { SegmentFile, WorkingArea, WorkingAreaOptions };
