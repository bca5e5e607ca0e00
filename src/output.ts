import path from "node:path";

interface OutputDescriptor {
  readonly directory: string;
  readonly filename: string;
  readonly path: string;
}

const MEDIA_EXTENSION = ".mp4";
const FALLBACK_NAME = "video";
const UNSAFE_CHARACTERS = /[^\p{L}\p{M}\p{N}_.-]/gu;

function sanitizeFilename(filename: string): string {
  const flattened = path.basename(filename.replace(/[/\\]/g, "_"));
  const safe = flattened.replace(UNSAFE_CHARACTERS, "_");
  return safe === "" ? FALLBACK_NAME : safe;
}

function ensureMediaExtension(filename: string): string {
  return filename.toLowerCase().endsWith(MEDIA_EXTENSION)
    ? filename
    : `${filename}${MEDIA_EXTENSION}`;
}

/**
 * Hidden sibling of `outputPath` that a run writes before renaming it into
 * place, so an existing file at `outputPath` survives a failed run. The
 * extension is kept for tools that pick the container from it.
 */
function partialOutputPath(outputPath: string, tag: string): string {
  return path.join(path.dirname(outputPath), `.${tag}.partial-${path.basename(outputPath)}`);
}

function resolveOutput(outputName: string, outputDir: string): OutputDescriptor {
  const directory = path.resolve(outputDir);
  const filename = ensureMediaExtension(sanitizeFilename(outputName));
  return Object.freeze({ directory, filename, path: path.join(directory, filename) });
}

export { ensureMediaExtension, MEDIA_EXTENSION, partialOutputPath, resolveOutput, sanitizeFilename };
export type { OutputDescriptor };
