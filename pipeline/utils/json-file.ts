import { mkdir, open, readFile, rename, rm } from "node:fs/promises";
import { basename, dirname, join } from "node:path";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

/** Parsed JSON, or null when the file does not exist. Malformed JSON throws. */
export const readJsonFile = async (filePath: string): Promise<unknown> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (readError) {
    if (isMissingFileError(readError)) {
      return null;
    }

    throw readError;
  }

  return JSON.parse(raw);
};

/**
 * Write `value` to a temporary sibling, fsync it and rename it over
 * `filePath`. Readers see either the old file or the new one.
 */
export const writeJsonFileAtomic = async (filePath: string, value: unknown): Promise<void> => {
  const directory = dirname(filePath);
  await mkdir(directory, { recursive: true });

  const temporaryPath = join(directory, `.${basename(filePath)}.${process.pid}.tmp`);
  const handle = await open(temporaryPath, "w");
  try {
    await handle.writeFile(`${JSON.stringify(value, null, 2)}\n`, "utf8");
    await handle.sync();
  } catch (writeError) {
    await handle.close();
    await rm(temporaryPath, { force: true });
    throw writeError;
  }

  await handle.close();
  try {
    await rename(temporaryPath, filePath);
  } catch (renameError) {
    await rm(temporaryPath, { force: true });
    throw renameError;
  }
};

/** Append `text` and fsync. Returns true when the file was empty or absent beforehand. */
export const appendDurably = async (
  filePath: string,
  text: (wasEmpty: boolean) => string
): Promise<boolean> => {
  await mkdir(dirname(filePath), { recursive: true });
  const handle = await open(filePath, "a");
  try {
    const wasEmpty = (await handle.stat()).size === 0;
    await handle.writeFile(text(wasEmpty), "utf8");
    await handle.sync();
    return wasEmpty;
  } finally {
    await handle.close();
  }
};
