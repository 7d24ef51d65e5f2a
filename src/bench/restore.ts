import { readFile, writeFile } from "node:fs/promises";

/**
 * Runs `fn` with the file's original bytes and writes those bytes back afterwards, whether
 * `fn` resolves or throws.
 */
export const withRestoredFile = async <T>(filePath: string, fn: (original: Buffer) => Promise<T>): Promise<T> => {
  const original = await readFile(filePath);
  try {
    return await fn(Buffer.from(original));
  } finally {
    await writeFile(filePath, original);
  }
};
