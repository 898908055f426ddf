import { open, type FileHandle } from "node:fs/promises";
import { ByteSources, type ByteSource } from "@bigram/histogram";
import { logger } from "@bigram/shared";

export class OpenFileError extends Error {
  override readonly name = "OpenFileError";

  constructor(
    readonly fileName: string,
    options: { cause: unknown },
  ) {
    super(`Error opening file "${fileName}":`, options);
  }
}

export interface OpenedFile {
  fileName: string;
  handle: FileHandle;
  source: ByteSource;
}

/**
 * Opens every file for reading. If any of them fails, the ones already
 * opened are closed again and an `OpenFileError` is thrown.
 */
export async function openFiles(fileNames: string[]): Promise<OpenedFile[]> {
  const opened: OpenedFile[] = [];

  for (const fileName of fileNames) {
    try {
      const handle = await open(fileName, "r");
      opened.push({
        fileName,
        handle,
        source: ByteSources.fromFileHandle(handle, fileName),
      });
    } catch (error) {
      await closeFiles(opened);
      throw new OpenFileError(fileName, { cause: error });
    }
  }

  return opened;
}

export async function closeFiles(files: OpenedFile[]): Promise<void> {
  const closed = await Promise.allSettled(files.map(({ handle }) => handle.close()));

  closed.forEach((outcome, index) => {
    if (outcome.status === "rejected") {
      logger.cli.warn(
        "Failed to close file",
        { file: files[index].fileName },
        outcome.reason instanceof Error ? outcome.reason : undefined,
      );
    }
  });
}
