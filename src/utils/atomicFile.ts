import * as crypto from 'crypto';
import * as fs from 'fs';
import * as path from 'path';

export interface AtomicWriteOptions {
  /** File mode for the written file (default 0o644) */
  mode?: number;
}

/**
 * Atomic file writes using the tmp-file-then-rename pattern.
 *
 * Key files are never observed half-written: the data lands in a unique
 * temporary file beside the target, which is then renamed over it.
 */
export class AtomicFileWriter {
  private static getTempPath(filePath: string): string {
    return `${filePath}.${process.pid}.${crypto.randomUUID()}.tmp`;
  }

  /**
   * Write data to `filePath` atomically, creating parent directories as needed.
   *
   * @throws Error if the write or rename fails; the temporary file is removed first
   */
  static async writeAsync(
    filePath: string,
    data: string | Uint8Array,
    options: AtomicWriteOptions = {}
  ): Promise<void> {
    await fs.promises.mkdir(path.dirname(filePath), { recursive: true });
    const tmpPath = this.getTempPath(filePath);

    try {
      await fs.promises.writeFile(tmpPath, data, { mode: options.mode ?? 0o644 });
      await fs.promises.rename(tmpPath, filePath);
    } catch (error) {
      await fs.promises.rm(tmpPath, { force: true });
      throw error;
    }
  }
}
