import fs from 'fs/promises';
import path from 'path';

export interface FileSink {
  /** Writes `content` under `filename` in the upload directory. */
  write(filename: string, content: Buffer): Promise<void>;
}

export async function ensureUploadDir(dir: string) {
  await fs.mkdir(dir, { recursive: true });
}

// Same filename overwrites the previous file; callers get no collision signal.
export function createDiskFileSink(dir: string): FileSink {
  return {
    async write(filename, content) {
      await fs.writeFile(path.join(dir, filename), content);
    },
  };
}
