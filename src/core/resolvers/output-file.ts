import { promises as fs } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';

/**
 * Runs `fn` with a path inside a fresh temporary directory for a tool to
 * write its report to; the directory is removed afterwards.
 */
export async function withToolOutputFile<T>(
  prefix: string,
  fn: (outputFile: string) => Promise<T>
): Promise<T> {
  const dir = await fs.mkdtemp(join(tmpdir(), `buildpath-${prefix}-`));
  try {
    return await fn(join(dir, 'output.txt'));
  } finally {
    await fs.rm(dir, { recursive: true, force: true });
  }
}
