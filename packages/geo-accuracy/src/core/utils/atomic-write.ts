/**
 * Atomic Write Utilities
 *
 * Write-to-temp-then-rename so a crash during a checkpoint write leaves either
 * the previous file or the new one on disk, never a truncated mix.
 *
 * **Pattern:**
 * 1. Write to a temporary file next to the target (PID + timestamp in the name)
 * 2. Rename the temporary file over the target (atomic on POSIX)
 * 3. Remove the temporary file if either step fails
 */

import { writeFile, rename, unlink, mkdir } from 'fs/promises';
import { dirname } from 'path';
import { logger } from './logger.js';

/**
 * Atomically write string data to file
 *
 * @param filePath - Target file path
 * @param data - String data to write
 * @param encoding - File encoding (default: 'utf-8')
 * @throws Error if write or rename fails
 *
 * @example
 * ```typescript
 * await atomicWriteFile('./tagged_geolocations.csv', csvText);
 * ```
 */
export async function atomicWriteFile(
  filePath: string,
  data: string,
  encoding: BufferEncoding = 'utf-8'
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.${Date.now()}.tmp`;

  try {
    await writeFile(tempPath, data, encoding);
    await rename(tempPath, filePath);
  } catch (error) {
    await unlink(tempPath).catch((cleanupError: unknown) => {
      // ENOENT is expected when writeFile never created the temp file
      logger.debug('Temporary checkpoint file not removed', {
        tempPath,
        error: cleanupError instanceof Error ? cleanupError.message : String(cleanupError),
      });
    });
    throw error;
  }
}
