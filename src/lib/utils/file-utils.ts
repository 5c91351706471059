import { mkdir } from 'fs/promises';
import { join } from 'path';
import { env } from '../env';

/**
 * Ensure a directory exists
 */
export async function ensureDir(path: string): Promise<void> {
  await mkdir(path, { recursive: true });
}

/**
 * Get the PDF output directory path
 */
export function getDownloadsDir(): string {
  return env.DOWNLOAD_DIR;
}

/**
 * Path of the stored PDF for a record id
 */
export function getPdfPath(outputDir: string, id: string): string {
  return join(outputDir, `${id}.pdf`);
}

export function formatKilobytes(bytes: number): string {
  return (bytes / 1024).toFixed(1);
}
