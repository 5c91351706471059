import { stat, writeFile } from 'fs/promises';
import type { DownloadStatus, PaperRecord } from '../types';
import { isDownloaded } from '../types';
import { env } from '../env';
import { ensureDir, formatKilobytes, getPdfPath } from '../utils/file-utils';

export type DownloadProgressCallback = (
  current: number,
  total: number,
  record: PaperRecord
) => void;

function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Download one PDF to `<outputDir>/<id>.pdf`. Never throws; failures are
 * reported in the returned status.
 */
export async function downloadPdf(
  pdfUrl: string | undefined,
  id: string,
  outputDir: string
): Promise<DownloadStatus> {
  if (!pdfUrl) {
    return 'No PDF URL';
  }

  const filePath = getPdfPath(outputDir, id);

  try {
    const response = await fetch(pdfUrl, {
      headers: {
        'User-Agent': 'arxiv-pdf-explorer/0.1 (PDF download)',
        'Accept': 'application/pdf,*/*'
      },
      redirect: 'follow'
    });

    if (!response.ok) {
      await response.body?.cancel();
      return `Failed: HTTP Error ${response.status}: ${response.statusText}`;
    }

    const buffer = Buffer.from(await response.arrayBuffer());
    await writeFile(filePath, buffer);

    const { size } = await stat(filePath);
    return `Downloaded (${formatKilobytes(size)} KB)`;
  } catch (error) {
    console.error(`[${id}] PDF download error:`, error);
    return `Failed: ${describeError(error)}`;
  }
}

/**
 * Download PDFs for all records, one at a time, with a fixed pause between
 * attempts. Returns new records carrying the download status.
 */
export async function downloadRecords(
  records: readonly PaperRecord[],
  outputDir: string,
  onProgress?: DownloadProgressCallback,
  delayMs: number = env.DOWNLOAD_DELAY_MS
): Promise<PaperRecord[]> {
  try {
    await ensureDir(outputDir);
  } catch (error) {
    console.error(`Cannot create download directory ${outputDir}:`, error);
    const downloadStatus: DownloadStatus = `Failed: ${describeError(error)}`;

    return records.map((record, i) => {
      const updated: PaperRecord = { ...record, downloadStatus };
      onProgress?.(i + 1, records.length, updated);
      return updated;
    });
  }

  const results: PaperRecord[] = [];

  console.log(`Starting download of ${records.length} PDFs into ${outputDir}`);

  for (let i = 0; i < records.length; i++) {
    const record = records[i];
    const downloadStatus = await downloadPdf(record.pdfUrl, record.id, outputDir);
    const updated: PaperRecord = { ...record, downloadStatus };

    results.push(updated);
    console.log(`[${i + 1}/${records.length}] ${record.id}: ${downloadStatus}`);

    onProgress?.(i + 1, records.length, updated);

    // Courtesy pause so the PDF host is not hit back to back
    if (i < records.length - 1) {
      await new Promise(resolve => setTimeout(resolve, delayMs));
    }
  }

  const downloaded = results.filter(r => isDownloaded(r.downloadStatus)).length;
  console.log(`Download complete: ${downloaded} successful, ${results.length - downloaded} failed`);

  return results;
}
