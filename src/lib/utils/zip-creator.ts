import JSZip from 'jszip';
import { readFile } from 'fs/promises';
import type { PaperRecord } from '../types/paper';
import { isDownloaded } from '../types/paper';
import { getPdfPath } from './file-utils';
import { EXPORT_FILENAME } from './result-table';

export const ARCHIVE_FILENAME = 'alcu_papers.zip';

/**
 * Bundle the PDFs downloaded by a run together with its CSV export
 */
export async function createRunArchive(
  records: readonly PaperRecord[],
  outputDir: string,
  csv: string
): Promise<Buffer> {
  const zip = new JSZip();

  zip.file(EXPORT_FILENAME, csv);

  const pdfFolder = zip.folder('pdfs');

  for (const record of records) {
    if (!isDownloaded(record.downloadStatus)) continue;

    const pdfPath = getPdfPath(outputDir, record.id);
    try {
      const content = await readFile(pdfPath);
      pdfFolder?.file(`${record.id}.pdf`, content);
    } catch (error) {
      // The file may have been removed from the shared directory since the run
      console.error(`Failed to add file to ZIP: ${pdfPath}`, error);
    }
  }

  return zip.generateAsync({
    type: 'nodebuffer',
    compression: 'DEFLATE',
    compressionOptions: { level: 6 }
  });
}
