/**
 * One entry of an arXiv Atom feed, as returned by the search client.
 */
export interface ArxivEntry {
  entryId: string; // canonical abs URL, e.g. http://arxiv.org/abs/2101.00001v2
  title: string;
  summary: string;
  published: string;
  year: number;
  categories: string[];
  pdfUrl?: string;
}

export type DownloadStatus =
  | 'Not downloaded'
  | 'No PDF URL'
  | `Downloaded (${string} KB)`
  | `Failed: ${string}`;

/**
 * A discovered publication. Only `downloadStatus` changes after creation.
 */
export interface PaperRecord {
  readonly id: string;
  readonly title: string;
  readonly year: number;
  readonly categories: readonly string[];
  readonly abstract: string;
  readonly pdfUrl?: string;
  downloadStatus: DownloadStatus;
}

export function isDownloaded(status: DownloadStatus): boolean {
  return status.startsWith('Downloaded (');
}
