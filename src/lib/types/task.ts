import type { PaperRecord } from './paper';
import type { ResultTable } from '../utils/result-table';

export type PipelineState =
  | 'idle'
  | 'validating'
  | 'searching'
  | 'downloading'
  | 'displaying'
  | 'error';

export interface TaskStatus {
  id: string;
  state: PipelineState;
  finished: boolean;
  progress: number;
  message: string;
  papersFound: number;
  downloadsAttempted: number;
  error?: string;
  csvUrl?: string;
  zipUrl?: string;
  lastUpdate: Date;
}

export interface TaskUpdate {
  state?: PipelineState;
  finished?: boolean;
  progress?: number;
  message?: string;
  papersFound?: number;
  downloadsAttempted?: number;
  error?: string;
  csvUrl?: string;
  zipUrl?: string;
}

export interface RunSummary {
  found: number;
  downloaded: number;
  headline: string; // "Found 3 papers matching your query!"
  recap: string;
  text: string; // "3 papers found, 2 PDFs downloaded successfully."
  warning?: string;
}

export type PipelineOutcome =
  | { kind: 'invalid'; error: string }
  | { kind: 'search-failed'; error: string }
  | { kind: 'no-results'; message: string; suggestions: string[] }
  | { kind: 'complete'; records: PaperRecord[]; table: ResultTable; summary: RunSummary };

export type TransitionCallback = (state: PipelineState, update: TaskUpdate) => void;
