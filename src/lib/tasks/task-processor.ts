import type { PaperRecord, PipelineOutcome, RunSummary, SearchParams, TransitionCallback } from '../types';
import { isDownloaded, NO_RESULTS_SUGGESTIONS, validateSearchRequest } from '../types';
import { searchArxiv, toPaperRecord, type ArxivSearchOptions } from '../services/arxiv.service';
import { downloadRecords } from '../services/download.service';
import { buildResultTable } from '../utils/result-table';
import { getDownloadsDir } from '../utils/file-utils';
import { env } from '../env';
import { taskManager as defaultTaskManager, type TaskManager } from './task-manager';

export const NO_RESULTS_MESSAGE = 'No papers found matching your criteria.';
export const PARTIAL_DOWNLOAD_WARNING = "Some PDFs failed to download. Check 'download_status' for details.";

export interface PipelineOptions {
  outputDir?: string;
  downloadDelayMs?: number;
  search?: ArxivSearchOptions;
  now?: Date;
}

export function summarizeRun(records: readonly PaperRecord[], params: SearchParams): RunSummary {
  const found = records.length;
  const downloaded = records.filter(r => isDownloaded(r.downloadStatus)).length;

  return {
    found,
    downloaded,
    headline: `Found ${found} papers matching your query!`,
    recap: `Query: ${params.query} | Categories: ${params.categories.join(', ')} | Years: ${params.startYear}–${params.endYear}`,
    text: `${found} papers found, ${downloaded} PDFs downloaded successfully.`,
    warning: downloaded < found ? PARTIAL_DOWNLOAD_WARNING : undefined
  };
}

/**
 * Run one search: validate, query arXiv, download PDFs in order, build the table.
 * Every state change is reported through `onTransition`.
 */
export async function runSearchPipeline(
  input: unknown,
  options: PipelineOptions = {},
  onTransition?: TransitionCallback
): Promise<PipelineOutcome> {
  const {
    outputDir = getDownloadsDir(),
    downloadDelayMs = env.DOWNLOAD_DELAY_MS,
    now = new Date()
  } = options;

  onTransition?.('validating', { message: 'Validating search options...', progress: 0 });

  const validation = validateSearchRequest(input, now);
  if (!validation.ok) {
    onTransition?.('error', { message: validation.error, error: validation.error });
    return { kind: 'invalid', error: validation.error };
  }

  const params = validation.value;

  onTransition?.('searching', { message: 'Querying arXiv...' });
  console.log(`Searching arXiv: "${params.query}" [${params.categories.join(', ')}] ${params.startYear}-${params.endYear}, max ${params.maxResults}`);

  const search = await searchArxiv(params, options.search);
  if (!search.ok) {
    onTransition?.('error', { message: search.error, error: search.error });
    return { kind: 'search-failed', error: search.error };
  }

  if (search.entries.length === 0) {
    onTransition?.('displaying', { message: NO_RESULTS_MESSAGE, papersFound: 0, progress: 100 });
    return { kind: 'no-results', message: NO_RESULTS_MESSAGE, suggestions: [...NO_RESULTS_SUGGESTIONS] };
  }

  const records = search.entries.map(toPaperRecord);

  onTransition?.('downloading', {
    message: `Found ${records.length} papers matching your query!`,
    papersFound: records.length,
    downloadsAttempted: 0,
    progress: 0
  });

  const downloaded = await downloadRecords(
    records,
    outputDir,
    (current, total) => {
      onTransition?.('downloading', {
        message: `Downloading PDFs (${current}/${total})...`,
        downloadsAttempted: current,
        progress: Math.round((current / total) * 100)
      });
    },
    downloadDelayMs
  );

  onTransition?.('displaying', { message: 'Building results table...', progress: 100 });

  return {
    kind: 'complete',
    records: downloaded,
    table: buildResultTable(downloaded),
    summary: summarizeRun(downloaded, params)
  };
}

/**
 * Run a search in the background, mirroring its progress onto a task
 */
export async function processSearchTask(
  taskId: string,
  input: unknown,
  options: PipelineOptions = {},
  manager: TaskManager = defaultTaskManager
): Promise<void> {
  try {
    const outcome = await runSearchPipeline(input, options, (state, update) => {
      manager.transition(taskId, state, update);
    });

    manager.finishTask(taskId, outcome);
    console.log(`Task ${taskId} finished: ${outcome.kind}`);
  } catch (error) {
    console.error('Search task error:', error);
    manager.failTask(taskId, `Search failed: ${error}`);
  }
}
