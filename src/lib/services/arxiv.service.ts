import { XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import type { ArxivEntry, PaperRecord, SearchParams } from '../types';
import { acceptEntry } from '../utils/paper-filter';
import { env } from '../env';

export const ABSTRACT_MAX_LENGTH = 200;

export interface ArxivSearchOptions {
  apiUrl?: string;
  pageSize?: number;
  pageDelayMs?: number;
  maxScanned?: number;
}

export type SearchOutcome =
  | { ok: true; entries: ArxivEntry[] }
  | { ok: false; error: string };

interface FeedPage {
  entries: ArxivEntry[];
  totalResults?: number;
}

const ARRAY_TAGS = new Set(['entry', 'link', 'category', 'author']);

const parser = new XMLParser({
  ignoreAttributes: false,
  attributeNamePrefix: '',
  removeNSPrefix: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (tagName) => ARRAY_TAGS.has(tagName)
});

// Elements that carry attributes come back as { '#text': ..., attr: ... }
const text = (value: unknown) =>
  typeof value === 'object' && value !== null && '#text' in value ? value['#text'] : value;

const entrySchema = z.object({
  id: z.preprocess(text, z.string()),
  title: z.preprocess(text, z.string()).default(''),
  summary: z.preprocess(text, z.string()).default(''),
  published: z.preprocess(text, z.string()).default(''), // absent on error entries
  link: z.array(z.object({
    href: z.string(),
    title: z.string().optional()
  })).default([]),
  category: z.array(z.object({ term: z.string() })).default([])
});

const feedSchema = z.object({
  feed: z.object({
    totalResults: z.preprocess(text, z.coerce.number().int()).optional(),
    entry: z.array(entrySchema).default([])
  })
});

/**
 * Parse one page of the arXiv Atom feed. Throws when the document is not a feed
 * or when arXiv answered with an error entry.
 */
export function parseArxivFeed(xml: string): FeedPage {
  const parsed = feedSchema.safeParse(parser.parse(xml));

  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new Error(`Unexpected response format (${issue?.path.join('.')}: ${issue?.message})`);
  }

  const { totalResults, entry } = parsed.data.feed;

  const apiError = entry.find(e => e.id.includes('/api/errors'));
  if (apiError) {
    throw new Error(apiError.summary || apiError.title || 'arXiv API error');
  }

  return {
    totalResults,
    entries: entry.map(e => ({
      entryId: e.id,
      title: e.title.replace(/\s+/g, ' ').trim(),
      summary: e.summary,
      published: e.published,
      year: new Date(e.published).getUTCFullYear(),
      categories: e.category.map(c => c.term),
      pdfUrl: e.link.find(l => l.title === 'pdf')?.href
    }))
  };
}

/**
 * Id from the abstract URL. Old-style ids keep their archive, with `/` mapped
 * to `_` so the id stays usable as a file name: `cond-mat/0102536v1` becomes
 * `cond-mat_0102536v1`.
 */
export function extractArxivId(entryId: string): string {
  const [, path] = entryId.split('/abs/');
  if (path) {
    return path.replace(/\//g, '_');
  }
  return entryId.split('/').pop() ?? '';
}

export function truncateAbstract(summary: string, maxLength = ABSTRACT_MAX_LENGTH): string {
  const collapsed = summary.replace(/\s+/g, ' ').trim();
  return collapsed.length > maxLength ? `${collapsed.slice(0, maxLength)}...` : collapsed;
}

export function toPaperRecord(entry: ArxivEntry): PaperRecord {
  return {
    id: extractArxivId(entry.entryId),
    title: entry.title,
    year: entry.year,
    categories: entry.categories,
    abstract: truncateAbstract(entry.summary),
    pdfUrl: entry.pdfUrl,
    downloadStatus: 'Not downloaded'
  };
}

async function fetchPage(apiUrl: string, query: string, start: number, maxResults: number): Promise<FeedPage> {
  const url = new URL(apiUrl);
  url.searchParams.set('search_query', query);
  url.searchParams.set('start', start.toString());
  url.searchParams.set('max_results', maxResults.toString());
  url.searchParams.set('sortBy', 'submittedDate');
  url.searchParams.set('sortOrder', 'descending');

  const response = await fetch(url.toString(), {
    headers: {
      'Accept': 'application/atom+xml'
    }
  });

  if (!response.ok) {
    throw new Error(`HTTP ${response.status} ${response.statusText}`);
  }

  return parseArxivFeed(await response.text());
}

/**
 * Search arXiv newest-first, keeping entries that pass the category and year
 * filter until `maxResults` are collected or the feed runs out.
 */
export async function searchArxiv(
  params: SearchParams,
  options: ArxivSearchOptions = {}
): Promise<SearchOutcome> {
  const {
    apiUrl = env.ARXIV_API_URL,
    pageSize = env.ARXIV_PAGE_SIZE,
    pageDelayMs = env.ARXIV_PAGE_DELAY_MS,
    maxScanned = env.ARXIV_MAX_SCANNED
  } = options;

  const categories = new Set<string>(params.categories);
  const seenIds = new Set<string>();
  const accepted: ArxivEntry[] = [];
  let start = 0;

  try {
    while (accepted.length < params.maxResults && start < maxScanned) {
      if (start > 0) {
        await new Promise(resolve => setTimeout(resolve, pageDelayMs));
      }

      const page = await fetchPage(apiUrl, params.query, start, Math.min(pageSize, maxScanned - start));
      console.log(`arXiv page at ${start}: ${page.entries.length} entries (total ${page.totalResults ?? 'unknown'})`);

      for (const entry of page.entries) {
        const id = extractArxivId(entry.entryId);
        if (!id || seenIds.has(id)) continue;
        if (!acceptEntry(entry, categories, params.startYear, params.endYear)) continue;

        seenIds.add(id);
        accepted.push(entry);
        if (accepted.length >= params.maxResults) break;
      }

      start += page.entries.length;

      if (page.entries.length === 0 || (page.totalResults !== undefined && start >= page.totalResults)) {
        break;
      }
    }
  } catch (error) {
    console.error('arXiv search error:', error);
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: `Error querying arXiv: ${reason}` };
  }

  console.log(`arXiv search matched ${accepted.length} entries after scanning ${start}`);
  return { ok: true, entries: accepted };
}
