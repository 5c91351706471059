import { z } from 'zod';

export const DEFAULT_QUERY = 'aluminum copper dissimilar welding process parameters';

export const SUGGESTED_QUERIES = [
  'laser welding aluminum copper',
  'Al-Cu dissimilar welding',
  'multimaterial welding Al-Cu',
  'laser welding process parameters'
] as const;

export const DEFAULT_CATEGORIES = ['cond-mat.mtrl-sci', 'physics.app-ph'] as const;
export const EXTRA_CATEGORIES = ['physics.optics', 'cond-mat.other'] as const;
export const ARXIV_CATEGORIES = [...DEFAULT_CATEGORIES, ...EXTRA_CATEGORIES] as const;

export type ArxivCategory = typeof ARXIV_CATEGORIES[number];

export const QUERY_MODES = ['default', 'custom', 'suggested'] as const;
export type QueryMode = typeof QUERY_MODES[number];

export const MAX_RESULTS_LIMIT = 50;
export const DEFAULT_MAX_RESULTS = 10;
export const MIN_YEAR = 1900;
export const DEFAULT_START_YEAR = 2015;

export const NO_RESULTS_SUGGESTIONS = [
  "Broaden the query (e.g., try 'laser welding aluminum copper' or 'Al-Cu welding').",
  "Add more categories (e.g., 'physics.optics' for laser-related papers).",
  'Expand the year range (e.g., 2010–2025).',
  'Increase the maximum number of papers.'
];

export interface SearchParams {
  query: string;
  categories: ArxivCategory[];
  maxResults: number;
  startYear: number;
  endYear: number;
}

export function createSearchRequestSchema(currentYear: number) {
  const yearMessage = `Years must be between ${MIN_YEAR} and ${currentYear}.`;

  return z.object({
    queryMode: z.enum(QUERY_MODES).default('default'),
    query: z.string().default(''),
    categories: z
      .array(z.enum(ARXIV_CATEGORIES, {
        errorMap: () => ({ message: `Categories must be chosen from: ${ARXIV_CATEGORIES.join(', ')}.` })
      }))
      .default([...DEFAULT_CATEGORIES]),
    maxResults: z.coerce
      .number()
      .int('Maximum number of papers must be a whole number.')
      .min(1, `Maximum number of papers must be between 1 and ${MAX_RESULTS_LIMIT}.`)
      .max(MAX_RESULTS_LIMIT, `Maximum number of papers must be between 1 and ${MAX_RESULTS_LIMIT}.`)
      .default(DEFAULT_MAX_RESULTS),
    startYear: z.coerce.number().int(yearMessage).min(MIN_YEAR, yearMessage).max(currentYear, yearMessage).default(DEFAULT_START_YEAR),
    endYear: z.coerce.number().int(yearMessage).min(MIN_YEAR, yearMessage).max(currentYear, yearMessage).default(currentYear)
  });
}

export type SearchRequest = z.input<ReturnType<typeof createSearchRequestSchema>>;

export type ValidationResult =
  | { ok: true; value: SearchParams }
  | { ok: false; error: string };

function resolveQuery(mode: QueryMode, query: string): { ok: true; query: string } | { ok: false; error: string } {
  switch (mode) {
    case 'default':
      return { ok: true, query: DEFAULT_QUERY };
    case 'custom':
      return { ok: true, query: query.trim() };
    case 'suggested':
      if (!SUGGESTED_QUERIES.some(suggested => suggested === query)) {
        return { ok: false, error: 'Please choose one of the suggested queries.' };
      }
      return { ok: true, query };
  }
}

/**
 * Validate a search request. Checks run in the order the form reports them:
 * shape and bounds, then query, categories and year order.
 */
export function validateSearchRequest(input: unknown, now: Date = new Date()): ValidationResult {
  const parsed = createSearchRequestSchema(now.getFullYear()).safeParse(input);

  if (!parsed.success) {
    return { ok: false, error: parsed.error.issues[0]?.message ?? 'Invalid search request.' };
  }

  const { queryMode, query, categories, maxResults, startYear, endYear } = parsed.data;

  const resolved = resolveQuery(queryMode, query);
  if (!resolved.ok) {
    return resolved;
  }
  if (!resolved.query) {
    return { ok: false, error: 'Please enter a valid query.' };
  }
  if (categories.length === 0) {
    return { ok: false, error: 'Please select at least one category.' };
  }
  if (startYear > endYear) {
    return { ok: false, error: 'Start year must be less than or equal to end year.' };
  }

  return {
    ok: true,
    value: { query: resolved.query, categories, maxResults, startYear, endYear }
  };
}
