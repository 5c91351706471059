export interface FeedEntryFixture {
  id: string;
  published: string;
  categories: string[];
  title?: string;
  summary?: string;
  pdf?: boolean;
}

/**
 * Build a minimal arXiv Atom feed page for tests
 */
export function buildFeed(entries: FeedEntryFixture[], totalResults = entries.length): string {
  const body = entries
    .map(entry => [
      '  <entry>',
      `    <id>http://arxiv.org/abs/${entry.id}</id>`,
      `    <published>${entry.published}</published>`,
      `    <title>${entry.title ?? `Paper ${entry.id}`}</title>`,
      `    <summary>${entry.summary ?? `Abstract of ${entry.id}.`}</summary>`,
      `    <link href="http://arxiv.org/abs/${entry.id}" rel="alternate" type="text/html"/>`,
      entry.pdf === false
        ? ''
        : `    <link title="pdf" href="http://arxiv.org/pdf/${entry.id}" rel="related" type="application/pdf"/>`,
      ...entry.categories.map(term => `    <category term="${term}" scheme="http://arxiv.org/schemas/atom"/>`),
      '  </entry>'
    ].filter(Boolean).join('\n'))
    .join('\n');

  return [
    '<?xml version="1.0" encoding="UTF-8"?>',
    '<feed xmlns="http://www.w3.org/2005/Atom">',
    `  <opensearch:totalResults xmlns:opensearch="http://a9.com/-/spec/opensearch/1.1/">${totalResults}</opensearch:totalResults>`,
    body,
    '</feed>'
  ].join('\n');
}
