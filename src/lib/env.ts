import 'dotenv/config';
import { z } from 'zod';

const envSchema = z.object({
  // arXiv API
  ARXIV_API_URL: z.string().url().default('https://export.arxiv.org/api/query'),
  ARXIV_PAGE_SIZE: z.coerce.number().int().min(1).max(2000).default(100),
  ARXIV_PAGE_DELAY_MS: z.coerce.number().int().min(0).default(3000), // arXiv asks for 3s between calls
  ARXIV_MAX_SCANNED: z.coerce.number().int().min(1).default(1000),

  // Downloads
  DOWNLOAD_DIR: z.string().min(1).default('pdfs'),
  DOWNLOAD_DELAY_MS: z.coerce.number().int().min(0).default(100),

  // Application settings
  TASK_TTL_MS: z.coerce.number().int().min(1).default(60 * 60 * 1000), // 1 hour
});

export type Env = z.infer<typeof envSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    console.error('Environment validation failed:');
    result.error.issues.forEach(issue => {
      console.error(`  - ${issue.path.join('.')}: ${issue.message}`);
    });
    throw new Error('Invalid environment configuration');
  }

  return result.data;
}

export const env = loadEnv();
