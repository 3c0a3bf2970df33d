import { readFile } from 'fs/promises';
import { glob } from 'glob';
import { basename, extname, relative } from 'path';
import { KnowledgeDocumentSchema, type KnowledgeDocument } from '../contracts/kb-source.js';
import { SwarmLogger } from '../runner/logger.js';

export interface IngestOptions {
  includePatterns?: string[];
  excludePatterns?: string[];
  concurrency?: number;
  logger?: SwarmLogger;
}

const DEFAULT_CONCURRENCY = 10;

function sourceName(filePath: string): string {
  return basename(filePath, extname(filePath));
}

export async function ingestFile(filePath: string, rootDir: string): Promise<KnowledgeDocument> {
  const content = await readFile(filePath, 'utf-8');
  return KnowledgeDocumentSchema.parse({
    doc_id: relative(rootDir, filePath).split('\\').join('/'),
    content,
    source: sourceName(filePath),
  });
}

/**
 * Read every markdown/text document under a directory.
 * Files that cannot be read or are too short are skipped with a warning.
 */
export async function ingestDirectory(
  dirPath: string,
  options: IngestOptions = {}
): Promise<KnowledgeDocument[]> {
  const includePatterns = options.includePatterns ?? ['**/*.{md,mdx,txt}'];
  const excludePatterns = options.excludePatterns ?? [
    '**/node_modules/**',
    '**/dist/**',
    '**/.git/**',
  ];
  const concurrency = options.concurrency ?? DEFAULT_CONCURRENCY;
  const logger = options.logger ?? SwarmLogger.silent();

  const globResults = await Promise.all(
    includePatterns.map(pattern =>
      glob(pattern, {
        cwd: dirPath,
        absolute: true,
        ignore: excludePatterns,
      })
    )
  );
  const files = [...new Set(globResults.flat())].sort();

  const documents: KnowledgeDocument[] = [];
  for (let i = 0; i < files.length; i += concurrency) {
    const batch = files.slice(i, i + concurrency);
    const settled = await Promise.allSettled(batch.map(file => ingestFile(file, dirPath)));

    settled.forEach((result, j) => {
      if (result.status === 'fulfilled') {
        documents.push(result.value);
      } else {
        logger.warn('kb.ingest.skipped', `Skipped knowledge file ${batch[j]}`, {
          file: batch[j],
          error: result.reason,
        });
      }
    });
  }

  logger.info('kb.ingest.done', `Ingested ${documents.length} knowledge documents`, {
    directory: dirPath,
    documents: documents.length,
    skipped: files.length - documents.length,
  });

  return documents;
}
