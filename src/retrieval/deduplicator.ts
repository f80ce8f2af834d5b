/**
 * Chunk filtering and deduplication for multi-query retrieval
 *
 * Several queries against the same codebase return overlapping chunks; the
 * first 200 characters of a chunk identify it.
 */
import { logger } from '@utils/logger';
import { type RetrievedChunk } from '@/types/extraction';

const FINGERPRINT_LENGTH = 200;
const MIN_CHUNK_LENGTH = 10;

/**
 * Build descriptors carry no application knowledge
 */
export const EXCLUDED_FILE_NAMES = ['buildblock.yaml', 'buildblock.yml', '.buildblock.yaml', '.buildblock.yml'];

/**
 * Whether a source path names an excluded file (case-insensitive, basename only)
 */
export const isExcludedSource = (sourcePath: string): boolean => {
  const fileName = sourcePath.split('/').pop() ?? sourcePath;
  return EXCLUDED_FILE_NAMES.includes(fileName.toLowerCase());
};

export const chunkFingerprint = (chunk: RetrievedChunk): string => chunk.content.slice(0, FINGERPRINT_LENGTH);

/**
 * Drop near-empty chunks and chunks already seen, keeping first occurrences in order
 *
 * @param chunks - Chunks from one or more searches
 * @param limit - Optional cap on the number of chunks returned
 * @returns Unique chunks
 */
export const deduplicateChunks = (chunks: RetrievedChunk[], limit?: number): RetrievedChunk[] => {
  const seen = new Set<string>();
  const unique: RetrievedChunk[] = [];

  for (const chunk of chunks) {
    if (chunk.content.trim().length <= MIN_CHUNK_LENGTH) {
      continue;
    }
    const fingerprint = chunkFingerprint(chunk);
    if (seen.has(fingerprint)) {
      continue;
    }
    seen.add(fingerprint);
    unique.push(chunk);
  }

  logger.debug('Chunk deduplication complete', {
    input: chunks.length,
    unique: unique.length,
  });

  return limit === undefined ? unique : unique.slice(0, limit);
};
