/**
 * Batch Pipeline - file bytes in, ordered per-line results out
 *
 * 1. Extract candidate lines (parse failure aborts the batch)
 * 2. Skip blank candidates
 * 3. Translate each remaining line; a failed line becomes an error row
 */

import type { BatchInput, BatchOptions, BatchOutcome } from '../types/batch.js';
import type { ItemTranslator } from '../translator/item-translator.js';
import { extractCandidates } from '../extract/line-extractor.js';
import { mapInOrder } from '../utils/concurrency.js';

export async function runBatch(
  input: BatchInput,
  translator: ItemTranslator,
  options: BatchOptions = {}
): Promise<BatchOutcome> {
  const candidates = extractCandidates(input.buffer, input.format, {
    hasHeader: input.hasHeader,
  });
  const parsedCount = candidates.length;

  const lines = candidates.map(c => c.trim()).filter(c => c.length > 0);

  if (lines.length === 0) {
    console.log(`[Batch] No usable lines (${parsedCount} parsed)`);
    return { status: 'empty', parsedCount };
  }

  const startTime = Date.now();
  let done = 0;

  const results = await mapInOrder(lines, options.concurrency ?? 1, async line => {
    const result = await translator.translateItem(line, input.targetLanguage);
    done++;
    options.onProgress?.(done, lines.length);
    return result;
  });

  const failed = results.filter(r => !r.succeeded).length;
  console.log(
    `[Batch] ✅ ${results.length} lines → ${input.targetLanguage} in ${Date.now() - startTime}ms` +
      (failed > 0 ? ` (${failed} failed)` : '')
  );

  return { status: 'completed', parsedCount, results };
}
