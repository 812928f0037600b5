// node/src/services/dedup-utils.ts

import type { NormalizedResponse, Source } from '@/types/core';

/** First occurrence of each key wins; later duplicates are dropped whatever their other fields. */
export function dedupFirstByKey<T>(items: Iterable<T>, getKey: (item: T) => string): T[] {
  const seen = new Set<string>();
  const kept: T[] = [];

  for (const item of items) {
    const key = getKey(item);
    if (seen.has(key)) continue;
    seen.add(key);
    kept.push(item);
  }

  return kept;
}

export function dedupSources(sources: Iterable<Source>): Source[] {
  return dedupFirstByKey(sources, (s) => s.sourceId);
}

/** Walks responses in order and returns each cited source once, in first-seen order. */
export function collectSources(responses: Pick<NormalizedResponse, 'sources'>[]): Source[] {
  return dedupSources(responses.flatMap((r) => r.sources));
}
