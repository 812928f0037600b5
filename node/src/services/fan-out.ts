// src/services/fan-out.ts — resolve every angle concurrently and join all outcomes
import type { Angle, AngleResult } from '@/types/core';
import { describeError } from './errors';
import { logger } from './logger';

export interface AngleResolverLike {
  resolve(angle: Angle): Promise<AngleResult>;
}

/**
 * Starts one branch per angle at once and waits for all of them (join-all, not fail-fast).
 * Outcomes come back in submission order; a rejected branch becomes a failed AngleResult.
 */
export async function resolveAngles(resolver: AngleResolverLike, angles: Angle[]): Promise<AngleResult[]> {
  const startedAt = Date.now();

  const results = await Promise.all(
    angles.map(async (angle, index): Promise<AngleResult> => {
      try {
        return await resolver.resolve(angle);
      } catch (err) {
        const error = describeError(err);
        logger.error('fan-out:branch_exception', { index, angle, error });
        return { ok: false, angle, error };
      }
    }),
  );

  logger.info('fan-out:joined', {
    angles: angles.length,
    succeeded: results.filter((r) => r.ok).length,
    failed: results.filter((r) => !r.ok).length,
    ms: Date.now() - startedAt,
  });
  return results;
}
