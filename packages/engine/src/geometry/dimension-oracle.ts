import type { SourceDimensions } from '../types';

export interface DimensionProber {
  probe(filePath: string): Promise<SourceDimensions>;
}

export interface DimensionOracle extends DimensionProber {
  readonly probeCount: number;
}

/**
 * Wraps a prober so each path is probed at most once for the lifetime of the
 * oracle. Failures are not cached.
 */
export const createDimensionOracle = (prober: DimensionProber): DimensionOracle => {
  const cache = new Map<string, Promise<SourceDimensions>>();
  let probeCount = 0;

  return {
    get probeCount() {
      return probeCount;
    },
    probe(filePath: string): Promise<SourceDimensions> {
      const cached = cache.get(filePath);
      if (cached) {
        return cached;
      }
      probeCount += 1;
      const pending = prober.probe(filePath).catch((error: unknown) => {
        cache.delete(filePath);
        throw error;
      });
      cache.set(filePath, pending);
      return pending;
    }
  };
};
