import { DEFAULT_FRAME_RATE, isVerticalSwap, lookupSizePreset } from '../presets';
import type { FilterOperation, OperationPlan, ResolvedParameters, SourceDimensions } from '../types';
import type { DimensionProber } from './dimension-oracle';

const swap = ({ width, height }: SourceDimensions): SourceDimensions => ({ width: height, height: width });

const needsSourceDimensions = (resolved: ResolvedParameters): boolean =>
  resolved.cropRatio === '1:1' || lookupSizePreset(resolved.targetSize) !== null;

/**
 * Size the scale stage compares against. Only the square crop changes the
 * reference size; other crops keep the probed dimensions.
 */
const computeEffectiveSize = (
  source: SourceDimensions,
  resolved: ResolvedParameters,
  verticalSwap: boolean
): SourceDimensions => {
  const side = Math.min(source.width, source.height);
  const effective = resolved.cropRatio === '1:1' ? { width: side, height: side } : { ...source };
  return verticalSwap ? swap(effective) : effective;
};

export async function planGeometry(
  resolved: ResolvedParameters,
  oracle: DimensionProber
): Promise<OperationPlan> {
  const operations: FilterOperation[] = [];
  const verticalSwap = isVerticalSwap(resolved.rotation);

  if (resolved.rotation !== 0) {
    operations.push({ kind: 'rotate', degrees: resolved.rotation });
  }

  if (resolved.cropRatio !== 'none') {
    operations.push({ kind: 'crop', ratio: resolved.cropRatio });
  }

  let sourceDimensions: SourceDimensions | null = null;
  let effectiveSize: SourceDimensions | null = null;
  if (needsSourceDimensions(resolved)) {
    sourceDimensions = await oracle.probe(resolved.inputPath);
    effectiveSize = computeEffectiveSize(sourceDimensions, resolved, verticalSwap);
  }

  const preset = lookupSizePreset(resolved.targetSize);
  if (preset) {
    const target = verticalSwap ? swap(preset) : preset;
    // Only a square crop can make the scale redundant.
    const redundant =
      resolved.cropRatio === '1:1' &&
      effectiveSize !== null &&
      target.width === effectiveSize.width &&
      target.height === effectiveSize.height;
    if (!redundant) {
      operations.push({ kind: 'scaleAndPad', width: target.width, height: target.height });
    }
  }

  operations.push({ kind: 'normalizeFrameRate', fps: DEFAULT_FRAME_RATE });

  if (resolved.speedModifier !== 1) {
    operations.push({
      kind: 'remapTimestamps',
      factor: 1 / resolved.speedModifier,
      speed: resolved.speedModifier
    });
  }

  return { operations, sourceDimensions };
}
