import { describe, expect, it, vi } from 'vitest';

import { DimensionProbeError } from '../errors';
import type { ResolvedParameters, SourceDimensions } from '../types';
import { createDimensionOracle } from './dimension-oracle';
import { planGeometry } from './planner';

const resolvedWith = (overrides: Partial<ResolvedParameters> = {}): ResolvedParameters => ({
  inputPath: '/videos/clip.mp4',
  startTime: 0,
  duration: null,
  speedModifier: 1,
  rotation: 0,
  cropRatio: 'none',
  targetSize: 'original',
  quality: 'medium',
  smallestFile: false,
  ...overrides
});

const proberFor = (dimensions: SourceDimensions) => ({
  probe: vi.fn(async (_filePath: string) => dimensions)
});

describe('planGeometry', () => {
  it('scales a landscape source to HD', async () => {
    const prober = proberFor({ width: 1920, height: 1080 });

    const plan = await planGeometry(resolvedWith({ targetSize: 'HD' }), prober);

    expect(plan.operations).toEqual([
      { kind: 'scaleAndPad', width: 1280, height: 720 },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
    expect(plan.sourceDimensions).toEqual({ width: 1920, height: 1080 });
    expect(prober.probe).toHaveBeenCalledTimes(1);
    expect(prober.probe).toHaveBeenCalledWith('/videos/clip.mp4');
  });

  it('rotates, square-crops and scales a portrait source', async () => {
    const prober = proberFor({ width: 1080, height: 1920 });

    const plan = await planGeometry(
      resolvedWith({ rotation: 90, cropRatio: '1:1', targetSize: '512x512' }),
      prober
    );

    expect(plan.operations).toEqual([
      { kind: 'rotate', degrees: 90 },
      { kind: 'crop', ratio: '1:1' },
      { kind: 'scaleAndPad', width: 512, height: 512 },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
  });

  it('skips scaling when the square crop already has the target size', async () => {
    const plan = await planGeometry(
      resolvedWith({ cropRatio: '1:1', targetSize: '720x720' }),
      proberFor({ width: 1280, height: 720 })
    );

    expect(plan.operations).toEqual([
      { kind: 'crop', ratio: '1:1' },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
  });

  it('swaps the target dimensions for vertical rotations', async () => {
    const clockwise = await planGeometry(
      resolvedWith({ rotation: 90, cropRatio: '1:1', targetSize: 'HD' }),
      proberFor({ width: 720, height: 720 })
    );
    const counterClockwise = await planGeometry(
      resolvedWith({ rotation: 270, targetSize: 'nHD' }),
      proberFor({ width: 1920, height: 1080 })
    );

    expect(clockwise.operations).toContainEqual({ kind: 'scaleAndPad', width: 720, height: 1280 });
    expect(counterClockwise.operations).toEqual([
      { kind: 'rotate', degrees: 270 },
      { kind: 'scaleAndPad', width: 360, height: 640 },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
  });

  it('keeps the target orientation for a half turn', async () => {
    const plan = await planGeometry(
      resolvedWith({ rotation: 180, cropRatio: '1:1', targetSize: 'HD' }),
      proberFor({ width: 720, height: 720 })
    );

    expect(plan.operations).toEqual([
      { kind: 'rotate', degrees: 180 },
      { kind: 'crop', ratio: '1:1' },
      { kind: 'scaleAndPad', width: 1280, height: 720 },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
  });

  it('skips a matching square scale after a vertical rotation', async () => {
    const plan = await planGeometry(
      resolvedWith({ rotation: 270, cropRatio: '1:1', targetSize: '1024x1024' }),
      proberFor({ width: 1024, height: 1536 })
    );

    expect(plan.operations.map(operation => operation.kind)).toEqual(['rotate', 'crop', 'normalizeFrameRate']);
  });

  it.each(['none', '16:9', '9:16'] as const)(
    'always scales for crop %s even when the sizes already match',
    async cropRatio => {
      const plan = await planGeometry(
        resolvedWith({ cropRatio, targetSize: 'FHD' }),
        proberFor({ width: 1920, height: 1080 })
      );

      expect(plan.operations).toContainEqual({ kind: 'scaleAndPad', width: 1920, height: 1080 });
    }
  );

  it('does not probe when neither a square crop nor a target size is requested', async () => {
    const prober = proberFor({ width: 1920, height: 1080 });

    const plan = await planGeometry(resolvedWith({ cropRatio: '16:9' }), prober);

    expect(plan.operations).toEqual([
      { kind: 'crop', ratio: '16:9' },
      { kind: 'normalizeFrameRate', fps: 24 }
    ]);
    expect(plan.sourceDimensions).toBeNull();
    expect(prober.probe).not.toHaveBeenCalled();
  });

  it('probes for a square crop even without a target size', async () => {
    const prober = proberFor({ width: 640, height: 480 });

    const plan = await planGeometry(resolvedWith({ cropRatio: '1:1' }), prober);

    expect(prober.probe).toHaveBeenCalledTimes(1);
    expect(plan.operations.map(operation => operation.kind)).toEqual(['crop', 'normalizeFrameRate']);
  });

  it('ends with a timestamp remap when the speed changes', async () => {
    const plan = await planGeometry(resolvedWith({ speedModifier: 2 }), proberFor({ width: 1, height: 1 }));

    expect(plan.operations).toEqual([
      { kind: 'normalizeFrameRate', fps: 24 },
      { kind: 'remapTimestamps', factor: 0.5, speed: 2 }
    ]);
  });

  it('propagates probe failures', async () => {
    const prober = {
      probe: vi.fn(async (filePath: string): Promise<SourceDimensions> => {
        throw new DimensionProbeError(filePath, 'missing_stream');
      })
    };

    await expect(planGeometry(resolvedWith({ targetSize: 'HD' }), prober)).rejects.toBeInstanceOf(
      DimensionProbeError
    );
  });
});

describe('createDimensionOracle', () => {
  it('probes each path once', async () => {
    const prober = proberFor({ width: 1280, height: 720 });
    const oracle = createDimensionOracle(prober);

    await oracle.probe('/videos/a.mp4');
    const second = await oracle.probe('/videos/a.mp4');

    expect(second).toEqual({ width: 1280, height: 720 });
    expect(prober.probe).toHaveBeenCalledTimes(1);
    expect(oracle.probeCount).toBe(1);
  });

  it('does not cache failures', async () => {
    const prober = {
      probe: vi
        .fn<(filePath: string) => Promise<SourceDimensions>>()
        .mockRejectedValueOnce(new DimensionProbeError('/videos/a.mp4', 'timeout'))
        .mockResolvedValueOnce({ width: 640, height: 360 })
    };
    const oracle = createDimensionOracle(prober);

    await expect(oracle.probe('/videos/a.mp4')).rejects.toBeInstanceOf(DimensionProbeError);
    await expect(oracle.probe('/videos/a.mp4')).resolves.toEqual({ width: 640, height: 360 });
    expect(oracle.probeCount).toBe(2);
  });
});
