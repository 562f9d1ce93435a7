import type { CropRatio, QualityPreset, Rotation, SourceDimensions } from './types';

export const ORIGINAL_SIZE = 'original';

export const SIZE_PRESETS: Readonly<Record<string, Readonly<SourceDimensions> | typeof ORIGINAL_SIZE>> =
  Object.freeze({
    original: ORIGINAL_SIZE,
    '256x256': Object.freeze({ width: 256, height: 256 }),
    '512x512': Object.freeze({ width: 512, height: 512 }),
    '640x640': Object.freeze({ width: 640, height: 640 }),
    '720x720': Object.freeze({ width: 720, height: 720 }),
    '1024x1024': Object.freeze({ width: 1024, height: 1024 }),
    nHD: Object.freeze({ width: 640, height: 360 }),
    qHD: Object.freeze({ width: 960, height: 540 }),
    HD: Object.freeze({ width: 1280, height: 720 }),
    FHD: Object.freeze({ width: 1920, height: 1080 }),
    '2K': Object.freeze({ width: 2048, height: 1080 }),
    UHD: Object.freeze({ width: 3840, height: 2160 }),
    '4K': Object.freeze({ width: 4096, height: 2160 })
  });

export const QUALITY_PRESETS: Readonly<Record<QualityPreset, number>> = Object.freeze({
  high: 18,
  medium: 23,
  low: 28,
  verylow: 35
});

export const ROTATION_OPTIONS: Readonly<Record<`${Rotation}`, string>> = Object.freeze({
  '0': 'No rotation',
  '90': 'Rotate 90 degrees right (clockwise)',
  '180': 'Rotate 180 degrees',
  '270': 'Rotate 90 degrees left (counter-clockwise)'
});

export const CROP_OPTIONS: Readonly<Record<CropRatio, string>> = Object.freeze({
  none: 'No cropping',
  '1:1': 'Square (1:1)',
  '16:9': 'Widescreen (16:9)',
  '9:16': 'Vertical (9:16)'
});

export const DEFAULT_FRAME_RATE = 24;

const hasKey = <T extends object>(table: T, key: string): key is Extract<keyof T, string> =>
  Object.prototype.hasOwnProperty.call(table, key);

export const isSizePreset = (value: string): boolean => hasKey(SIZE_PRESETS, value);

export const isQualityPreset = (value: string): value is QualityPreset => hasKey(QUALITY_PRESETS, value);

export const isRotation = (value: string): value is `${Rotation}` => hasKey(ROTATION_OPTIONS, value);

export const isCropRatio = (value: string): value is CropRatio => hasKey(CROP_OPTIONS, value);

export const isVerticalSwap = (rotation: Rotation): boolean => rotation === 90 || rotation === 270;

/**
 * Pixel dimensions of a size preset, or null for the `original` passthrough.
 * Throws for keys that are not in the table.
 */
export const lookupSizePreset = (key: string): SourceDimensions | null => {
  if (!isSizePreset(key)) {
    throw new Error(`Unknown size preset: ${key}`);
  }
  const entry = SIZE_PRESETS[key];
  return entry === ORIGINAL_SIZE ? null : { width: entry.width, height: entry.height };
};

export const describeSizePresets = (): string[] =>
  Object.entries(SIZE_PRESETS)
    .map(([key, entry]) => `${key} - ${entry === ORIGINAL_SIZE ? ORIGINAL_SIZE : `${entry.width}x${entry.height}`}`)
    .sort();

export const describeQualityPresets = (): string[] =>
  Object.entries(QUALITY_PRESETS).map(([key, crf]) => `${key} - CRF: ${crf}`);

export const describeRotationOptions = (): string[] =>
  Object.entries(ROTATION_OPTIONS)
    .sort(([a], [b]) => Number(a) - Number(b))
    .map(([key, label]) => `${key} - ${label}`);

export const describeCropOptions = (): string[] =>
  Object.entries(CROP_OPTIONS).map(([key, label]) => `${key} - ${label}`);
