import { InputNotFoundError, MissingRequiredFieldError, ValidationError } from './errors';
import {
  describeCropOptions,
  describeQualityPresets,
  describeRotationOptions,
  describeSizePresets,
  isCropRatio,
  isQualityPreset,
  isRotation,
  isSizePreset
} from './presets';
import type {
  CropRatio,
  EditLogger,
  QualityPreset,
  RawParameters,
  ResolvedParameters,
  Rotation
} from './types';

export interface PromptRequest {
  label: string;
  defaultValue: string;
  options: string[];
}

export type PromptFn = (request: PromptRequest) => Promise<string>;

export interface ResolveContext {
  assumeDefaults: boolean;
  prompt: PromptFn;
  fileExists: (filePath: string) => Promise<boolean>;
  logger: EditLogger;
}

export interface FieldDescriptor<T> {
  name: string;
  label: string;
  defaultValue: string;
  required: boolean;
  validate: (raw: string) => boolean;
  parse: (raw: string) => T;
  options?: () => string[];
  verify?: (value: T, ctx: ResolveContext) => Promise<void>;
}

export interface FieldValues {
  inputPath: string;
  startTime: number;
  duration: number | null;
  speedModifier: number;
  rotation: Rotation;
  cropRatio: CropRatio;
  targetSize: string;
  quality: QualityPreset;
}

export type FieldKey = keyof FieldValues;

export const INVALID_INPUT_MESSAGE = 'Invalid input. Please try again.';
export const REQUIRED_FIELD_MESSAGE = 'This field is required. Please provide a value.';

const INTEGER_PATTERN = /^[0-9]+$/;
const DECIMAL_PATTERN = /^[0-9]+(\.[0-9]+)?$/;

const ROTATION_VALUES: Readonly<Record<`${Rotation}`, Rotation>> = Object.freeze({
  '0': 0,
  '90': 90,
  '180': 180,
  '270': 270
});

const parseRotation = (raw: string): Rotation => {
  if (!isRotation(raw)) {
    throw new ValidationError('rotation', raw);
  }
  return ROTATION_VALUES[raw];
};

const parseCropRatio = (raw: string): CropRatio => {
  if (!isCropRatio(raw)) {
    throw new ValidationError('crop ratio', raw);
  }
  return raw;
};

const parseQuality = (raw: string): QualityPreset => {
  if (!isQualityPreset(raw)) {
    throw new ValidationError('quality', raw);
  }
  return raw;
};

export const FIELDS: { readonly [K in FieldKey]: FieldDescriptor<FieldValues[K]> } = {
  inputPath: {
    name: 'input path',
    label: 'Enter input file path',
    defaultValue: '',
    required: true,
    validate: () => true,
    parse: raw => raw,
    verify: async (value, ctx) => {
      if (!(await ctx.fileExists(value))) {
        throw new InputNotFoundError(value);
      }
    }
  },
  startTime: {
    name: 'start time',
    label: 'Enter start time (in seconds)',
    defaultValue: '0',
    required: false,
    validate: raw => INTEGER_PATTERN.test(raw),
    parse: raw => Number(raw)
  },
  duration: {
    name: 'duration',
    label: 'Enter duration in seconds (leave empty for full video)',
    defaultValue: '',
    required: false,
    validate: raw => raw === '' || (INTEGER_PATTERN.test(raw) && Number(raw) > 0),
    parse: raw => (raw === '' ? null : Number(raw))
  },
  speedModifier: {
    name: 'speed modifier',
    label: 'Enter speed modifier (1.0 = normal speed)',
    defaultValue: '1.0',
    required: false,
    validate: raw => DECIMAL_PATTERN.test(raw) && Number(raw) > 0,
    parse: raw => Number(raw)
  },
  rotation: {
    name: 'rotation',
    label: 'Select rotation angle',
    defaultValue: '0',
    required: false,
    validate: isRotation,
    parse: parseRotation,
    options: describeRotationOptions
  },
  cropRatio: {
    name: 'crop ratio',
    label: 'Select crop ratio',
    defaultValue: 'none',
    required: false,
    validate: isCropRatio,
    parse: parseCropRatio,
    options: describeCropOptions
  },
  targetSize: {
    name: 'target size',
    label: 'Select target size',
    defaultValue: 'original',
    required: false,
    validate: isSizePreset,
    parse: raw => raw,
    options: describeSizePresets
  },
  quality: {
    name: 'quality',
    label: 'Select quality',
    defaultValue: 'medium',
    required: false,
    validate: isQualityPreset,
    parse: parseQuality,
    options: describeQualityPresets
  }
};

export const RESOLUTION_ORDER: readonly FieldKey[] = [
  'inputPath',
  'startTime',
  'duration',
  'speedModifier',
  'rotation',
  'cropRatio',
  'targetSize',
  'quality'
];

const promptUntilValid = async <T>(field: FieldDescriptor<T>, ctx: ResolveContext): Promise<T> => {
  for (;;) {
    const answer = (
      await ctx.prompt({
        label: field.label,
        defaultValue: field.defaultValue,
        options: field.options?.() ?? []
      })
    ).trim();
    const value = answer === '' ? field.defaultValue : answer;

    if (value === '' && field.required) {
      ctx.logger.warn(REQUIRED_FIELD_MESSAGE);
      continue;
    }
    if (field.validate(value)) {
      return field.parse(value);
    }
    ctx.logger.warn(INVALID_INPUT_MESSAGE);
  }
};

/**
 * Resolves one field from its raw value.
 *
 * A valid supplied value is kept without prompting. Missing values take the
 * default when `assumeDefaults` is set, otherwise the user is asked with the
 * default pre-filled until the answer validates. Under `assumeDefaults` an
 * invalid supplied value is a `ValidationError` and a required field without
 * a value is a `MissingRequiredFieldError`.
 */
export async function resolveField<T>(
  raw: string | null | undefined,
  field: FieldDescriptor<T>,
  ctx: ResolveContext
): Promise<T> {
  const supplied = raw?.trim() ?? '';

  if (supplied !== '') {
    if (field.validate(supplied)) {
      return field.parse(supplied);
    }
    if (ctx.assumeDefaults) {
      throw new ValidationError(field.name, supplied);
    }
    ctx.logger.warn(`Invalid ${field.name} provided (${supplied}), ignoring.`);
  } else if (ctx.assumeDefaults) {
    if (field.defaultValue === '' && field.required) {
      throw new MissingRequiredFieldError(field.name);
    }
    return field.parse(field.defaultValue);
  }

  return promptUntilValid(field, ctx);
}

const applySmallestFileOverride = (raw: RawParameters, logger: EditLogger): string | null | undefined => {
  if (!raw.smallestFile) {
    return raw.quality;
  }
  logger.info('Smallest file requested, setting quality to verylow.');
  return 'verylow';
};

const isComplete = (values: Partial<FieldValues>): values is FieldValues =>
  RESOLUTION_ORDER.every(key => values[key] !== undefined);

export async function resolveParameters(
  raw: RawParameters,
  ctx: Omit<ResolveContext, 'assumeDefaults'>
): Promise<ResolvedParameters> {
  const context: ResolveContext = { ...ctx, assumeDefaults: Boolean(raw.assumeDefaults) };
  const values: Partial<FieldValues> = {};

  const resolveKey = async <K extends FieldKey>(key: K): Promise<void> => {
    const field: FieldDescriptor<FieldValues[K]> = FIELDS[key];
    const source = key === 'quality' ? applySmallestFileOverride(raw, context.logger) : raw[key];
    const value = await resolveField(source, field, context);
    await field.verify?.(value, context);
    values[key] = value;
  };

  for (const key of RESOLUTION_ORDER) {
    await resolveKey(key);
  }

  if (!isComplete(values)) {
    throw new Error('Parameter resolution finished with unresolved fields');
  }

  return Object.freeze({
    ...values,
    smallestFile: Boolean(raw.smallestFile)
  });
}
