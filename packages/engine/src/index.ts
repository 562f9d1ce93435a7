/* c8 ignore file */
export {
  SIZE_PRESETS,
  QUALITY_PRESETS,
  ROTATION_OPTIONS,
  CROP_OPTIONS,
  ORIGINAL_SIZE,
  DEFAULT_FRAME_RATE,
  isSizePreset,
  isQualityPreset,
  isRotation,
  isCropRatio,
  isVerticalSwap,
  lookupSizePreset,
  describeSizePresets,
  describeQualityPresets,
  describeRotationOptions,
  describeCropOptions
} from './presets';
export {
  resolveField,
  resolveParameters,
  FIELDS,
  RESOLUTION_ORDER,
  INVALID_INPUT_MESSAGE,
  REQUIRED_FIELD_MESSAGE
} from './resolver';
export { createDimensionOracle } from './geometry/dimension-oracle';
export { planGeometry } from './geometry/planner';
export {
  buildFilterChain,
  serializeOperation,
  buildCodecParams,
  buildVideoCodecParams,
  buildAudioCodecParams,
  buildEncodeArgs,
  formatCommandLine
} from './ffmpeg/builder';
export { createFfprobeProber, parseProbeOutput, DEFAULT_PROBE_TIMEOUT_MS } from './ffmpeg/probe';
export { createFfmpegEncoder } from './ffmpeg/encode';
export { buildOutputName, buildSuffixTokens, deriveOutputPath, OUTPUT_EXTENSION } from './naming';
export { computeSizeReport, computeReductionPercent, formatSizeReport, toMegabytes } from './report';
export { prepareEdit, runEdit } from './pipeline';
export {
  ValidationError,
  MissingRequiredFieldError,
  InputNotFoundError,
  DimensionProbeError,
  EncodeError,
  OutputMissingError,
  describeFailure,
  isEditError,
  isValidationError,
  isDimensionProbeError,
  isEncodeError
} from './errors';
export type { EditStage, EditError, FailureSummary } from './errors';
export type { PromptFn, PromptRequest, ResolveContext, FieldDescriptor, FieldValues, FieldKey } from './resolver';
export type { DimensionOracle, DimensionProber } from './geometry/dimension-oracle';
export type { FfprobeProberOptions } from './ffmpeg/probe';
export type { Encoder, FfmpegEncoderOptions } from './ffmpeg/encode';
export type { EditCollaborators, EditResult, RunEditOptions } from './pipeline';
export type {
  LogLevel,
  Rotation,
  CropRatio,
  QualityPreset,
  SourceDimensions,
  RawParameters,
  ResolvedParameters,
  FilterOperation,
  OperationPlan,
  VideoCodecParams,
  AudioCodecParams,
  CodecParams,
  EncodeRequest,
  EditLogger,
  SizeReport
} from './types';
