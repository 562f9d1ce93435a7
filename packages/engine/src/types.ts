export type LogLevel = 'info' | 'warn' | 'error' | 'debug';

export type Rotation = 0 | 90 | 180 | 270;

export type CropRatio = 'none' | '1:1' | '16:9' | '9:16';

export type QualityPreset = 'high' | 'medium' | 'low' | 'verylow';

export interface SourceDimensions {
  width: number;
  height: number;
}

export interface RawParameters {
  inputPath?: string | null;
  startTime?: string | null;
  duration?: string | null;
  speedModifier?: string | null;
  rotation?: string | null;
  cropRatio?: string | null;
  targetSize?: string | null;
  quality?: string | null;
  smallestFile?: boolean;
  assumeDefaults?: boolean;
}

export interface ResolvedParameters {
  readonly inputPath: string;
  readonly startTime: number;
  readonly duration: number | null;
  readonly speedModifier: number;
  readonly rotation: Rotation;
  readonly cropRatio: CropRatio;
  readonly targetSize: string;
  readonly quality: QualityPreset;
  readonly smallestFile: boolean;
}

export type FilterOperation =
  | { kind: 'rotate'; degrees: Exclude<Rotation, 0> }
  | { kind: 'crop'; ratio: Exclude<CropRatio, 'none'> }
  | { kind: 'scaleAndPad'; width: number; height: number }
  | { kind: 'normalizeFrameRate'; fps: number }
  | { kind: 'remapTimestamps'; factor: number; speed: number };

export interface OperationPlan {
  operations: FilterOperation[];
  sourceDimensions: SourceDimensions | null;
}

export interface VideoCodecParams {
  codec: 'libx264';
  preset: 'veryslow' | 'faster';
  crf: number;
  bitrateCap: { bitrate: string; maxrate: string; bufsize: string } | null;
}

export interface AudioCodecParams {
  channels: 1 | null;
  codec: 'aac' | null;
  bitrate: string;
}

export interface CodecParams {
  video: VideoCodecParams;
  audio: AudioCodecParams;
}

export interface EncodeRequest {
  inputPath: string;
  outputPath: string;
  startTime: number;
  duration: number | null;
  filterChain: string;
  codec: CodecParams;
}

export interface EditLogger {
  debug(message: string): void;
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface SizeReport {
  originalBytes: number;
  newBytes: number;
  originalMegabytes: number;
  newMegabytes: number;
  reductionPercent: number;
}
