import { QUALITY_PRESETS } from '../presets';
import type {
  AudioCodecParams,
  CodecParams,
  EncodeRequest,
  FilterOperation,
  OperationPlan,
  ResolvedParameters,
  VideoCodecParams
} from '../types';

const ROTATE_FILTERS: Record<90 | 180 | 270, string> = {
  90: 'transpose=1',
  180: 'transpose=2,transpose=2',
  270: 'transpose=2'
};

const CROP_FILTERS: Record<'1:1' | '16:9' | '9:16', string> = {
  '1:1': 'crop=min(iw\\,ih):min(iw\\,ih)',
  '16:9': 'crop=iw:iw*9/16',
  '9:16': 'crop=ih*9/16:ih'
};

export const serializeOperation = (operation: FilterOperation): string => {
  switch (operation.kind) {
    case 'rotate':
      return ROTATE_FILTERS[operation.degrees];
    case 'crop':
      return CROP_FILTERS[operation.ratio];
    case 'scaleAndPad': {
      const { width, height } = operation;
      return (
        `scale=${width}:${height}:force_original_aspect_ratio=decrease,` +
        `pad=${width}:${height}:(ow-iw)/2:(oh-ih)/2:color=black`
      );
    }
    case 'normalizeFrameRate':
      return `fps=${operation.fps}`;
    case 'remapTimestamps':
      return `setpts=PTS/${operation.speed}`;
  }
};

/** Joins the planned operations in plan order; the encoder is order-sensitive. */
export const buildFilterChain = (plan: OperationPlan): string =>
  plan.operations.map(serializeOperation).join(',');

export const buildVideoCodecParams = (resolved: ResolvedParameters): VideoCodecParams => {
  const crf = QUALITY_PRESETS[resolved.quality];
  if (resolved.smallestFile) {
    return {
      codec: 'libx264',
      preset: 'veryslow',
      crf,
      bitrateCap: { bitrate: '500k', maxrate: '500k', bufsize: '1000k' }
    };
  }
  return { codec: 'libx264', preset: 'faster', crf, bitrateCap: null };
};

export const buildAudioCodecParams = (resolved: ResolvedParameters): AudioCodecParams => {
  if (resolved.quality === 'verylow' || resolved.smallestFile) {
    return { channels: 1, codec: null, bitrate: '64k' };
  }
  return { channels: null, codec: 'aac', bitrate: '128k' };
};

export const buildCodecParams = (resolved: ResolvedParameters): CodecParams => ({
  video: buildVideoCodecParams(resolved),
  audio: buildAudioCodecParams(resolved)
});

const videoArgs = (video: VideoCodecParams): string[] => {
  const args = ['-c:v', video.codec, '-preset', video.preset];
  if (video.bitrateCap) {
    args.push(
      '-b:v',
      video.bitrateCap.bitrate,
      '-maxrate',
      video.bitrateCap.maxrate,
      '-bufsize',
      video.bitrateCap.bufsize
    );
  }
  args.push('-crf', String(video.crf));
  return args;
};

const audioArgs = (audio: AudioCodecParams): string[] => {
  const args: string[] = [];
  if (audio.channels !== null) {
    args.push('-ac', String(audio.channels));
  }
  if (audio.codec !== null) {
    args.push('-c:a', audio.codec);
  }
  args.push('-b:a', audio.bitrate);
  return args;
};

export const buildEncodeArgs = (request: EncodeRequest): string[] => {
  const args = ['-ss', String(request.startTime)];
  if (request.duration !== null) {
    args.push('-t', String(request.duration));
  }
  args.push('-i', request.inputPath);
  if (request.filterChain) {
    args.push('-vf', request.filterChain);
  }
  args.push(...videoArgs(request.codec.video), ...audioArgs(request.codec.audio));
  args.push('-y', request.outputPath);
  return args;
};

const SAFE_ARG = /^[A-Za-z0-9_@%+=:,./-]+$/;

const quoteArg = (arg: string): string => {
  if (arg.length && SAFE_ARG.test(arg)) {
    return arg;
  }
  return `'${arg.replace(/'/g, `'\\''`)}'`;
};

export const formatCommandLine = (binary: string, args: string[]): string =>
  [binary, ...args].map(quoteArg).join(' ');
