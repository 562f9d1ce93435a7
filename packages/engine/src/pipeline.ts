import { OutputMissingError } from './errors';
import { buildCodecParams, buildEncodeArgs, buildFilterChain, formatCommandLine } from './ffmpeg/builder';
import type { Encoder } from './ffmpeg/encode';
import { createDimensionOracle, type DimensionProber } from './geometry/dimension-oracle';
import { planGeometry } from './geometry/planner';
import { deriveOutputPath } from './naming';
import { QUALITY_PRESETS } from './presets';
import { computeSizeReport } from './report';
import type { EditLogger, EncodeRequest, OperationPlan, ResolvedParameters, SizeReport } from './types';

export interface EditCollaborators {
  prober: DimensionProber;
  encoder: Encoder;
  statSize: (filePath: string) => Promise<number>;
  fileExists: (filePath: string) => Promise<boolean>;
  logger: EditLogger;
}

export interface RunEditOptions {
  outputDir: string;
}

export interface EditResult {
  outputPath: string;
  plan: OperationPlan;
  request: EncodeRequest;
  commandLine: string;
  report: SizeReport;
}

const describeEncoding = (resolved: ResolvedParameters): string => {
  const crf = QUALITY_PRESETS[resolved.quality];
  return resolved.smallestFile
    ? `Using smallest file settings: CRF ${crf}, maxrate 500k, veryslow preset`
    : `Using quality '${resolved.quality}': CRF ${crf}, faster preset`;
};

export async function prepareEdit(
  resolved: ResolvedParameters,
  collaborators: Pick<EditCollaborators, 'prober' | 'logger'>,
  options: RunEditOptions
): Promise<{ plan: OperationPlan; request: EncodeRequest }> {
  const { logger } = collaborators;
  const outputPath = deriveOutputPath(resolved, options.outputDir);
  logger.info(`Output file will be: ${outputPath}`);

  const plan = await planGeometry(resolved, createDimensionOracle(collaborators.prober));
  if (plan.sourceDimensions) {
    logger.debug(`Source dimensions: ${plan.sourceDimensions.width}x${plan.sourceDimensions.height}`);
  }
  const scale = plan.operations.find(operation => operation.kind === 'scaleAndPad');
  if (scale && scale.kind === 'scaleAndPad') {
    logger.info(`Applying scale/pad to ${scale.width}x${scale.height}`);
  } else if (resolved.targetSize !== 'original') {
    logger.info('Target size matches cropped/rotated size. No scaling needed.');
  }
  logger.info(describeEncoding(resolved));

  return {
    plan,
    request: {
      inputPath: resolved.inputPath,
      outputPath,
      startTime: resolved.startTime,
      duration: resolved.duration,
      filterChain: buildFilterChain(plan),
      codec: buildCodecParams(resolved)
    }
  };
}

/**
 * Plans, encodes and measures one edit. Every failure propagates; nothing is
 * retried.
 */
export async function runEdit(
  resolved: ResolvedParameters,
  collaborators: EditCollaborators,
  options: RunEditOptions
): Promise<EditResult> {
  const { logger, encoder } = collaborators;
  const { plan, request } = await prepareEdit(resolved, collaborators, options);

  const commandLine = formatCommandLine(encoder.binary, buildEncodeArgs(request));
  logger.info('Executing command:');
  logger.info(commandLine);

  await encoder.encode(request);

  if (!(await collaborators.fileExists(request.outputPath))) {
    throw new OutputMissingError(request.outputPath);
  }

  const [originalBytes, newBytes] = await Promise.all([
    collaborators.statSize(resolved.inputPath),
    collaborators.statSize(request.outputPath)
  ]);

  return {
    outputPath: request.outputPath,
    plan,
    request,
    commandLine,
    report: computeSizeReport(originalBytes, newBytes)
  };
}
