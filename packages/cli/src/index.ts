#!/usr/bin/env node
import { describeFailure, formatSizeReport } from '@reelcut/engine';
import { loadSettings } from '@reelcut/settings';
import { Command } from 'commander';
import pc from 'picocolors';

import { createReelcutContext, doctorAction, editAction, presetsAction, type ReelcutContext } from './actions';

const handleError = (error: unknown) => {
  const { stage, message } = describeFailure(error);
  const prefix = stage ? `reelcut error [${stage}]` : 'reelcut error';
  console.error(pc.red(`${prefix}: ${message}`));
  process.exitCode = 1;
};

let cachedContext: ReelcutContext | null = null;
const getContext = (): ReelcutContext => {
  cachedContext ??= createReelcutContext(loadSettings());
  return cachedContext;
};

interface EditCommandOptions {
  input?: string;
  start?: string;
  duration?: string;
  speed?: string;
  rotation?: string;
  crop?: string;
  target?: string;
  quality?: string;
  smallest?: boolean;
  yes?: boolean;
  outputDir?: string;
}

const program = new Command();
program
  .name('reelcut')
  .description('Trim, rotate, crop, resize and re-encode a video with ffmpeg')
  .version('0.1.0');

program
  .command('edit', { isDefault: true })
  .description('Edit a video and report the size reduction')
  .option('-i, --input <path>', 'Input video file')
  .option('-s, --start <seconds>', 'Start time in seconds')
  .option('-d, --duration <seconds>', 'Duration in seconds (default: to the end)')
  .option('--speed <modifier>', 'Speed modifier (1.0 = normal speed)')
  .option('-r, --rotation <degrees>', 'Rotation: 0, 90, 180 or 270')
  .option('--crop <ratio>', 'Crop ratio: none, 1:1, 16:9 or 9:16')
  .option('--target <size>', 'Target size preset (see `reelcut presets`)')
  .option('-q, --quality <preset>', 'Quality: high, medium, low or verylow')
  .option('--smallest', 'Optimise for the smallest file (forces verylow quality)', false)
  .option('-y, --yes', 'Use defaults for unset values without prompting', false)
  .option('-o, --output-dir <dir>', 'Directory for the output file', '.')
  .action(async (options: EditCommandOptions) => {
    try {
      const result = await editAction(
        {
          inputPath: options.input,
          startTime: options.start,
          duration: options.duration,
          speedModifier: options.speed,
          rotation: options.rotation,
          cropRatio: options.crop,
          targetSize: options.target,
          quality: options.quality,
          smallestFile: Boolean(options.smallest),
          assumeDefaults: Boolean(options.yes),
          outputDir: options.outputDir
        },
        getContext()
      );
      for (const line of formatSizeReport(result.outputPath, result.report)) {
        console.log(pc.green(line));
      }
    } catch (error) {
      handleError(error);
    }
  });

program
  .command('presets')
  .description('List size, quality, rotation and crop presets')
  .action(() => {
    const listing = presetsAction();
    const sections: Array<[string, string[]]> = [
      ['Target size options', listing.sizes],
      ['Quality options', listing.qualities],
      ['Rotation options', listing.rotations],
      ['Crop ratio options', listing.crops]
    ];
    for (const [title, lines] of sections) {
      console.log(pc.bold(`${title}:`));
      for (const line of lines) {
        console.log(`  ${line}`);
      }
    }
  });

program
  .command('doctor')
  .description('Show the ffmpeg and ffprobe binaries that will be used')
  .action(async () => {
    try {
      const result = await doctorAction(getContext());
      console.log(`ffmpeg:  ${result.ffmpeg.path} ${pc.dim(result.ffmpeg.version ?? 'unknown version')}`);
      console.log(`ffprobe: ${result.ffprobe.path} ${pc.dim(result.ffprobe.version ?? 'unknown version')}`);
    } catch (error) {
      handleError(error);
    }
  });

program.parseAsync(process.argv).catch(handleError);
