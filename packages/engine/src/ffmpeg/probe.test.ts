import { beforeEach, describe, expect, it, vi } from 'vitest';

import { DimensionProbeError } from '../errors';
import { createFfprobeProber, DEFAULT_PROBE_TIMEOUT_MS, parseProbeOutput } from './probe';

vi.mock('execa', () => ({
  execa: vi.fn()
}));

import { execa } from 'execa';

const execaMock = vi.mocked(execa);

beforeEach(() => {
  execaMock.mockReset();
});

describe('parseProbeOutput', () => {
  it('reads the first video stream', () => {
    expect(parseProbeOutput('/a.mp4', JSON.stringify({ streams: [{ width: 1920, height: 1080 }] }))).toEqual({
      width: 1920,
      height: 1080
    });
  });

  it.each([
    ['not json', 'invalid_json'],
    ['null', 'invalid_json'],
    ['1', 'invalid_json'],
    ['[]', 'invalid_json'],
    [JSON.stringify({ streams: [] }), 'missing_stream'],
    [JSON.stringify({}), 'missing_stream'],
    [JSON.stringify({ streams: [{ width: 0, height: 720 }] }), 'invalid_dimensions'],
    [JSON.stringify({ streams: [{ height: 720 }] }), 'invalid_dimensions']
  ])('rejects %s as %s', (stdout, reason) => {
    try {
      parseProbeOutput('/a.mp4', stdout);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DimensionProbeError);
      expect((error as DimensionProbeError).reason).toBe(reason);
    }
  });
});

describe('createFfprobeProber', () => {
  it('runs ffprobe on the first video stream', async () => {
    execaMock.mockResolvedValueOnce({
      failed: false,
      stdout: JSON.stringify({ streams: [{ width: 1080, height: 1920 }] })
    } as never);
    const prober = createFfprobeProber({ ffprobePath: '/usr/bin/ffprobe', timeoutMs: 500 });

    await expect(prober.probe('/videos/portrait.mp4')).resolves.toEqual({ width: 1080, height: 1920 });
    expect(execaMock).toHaveBeenCalledWith(
      '/usr/bin/ffprobe',
      [
        '-v',
        'error',
        '-select_streams',
        'v:0',
        '-show_entries',
        'stream=width,height',
        '-of',
        'json',
        '/videos/portrait.mp4'
      ],
      { reject: false, timeout: 500 }
    );
  });

  it('uses the default timeout', async () => {
    execaMock.mockResolvedValueOnce({
      failed: false,
      stdout: JSON.stringify({ streams: [{ width: 640, height: 360 }] })
    } as never);

    await createFfprobeProber({ ffprobePath: 'ffprobe' }).probe('/a.mp4');

    expect(execaMock.mock.calls[0][2]).toEqual({ reject: false, timeout: DEFAULT_PROBE_TIMEOUT_MS });
  });

  it('reports a failed ffprobe run', async () => {
    execaMock.mockResolvedValueOnce({
      failed: true,
      timedOut: false,
      exitCode: 1,
      stderr: '/a.mp4: Invalid data found when processing input',
      stdout: ''
    } as never);

    const error = await createFfprobeProber({ ffprobePath: 'ffprobe' })
      .probe('/a.mp4')
      .catch((reason: unknown) => reason);

    expect(error).toBeInstanceOf(DimensionProbeError);
    expect((error as DimensionProbeError).reason).toBe('ffprobe_failed');
    expect((error as DimensionProbeError).meta).toEqual({
      exitCode: 1,
      stderr: '/a.mp4: Invalid data found when processing input'
    });
  });

  it('reports a timeout', async () => {
    execaMock.mockResolvedValueOnce({ failed: true, timedOut: true, stderr: '', stdout: '' } as never);

    await expect(createFfprobeProber({ ffprobePath: 'ffprobe' }).probe('/a.mp4')).rejects.toThrow(
      'Could not get video dimensions for /a.mp4 (timeout)'
    );
  });
});
