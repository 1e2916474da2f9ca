import { existsSync, promises as fs } from 'fs';
import path from 'path';
import { MergeError } from '../../src/errors';
import { FFmpegMerger, buildConcatList, ffmpegConcatArgs } from '../../src/utils/FFmpegMerger';
import { makeTempDir, removeDir, silentLogger } from '../helpers/fakes';

const FAKE_FFMPEG = path.join(__dirname, '..', 'fixtures', 'fake-ffmpeg.js');

describe('buildConcatList', () => {
  it('writes one absolute file line per segment in the given order', () => {
    expect(buildConcatList(['/cache/abc/segment_00001.ts', '/cache/abc/segment_00000.ts'])).toBe(
      "file '/cache/abc/segment_00001.ts'\nfile '/cache/abc/segment_00000.ts'\n"
    );
  });

  it('escapes single quotes in paths', () => {
    expect(buildConcatList(["/tmp/it's/segment_00000.ts"])).toBe("file '/tmp/it'\\''s/segment_00000.ts'\n");
  });

  it('resolves relative paths', () => {
    expect(buildConcatList(['segment_00000.ts'])).toBe(`file '${path.resolve('segment_00000.ts')}'\n`);
  });
});

describe('ffmpegConcatArgs', () => {
  it('stream-copies through the concat demuxer and overwrites the output', () => {
    expect(ffmpegConcatArgs('/cache/concat.txt', '/out/video.mp4')).toEqual([
      '-hide_banner',
      '-loglevel',
      'warning',
      '-stats',
      '-f',
      'concat',
      '-safe',
      '0',
      '-i',
      '/cache/concat.txt',
      '-c',
      'copy',
      '-bsf:a',
      'aac_adtstoasc',
      '-y',
      '/out/video.mp4',
    ]);
  });
});

/**
 * Writes an executable shim in the temp dir that runs the fixture under this Node binary
 * with the given mode, so the child sees the mode whatever the test's own environment is.
 */
async function writeFakeFFmpeg(dir: string, mode: 'ok' | 'fail' | 'empty'): Promise<string> {
  const shim = path.join(dir, `ffmpeg-${mode}`);
  const script = `#!/bin/sh\nFAKE_FFMPEG_MODE=${mode} exec '${process.execPath}' '${FAKE_FFMPEG}' "$@"\n`;
  await fs.writeFile(shim, script, { mode: 0o755 });
  return shim;
}

describe('FFmpegMerger', () => {
  let workDir: string;
  let segments: string[];
  let outputPath: string;
  let listPath: string;

  beforeEach(async () => {
    workDir = await makeTempDir();
    const cacheDir = path.join(workDir, "it's cached");
    await fs.mkdir(cacheDir);
    segments = [];
    for (let i = 0; i < 3; i++) {
      const file = path.join(cacheDir, `segment_0000${i}.ts`);
      await fs.writeFile(file, `part${i};`);
      segments.push(file);
    }
    outputPath = path.join(workDir, 'out', 'video.mp4');
    listPath = path.join(cacheDir, 'concat.txt');
  });

  afterEach(async () => {
    await removeDir(workDir);
  });

  it('joins the segments in order and removes the list file', async () => {
    const merger = new FFmpegMerger(await writeFakeFFmpeg(workDir, 'ok'), silentLogger);

    const outcome = await merger.merge(segments, outputPath);

    expect(await fs.readFile(outputPath, 'utf8')).toBe('part0;part1;part2;');
    expect(outcome.fileSize).toBe(18);
    expect(existsSync(listPath)).toBe(false);
  });

  it('fails with the exit code when the muxer exits non-zero', async () => {
    const merger = new FFmpegMerger(await writeFakeFFmpeg(workDir, 'fail'), silentLogger);

    const error = await merger.merge(segments, outputPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ message: 'Merge failed (ffmpeg exit code: 1)', exitCode: 1 });
    expect(existsSync(listPath)).toBe(false);
  });

  it('fails when the muxer exits cleanly but leaves an empty file', async () => {
    const merger = new FFmpegMerger(await writeFakeFFmpeg(workDir, 'empty'), silentLogger);

    const error = await merger.merge(segments, outputPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ message: `Merge failed: ${outputPath} is empty or missing`, exitCode: 0 });
    expect(await fs.readFile(outputPath, 'utf8')).toBe('');
  });

  it('fails when the muxer binary cannot be started', async () => {
    const missing = path.join(workDir, 'no-such-ffmpeg');
    const merger = new FFmpegMerger(missing, silentLogger);

    const error = await merger.merge(segments, outputPath).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(MergeError);
    expect(error).toMatchObject({ message: expect.stringContaining(`Cannot run ${missing}`) });
  });

  it('refuses an empty segment list', async () => {
    const merger = new FFmpegMerger(await writeFakeFFmpeg(workDir, 'ok'));

    await expect(merger.merge([], outputPath)).rejects.toThrow('No segments to merge');
  });
});
