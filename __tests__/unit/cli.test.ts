import { failureReport, parseHeaders, program } from '../../src/cli';
import type { DownloadResult } from '../../src/DownloadSession';
import { ManifestError, MergeError } from '../../src/errors';
import type { DownloadStatus } from '../../src/types';

describe('parseHeaders', () => {
  it('splits each value on the first colon and trims both sides', () => {
    expect(parseHeaders(['Referer: https://player.example.org/', 'X-Token:abc:def '])).toEqual({
      Referer: 'https://player.example.org/',
      'X-Token': 'abc:def',
    });
  });

  it('lets a later value win for the same name', () => {
    expect(parseHeaders(['Cookie: a=1', 'Cookie: a=2'])).toEqual({ Cookie: 'a=2' });
  });

  it('rejects a value without a name', () => {
    expect(() => parseHeaders([': value'])).toThrow('Invalid header ": value", expected "Name: value"');
    expect(() => parseHeaders(['novalue'])).toThrow('Invalid header "novalue"');
  });
});

describe('program', () => {
  it('exposes the download and variants commands', () => {
    expect(program.commands.map(command => command.name())).toEqual(['download', 'variants']);
  });
});

describe('failureReport', () => {
  const CACHE = '/tmp/hlsfetch-cache/0123456789abcdef';
  const HINT = `Cache preserved at ${CACHE} - run again to resume`;

  function result(
    status: DownloadStatus,
    counts: { failedSegments?: number; errors?: string[] },
    error?: DownloadResult['error']
  ): DownloadResult {
    return {
      success: false,
      outputPath: '/tmp/out/video.mp4',
      error,
      snapshot: {
        status,
        percent: 40,
        downloadedSegments: 4,
        totalSegments: 10,
        failedSegments: counts.failedSegments ?? 0,
        bytesDownloaded: 4096,
        speedMBps: 0,
        speedSegPerSec: 0,
        etaSeconds: 0,
        errors: counts.errors ?? [],
      },
    };
  }

  it('prints only the resume hint for a cancelled run', () => {
    expect(failureReport(result('cancelled', {}), CACHE)).toEqual([HINT]);
  });

  it('explains an incomplete run that failed no segment', () => {
    expect(failureReport(result('failed', { errors: ['Download incomplete: 4/10 segments'] }), CACHE)).toEqual([
      'Error details (showing first 10):',
      '  • Download incomplete: 4/10 segments',
      HINT,
    ]);
  });

  it('keeps the hint after a merge failure but not after a playlist failure', () => {
    const merge = result('failed', { errors: ['Merge failed: disk full'] }, new MergeError('Merge failed: disk full'));
    const manifest = result('failed', { errors: ['Playlist is empty'] }, new ManifestError('Playlist is empty'));

    expect(failureReport(merge, CACHE)).toContain(HINT);
    expect(failureReport(manifest, CACHE)).toEqual(['Error details (showing first 10):', '  • Playlist is empty']);
  });

  it('lists at most ten errors and counts the rest', () => {
    const errors = Array.from({ length: 12 }, (_, i) => `Segment ${i}: HTTP 500`);

    const lines = failureReport(result('failed', { failedSegments: 12, errors }), CACHE);

    expect(lines[0]).toBe('Failed to download 12 segments');
    expect(lines[1]).toBe('Error details (showing first 10):');
    expect(lines.slice(2, 12)).toEqual(errors.slice(0, 10).map(error => `  • ${error}`));
    expect(lines[12]).toBe('  ... and 2 more errors');
    expect(lines[13]).toBe(HINT);
    expect(lines).toHaveLength(14);
  });
});
