import { isMasterPlaylist, parseMasterPlaylist, parseMediaPlaylist } from '../../src/utils/M3U8Parser';

const MASTER = [
  '#EXTM3U',
  '#EXT-X-STREAM-INF:BANDWIDTH=800000,RESOLUTION=640x360,CODECS="avc1.4d401e,mp4a.40.2"',
  'low/index.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=5000000,RESOLUTION=1920x1080',
  'https://cdn.example.com/high/index.m3u8',
  '#EXT-X-STREAM-INF:BANDWIDTH=2500000',
  '/mid/index.m3u8',
].join('\n');

describe('isMasterPlaylist', () => {
  it('detects a master playlist by its stream-inf tags', () => {
    expect(isMasterPlaylist(MASTER)).toBe(true);
  });

  it('treats a playlist without stream-inf tags as a media playlist', () => {
    expect(isMasterPlaylist('#EXTM3U\n#EXTINF:4,\nseg0.ts\n')).toBe(false);
  });
});

describe('parseMediaPlaylist', () => {
  it('returns segment URIs in playlist order with their durations', () => {
    const content = '#EXTM3U\n#EXT-X-TARGETDURATION:6\n#EXTINF:6.006,\na.ts\n#EXTINF:4.5,\nb.ts\n#EXT-X-ENDLIST\n';

    expect(parseMediaPlaylist(content)).toEqual([
      { uri: 'a.ts', duration: 6.006 },
      { uri: 'b.ts', duration: 4.5 },
    ]);
  });

  it('keeps URI lines that have no EXTINF before them', () => {
    expect(parseMediaPlaylist('#EXTM3U\nfirst.ts\n#EXTINF:2,\nsecond.ts\n')).toEqual([
      { uri: 'first.ts' },
      { uri: 'second.ts', duration: 2 },
    ]);
  });

  it('handles CRLF line endings and blank lines', () => {
    expect(parseMediaPlaylist('#EXTM3U\r\n\r\n#EXTINF:1,\r\n  seg.ts  \r\n')).toEqual([{ uri: 'seg.ts', duration: 1 }]);
  });

  it('returns nothing for a playlist with only tags', () => {
    expect(parseMediaPlaylist('#EXTM3U\n#EXT-X-ENDLIST\n')).toEqual([]);
  });
});

describe('parseMasterPlaylist', () => {
  it('reads bandwidth, resolution and quoted codecs for each variant', () => {
    expect(parseMasterPlaylist(MASTER)).toEqual([
      {
        uri: 'low/index.m3u8',
        bandwidth: 800000,
        resolution: { width: 640, height: 360 },
        codecs: 'avc1.4d401e,mp4a.40.2',
      },
      {
        uri: 'https://cdn.example.com/high/index.m3u8',
        bandwidth: 5000000,
        resolution: { width: 1920, height: 1080 },
        codecs: undefined,
      },
      { uri: '/mid/index.m3u8', bandwidth: 2500000, resolution: undefined, codecs: undefined },
    ]);
  });

  it('skips a stream-inf tag that is not followed by a URI', () => {
    const content = '#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=1\n#EXT-X-STREAM-INF:BANDWIDTH=2\nonly.m3u8\n';

    expect(parseMasterPlaylist(content).map(v => v.bandwidth)).toEqual([2]);
  });

  it('leaves bandwidth undefined when it is missing or not a number', () => {
    const content = '#EXTM3U\n#EXT-X-STREAM-INF:BANDWIDTH=abc\na.m3u8\n#EXT-X-STREAM-INF:RESOLUTION=1x1\nb.m3u8\n';

    expect(parseMasterPlaylist(content).map(v => v.bandwidth)).toEqual([undefined, undefined]);
  });
});
