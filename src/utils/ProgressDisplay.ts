import * as cliProgress from 'cli-progress';
import type { ProgressSink, ProgressSnapshot } from '../types/index.js';

function payloadFor(snapshot: ProgressSnapshot): Record<string, string> {
  return {
    speed: snapshot.speedSegPerSec.toFixed(1),
    mbps: snapshot.speedMBps.toFixed(2),
    etaText: snapshot.etaSeconds > 0 ? `${snapshot.etaSeconds}s` : 'N/A',
  };
}

/**
 * Terminal progress bar fed by session snapshots. The bar is torn down as soon as the
 * run leaves the downloading phase so later log lines start on a clean line.
 */
export class ProgressDisplay {
  private bar: cliProgress.SingleBar | null = null;

  public readonly sink: ProgressSink = snapshot => this.update(snapshot);

  public update(snapshot: ProgressSnapshot): void {
    if (snapshot.status !== 'downloading') {
      this.stop();
      return;
    }

    if (!this.bar) {
      this.bar = new cliProgress.SingleBar({
        format: 'Downloading |{bar}| {percentage}% || {value}/{total} segments || {speed} seg/s || {mbps} MB/s || ETA: {etaText}',
        barCompleteChar: '█',
        barIncompleteChar: '░',
        barsize: 40,
        hideCursor: true,
      });
      this.bar.start(snapshot.totalSegments, snapshot.downloadedSegments, payloadFor(snapshot));
      return;
    }

    this.bar.update(snapshot.downloadedSegments, payloadFor(snapshot));
  }

  public stop(): void {
    this.bar?.stop();
    this.bar = null;
  }
}
