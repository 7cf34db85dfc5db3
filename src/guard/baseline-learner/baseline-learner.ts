/**
 * Baseline Learner
 *
 * Learns what "quiet idle" looks like on this device for upload rate,
 * download rate and CPU. The first samples are averaged with a plain running
 * mean; once the cold-start count is reached the estimate switches to an
 * exponential moving average so it can drift with long-term usage.
 *
 * Baselines live for the monitoring session only. A process restart starts
 * learning from scratch.
 */

import { createSubsystemLogger } from '../../logging/subsystem.js';
import type { BaselineEstimate, GuardConfiguration } from '../types/index.js';

export type BaselineSettings = Pick<GuardConfiguration['baseline'], 'coldStartSamples' | 'smoothing'>;

/**
 * Folds one sample into a running estimate. Running mean while
 * `count < coldStartSamples`, EMA afterwards.
 */
export function foldBaselineValue(
  current: number,
  value: number,
  count: number,
  settings: BaselineSettings,
): number {
  if (count < settings.coldStartSamples) {
    return (current * count + value) / (count + 1);
  }
  return settings.smoothing * value + (1 - settings.smoothing) * current;
}

export class BaselineLearner {
  private readonly logger = createSubsystemLogger('guard/baseline');
  private readonly settings: BaselineSettings;
  private upload = 0;
  private download = 0;
  private cpu = 0;
  private count = 0;

  constructor(settings: BaselineSettings) {
    this.settings = { ...settings };
  }

  /**
   * Feeds one quiet-idle sample. Callers only invoke this while the device is
   * idle and below the idle CPU/network limits.
   */
  observe(uploadBytesPerSecond: number, downloadBytesPerSecond: number, cpuPercent: number): void {
    this.upload = foldBaselineValue(this.upload, uploadBytesPerSecond, this.count, this.settings);
    this.download = foldBaselineValue(this.download, downloadBytesPerSecond, this.count, this.settings);
    this.cpu = foldBaselineValue(this.cpu, cpuPercent, this.count, this.settings);
    this.count += 1;

    if (this.count === this.settings.coldStartSamples) {
      this.logger.info('Baseline warm-up complete', {
        samples: this.count,
        uploadBytesPerSecond: this.upload,
        downloadBytesPerSecond: this.download,
        cpuPercent: this.cpu,
      });
    }
  }

  isWarm(): boolean {
    return this.count >= this.settings.coldStartSamples;
  }

  getEstimate(): BaselineEstimate {
    return {
      uploadBytesPerSecond: this.upload,
      downloadBytesPerSecond: this.download,
      cpuUsagePercent: this.cpu,
      sampleCount: this.count,
      warm: this.isWarm(),
    };
  }
}
