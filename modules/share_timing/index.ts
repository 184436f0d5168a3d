/**
 * Share Timing Controller - paces share submissions to a device-like cadence
 */

import { gaussian, Rng } from '../../common/random';
import { ShareTimingState } from '../../common/types';

export interface ShareTimingOptions {
  meanIntervalMs: number;
  jitterStddevMs: number;
  floorIntervalMs: number;
}

export class ShareTimingController {
  private state: ShareTimingState;
  private readonly rng: Rng;

  constructor(options: ShareTimingOptions, startedAt: number, rng: Rng) {
    this.rng = rng;
    this.state = {
      last_submission: startedAt,
      mean_interval: options.meanIntervalMs,
      jitter_stddev: Math.max(0, options.jitterStddevMs),
      floor_interval: Math.max(0, options.floorIntervalMs)
    };
  }

  /**
   * True when enough time has passed since the last accepted submission.
   * A fresh target interval is drawn on every call, never below the floor.
   */
  shouldSubmit(now: number): boolean {
    const elapsed = now - this.state.last_submission;
    const target = Math.max(
      this.state.floor_interval,
      gaussian(this.rng, this.state.mean_interval, this.state.jitter_stddev)
    );

    if (elapsed >= target) {
      this.state = { ...this.state, last_submission: now };
      return true;
    }
    return false;
  }

  snapshot(): Readonly<ShareTimingState> {
    return { ...this.state };
  }
}
