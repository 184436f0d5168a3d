/**
 * Fan Bank - tach-only fans; a failed fan silently reports 0 RPM
 */

import { Rng, uniform } from '../../common/random';

export interface FanBankOptions {
  count: number;
  maxRpm: number;
  failureProbability: number;
}

export class FanBank {
  private readonly failed = new Set<number>();
  private readonly options: FanBankOptions;

  constructor(options: FanBankOptions) {
    this.options = options;
  }

  injectFailure(fanId: number): boolean {
    if (!this.isFan(fanId)) return false;
    this.failed.add(fanId);
    return true;
  }

  restore(fanId: number): boolean {
    return this.failed.delete(fanId);
  }

  /**
   * Roll the per-read random failure chance
   */
  tick(rng: Rng): void {
    if (this.options.failureProbability <= 0) return;
    for (let id = 0; id < this.options.count; id++) {
      if (!this.failed.has(id) && rng() < this.options.failureProbability) {
        console.warn(`Fan ${id} failed in simulation`);
        this.failed.add(id);
      }
    }
  }

  failedFans(): number[] {
    return Array.from(this.failed).sort((a, b) => a - b);
  }

  private isFan(fanId: number): boolean {
    return Number.isInteger(fanId) && fanId >= 0 && fanId < this.options.count;
  }
}

export interface FanSpeedInput {
  count: number;
  maxRpm: number;
  failed: readonly number[];
  fanPercent: number;
  tempC: number;
  optimalTempC: number;
}

/**
 * Duty cycle sets the base speed; each degree over the optimum adds 20 RPM.
 */
export function fanSpeeds(input: FanSpeedInput, rng: Rng): number[] {
  const base = (Math.min(100, Math.max(0, input.fanPercent)) / 100) * input.maxRpm;
  const thermal = Math.max(0, input.tempC - input.optimalTempC) * 20;

  return Array.from({ length: input.count }, (_, id) => {
    if (input.failed.includes(id)) return 0;
    const rpm = base + thermal + Math.round(uniform(rng, -50, 50));
    return Math.round(Math.min(input.maxRpm, Math.max(0, rpm)));
  });
}
