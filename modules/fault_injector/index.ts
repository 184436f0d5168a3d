/**
 * Fault Injector - nonce errors and rotating hash-board silence windows
 */

import { eventLogger } from '../../common/eventLogger';
import { Rng } from '../../common/random';
import { Decision, FaultProfile } from '../../common/types';

export interface FaultInjectorOptions {
  nonceErrorRate: number;
  silenceEnabled: boolean;
  silencePeriodMs: number;
}

const HOURS_PER_YEAR = 365 * 24;

const clampProbability = (value: number): number =>
  Number.isFinite(value) ? Math.min(1, Math.max(0, value)) : 0;

/**
 * Nonce error rate after thermal stress and wear.
 * base * (1 + 2 * degrees above optimum + uptimeHours * 1e-5)
 */
export function degradedErrorRate(
  base: number,
  uptimeHours: number,
  tempC: number,
  optimalTempC: number
): number {
  const tempStress = Math.max(0, tempC - optimalTempC);
  return clampProbability(base * (1 + tempStress * 2 + Math.max(0, uptimeHours) * 0.00001));
}

/**
 * Fraction of nominal hash rate left after uptimeHours of 5%-per-year wear
 */
export function hashrateDegradation(uptimeHours: number): number {
  return Math.pow(0.95, Math.max(0, uptimeHours) / HOURS_PER_YEAR);
}

export class FaultInjector {
  private profile: FaultProfile;

  constructor(options: FaultInjectorOptions, startedAt: number) {
    const base = clampProbability(options.nonceErrorRate);
    this.profile = {
      base_error_rate: base,
      nonce_error_rate: base,
      silent_unit: options.silenceEnabled ? 0 : null,
      silence_started_at: startedAt,
      silence_period: options.silencePeriodMs
    };
  }

  /**
   * Move the silence window forward by however many whole periods have passed
   */
  rotate(unitCount: number, now: number): boolean {
    const { silent_unit, silence_started_at, silence_period } = this.profile;
    if (silent_unit === null || unitCount <= 0 || !(silence_period > 0)) {
      return false;
    }

    const windows = Math.floor((now - silence_started_at) / silence_period);
    if (windows < 1) {
      return false;
    }

    const next = (silent_unit + windows) % unitCount;
    this.profile = {
      ...this.profile,
      silent_unit: next,
      silence_started_at: silence_started_at + windows * silence_period
    };

    eventLogger.appendEvent({
      type: 'fault.rotation',
      source: 'fault',
      key: `unit:${next}`,
      status: 'ok',
      details: { previous: silent_unit, windows }
    });
    return true;
  }

  /**
   * Decide whether a result computed for `unitId` survives
   */
  evaluate<T>(unitCount: number, unitId: number, value: T, rng: Rng, now: number): Decision<T> {
    if (rng() < this.profile.nonce_error_rate) {
      return { kind: 'dropped', reason: 'nonce_error' };
    }

    this.rotate(unitCount, now);

    if (this.profile.silent_unit === unitId) {
      return { kind: 'dropped', reason: 'silent_unit' };
    }

    return { kind: 'accept', value };
  }

  /**
   * Raise the error rate for current stress; never lowers it
   */
  degrade(uptimeHours: number, tempC: number, optimalTempC: number): number {
    const computed = degradedErrorRate(this.profile.base_error_rate, uptimeHours, tempC, optimalTempC);
    if (computed > this.profile.nonce_error_rate) {
      this.profile = { ...this.profile, nonce_error_rate: computed };
    }
    return this.profile.nonce_error_rate;
  }

  snapshot(): Readonly<FaultProfile> {
    return { ...this.profile };
  }
}

export enum FaultRegisterBit {
  HASH_BOARD_ABSENT = 0x01,
  VOLTAGE_LOW = 0x02,
  TEMP_OVER_85C = 0x04,
  FAN_FAILURE = 0x08
}

export interface FaultRegisterInput {
  silentUnit: number | null;
  voltageMv: number;
  minVoltageMv: number;
  junctionTempC: number;
  failedFans: number;
}

export function faultRegister(input: FaultRegisterInput): number {
  let register = 0x00;
  if (input.silentUnit !== null) register |= FaultRegisterBit.HASH_BOARD_ABSENT;
  if (input.voltageMv < input.minVoltageMv) register |= FaultRegisterBit.VOLTAGE_LOW;
  if (input.junctionTempC > 85) register |= FaultRegisterBit.TEMP_OVER_85C;
  if (input.failedFans > 0) register |= FaultRegisterBit.FAN_FAILURE;
  return register;
}

export function formatFaultRegister(register: number): string {
  return `0x${register.toString(16).toUpperCase().padStart(2, '0')}`;
}
