/**
 * Thermal Model - single-node RC network driven by measured power draw
 *
 * dT/dt = (P*R - T) / (R*C), integrated with explicit steps no longer than
 * maxStepSeconds. The P*R target is bounded to [ambientFloor, ceiling] so a
 * large power figure saturates at the ceiling instead of running away.
 */

import { Rng, uniform } from '../../common/random';
import { ThermalState } from '../../common/types';

export interface ThermalModelOptions {
  rThermal: number;
  cThermal: number;
  initialTempC: number;
  ambientFloorC: number;
  ceilingC: number;
  maxStepSeconds: number;
  noiseC: number;
}

export interface ThermalBounds {
  floor: number;
  ceiling: number;
}

const MAX_SUB_STEPS = 10_000;

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

/**
 * Junction temperature as a sensor would report it: state plus symmetric noise
 */
export function readJunction(
  state: Pick<ThermalState, 'junction_temp'>,
  noiseC: number,
  bounds: ThermalBounds,
  rng: Rng
): number {
  return clamp(state.junction_temp + uniform(rng, -noiseC, noiseC), bounds.floor, bounds.ceiling);
}

export class ThermalModel {
  private state: ThermalState;
  private readonly bounds: ThermalBounds;
  private readonly maxStepSeconds: number;
  private readonly noiseC: number;
  private readonly rng: Rng;

  constructor(options: ThermalModelOptions, startedAt: number, rng: Rng) {
    this.bounds = {
      floor: Math.min(options.ambientFloorC, options.ceilingC),
      ceiling: Math.max(options.ambientFloorC, options.ceilingC)
    };
    this.maxStepSeconds = options.maxStepSeconds > 0 ? options.maxStepSeconds : 1;
    this.noiseC = Math.abs(options.noiseC);
    this.rng = rng;
    this.state = {
      junction_temp: clamp(options.initialTempC, this.bounds.floor, this.bounds.ceiling),
      last_update: startedAt,
      r_thermal: options.rThermal,
      c_thermal: options.cThermal
    };
  }

  /**
   * Advance the simulation to `now` (epoch ms) under `powerWatts` of input.
   * Never throws: bad power values are clamped, backward clocks ignored.
   */
  update(powerWatts: number, now: number): void {
    const dt = (now - this.state.last_update) / 1000;
    if (!(dt > 0) || !Number.isFinite(dt)) {
      return;
    }

    const power = Number.isFinite(powerWatts) ? Math.max(0, powerWatts) : 0;
    const { r_thermal, c_thermal } = this.state;
    const target = clamp(power * r_thermal, this.bounds.floor, this.bounds.ceiling);
    const tau = r_thermal * c_thermal;

    const steps = Math.ceil(dt / this.maxStepSeconds);
    const h = dt / steps;
    let temp = this.state.junction_temp;

    if (h >= tau) {
      temp = target;
    } else if (steps > MAX_SUB_STEPS) {
      temp = target + (temp - target) * Math.exp(-dt / tau);
    } else {
      for (let i = 0; i < steps; i++) {
        temp += (target - temp) * (h / tau);
      }
    }

    this.state = {
      ...this.state,
      junction_temp: clamp(temp, this.bounds.floor, this.bounds.ceiling),
      last_update: now
    };
  }

  /**
   * Current junction temperature with ±noiseC of sensor noise
   */
  read(): number {
    return readJunction(this.state, this.noiseC, this.bounds, this.rng);
  }

  snapshot(): Readonly<ThermalState> {
    return { ...this.state };
  }

  getBounds(): ThermalBounds {
    return { ...this.bounds };
  }

  getNoise(): number {
    return this.noiseC;
  }
}
