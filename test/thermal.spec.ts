/**
 * Thermal Model Tests - RC charging curve, clamping and bounds
 */

import fc from 'fast-check';
import { createRng } from '../common/random';
import { ThermalModel, ThermalModelOptions } from '../modules/thermal_model';

const options: ThermalModelOptions = {
  rThermal: 1.5,
  cThermal: 250,
  initialTempC: 65,
  ambientFloorC: 25,
  ceilingC: 95,
  maxStepSeconds: 5,
  noiseC: 0.3
};

describe('ThermalModel', () => {
  it('rises strictly toward the ceiling over an hour at 3425W', () => {
    const model = new ThermalModel(options, 0, createRng(1));
    const temps: number[] = [];

    for (let i = 1; i <= 3600; i++) {
      model.update(3425, i * 1000);
      temps.push(model.snapshot().junction_temp);
    }

    let previous = 65;
    for (const temp of temps) {
      expect(temp).toBeGreaterThan(previous);
      expect(temp).toBeLessThanOrEqual(95);
      previous = temp;
    }

    const target = 3425 * 1.5;
    expect(Math.abs(target - temps[3599])).toBeLessThan(Math.abs(target - temps[1799]));
  });

  it('shrinks the error geometrically by 1 - dt/tau per step', () => {
    // 200W * 1.5 = 300 → clamped to 95; tau = 375s
    const model = new ThermalModel(options, 0, createRng(1));
    let error = 95 - 65;

    for (let i = 1; i <= 100; i++) {
      model.update(200, i * 1000);
      const next = 95 - model.snapshot().junction_temp;
      expect(next / error).toBeCloseTo(1 - 1 / 375, 10);
      error = next;
    }
  });

  it('cools toward P*R when the target is inside the bounds', () => {
    // 40W * 1.5 = 60°C
    const model = new ThermalModel(options, 0, createRng(1));
    model.update(40, 1000);

    expect(model.snapshot().junction_temp).toBeCloseTo(65 + (60 - 65) / 375, 10);
  });

  it('ignores dt <= 0', () => {
    const model = new ThermalModel(options, 10_000, createRng(1));

    model.update(5000, 10_000);
    model.update(5000, 5_000);

    expect(model.snapshot()).toEqual({ junction_temp: 65, last_update: 10_000, r_thermal: 1.5, c_thermal: 250 });
  });

  it('treats NaN and negative power as zero', () => {
    const model = new ThermalModel(options, 0, createRng(1));
    model.update(Number.NaN, 1000);
    const afterNaN = model.snapshot().junction_temp;
    model.update(-100, 2000);

    // target clamps to the 25°C floor
    expect(afterNaN).toBeCloseTo(65 + (25 - 65) / 375, 10);
    expect(model.snapshot().junction_temp).toBeLessThan(afterNaN);
  });

  it('splits a long gap into sub-steps instead of jumping', () => {
    const model = new ThermalModel(options, 0, createRng(1));
    model.update(3425, 10_000);

    // two 5s steps
    let expected = 65;
    for (let i = 0; i < 2; i++) expected += (95 - expected) * (5 / 375);
    expect(model.snapshot().junction_temp).toBeCloseTo(expected, 10);
  });

  it('uses the exact solution for gaps beyond the sub-step budget', () => {
    const model = new ThermalModel(options, 0, createRng(1));
    const gapSeconds = 100_000;
    model.update(3425, gapSeconds * 1000);

    expect(model.snapshot().junction_temp).toBeCloseTo(95 + (65 - 95) * Math.exp(-gapSeconds / 375), 10);
  });

  it('read() stays within noise of the state', () => {
    const model = new ThermalModel(options, 0, createRng(7));
    for (let i = 0; i < 500; i++) {
      const reading = model.read();
      expect(reading).toBeGreaterThanOrEqual(65 - 0.3);
      expect(reading).toBeLessThanOrEqual(65 + 0.3);
    }
  });

  it('read() stays within [floor, ceiling] for any power and gap sequence', () => {
    fc.assert(
      fc.property(
        fc.array(fc.tuple(fc.double({ min: 0, max: 1e6, noNaN: true }), fc.integer({ min: 0, max: 10_000_000 })), {
          maxLength: 50
        }),
        fc.integer(),
        (steps, seed) => {
          const model = new ThermalModel(options, 0, createRng(seed));
          let now = 0;
          for (const [power, gap] of steps) {
            now += gap;
            model.update(power, now);
            const reading = model.read();
            if (reading < 25 || reading > 95 || !Number.isFinite(reading)) return false;
          }
          return true;
        }
      )
    );
  });
});
