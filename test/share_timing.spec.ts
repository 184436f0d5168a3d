/**
 * Share Timing Tests - cadence and the floor interval
 */

import fc from 'fast-check';
import { createRng } from '../common/random';
import { ShareTimingController } from '../modules/share_timing';

describe('ShareTimingController', () => {
  it('submits once the mean interval has elapsed when jitter is zero', () => {
    const controller = new ShareTimingController(
      { meanIntervalMs: 5000, jitterStddevMs: 0, floorIntervalMs: 1000 },
      0,
      createRng(1)
    );

    expect(controller.shouldSubmit(4999)).toBe(false);
    expect(controller.shouldSubmit(5000)).toBe(true);
    expect(controller.snapshot().last_submission).toBe(5000);
    expect(controller.shouldSubmit(9999)).toBe(false);
    expect(controller.shouldSubmit(10_000)).toBe(true);
  });

  it('never goes below the floor even when the draw is shorter', () => {
    const controller = new ShareTimingController(
      { meanIntervalMs: 100, jitterStddevMs: 0, floorIntervalMs: 1000 },
      0,
      createRng(1)
    );

    expect(controller.shouldSubmit(999)).toBe(false);
    expect(controller.shouldSubmit(1000)).toBe(true);
  });

  it('leaves state untouched on a false result', () => {
    const controller = new ShareTimingController(
      { meanIntervalMs: 5000, jitterStddevMs: 0, floorIntervalMs: 1000 },
      0,
      createRng(1)
    );
    controller.shouldSubmit(10);

    expect(controller.snapshot().last_submission).toBe(0);
  });

  it('keeps consecutive submissions at least floor apart', () => {
    fc.assert(
      fc.property(
        fc.integer(),
        fc.integer({ min: 0, max: 3000 }),
        fc.array(fc.integer({ min: 0, max: 2000 }), { minLength: 1, maxLength: 300 }),
        (seed, floor, gaps) => {
          const controller = new ShareTimingController(
            { meanIntervalMs: 1200, jitterStddevMs: 800, floorIntervalMs: floor },
            0,
            createRng(seed)
          );
          let now = 0;
          let last: number | null = null;
          for (const gap of gaps) {
            now += gap;
            if (controller.shouldSubmit(now)) {
              if (last !== null && now - last < floor) return false;
              last = now;
            }
          }
          return true;
        }
      )
    );
  });
});
