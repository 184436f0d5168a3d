import { EmulatorConfig, EmulatorConfigInput, resolveEmulatorConfig } from '../common/config';
import { Clock } from '../common/types';

export interface ManualClock {
  now: Clock;
  advance(ms: number): void;
  set(ms: number): void;
}

export function manualClock(start: number = 0): ManualClock {
  let current = start;
  return {
    now: () => current,
    advance: ms => {
      current += ms;
    },
    set: ms => {
      current = ms;
    }
  };
}

/**
 * Defaults with native control off and an ephemeral API port
 */
export function testConfig(input: EmulatorConfigInput = {}): EmulatorConfig {
  return resolveEmulatorConfig({
    native: { enabled: false },
    ...input,
    api: { host: '127.0.0.1', port: 0, shutdown_grace_ms: 200, ...input.api }
  });
}
