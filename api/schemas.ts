import { z } from 'zod';
import { DomainSettings } from '../common/types';

// Firmware UIs post numbers as strings as often as not
const numeric = z.union([
  z.number(),
  z.string().trim().regex(/^\d+(\.\d+)?$/, 'Expected a number').transform(Number)
]);

export const minerConfSchema = z.object({
  freq: numeric.pipe(z.number().int().min(100).max(1200)),
  volt: numeric.pipe(z.number().int().min(500).max(1500)),
  fan: numeric.pipe(z.number().int().min(0).max(100)),
  'power-strict': numeric.pipe(z.number().positive().max(10000))
});

export type MinerConfPayload = z.infer<typeof minerConfSchema>;

export function toDomainSettings(payload: MinerConfPayload): DomainSettings {
  return {
    voltage_mv: payload.volt,
    frequency_mhz: payload.freq,
    power_limit_w: payload['power-strict'],
    fan_percent: payload.fan
  };
}
