/**
 * Telemetry Snapshot Builder - assembles the get_miner_status.cgi document
 *
 * Pure apart from the injected Rng: the caller passes the previous cumulative
 * counters in and receives the advanced counters back with the snapshot.
 */

import { poisson, Rng, uniform } from '../../common/random';
import {
  CumulativeCounters,
  DevEntry,
  DomainConfig,
  FaultProfile,
  MinerStatusDocument,
  StatusSnapshot,
  SummaryEntry,
  ThermalState,
  UnitCounters,
  UnitTelemetry
} from '../../common/types';
import { DeviceModel } from '../device_models/registry';
import { faultRegister } from '../fault_injector';
import { fanSpeeds } from '../fan_bank';
import { readJunction, ThermalBounds } from '../thermal_model';

export interface ShareStatistics {
  meanIntervalMs: number;
  rejectRate: number;
  shareDifficulty: number;
}

export interface SnapshotInput {
  now: number;
  startedAt: number;
  thermal: Readonly<ThermalState>;
  thermalNoiseC: number;
  thermalBounds: ThermalBounds;
  fault: Readonly<FaultProfile>;
  domain: Readonly<DomainConfig>;
  model: DeviceModel;
  failedFans: readonly number[];
  shares: ShareStatistics;
  unitVariance: number;
  hashrateFactor: number;
  counters: Readonly<CumulativeCounters>;
}

export interface SnapshotResult {
  snapshot: StatusSnapshot;
  counters: CumulativeCounters;
}

const DIFF1_HASHES = 2 ** 32;
const MAX_BEST_SHARE_DRAWS = 16;

const round = (value: number, digits: number): number => {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
};

const clamp = (value: number, min: number, max: number): number =>
  Math.min(max, Math.max(min, value));

export function initialCounters(unitCount: number, startedAt: number): CumulativeCounters {
  return {
    units: Array.from({ length: unitCount }, () => ({ accepted: 0, rejected: 0, hw_errors: 0 })),
    total_mh: 0,
    best_share: 0,
    last_build_at: startedAt
  };
}

function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object' && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze(child);
    }
  }
  return value;
}

export function buildSnapshot(input: SnapshotInput, rng: Rng): SnapshotResult {
  const { model, domain, fault, shares, counters } = input;
  const dtSec = Math.max(0, (input.now - counters.last_build_at) / 1000);
  const junction = readJunction(input.thermal, input.thermalNoiseC, input.thermalBounds, rng);
  const variance = Math.abs(input.unitVariance);
  const clockRatio = domain.frequency_mhz / model.baseline_frequency_mhz;
  const shareEventsPerUnit = dtSec / ((shares.meanIntervalMs / 1000) * model.unit_count);

  let bestShare = counters.best_share;
  const unitCounters: UnitCounters[] = [];
  const units: UnitTelemetry[] = [];

  for (let id = 0; id < model.unit_count; id++) {
    const previous = counters.units[id] ?? { accepted: 0, rejected: 0, hw_errors: 0 };
    const silenced = fault.silent_unit === id;
    const rateMhs = silenced
      ? 0
      : round(
          Math.max(0, model.nominal_rate_mhs * clockRatio * input.hashrateFactor * (1 + uniform(rng, -variance, variance))),
          2
        );

    // A silenced board hashes nothing and finds no shares
    const events = silenced ? 0 : poisson(rng, shareEventsPerUnit);
    let rejected = 0;
    for (let i = 0; i < events; i++) {
      if (rng() < shares.rejectRate) rejected += 1;
    }
    const accepted = events - rejected;
    const hwErrors = poisson(rng, dtSec * ((rateMhs * 1e6) / DIFF1_HASHES) * fault.nonce_error_rate);

    for (let i = 0; i < Math.min(accepted, MAX_BEST_SHARE_DRAWS); i++) {
      bestShare = Math.max(bestShare, Math.round(shares.shareDifficulty / Math.max(rng(), 1e-6)));
    }

    const next: UnitCounters = {
      accepted: previous.accepted + accepted,
      rejected: previous.rejected + rejected,
      hw_errors: previous.hw_errors + hwErrors
    };
    unitCounters.push(next);

    units.push({
      id,
      rate_hs: rateMhs * 1e6,
      temp_c: round(clamp(junction + uniform(rng, -2, 2), input.thermalBounds.floor, input.thermalBounds.ceiling), 1),
      voltage_v: round(domain.voltage_mv / 1000 + uniform(rng, -0.02, 0.02), 3),
      frequency_mhz: Math.round(domain.frequency_mhz * (1 + uniform(rng, -variance, variance))),
      ...next
    });
  }

  const devs: DevEntry[] = units.map(unit => ({
    ASC: unit.id,
    Name: model.dev_name,
    Temperature: unit.temp_c,
    'MHS av': unit.rate_hs / 1e6,
    Accepted: unit.accepted,
    Rejected: unit.rejected,
    'Hardware Errors': unit.hw_errors
  }));

  const mhsAv = devs.length > 0 ? devs.reduce((sum, dev) => sum + dev['MHS av'], 0) / devs.length : 0;
  const totalMh = counters.total_mh + mhsAv * dtSec;
  const accepted = units.reduce((sum, unit) => sum + unit.accepted, 0);
  const rejected = units.reduce((sum, unit) => sum + unit.rejected, 0);
  const hwErrors = units.reduce((sum, unit) => sum + unit.hw_errors, 0);

  const fanRpm = fanSpeeds(
    {
      count: model.fan_count,
      maxRpm: model.fan_max_rpm,
      failed: input.failedFans,
      fanPercent: domain.fan_percent,
      tempC: junction,
      optimalTempC: model.optimal_temp_c
    },
    rng
  );

  const summary: SummaryEntry = {
    Elapsed: Math.max(0, Math.floor((input.now - input.startedAt) / 1000)),
    'MHS av': round(mhsAv, 2),
    'MHS 5s': round(mhsAv * uniform(rng, 0.95, 1.05), 2),
    Temperature: round(junction, 1),
    'Fan Speed': fanRpm,
    Accepted: accepted,
    Rejected: rejected,
    'Hardware Errors': hwErrors,
    'Total MH': round(totalMh, 2),
    'Pool Rejected%': accepted + rejected > 0 ? round((rejected / (accepted + rejected)) * 100, 2) : 0,
    'Best Share': bestShare
  };

  const document: MinerStatusDocument = {
    STATUS: [{ STATUS: 'S', When: Math.floor(input.now / 1000), Code: 11, Msg: 'Summary' }],
    SUMMARY: [summary],
    DEVS: devs,
    FANS: fanRpm.map((speed, id) => ({ ID: id, Speed: speed })),
    TEMPS: units.map(unit => ({ ID: unit.id, Temperature: unit.temp_c }))
  };

  const snapshot: StatusSnapshot = {
    taken_at: input.now,
    thermal: { ...input.thermal },
    fault: { ...fault },
    domain: { ...domain },
    units,
    fan_rpm: fanRpm,
    fault_register: faultRegister({
      silentUnit: fault.silent_unit,
      voltageMv: domain.voltage_mv,
      minVoltageMv: model.min_voltage_mv,
      junctionTempC: junction,
      failedFans: input.failedFans.length
    }),
    document
  };

  return {
    snapshot: deepFreeze(snapshot),
    counters: {
      units: unitCounters,
      total_mh: totalMh,
      best_share: bestShare,
      last_build_at: Math.max(counters.last_build_at, input.now)
    }
  };
}
