/**
 * Emulator State - the one place simulation state is mutated.
 *
 * The mining loop (feedPower / evaluateUnit / shouldSubmitShare) and the HTTP
 * layer (snapshot / configure) both go through this block. Every method runs
 * to completion synchronously, so each is a critical section on the event
 * loop; I/O never happens while state is being read or written.
 */

import { EmulatorConfig } from '../../common/config';
import { Rng } from '../../common/random';
import {
  Clock,
  CumulativeCounters,
  DomainConfig,
  DomainSettings,
  FaultProfile,
  StatusSnapshot
} from '../../common/types';
import { DeviceModel } from '../device_models/registry';
import { DomainController } from '../domain_controller';
import { CommandRunner } from '../domain_controller/native';
import { FanBank } from '../fan_bank';
import { FaultInjector, hashrateDegradation } from '../fault_injector';
import { ShareTimingController } from '../share_timing';
import { buildSnapshot, initialCounters, SnapshotInput } from '../telemetry/snapshot';
import { ThermalModel } from '../thermal_model';

const MS_PER_HOUR = 3_600_000;

/**
 * What the HTTP layer is allowed to see and do
 */
export interface TelemetrySource {
  snapshot(): StatusSnapshot;
  configure(settings: DomainSettings, actor: string): Readonly<DomainConfig>;
  describe(): { device_model: string; domain: DomainConfig['name'] };
}

export interface EmulatorStateDeps {
  clock: Clock;
  rng: Rng;
  runner?: CommandRunner;
}

export class EmulatorState implements TelemetrySource {
  readonly startedAt: number;
  readonly domain: DomainController;

  private readonly thermal: ThermalModel;
  private readonly faults: FaultInjector;
  private readonly shares: ShareTimingController;
  private readonly fans: FanBank;
  private counters: CumulativeCounters;
  private readonly clock: Clock;
  private readonly rng: Rng;

  constructor(
    private readonly config: EmulatorConfig,
    readonly model: DeviceModel,
    deps: EmulatorStateDeps
  ) {
    this.clock = deps.clock;
    this.rng = deps.rng;
    this.startedAt = this.clock();

    this.thermal = new ThermalModel(
      {
        rThermal: config.thermal.r_thermal,
        cThermal: config.thermal.c_thermal,
        initialTempC: config.thermal.initial_temp_c,
        ambientFloorC: config.thermal.ambient_floor_c,
        ceilingC: config.thermal.ceiling_c,
        maxStepSeconds: config.thermal.max_step_s,
        noiseC: config.thermal.noise_c
      },
      this.startedAt,
      this.rng
    );
    this.faults = new FaultInjector(
      {
        nonceErrorRate: config.faults.nonce_error_rate,
        silenceEnabled: config.faults.silence_enabled,
        silencePeriodMs: config.faults.silence_period_ms
      },
      this.startedAt
    );
    this.shares = new ShareTimingController(
      {
        meanIntervalMs: config.shares.mean_interval_ms,
        jitterStddevMs: config.shares.jitter_stddev_ms,
        floorIntervalMs: config.shares.floor_interval_ms
      },
      this.startedAt,
      this.rng
    );
    this.fans = new FanBank({
      count: model.fan_count,
      maxRpm: model.fan_max_rpm,
      failureProbability: config.faults.fan_failure_probability
    });
    this.domain = new DomainController(
      config.profiles,
      config.initial_profile,
      {
        nativeEnabled: config.native.enabled,
        probeTimeoutMs: config.native.probe_timeout_ms,
        commandTimeoutMs: config.native.command_timeout_ms
      },
      deps.runner
    );
    this.counters = initialCounters(model.unit_count, this.startedAt);
  }

  feedPower(watts: number): void {
    const now = this.clock();
    this.thermal.update(watts, now);

    if (this.config.faults.degradation_enabled) {
      this.faults.degrade(this.uptimeHours(now), this.thermal.snapshot().junction_temp, this.model.optimal_temp_c);
    }
  }

  evaluateUnit<T>(unitId: number, value: T): T | null {
    const decision = this.faults.evaluate(this.model.unit_count, unitId, value, this.rng, this.clock());
    if (decision.kind === 'accept') {
      return decision.value;
    }

    if (decision.reason === 'nonce_error') {
      const units = this.counters.units.map((unit, id) =>
        id === unitId ? { ...unit, hw_errors: unit.hw_errors + 1 } : unit
      );
      this.counters = { ...this.counters, units };
    }
    return null;
  }

  shouldSubmitShare(): boolean {
    return this.shares.shouldSubmit(this.clock());
  }

  applyProfile(name: string, actor: string = 'system'): Readonly<DomainConfig> {
    return this.domain.apply(name, actor);
  }

  configure(settings: DomainSettings, actor: string): Readonly<DomainConfig> {
    return this.domain.configure(settings, actor);
  }

  /**
   * Copy out a consistent view, build the document, then commit the advanced
   * counters. All three steps run in one synchronous turn.
   */
  snapshot(): StatusSnapshot {
    const now = this.clock();
    this.faults.rotate(this.model.unit_count, now);
    this.fans.tick(this.rng);

    const input: SnapshotInput = {
      now,
      startedAt: this.startedAt,
      thermal: this.thermal.snapshot(),
      thermalNoiseC: this.thermal.getNoise(),
      thermalBounds: this.thermal.getBounds(),
      fault: this.faults.snapshot(),
      domain: this.domain.current(),
      model: this.model,
      failedFans: this.fans.failedFans(),
      shares: {
        meanIntervalMs: this.config.shares.mean_interval_ms,
        rejectRate: this.config.shares.reject_rate,
        shareDifficulty: this.config.shares.share_difficulty
      },
      unitVariance: this.config.telemetry.unit_variance,
      hashrateFactor: this.config.faults.degradation_enabled ? hashrateDegradation(this.uptimeHours(now)) : 1,
      counters: this.counters
    };

    const result = buildSnapshot(input, this.rng);
    this.counters = result.counters;
    return result.snapshot;
  }

  describe(): { device_model: string; domain: DomainConfig['name'] } {
    return { device_model: this.model.name, domain: this.domain.current().name };
  }

  readTemperature(): number {
    return this.thermal.read();
  }

  faultProfile(): Readonly<FaultProfile> {
    this.faults.rotate(this.model.unit_count, this.clock());
    return this.faults.snapshot();
  }

  shareIntervalMs(): number {
    return this.shares.snapshot().mean_interval;
  }

  injectFanFailure(fanId: number): boolean {
    return this.fans.injectFailure(fanId);
  }

  restoreFan(fanId: number): boolean {
    return this.fans.restore(fanId);
  }

  failedFans(): number[] {
    return this.fans.failedFans();
  }

  junctionTemperature(): number {
    return this.thermal.snapshot().junction_temp;
  }

  private uptimeHours(now: number): number {
    return Math.max(0, now - this.startedAt) / MS_PER_HOUR;
  }
}
