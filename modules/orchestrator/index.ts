/**
 * Emulation Orchestrator - owns one emulation session
 *
 * uninitialized → initializing → active → shutting_down → stopped
 *
 * The caller constructs it with a resolved config, awaits initialize(), drives
 * the mining-loop surface while active, and awaits shutdown() once.
 */

import { v4 as uuidv4 } from 'uuid';
import { TelemetryAPIServer } from '../../api/telemetryServer';
import { EmulatorConfig } from '../../common/config';
import { BindError, InvariantError } from '../../common/errors';
import { eventLogger } from '../../common/eventLogger';
import { createRng, Rng } from '../../common/random';
import {
  Clock,
  DomainConfig,
  DomainSettings,
  EmulatorStatus,
  OrchestratorPhase,
  StatusSnapshot
} from '../../common/types';
import { DeviceModelRegistry, deviceModels } from '../device_models/registry';
import { CommandRunner } from '../domain_controller/native';
import { EmulatorState } from '../emulator_state';
import { formatFaultRegister, faultRegister } from '../fault_injector';

export interface OrchestratorDeps {
  clock?: Clock;
  rng?: Rng;
  seed?: number;
  runner?: CommandRunner;
  models?: DeviceModelRegistry;
}

export class EmulationOrchestrator {
  readonly sessionId: string;
  readonly state: EmulatorState;

  private phase: OrchestratorPhase = 'uninitialized';
  private server: TelemetryAPIServer | null = null;
  private initializing: Promise<void> | null = null;
  private stopping: Promise<void> | null = null;

  constructor(
    private readonly config: EmulatorConfig,
    deps: OrchestratorDeps = {}
  ) {
    this.sessionId = uuidv4();

    const model = (deps.models ?? deviceModels).resolve(config.device_model, {
      unit_count: config.unit_count,
      nominal_power_w: config.nominal_power_w
    });

    this.state = new EmulatorState(config, model, {
      clock: deps.clock ?? Date.now,
      rng: deps.rng ?? createRng(deps.seed),
      runner: deps.runner
    });
  }

  getPhase(): OrchestratorPhase {
    return this.phase;
  }

  /**
   * Probe native control, apply the initial profile, prime the thermal model
   * and bring up the telemetry API. Only a bind failure is tolerated here,
   * and it leaves the session active without an API.
   */
  initialize(): Promise<void> {
    if (!this.initializing) {
      if (this.phase !== 'uninitialized') {
        return Promise.reject(new InvariantError(`Cannot initialize from phase ${this.phase}`));
      }
      this.initializing = this.runInitialize();
    }
    return this.initializing;
  }

  // Mining-loop surface

  feedPower(watts: number): void {
    this.assertActive('feedPower');
    if (!Number.isFinite(watts) || watts < 0) {
      throw new InvariantError(`Power must be a finite non-negative number of watts, got ${watts}`);
    }
    this.state.feedPower(watts);
  }

  shouldSubmitShare(): boolean {
    this.assertActive('shouldSubmitShare');
    return this.state.shouldSubmitShare();
  }

  /**
   * The value computed for a unit, or null when the fault model drops it
   */
  evaluateUnit<T>(unitId: number, value: T): T | null {
    this.assertActive('evaluateUnit');
    const unitCount = this.state.model.unit_count;
    if (!Number.isInteger(unitId) || unitId < 0 || unitId >= unitCount) {
      throw new InvariantError(`Unit id must be an integer in [0, ${unitCount}), got ${unitId}`);
    }
    return this.state.evaluateUnit(unitId, value);
  }

  snapshot(): StatusSnapshot {
    this.assertActive('snapshot');
    return this.state.snapshot();
  }

  applyProfile(name: string, actor: string = 'system'): Readonly<DomainConfig> {
    this.assertActive('applyProfile');
    return this.state.applyProfile(name, actor);
  }

  configure(settings: DomainSettings, actor: string = 'system'): Readonly<DomainConfig> {
    this.assertActive('configure');
    return this.state.configure(settings, actor);
  }

  injectFanFailure(fanId: number): boolean {
    this.assertActive('injectFanFailure');
    return this.state.injectFanFailure(fanId);
  }

  restoreFan(fanId: number): boolean {
    this.assertActive('restoreFan');
    return this.state.restoreFan(fanId);
  }

  status(): EmulatorStatus {
    const fault = this.state.faultProfile();
    const domain = this.state.domain.current();
    const address = this.server?.address() ?? null;

    return {
      phase: this.phase,
      session_id: this.sessionId,
      device_model: this.state.model.name,
      thermal_temp_c: Math.round(this.state.readTemperature() * 10) / 10,
      current_domain: domain.name,
      native_vendor: this.state.domain.vendor(),
      api_address: address ? `${address.address}:${address.port}` : null,
      nonce_error_rate: fault.nonce_error_rate,
      silent_unit: fault.silent_unit,
      share_interval_ms: this.state.shareIntervalMs(),
      fault_register: formatFaultRegister(
        faultRegister({
          silentUnit: fault.silent_unit,
          voltageMv: domain.voltage_mv,
          minVoltageMv: this.state.model.min_voltage_mv,
          junctionTempC: this.state.junctionTemperature(),
          failedFans: this.state.failedFans().length
        })
      )
    };
  }

  apiAddress(): string | null {
    const address = this.server?.address();
    return address ? `http://${address.address}:${address.port}` : null;
  }

  /**
   * Idempotent. Stops the API within its grace period and settles in stopped.
   */
  shutdown(): Promise<void> {
    if (this.phase === 'stopped') {
      return Promise.resolve();
    }
    if (!this.stopping) {
      this.stopping = this.runShutdown();
    }
    return this.stopping;
  }

  private async runInitialize(): Promise<void> {
    this.transition('initializing');

    const vendor = await this.state.domain.probe();
    eventLogger.appendEvent({
      type: 'emulator.probe',
      source: 'orchestrator',
      key: this.sessionId,
      status: vendor ? 'ok' : 'skipped',
      details: { vendor }
    });

    this.state.applyProfile(this.config.initial_profile);
    this.state.feedPower(this.state.model.nominal_power_w);

    if (this.config.api.enabled) {
      await this.startApi();
    }

    // shutdown() may have been called while we were awaiting
    if (this.phase === 'initializing') {
      this.transition('active');
    }
  }

  private async startApi(): Promise<void> {
    const server = new TelemetryAPIServer(this.state, {
      host: this.config.api.host,
      port: this.config.api.port,
      requestTimeoutMs: this.config.api.request_timeout_ms,
      shutdownGraceMs: this.config.api.shutdown_grace_ms
    });

    try {
      const address = await server.start();
      this.server = server;
      eventLogger.appendEvent({
        type: 'api.bind',
        source: 'api',
        key: `${address.address}:${address.port}`,
        status: 'ok'
      });
    } catch (error) {
      if (!(error instanceof BindError)) {
        throw error;
      }
      console.warn(`⚠️  ${error.message}; continuing in simulation-only mode`);
      eventLogger.appendEvent({
        type: 'api.bind',
        source: 'api',
        key: `${this.config.api.host}:${this.config.api.port}`,
        status: 'error',
        details: { error: String(error.reason) }
      });
    }
  }

  private async runShutdown(): Promise<void> {
    this.transition('shutting_down');

    try {
      if (this.initializing) {
        // Let startup settle so a listener it opens is not leaked
        await this.initializing.catch(error => {
          console.warn(`Initialization failed during shutdown: ${String(error)}`);
        });
      }

      const grace = this.config.api.shutdown_grace_ms;
      if (this.server) {
        await this.server.stop(grace);
        this.server = null;
      }
      await this.state.domain.drain(grace);
    } finally {
      this.transition('stopped');
    }
  }

  private transition(next: OrchestratorPhase): void {
    const previous = this.phase;
    this.phase = next;
    eventLogger.recordLifecycle(this.sessionId, next, 'ok', {
      previous,
      device_model: this.state.model.name
    });
  }

  private assertActive(operation: string): void {
    if (this.phase !== 'active') {
      throw new InvariantError(`${operation} requires an active session (phase: ${this.phase})`);
    }
  }
}
