/**
 * Domain Controller - maps named operating profiles to voltage/frequency/power/fan
 * and forwards them to a native control channel on a best-effort basis
 */

import { eventLogger } from '../../common/eventLogger';
import { ConfigurationError } from '../../common/errors';
import { withTimeout } from '../../common/timeout';
import { DomainConfig, DomainName, DomainSettings, NativeVendor } from '../../common/types';
import {
  CommandRunner,
  execFileRunner,
  NativeControlChannel,
  probeBudgetMs,
  probeNativeChannel,
  TOOL_SLACK_MS
} from './native';

export interface DomainControllerOptions {
  nativeEnabled: boolean;
  probeTimeoutMs: number;
  commandTimeoutMs: number;
}

export type ProfileTable = Record<DomainName, DomainSettings>;

const DOMAIN_NAMES: readonly DomainName[] = ['LOW_POWER', 'BALANCED', 'HIGH_PERFORMANCE'];

export function isDomainName(name: string): name is DomainName {
  return DOMAIN_NAMES.some(domain => domain === name);
}

export class DomainController {
  private readonly profiles: ReadonlyMap<DomainName, Readonly<DomainConfig>>;
  private active: Readonly<DomainConfig>;
  private channel: NativeControlChannel | null = null;
  private probing: Promise<NativeVendor | null> | null = null;
  private readonly inflight = new Set<Promise<void>>();

  constructor(
    table: ProfileTable,
    initial: DomainName,
    private readonly options: DomainControllerOptions,
    private readonly runner: CommandRunner = execFileRunner
  ) {
    this.profiles = new Map(
      DOMAIN_NAMES.map((name): [DomainName, Readonly<DomainConfig>] => [
        name,
        Object.freeze({ name, ...table[name] })
      ])
    );
    this.active = this.lookup(initial);
  }

  /**
   * Detect a native tool once per session; later calls return the cached answer
   */
  probe(): Promise<NativeVendor | null> {
    if (!this.probing) {
      this.probing = this.runProbe();
    }
    return this.probing;
  }

  /**
   * Switch to a named profile. Unknown names leave the active profile untouched.
   */
  apply(profileName: string, actor: string = 'system'): Readonly<DomainConfig> {
    if (!isDomainName(profileName)) {
      eventLogger.recordDomainChange(profileName, actor, 'error', { reason: 'unknown_profile' });
      throw ConfigurationError.unknownProfile(profileName);
    }
    return this.activate(this.lookup(profileName), actor);
  }

  /**
   * Switch to an explicit operating point (the set_miner_conf.cgi path)
   */
  configure(settings: DomainSettings, actor: string = 'system'): Readonly<DomainConfig> {
    const config: DomainConfig = { name: 'CUSTOM', ...settings };
    return this.activate(Object.freeze(config), actor);
  }

  current(): Readonly<DomainConfig> {
    return this.active;
  }

  vendor(): NativeVendor | null {
    return this.channel ? this.channel.vendor : null;
  }

  /**
   * Wait for in-flight forwarding, giving up after graceMs
   */
  async drain(graceMs: number): Promise<void> {
    if (this.inflight.size === 0) return;
    try {
      await withTimeout(Promise.all(this.inflight), graceMs, 'Native forwarding drain');
    } catch (error) {
      console.warn(`Abandoning ${this.inflight.size} native forwarding call(s): ${String(error)}`);
    }
  }

  private activate(config: Readonly<DomainConfig>, actor: string): Readonly<DomainConfig> {
    this.active = config;

    console.log(
      `Setting ASIC domain: ${config.name} (${config.voltage_mv}mV, ${config.frequency_mhz}MHz, ` +
        `${config.power_limit_w}W, fan ${config.fan_percent}%)`
    );
    eventLogger.recordDomainChange(config.name, actor, 'ok', {
      voltage_mv: config.voltage_mv,
      frequency_mhz: config.frequency_mhz,
      power_limit_w: config.power_limit_w,
      fan_percent: config.fan_percent,
      native: this.vendor()
    });

    if (this.channel) {
      const task: Promise<void> = this.forward(this.channel, config).finally(() => {
        this.inflight.delete(task);
      });
      this.inflight.add(task);
    }

    return config;
  }

  private async forward(channel: NativeControlChannel, config: DomainConfig): Promise<void> {
    try {
      const result = await withTimeout(
        channel.apply(config),
        this.options.commandTimeoutMs * channel.commandCount(config) + TOOL_SLACK_MS,
        `${channel.vendor} forwarding`
      );
      if (result.failures.length > 0) {
        console.warn(`${channel.vendor} configuration partially failed: ${result.failures.join('; ')}`);
      }
    } catch (error) {
      console.warn(`${channel.vendor} configuration failed: ${String(error)}`);
    }
  }

  private async runProbe(): Promise<NativeVendor | null> {
    if (!this.options.nativeEnabled) {
      eventLogger.appendEvent({
        type: 'emulator.probe',
        source: 'domain',
        key: 'native',
        status: 'skipped'
      });
      return null;
    }

    try {
      this.channel = await withTimeout(
        probeNativeChannel(this.runner, this.options.probeTimeoutMs, this.options.commandTimeoutMs),
        probeBudgetMs(this.options.probeTimeoutMs),
        'Capability probe'
      );
    } catch (error) {
      console.warn(`Capability probe failed, using simulation mode: ${String(error)}`);
      this.channel = null;
    }

    return this.vendor();
  }

  private lookup(name: DomainName): Readonly<DomainConfig> {
    const config = this.profiles.get(name);
    if (!config) {
      throw ConfigurationError.unknownProfile(name);
    }
    return config;
  }
}
