/**
 * Native control channels - forwards operating points to vendor GPU tools
 * (rocm-smi / nvidia-smi) when one is installed on the host.
 */

import { execFile } from 'child_process';
import { eventLogger } from '../../common/eventLogger';
import { CapabilityProbeError } from '../../common/errors';
import { DomainConfig, EventSource, NativeVendor } from '../../common/types';

export interface CommandResult {
  code: number;
  stdout: string;
  stderr: string;
}

export type CommandRunner = (file: string, args: string[], timeoutMs: number) => Promise<CommandResult>;

/**
 * Run a tool with a hard timeout. Non-zero exits resolve; spawn failures and
 * timeouts reject.
 */
export const execFileRunner: CommandRunner = (file, args, timeoutMs) =>
  new Promise((resolve, reject) => {
    execFile(file, args, { timeout: timeoutMs, windowsHide: true }, (error, stdout, stderr) => {
      const code: unknown = error ? error.code : 0;
      if (typeof code !== 'number') {
        reject(error);
        return;
      }
      resolve({ code, stdout: String(stdout), stderr: String(stderr) });
    });
  });

export interface ForwardResult {
  vendor: NativeVendor;
  failures: string[];
}

export interface NativeControlChannel {
  readonly vendor: NativeVendor;
  apply(config: DomainConfig): Promise<ForwardResult>;
  commandCount(config: DomainConfig): number;
}

// Scheduling headroom on top of the per-command timeouts
export const TOOL_SLACK_MS = 500;

abstract class ToolChannel implements NativeControlChannel {
  abstract readonly vendor: NativeVendor;
  protected abstract readonly tool: Extract<EventSource, 'rocm-smi' | 'nvidia-smi'>;

  constructor(
    protected readonly runner: CommandRunner,
    protected readonly timeoutMs: number
  ) {}

  protected abstract commands(config: DomainConfig): string[][];

  commandCount(config: DomainConfig): number {
    return this.commands(config).length;
  }

  async apply(config: DomainConfig): Promise<ForwardResult> {
    const failures: string[] = [];

    for (const args of this.commands(config)) {
      const startTime = Date.now();
      const command = `${this.tool} ${args.join(' ')}`;
      try {
        const result = await this.runner(this.tool, args, this.timeoutMs);
        const latency = Date.now() - startTime;
        if (result.code !== 0) {
          failures.push(`${command} exited with ${result.code}`);
          eventLogger.recordNativeCommand('domain.forward', this.tool, command, 'error', latency, {
            code: result.code,
            stderr: result.stderr.trim()
          });
        } else {
          eventLogger.recordNativeCommand('domain.forward', this.tool, command, 'ok', latency);
        }
      } catch (error) {
        const latency = Date.now() - startTime;
        failures.push(`${command}: ${String(error)}`);
        eventLogger.recordNativeCommand('domain.forward', this.tool, command, 'error', latency, {
          error: String(error)
        });
      }
    }

    return { vendor: this.vendor, failures };
  }
}

export class RocmSmiChannel extends ToolChannel {
  readonly vendor = 'AMD' as const;
  protected readonly tool = 'rocm-smi' as const;

  protected commands(config: DomainConfig): string[][] {
    return [
      ['-d', '0', '--setpoweroverdrive', String(Math.round(config.power_limit_w))],
      ['-d', '0', '--setfan', `${config.fan_percent}%`],
      ['-d', '0', '--setsclk', String(config.frequency_mhz)]
    ];
  }
}

export class NvidiaSmiChannel extends ToolChannel {
  readonly vendor = 'NVIDIA' as const;
  protected readonly tool = 'nvidia-smi' as const;

  // nvidia-smi has no fan control; fan percent stays simulated
  protected commands(config: DomainConfig): string[][] {
    const clock = String(config.frequency_mhz);
    return [
      ['-i', '0', '-pl', String(Math.round(config.power_limit_w))],
      ['-i', '0', '-lgc', `${clock},${clock}`]
    ];
  }
}

interface ProbeCandidate {
  tool: 'rocm-smi' | 'nvidia-smi';
  args: string[];
  create: (runner: CommandRunner, timeoutMs: number) => NativeControlChannel;
}

const PROBE_CANDIDATES: ProbeCandidate[] = [
  {
    tool: 'rocm-smi',
    args: ['--showproductname'],
    create: (runner, timeoutMs) => new RocmSmiChannel(runner, timeoutMs)
  },
  {
    tool: 'nvidia-smi',
    args: ['-q'],
    create: (runner, timeoutMs) => new NvidiaSmiChannel(runner, timeoutMs)
  }
];

/**
 * Upper bound for a whole probe: every candidate may use its full timeout
 */
export function probeBudgetMs(probeTimeoutMs: number): number {
  return probeTimeoutMs * PROBE_CANDIDATES.length + TOOL_SLACK_MS;
}

/**
 * Detect a usable vendor tool. Returns null (never throws) when none answers.
 */
export async function probeNativeChannel(
  runner: CommandRunner,
  probeTimeoutMs: number,
  commandTimeoutMs: number
): Promise<NativeControlChannel | null> {
  const errors: CapabilityProbeError[] = [];

  for (const candidate of PROBE_CANDIDATES) {
    const startTime = Date.now();
    const command = `${candidate.tool} ${candidate.args.join(' ')}`;
    try {
      const result = await runner(candidate.tool, candidate.args, probeTimeoutMs);
      const latency = Date.now() - startTime;
      if (result.code === 0) {
        eventLogger.recordNativeCommand('emulator.probe', candidate.tool, command, 'ok', latency);
        return candidate.create(runner, commandTimeoutMs);
      }
      errors.push(new CapabilityProbeError(candidate.tool, `exited with ${result.code}`));
      eventLogger.recordNativeCommand('emulator.probe', candidate.tool, command, 'error', latency, {
        code: result.code
      });
    } catch (error) {
      const latency = Date.now() - startTime;
      errors.push(new CapabilityProbeError(candidate.tool, String(error)));
      eventLogger.recordNativeCommand('emulator.probe', candidate.tool, command, 'error', latency, {
        error: String(error)
      });
    }
  }

  console.warn(
    `No native control tool available, using simulation mode (${errors.map(e => e.message).join('; ')})`
  );
  return null;
}
