/**
 * Emulator configuration - JSON file + environment overrides, validated with zod
 */

import * as fs from 'fs';
import { z } from 'zod';
import { ConfigurationError } from './errors';

const domainSettingsSchema = z.object({
  voltage_mv: z.number().int().positive(),
  frequency_mhz: z.number().int().positive(),
  power_limit_w: z.number().positive(),
  fan_percent: z.number().int().min(0).max(100)
});

export const emulatorConfigSchema = z.object({
  device_model: z.string().min(1).default('Antminer_L7'),
  unit_count: z.number().int().positive().optional(),
  nominal_power_w: z.number().positive().optional(),
  initial_profile: z.enum(['LOW_POWER', 'BALANCED', 'HIGH_PERFORMANCE']).default('BALANCED'),
  profiles: z
    .object({
      LOW_POWER: domainSettingsSchema.default({ voltage_mv: 800, frequency_mhz: 400, power_limit_w: 2800, fan_percent: 100 }),
      BALANCED: domainSettingsSchema.default({ voltage_mv: 900, frequency_mhz: 500, power_limit_w: 3425, fan_percent: 100 }),
      HIGH_PERFORMANCE: domainSettingsSchema.default({ voltage_mv: 1000, frequency_mhz: 600, power_limit_w: 4200, fan_percent: 100 })
    })
    .default({}),
  thermal: z
    .object({
      r_thermal: z.number().positive().default(1.5),
      c_thermal: z.number().positive().default(250),
      initial_temp_c: z.number().default(65),
      ambient_floor_c: z.number().default(25),
      ceiling_c: z.number().default(95),
      max_step_s: z.number().positive().default(5),
      noise_c: z.number().min(0).default(0.3)
    })
    .default({}),
  faults: z
    .object({
      nonce_error_rate: z.number().min(0).max(1).default(5e-5),
      silence_enabled: z.boolean().default(true),
      silence_period_ms: z.number().int().positive().default(20 * 60 * 1000),
      degradation_enabled: z.boolean().default(true),
      fan_failure_probability: z.number().min(0).max(1).default(0)
    })
    .default({}),
  shares: z
    .object({
      mean_interval_ms: z.number().positive().default(5200),
      jitter_stddev_ms: z.number().min(0).default(800),
      floor_interval_ms: z.number().min(0).default(1000),
      reject_rate: z.number().min(0).max(1).default(0.005),
      share_difficulty: z.number().positive().default(65536)
    })
    .default({}),
  telemetry: z
    .object({
      unit_variance: z.number().min(0).max(0.05).default(0.02)
    })
    .default({}),
  api: z
    .object({
      enabled: z.boolean().default(true),
      host: z.string().default('127.0.0.1'),
      port: z.number().int().min(0).max(65535).default(8080),
      request_timeout_ms: z.number().int().positive().default(5000),
      shutdown_grace_ms: z.number().int().positive().default(2000)
    })
    .default({}),
  native: z
    .object({
      enabled: z.boolean().default(true),
      probe_timeout_ms: z.number().int().positive().default(3000),
      command_timeout_ms: z.number().int().positive().default(3000)
    })
    .default({})
});

export type EmulatorConfig = z.infer<typeof emulatorConfigSchema>;
export type EmulatorConfigInput = z.input<typeof emulatorConfigSchema>;

/**
 * Validate a partial configuration and fill in defaults
 */
export function resolveEmulatorConfig(input: unknown = {}): EmulatorConfig {
  const result = emulatorConfigSchema.safeParse(input);
  if (!result.success) {
    const paths = result.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    throw new ConfigurationError(`Invalid emulator configuration: ${paths.join('; ')}`);
  }
  return result.data;
}

/**
 * Load configuration from file, then apply environment overrides
 */
export function loadEmulatorConfig(
  configPath: string = process.env.EMULATOR_CONFIG || './config/emulator.json',
  env: NodeJS.ProcessEnv = process.env
): EmulatorConfig {
  let raw: unknown = {};

  if (!fs.existsSync(configPath)) {
    console.warn(`Emulator config not found: ${configPath}, using defaults`);
  } else {
    try {
      raw = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    } catch (error) {
      throw new ConfigurationError(`Failed to parse ${configPath}: ${String(error)}`);
    }
  }

  return applyEnvOverrides(resolveEmulatorConfig(raw), env);
}

function applyEnvOverrides(config: EmulatorConfig, env: NodeJS.ProcessEnv): EmulatorConfig {
  const api = { ...config.api };
  const faults = { ...config.faults };
  const native = { ...config.native };

  if (env.TELEMETRY_API_PORT) {
    api.port = parseInt(env.TELEMETRY_API_PORT);
  }
  if (env.TELEMETRY_API_HOST) {
    api.host = env.TELEMETRY_API_HOST;
  }
  if (env.TELEMETRY_API_ENABLED) {
    api.enabled = env.TELEMETRY_API_ENABLED !== 'false';
  }
  if (env.EMULATOR_NONCE_ERROR_RATE) {
    faults.nonce_error_rate = parseFloat(env.EMULATOR_NONCE_ERROR_RATE);
  }
  if (env.EMULATOR_SILENCE_PERIOD_MS) {
    faults.silence_period_ms = parseInt(env.EMULATOR_SILENCE_PERIOD_MS);
  }
  if (env.EMULATOR_NATIVE_CONTROL) {
    native.enabled = env.EMULATOR_NATIVE_CONTROL !== 'false';
  }

  // Re-validate so env values obey the same bounds as the file
  return resolveEmulatorConfig({
    ...config,
    device_model: env.EMULATOR_DEVICE_MODEL || config.device_model,
    initial_profile: env.EMULATOR_PROFILE || config.initial_profile,
    api,
    faults,
    native
  });
}
