/**
 * Device Model Registry - Resolves the appliance model being emulated
 */

import { ConfigurationError } from '../../common/errors';

export interface DeviceModel {
  name: string;
  dev_name: string; // "Name" column of DEVS
  unit_count: number; // hash boards
  nominal_rate_mhs: number; // per-board average at baseline clock
  nominal_power_w: number;
  optimal_temp_c: number;
  baseline_frequency_mhz: number;
  min_voltage_mv: number;
  fan_count: number;
  fan_max_rpm: number;
}

const DEFAULT_MODELS: DeviceModel[] = [
  {
    name: 'Antminer_L7',
    dev_name: 'BTM',
    unit_count: 3,
    nominal_rate_mhs: 9500,
    nominal_power_w: 3425,
    optimal_temp_c: 80,
    baseline_frequency_mhz: 500,
    min_voltage_mv: 750,
    fan_count: 4,
    fan_max_rpm: 6000
  },
  {
    name: 'Antminer_S21_XP',
    dev_name: 'BTM',
    unit_count: 4,
    nominal_rate_mhs: 270_000_000, // 270 TH/s
    nominal_power_w: 5150,
    optimal_temp_c: 75,
    baseline_frequency_mhz: 500,
    min_voltage_mv: 750,
    fan_count: 4,
    fan_max_rpm: 6000
  }
];

export class DeviceModelRegistry {
  private models: Map<string, DeviceModel>;

  constructor(models: DeviceModel[] = DEFAULT_MODELS) {
    this.models = new Map(models.map(model => [model.name, model]));
  }

  /**
   * Get a model by name, applying per-deployment overrides
   */
  resolve(name: string, overrides: Partial<Pick<DeviceModel, 'unit_count' | 'nominal_power_w'>> = {}): DeviceModel {
    const model = this.models.get(name);
    if (!model) {
      throw new ConfigurationError(
        `Unknown device model: ${name} (known: ${this.names().join(', ')})`
      );
    }

    return {
      ...model,
      unit_count: overrides.unit_count ?? model.unit_count,
      nominal_power_w: overrides.nominal_power_w ?? model.nominal_power_w
    };
  }

  names(): string[] {
    return Array.from(this.models.keys());
  }
}

export const deviceModels = new DeviceModelRegistry();
