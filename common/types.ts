/**
 * Common TypeScript types for the ASIC emulation engine
 */

// Event Logging Types
export interface Event {
  ts: string; // ISO 8601 timestamp with Z
  type: EventType;
  source: EventSource;
  key: string;
  status: EventStatus;
  latency_ms?: number;
  details?: Record<string, unknown>;
  actor?: string; // "system" or "api:<remote address>"
}

export type EventType =
  | 'emulator.lifecycle'
  | 'emulator.probe'
  | 'domain.apply'
  | 'domain.forward'
  | 'api.config'
  | 'api.bind'
  | 'fault.rotation';

export type EventSource =
  | 'orchestrator'
  | 'domain'
  | 'fault'
  | 'api'
  | 'rocm-smi'
  | 'nvidia-smi'
  | 'system';

export type EventStatus = 'ok' | 'timeout' | 'error' | 'skipped';

// Thermal model
export interface ThermalState {
  junction_temp: number; // °C
  last_update: number; // epoch ms
  r_thermal: number; // K/W
  c_thermal: number; // J/K
}

// Fault model
export interface FaultProfile {
  base_error_rate: number; // configured rate before degradation
  nonce_error_rate: number; // probability in [0, 1]
  silent_unit: number | null;
  silence_started_at: number; // epoch ms
  silence_period: number; // ms
}

export type Decision<T> =
  | { kind: 'accept'; value: T }
  | { kind: 'dropped'; reason: DropReason };

export type DropReason = 'nonce_error' | 'silent_unit';

// Operating domains
export type DomainName = 'LOW_POWER' | 'BALANCED' | 'HIGH_PERFORMANCE';

export interface DomainSettings {
  voltage_mv: number;
  frequency_mhz: number;
  power_limit_w: number;
  fan_percent: number;
}

export interface DomainConfig extends DomainSettings {
  name: DomainName | 'CUSTOM';
}

export type NativeVendor = 'AMD' | 'NVIDIA';

// Share pacing
export interface ShareTimingState {
  last_submission: number; // epoch ms
  mean_interval: number; // ms
  jitter_stddev: number; // ms
  floor_interval: number; // ms
}

// Per hash board
export interface UnitTelemetry {
  id: number;
  rate_hs: number;
  temp_c: number;
  voltage_v: number;
  frequency_mhz: number;
  accepted: number;
  rejected: number;
  hw_errors: number;
}

export interface UnitCounters {
  accepted: number;
  rejected: number;
  hw_errors: number;
}

export interface CumulativeCounters {
  units: UnitCounters[];
  total_mh: number;
  best_share: number;
  last_build_at: number; // epoch ms
}

// Wire format of get_miner_status.cgi
export interface StatusEntry {
  STATUS: 'S' | 'W' | 'E';
  When: number;
  Code: number;
  Msg: string;
}

export interface SummaryEntry {
  Elapsed: number;
  'MHS av': number;
  'MHS 5s': number;
  Temperature: number;
  'Fan Speed': number[];
  Accepted: number;
  Rejected: number;
  'Hardware Errors': number;
  'Total MH': number;
  'Pool Rejected%': number;
  'Best Share': number;
}

export interface DevEntry {
  ASC: number;
  Name: string;
  Temperature: number;
  'MHS av': number;
  Accepted: number;
  Rejected: number;
  'Hardware Errors': number;
}

export interface FanEntry {
  ID: number;
  Speed: number;
}

export interface TempEntry {
  ID: number;
  Temperature: number;
}

export interface MinerStatusDocument {
  STATUS: StatusEntry[];
  SUMMARY: [SummaryEntry];
  DEVS: DevEntry[];
  FANS: FanEntry[];
  TEMPS: TempEntry[];
}

export interface StatusSnapshot {
  taken_at: number; // epoch ms
  thermal: Readonly<ThermalState>;
  fault: Readonly<FaultProfile>;
  domain: Readonly<DomainConfig>;
  units: readonly Readonly<UnitTelemetry>[];
  fan_rpm: readonly number[];
  fault_register: number;
  document: MinerStatusDocument;
}

// Orchestrator
export type OrchestratorPhase =
  | 'uninitialized'
  | 'initializing'
  | 'active'
  | 'shutting_down'
  | 'stopped';

export interface EmulatorStatus {
  phase: OrchestratorPhase;
  session_id: string;
  device_model: string;
  thermal_temp_c: number;
  current_domain: DomainConfig['name'];
  native_vendor: NativeVendor | null;
  api_address: string | null;
  nonce_error_rate: number;
  silent_unit: number | null;
  share_interval_ms: number;
  fault_register: string; // e.g. "0x05"
}

export type Clock = () => number; // epoch ms
