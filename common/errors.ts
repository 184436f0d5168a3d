/**
 * Error taxonomy for the emulation engine.
 * Only InvariantError is meant to reach a caller; the rest degrade a feature.
 */

export type EmulatorErrorCode =
  | 'CONFIGURATION'
  | 'CAPABILITY_PROBE'
  | 'VALIDATION'
  | 'BIND'
  | 'INVARIANT';

export class EmulatorError extends Error {
  readonly code: EmulatorErrorCode;

  constructor(code: EmulatorErrorCode, message: string) {
    super(message);
    this.name = new.target.name;
    this.code = code;
  }
}

export class ConfigurationError extends EmulatorError {
  readonly profile?: string;

  constructor(message: string, profile?: string) {
    super('CONFIGURATION', message);
    this.profile = profile;
  }

  static unknownProfile(name: string): ConfigurationError {
    return new ConfigurationError(`Unknown profile: ${name}`, name);
  }
}

export class CapabilityProbeError extends EmulatorError {
  readonly tool: string;

  constructor(tool: string, message: string) {
    super('CAPABILITY_PROBE', `${tool}: ${message}`);
    this.tool = tool;
  }
}

export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends EmulatorError {
  readonly issues: ValidationIssue[];

  constructor(message: string, issues: ValidationIssue[] = []) {
    super('VALIDATION', message);
    this.issues = issues;
  }
}

export class BindError extends EmulatorError {
  readonly port: number;
  readonly reason: unknown;

  constructor(port: number, reason: unknown) {
    super('BIND', `Cannot bind telemetry API on port ${port}: ${String(reason)}`);
    this.port = port;
    this.reason = reason;
  }
}

export class InvariantError extends EmulatorError {
  constructor(message: string) {
    super('INVARIANT', message);
  }
}
