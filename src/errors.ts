/**
 * Error types
 *
 * Only configuration-level failures are thrown. Problems local to one
 * project are reported as ScanWarning values and never escalate.
 */

export class DevshelfError extends Error {
  constructor(
    public readonly code: string,
    message: string,
    public readonly details?: Record<string, unknown>,
  ) {
    super(message);
    this.name = this.constructor.name;
  }
}

export type ConfigErrorCode = 'CONFIG_INVALID' | 'NO_ROOTS' | 'OUTPUT_UNWRITABLE';

export class ConfigError extends DevshelfError {
  constructor(code: ConfigErrorCode, message: string, details?: Record<string, unknown>) {
    super(code, message, details);
  }
}

export class StateOwnershipError extends DevshelfError {
  constructor(ownMachineId: string, documentMachineId: string) {
    super(
      'STATE_NOT_OWNED',
      `Machine ${ownMachineId} cannot write the state document of ${documentMachineId}`,
      { ownMachineId, documentMachineId },
    );
  }
}

export type WarningKind =
  | 'invalid-declaration'
  | 'unreadable-directory'
  | 'duplicate-id'
  | 'missing-root'
  | 'missing-screenshot'
  | 'unparsable-remote'
  | 'invalid-state-document'
  | 'invalid-activity-log'
  | 'remote-unavailable';

export interface ScanWarning {
  kind: WarningKind;
  path: string;
  message: string;
}

export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Message of an unknown thrown value
 */
export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
