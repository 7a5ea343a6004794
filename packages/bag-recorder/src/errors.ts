/**
 * Custom error types for the bag recorder.
 */

/** Base error for all bag recorder errors */
export class BagRecorderError extends Error {
  constructor(message: string, public readonly code: string) {
    super(message);
    this.name = 'BagRecorderError';
  }
}

/** Configuration is missing, malformed or out of range. Fatal at startup. */
export class InvalidConfigError extends BagRecorderError {
  constructor(message: string, public readonly issues: string[] = []) {
    super(message, 'INVALID_CONFIG');
    this.name = 'InvalidConfigError';
  }
}

/** The writer could not open or flush its output location */
export class StorageUnavailableError extends BagRecorderError {
  constructor(message: string, public readonly uri?: string) {
    super(message, 'STORAGE_UNAVAILABLE');
    this.name = 'StorageUnavailableError';
  }
}

/** A session was begun while one was active, or ended while none was */
export class DoubleTransitionError extends BagRecorderError {
  constructor(
    public readonly attempted: 'begin' | 'end',
    public readonly state: string
  ) {
    super(`Cannot ${attempted} a capture session while ${state}`, 'DOUBLE_TRANSITION');
    this.name = 'DoubleTransitionError';
  }
}

/** Executor registry misuse (duplicate or unknown unit) */
export class UnitRegistrationError extends BagRecorderError {
  constructor(message: string, public readonly unitName: string) {
    super(message, 'UNIT_REGISTRATION');
    this.name = 'UnitRegistrationError';
  }
}

/** Bridge connection errors */
export class BridgeConnectionError extends BagRecorderError {
  constructor(message: string, public readonly bridgeUrl?: string) {
    super(message, 'BRIDGE_CONNECTION_ERROR');
    this.name = 'BridgeConnectionError';
  }
}

/** Bridge timeout errors */
export class BridgeTimeoutError extends BagRecorderError {
  constructor(message: string, public readonly timeoutMs?: number) {
    super(message, 'BRIDGE_TIMEOUT');
    this.name = 'BridgeTimeoutError';
  }
}

/** Normalize anything thrown into a message string */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
