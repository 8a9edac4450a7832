/**
 * Optics errors
 */

export type FactoryErrorCode = 'UNKNOWN_TYPE';

export class FactoryError extends Error {
  constructor(
    message: string,
    public readonly code: FactoryErrorCode,
    public readonly keyword: string
  ) {
    super(message);
    this.name = 'FactoryError';
  }
}

export type DriverErrorCode = 'INVALID_ROW' | 'INVALID_CONFIG' | 'NO_MODEL';

export class DriverError extends Error {
  constructor(
    message: string,
    public readonly code: DriverErrorCode,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'DriverError';
  }
}
