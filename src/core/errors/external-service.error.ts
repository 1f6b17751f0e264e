import { BaseError } from './base-error.js';

export type ExternalServiceName = 'directory' | 'billing' | 'prescription' | 'notification';

export class ExternalServiceError extends BaseError {
  constructor(
    public readonly service: ExternalServiceName,
    message: string,
  ) {
    super('EXTERNAL_SERVICE', 503, message, { service });
  }
}
