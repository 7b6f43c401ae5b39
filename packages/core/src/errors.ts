export type ResourceModelErrorCode = 'DUPLICATE_KEY' | 'IMMUTABLE' | 'NOT_FOUND' | 'INVALID_KEY';

/**
 * Base class for structural failures raised by the resource model.
 * Validation findings (format parameter mismatches) are plain data and never use this path.
 */
export class ResourceModelError extends Error {
  constructor(message: string, public readonly code: ResourceModelErrorCode) {
    super(message);
    this.name = 'ResourceModelError';
  }
}

export class DuplicateKeyError extends ResourceModelError {
  constructor(public readonly key: string) {
    super(`Key already exists: ${key}`, 'DUPLICATE_KEY');
    this.name = 'DuplicateKeyError';
  }
}

export class ImmutableResourceError extends ResourceModelError {
  constructor(public readonly cultures: string[]) {
    super(`Resources cannot be changed for culture(s): ${cultures.join(', ')}`, 'IMMUTABLE');
    this.name = 'ImmutableResourceError';
  }
}

export class CultureNotFoundError extends ResourceModelError {
  constructor(public readonly culture: string) {
    super(`Culture is not part of this resource: ${culture}`, 'NOT_FOUND');
    this.name = 'CultureNotFoundError';
  }
}

export class InvalidKeyError extends ResourceModelError {
  constructor(message = 'Resource key must not be empty') {
    super(message, 'INVALID_KEY');
    this.name = 'InvalidKeyError';
  }
}

export function isResourceModelError(error: unknown): error is ResourceModelError {
  return error instanceof ResourceModelError;
}
