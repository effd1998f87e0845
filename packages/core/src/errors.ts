import type { ZodError } from 'zod'

/**
 * Machine-readable error kinds raised by schemas, pipelines and iterators.
 */
export type DatasetErrorCode =
  | 'STRUCTURE_MISMATCH'
  | 'TYPE_MISMATCH'
  | 'SHAPE_MISMATCH'
  | 'INVALID_ARGUMENT'
  | 'OUT_OF_RANGE'
  | 'NOT_FOUND'
  | 'DATA_LOSS'

/**
 * Base class of every error raised by feedline.
 */
export class DatasetError extends Error {
  constructor(
    public readonly code: DatasetErrorCode,
    message: string
  ) {
    super(message)
    this.name = 'DatasetError'
  }
}

/**
 * Two nested structures differ in kind, tuple arity or record keys.
 */
export class StructureMismatchError extends DatasetError {
  constructor(message: string) {
    super('STRUCTURE_MISMATCH', message)
    this.name = 'StructureMismatchError'
  }
}

export class TypeMismatchError extends DatasetError {
  constructor(message: string) {
    super('TYPE_MISMATCH', message)
    this.name = 'TypeMismatchError'
  }
}

export class ShapeMismatchError extends DatasetError {
  constructor(message: string) {
    super('SHAPE_MISMATCH', message)
    this.name = 'ShapeMismatchError'
  }
}

export class InvalidArgumentError extends DatasetError {
  constructor(message: string) {
    super('INVALID_ARGUMENT', message)
    this.name = 'InvalidArgumentError'
  }
}

/**
 * The terminal "no more elements" signal. Not a fault.
 */
export class OutOfRangeError extends DatasetError {
  constructor(message = 'End of sequence') {
    super('OUT_OF_RANGE', message)
    this.name = 'OutOfRangeError'
  }
}

export class NotFoundError extends DatasetError {
  constructor(message: string) {
    super('NOT_FOUND', message)
    this.name = 'NotFoundError'
  }
}

/**
 * Stored data is truncated or fails its checksum.
 */
export class DataLossError extends DatasetError {
  constructor(message: string) {
    super('DATA_LOSS', message)
    this.name = 'DataLossError'
  }
}

export function isOutOfRange(error: unknown): error is OutOfRangeError {
  return error instanceof OutOfRangeError
}

/**
 * Convert a zod failure into an InvalidArgumentError carrying its issue messages.
 */
export function fromZodError(name: string, error: ZodError): InvalidArgumentError {
  const details = error.issues.map((issue) => issue.message).join('; ')
  return new InvalidArgumentError(`${name}: ${details}`)
}
