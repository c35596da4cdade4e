export type CatalogErrorKind = 'not-found' | 'format' | 'conflict' | 'validation' | 'io';

export abstract class CatalogError extends Error {
  abstract readonly kind: CatalogErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** An expected document or file is missing. */
export class NotFoundError extends CatalogError {
  readonly kind = 'not-found' as const;
}

/** A document exists but does not have the expected structure. */
export class FormatError extends CatalogError {
  readonly kind = 'format' as const;
}

/** The destination of a write or rename already exists, or the session is busy. */
export class ConflictError extends CatalogError {
  readonly kind = 'conflict' as const;
}

export class ValidationError extends CatalogError {
  readonly kind = 'validation' as const;
}

export class IOError extends CatalogError {
  readonly kind = 'io' as const;
}

const errnoCode = (error: unknown): string | undefined => {
  if (typeof error === 'object' && error !== null && 'code' in error) {
    return typeof error.code === 'string' ? error.code : undefined;
  }
  return undefined;
};

export const isErrnoCode = (error: unknown, ...codes: string[]) => {
  const code = errnoCode(error);
  return code !== undefined && codes.includes(code);
};

export const describeError = (error: unknown): string => {
  if (error instanceof Error) return error.message;
  if (typeof error === 'string') return error;
  return 'Unknown error';
};

/**
 * Maps a filesystem failure onto the catalog error kinds. Errors that are
 * already catalog errors pass through untouched.
 */
export const toCatalogError = (error: unknown, context: string): CatalogError => {
  if (error instanceof CatalogError) {
    return error;
  }
  const message = `${context}: ${describeError(error)}`;
  switch (errnoCode(error)) {
    case 'ENOENT':
      return new NotFoundError(message, { cause: error });
    case 'EEXIST':
    case 'ENOTEMPTY':
      return new ConflictError(message, { cause: error });
    default:
      return new IOError(message, { cause: error });
  }
};
