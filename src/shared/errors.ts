/**
 * Error types raised by the store, the services and the settings loader.
 * The parsing and validation core never throws on malformed input.
 */

export class NetValError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/** An id that does not refer to a stored record. */
export class NotFoundError extends NetValError {
  readonly entity: string;
  readonly id: string;

  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.entity = entity;
    this.id = id;
  }
}

/** A request body or stored document that fails its schema. */
export class RequestValidationError extends NetValError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.details = details;
  }
}

/** A stored project document that cannot be read back. */
export class StorageError extends NetValError {
  readonly details: string[];

  constructor(message: string, details: string[] = []) {
    super(details.length > 0 ? `${message}: ${details.join("; ")}` : message);
    this.details = details;
  }
}

export class SettingsError extends NetValError {
  readonly details: string[];

  constructor(details: string[]) {
    super(`Invalid settings: ${details.join("; ")}`);
    this.details = details;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
