import { ValidationError } from '../shared/types.js';

export type SchemaErrorCode = 'INVALID_SCHEMA' | 'SCHEMA_FILE_UNREADABLE';

export class SchemaError extends ValidationError {
  /** Location of the offending entry, e.g. `options[2].short`. */
  public readonly path?: string;

  constructor(message: string, path?: string, code: SchemaErrorCode = 'INVALID_SCHEMA') {
    super(path ? `${path}: ${message}` : message, code);
    this.name = 'SchemaError';
    this.path = path;
  }
}
