/**
 * JSON Schema Validator Service
 *
 * ajv-backed validation for untrusted payloads (judge replies, configuration).
 */

import Ajv, { ValidateFunction, ErrorObject, JSONSchemaType } from 'ajv';
import addFormats from 'ajv-formats';
import { ILogger, ConsoleLogger } from './utils/ILogger';

export interface ValidationResult<T> {
  valid: boolean;
  value?: T;
  errors: string[];
}

export class JSONSchemaValidator {
  private ajv: Ajv;
  private logger: ILogger;

  constructor(logger?: ILogger) {
    this.logger = logger || new ConsoleLogger('JSONSchemaValidator');
    this.ajv = new Ajv({
      allErrors: true,
      strict: true,
      coerceTypes: false,
      useDefaults: false,
    });

    // uri, email, date-time, ...
    addFormats(this.ajv);
  }

  /**
   * Validate data against a schema, narrowing it to T on success
   */
  validate<T>(data: unknown, schema: JSONSchemaType<T>, schemaId: string): ValidationResult<T> {
    let validate: ValidateFunction<T>;
    try {
      // ajv caches compiled validators by schema object
      validate = this.ajv.compile<T>(schema);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error('JSON schema compilation failed', { schemaId, error: message });
      return { valid: false, errors: [`Schema compilation error: ${message}`] };
    }

    if (validate(data)) {
      this.logger.debug('JSON schema validation passed', { schemaId });
      return { valid: true, value: data, errors: [] };
    }

    const errors = this.formatErrors(validate.errors || []);
    this.logger.warn('JSON schema validation failed', {
      schemaId,
      errorCount: errors.length,
      errors,
    });
    return { valid: false, errors };
  }

  private formatErrors(errors: ErrorObject[]): string[] {
    return errors.map((error) => {
      const path = error.instancePath || 'root';
      let formatted = `${path}: ${error.message || 'Validation error'}`;

      const params = Object.entries(error.params)
        .map(([key, value]) => `${key}=${JSON.stringify(value)}`)
        .join(', ');
      if (params) {
        formatted += ` (${params})`;
      }

      return formatted;
    });
  }
}
