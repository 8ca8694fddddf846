import { Ajv, type ErrorObject, type ValidateFunction } from 'ajv';

import type { Operation } from './types.js';

import { describeSchemaParameters } from './types.js';

export type ParameterValidation =
  | { valid: true; parameters: Record<string, unknown> }
  | { valid: false; message: string };

export const canonicalOperationKey = (name: string): string => name.toLowerCase().replace(/[\s_-]/g, '');

const formatAjvErrors = (errors: ErrorObject[] | null | undefined): string => {
  const list = Array.isArray(errors) ? errors : [];
  if (list.length === 0) return 'validation_failed';
  return list.map((e) => {
    const inst = e.instancePath.length > 0 ? e.instancePath : '/';
    const msg = typeof e.message === 'string' ? e.message : '';
    return `${inst} ${msg}`.trim();
  }).join('; ');
};

/**
 * Name-to-operation catalog shared by every conversation. Registration must
 * finish before the first conversation starts; `freeze()` enforces that.
 * Lookup ignores case and `_`, `-` and space separators, and accepts aliases.
 */
export class OperationRegistry {
  private readonly byKey = new Map<string, Operation>();
  private readonly ordered: Operation[] = [];
  private readonly validators = new Map<string, ValidateFunction>();
  private readonly ajv = new Ajv({ allErrors: true, strict: false, coerceTypes: true, useDefaults: true });
  private frozen = false;

  register(operation: Operation): this {
    if (this.frozen) {
      throw new Error(`operation registry is frozen; cannot register '${operation.name}'`);
    }
    const keys = [operation.name, ...operation.aliases].map(canonicalOperationKey);
    const clash = keys.find((key) => this.byKey.has(key));
    if (clash !== undefined) {
      throw new Error(`operation name '${clash}' is already registered`);
    }
    let validator: ValidateFunction;
    try {
      validator = this.ajv.compile(operation.inputSchema);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new Error(`operation '${operation.name}' has an invalid input schema: ${message}`);
    }
    keys.forEach((key) => this.byKey.set(key, operation));
    this.validators.set(operation.name, validator);
    this.ordered.push(operation);
    return this;
  }

  freeze(): this {
    this.frozen = true;
    return this;
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  resolve(name: string): Operation | undefined {
    return this.byKey.get(canonicalOperationKey(name));
  }

  list(): readonly Operation[] {
    return this.ordered;
  }

  /**
   * Validates a copy of `parameters`. The copy comes back with schema
   * defaults filled in and scalars coerced ("true" to true, "3" to 3).
   */
  validateParameters(operation: Operation, parameters: Readonly<Record<string, unknown>>): ParameterValidation {
    const validator = this.validators.get(operation.name);
    if (validator === undefined) {
      return { valid: false, message: `invalid_parameters: operation '${operation.name}' is not registered` };
    }
    const candidate: Record<string, unknown> = structuredClone({ ...parameters });
    if (validator(candidate)) return { valid: true, parameters: candidate };
    return { valid: false, message: `invalid_parameters: ${formatAjvErrors(validator.errors)}` };
  }

  /** One line per operation, used in the system prompt and the CLI listing. */
  describe(): string {
    return this.ordered.map((operation) => {
      const params = describeSchemaParameters(operation.inputSchema);
      const alternatives = operation.alternativeMethods();
      const suffix = alternatives.length > 0 ? ` [fallbacks: ${alternatives.join(', ')}]` : '';
      return `- ${operation.name}(${params}): ${operation.description}${suffix}`;
    }).join('\n');
  }
}
