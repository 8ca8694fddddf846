import type { OperationContext, OperationOutcome } from '../types.js';

import { isPlainObject } from '../utils.js';

import { OperationExecutionError } from './operation-errors.js';

export type JsonSchema = Record<string, unknown>;

/** What the engine knows about an operation. Nothing else is assumed. */
export interface Operation {
  readonly name: string;
  readonly description: string;
  readonly aliases: readonly string[];
  readonly capabilities: readonly string[];
  readonly requiresNetwork: boolean;
  readonly requiresFileSystem: boolean;
  readonly inputSchema: JsonSchema;
  run(context: Readonly<OperationContext>): Promise<OperationOutcome>;
  /** Named fallback strategies, in the order they should be tried. */
  alternativeMethods(): readonly string[];
  runAlternative(method: string, context: Readonly<OperationContext>): Promise<OperationOutcome>;
  estimateCost(context: Readonly<OperationContext>): Promise<number>;
  dryRun(context: Readonly<OperationContext>): Promise<boolean>;
}

export abstract class BaseOperation implements Operation {
  abstract readonly name: string;
  abstract readonly description: string;
  abstract readonly capabilities: readonly string[];
  abstract readonly inputSchema: JsonSchema;
  readonly aliases: readonly string[] = [];
  readonly requiresNetwork: boolean = false;
  readonly requiresFileSystem: boolean = false;

  abstract run(context: Readonly<OperationContext>): Promise<OperationOutcome>;

  alternativeMethods(): readonly string[] {
    return [];
  }

  runAlternative(method: string, _context: Readonly<OperationContext>): Promise<OperationOutcome> {
    return Promise.reject(new OperationExecutionError('internal_error', `${this.name} has no alternative method '${method}'`));
  }

  estimateCost(_context: Readonly<OperationContext>): Promise<number> {
    return Promise.resolve(this.requiresNetwork ? 1 : 0);
  }

  /** True when every required parameter of the input schema is present. */
  dryRun(context: Readonly<OperationContext>): Promise<boolean> {
    const required = requiredParameters(this.inputSchema);
    const present = required.every((key) => {
      const value = context.parameters[key];
      return value !== undefined && value !== null && !(typeof value === 'string' && value.trim().length === 0);
    });
    return Promise.resolve(present);
  }
}

export function requiredParameters(schema: JsonSchema): string[] {
  const required = schema.required;
  if (!Array.isArray(required)) return [];
  return required.filter((item): item is string => typeof item === 'string');
}

export function describeSchemaParameters(schema: JsonSchema): string {
  const properties = isPlainObject(schema.properties) ? schema.properties : {};
  const required = new Set(requiredParameters(schema));
  const parts = Object.entries(properties).map(([key, definition]) => {
    const type = isPlainObject(definition) && typeof definition.type === 'string' ? definition.type : 'any';
    return required.has(key) ? `${key}: ${type}` : `${key}?: ${type}`;
  });
  return parts.join(', ');
}

export type OperationOutcomeFailure = Extract<OperationOutcome, { success: false }>;

export const succeed = (output: unknown): OperationOutcome => ({ success: true, output });

export const fail = (errorMessage: string, errorKind?: OperationOutcomeFailure['errorKind']): OperationOutcome => (
  errorKind !== undefined ? { success: false, errorMessage, errorKind } : { success: false, errorMessage }
);
