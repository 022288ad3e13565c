import Ajv from 'ajv';
import { InvalidConfigError, type ConfigIssue } from '../types/errors';
import {
  API_PROTOCOLS,
  DATABASE_VARIANTS,
  FILE_FORMATS,
  type ConnectionConfig,
} from '../types/source';

const ajv = new Ajv({ allErrors: true });

const sourceTypeSchema = {
  oneOf: [
    {
      type: 'object',
      required: ['kind', 'database'],
      additionalProperties: false,
      properties: {
        kind: { type: 'string', const: 'database' },
        database: { type: 'string', enum: [...DATABASE_VARIANTS] },
      },
    },
    {
      type: 'object',
      required: ['kind', 'format'],
      additionalProperties: false,
      properties: {
        kind: { type: 'string', const: 'file' },
        format: { type: 'string', enum: [...FILE_FORMATS] },
      },
    },
    {
      type: 'object',
      required: ['kind', 'protocol'],
      additionalProperties: false,
      properties: {
        kind: { type: 'string', const: 'api' },
        protocol: { type: 'string', enum: [...API_PROTOCOLS] },
      },
    },
  ],
};

export const connectionConfigSchema = {
  type: 'object',
  required: ['sourceType'],
  additionalProperties: false,
  properties: {
    sourceType: sourceTypeSchema,
    host: { type: 'string', minLength: 1 },
    port: { type: 'integer', minimum: 1, maximum: 65535 },
    username: { type: 'string' },
    password: { type: 'string' },
    database: { type: 'string' },
    connectionId: { type: 'string', minLength: 1 },
    options: { type: 'object' },
  },
};

const validateConfig = ajv.compile<ConnectionConfig>(connectionConfigSchema);

/**
 * Validate untrusted input as a ConnectionConfig.
 *
 * @throws InvalidConfigError listing every schema issue
 */
export function parseConnectionConfig(input: unknown): ConnectionConfig {
  if (!validateConfig(input)) {
    const issues: ConfigIssue[] = (validateConfig.errors ?? []).map(e => ({
      path: e.instancePath || '/',
      message: e.message ?? e.keyword,
    }));
    throw new InvalidConfigError('Invalid connection config', issues);
  }

  return Object.freeze({
    ...input,
    sourceType: Object.freeze({ ...input.sourceType }),
  });
}
