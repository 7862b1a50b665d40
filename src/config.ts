import os from 'node:os';
import path from 'node:path';
import { promises as fs } from 'node:fs';
import Ajv, { type JSONSchemaType } from 'ajv';
import { ConfigError } from './errors';
import type { Logger, RenderOptions, TableFormatterConfig } from './types';

export const PACKAGE_ID = 'fixed-width-table';
export const CONFIG_ENV = 'FIXED_WIDTH_TABLE_CONFIG';

export const configSchema: JSONSchemaType<TableFormatterConfig> = {
  type: 'object',
  additionalProperties: false,
  properties: {
    missingField: {
      type: 'object',
      additionalProperties: false,
      properties: {
        policy: { type: 'string', enum: ['placeholder', 'fail'], default: 'placeholder' },
        placeholder: { type: 'string', default: '' }
      },
      required: ['policy', 'placeholder']
    },
    lineBreak: { type: 'string', enum: ['\n', '\r\n'], default: '\n' }
  },
  required: ['missingField', 'lineBreak']
};

export const defaultConfig: TableFormatterConfig = {
  missingField: { policy: 'placeholder', placeholder: '' },
  lineBreak: '\n'
};

const ajv = new Ajv({ allErrors: true, useDefaults: true, removeAdditional: false });
const validate = ajv.compile(configSchema);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function mergeDefaults(defaults: unknown, input: unknown): unknown {
  if (Array.isArray(defaults)) {
    return Array.isArray(input) ? input : structuredClone(defaults);
  }
  if (isPlainObject(defaults)) {
    if (input !== undefined && !isPlainObject(input)) return input;
    const source: Record<string, unknown> = isPlainObject(input) ? input : {};
    const output: Record<string, unknown> = {};
    const keys = new Set([...Object.keys(defaults), ...Object.keys(source)]);
    for (const key of keys) {
      const inVal = source[key];
      output[key] = inVal === undefined ? structuredClone(defaults[key]) : mergeDefaults(defaults[key], inVal);
    }
    return output;
  }
  return input === undefined ? defaults : input;
}

export function validateConfig(
  input: unknown,
  logger?: Logger
): { config: TableFormatterConfig | undefined; errors: string[] } {
  const candidate = structuredClone(input);
  if (validate(candidate)) {
    return { config: candidate, errors: [] };
  }

  const errors = (validate.errors || []).map((err) => `${err.instancePath || '/'} ${err.message || 'invalid'}`);
  logger?.warn?.(`${PACKAGE_ID}: config validation errors: ${JSON.stringify(errors)}`);
  return { config: undefined, errors };
}

export function loadConfig(raw: unknown, logger?: Logger, source = 'config'): TableFormatterConfig {
  const { config, errors } = validateConfig(mergeDefaults(defaultConfig, raw ?? {}), logger);
  if (!config) throw new ConfigError(`invalid ${source}`, errors);
  return config;
}

function expandHome(p: string): string {
  if (p === '~') return os.homedir();
  if (p.startsWith('~/')) return path.join(os.homedir(), p.slice(2));
  return p;
}

export function resolveConfigPath(cwd: string = process.cwd()): string {
  const fromEnv = process.env[CONFIG_ENV];
  if (fromEnv) return path.resolve(cwd, expandHome(fromEnv));
  return path.join(cwd, `.${PACKAGE_ID}`, 'config.json');
}

export async function loadConfigFile(cwd: string = process.cwd(), logger?: Logger): Promise<TableFormatterConfig> {
  const filePath = resolveConfigPath(cwd);
  let text: string;
  try {
    text = await fs.readFile(filePath, 'utf8');
  } catch (err) {
    if (isPlainObject(err) && err.code === 'ENOENT') {
      logger?.debug?.(`${PACKAGE_ID}: no config at ${filePath}, using defaults`);
      return structuredClone(defaultConfig);
    }
    throw err;
  }

  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch (err) {
    throw new ConfigError(`failed to parse config ${filePath}: ${err instanceof Error ? err.message : String(err)}`);
  }
  return loadConfig(raw, logger, `config ${filePath}`);
}

export function resolveRenderOptions(config: TableFormatterConfig, logger?: Logger): RenderOptions {
  return {
    onMissingField:
      config.missingField.policy === 'fail'
        ? { kind: 'fail' }
        : { kind: 'placeholder', text: config.missingField.placeholder },
    lineBreak: config.lineBreak,
    logger
  };
}
