import { basename, extname } from 'node:path';

import { parse as parseToml, stringify as stringifyToml } from 'smol-toml';
import { parse as parseYaml, stringify as stringifyYaml } from 'yaml';

import { ConfigurationError, errorMessage } from '../utils/errors.js';
import { err } from '../utils/result.js';
import type { Result } from '../utils/result.js';
import { toConfigMap } from './config-value.js';
import type { ConfigMap } from './config-value.js';

export type DocumentFormat = 'toml' | 'yaml' | 'json';

/**
 * Parser/serializer pair for one structured document format. `parse` reports
 * malformed input as a Result; `stringify` throws ConfigurationError.
 */
export interface DocumentCodec {
  format: DocumentFormat;
  parse(text: string): Result<ConfigMap>;
  stringify(doc: ConfigMap): string;
}

function parseWith(format: DocumentFormat, text: string, fn: (text: string) => unknown): Result<ConfigMap> {
  let raw: unknown;
  try {
    raw = fn(text);
  } catch (error) {
    return err(new Error(`Invalid ${format.toUpperCase()}: ${errorMessage(error)}`));
  }
  return toConfigMap(raw);
}

function stringifyWith(format: DocumentFormat, doc: ConfigMap, fn: (doc: ConfigMap) => string): string {
  try {
    return fn(doc);
  } catch (error) {
    throw new ConfigurationError(`Failed to serialize ${format.toUpperCase()} content: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

// TOML integers are read as bigint and every JS number is written as a float,
// so `1` and `1.0` keep their kinds through a rewrite.
export const tomlCodec: DocumentCodec = {
  format: 'toml',
  parse: (text) => parseWith('toml', text, (t) => parseToml(t, { integersAsBigInt: true })),
  stringify: (doc) => stringifyWith('toml', doc, (d) => stringifyToml(d, { numbersAsFloat: true })),
};

export const yamlCodec: DocumentCodec = {
  format: 'yaml',
  parse: (text) => parseWith('yaml', text, (t): unknown => parseYaml(t)),
  stringify: (doc) => stringifyWith('yaml', doc, (d) => stringifyYaml(d)),
};

function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? Number(value) : value;
}

export const jsonCodec: DocumentCodec = {
  format: 'json',
  parse: (text) => parseWith('json', text, (t): unknown => (t.trim() === '' ? {} : JSON.parse(t))),
  stringify: (doc) => stringifyWith('json', doc, (d) => `${JSON.stringify(d, jsonReplacer, 2)}\n`),
};

const CODECS_BY_EXTENSION: Record<string, DocumentCodec> = {
  '.toml': tomlCodec,
  '.yaml': yamlCodec,
  '.yml': yamlCodec,
  '.json': jsonCodec,
};

export function codecForPath(filePath: string): DocumentCodec {
  const codec = CODECS_BY_EXTENSION[extname(filePath).toLowerCase()];
  if (!codec) {
    throw new ConfigurationError(`No serializer available for ${basename(filePath)}`, { path: filePath });
  }
  return codec;
}
