/**
 * Generator parameters ("configurable params").
 *
 * Parameters are flat `scope.key` → string entries. A JSON parameter file is
 * read first (nested objects are flattened), then `scope.key=value;...`
 * overrides from the run configuration are applied on top.
 */

import * as fs from 'fs/promises';
import { ConfigurationError, formatError } from '../../shared/lib/errors.js';

export type GeneratorParams = Readonly<Record<string, string>>;

export function parseKeyValues(text: string): Record<string, string> {
  const params: Record<string, string> = {};
  for (const token of text.split(/[;,]/)) {
    const entry = token.trim();
    if (!entry) continue;
    const eq = entry.indexOf('=');
    if (eq <= 0) {
      throw new ConfigurationError(`Invalid parameter "${entry}", expected scope.key=value`);
    }
    const key = entry.slice(0, eq).trim();
    if (!key.includes('.')) {
      throw new ConfigurationError(`Parameter "${key}" has no scope, expected scope.key=value`);
    }
    params[key] = entry.slice(eq + 1).trim();
  }
  return params;
}

export function flattenParams(value: unknown, prefix = '', out: Record<string, string> = {}): Record<string, string> {
  if (value !== null && typeof value === 'object' && !Array.isArray(value)) {
    for (const [key, child] of Object.entries(value)) {
      flattenParams(child, prefix ? `${prefix}.${key}` : key, out);
    }
  } else if (prefix) {
    out[prefix] = Array.isArray(value) ? value.join(',') : String(value);
  }
  return out;
}

export async function loadParams(configFile?: string, keyValues?: string): Promise<GeneratorParams> {
  let params: Record<string, string> = {};
  if (configFile) {
    let text: string;
    try {
      text = await fs.readFile(configFile, 'utf-8');
    } catch (err) {
      throw new ConfigurationError(`Cannot read parameter file ${configFile}: ${formatError(err)}`, { cause: err });
    }
    try {
      params = flattenParams(JSON.parse(text));
    } catch (err) {
      throw new ConfigurationError(`Parameter file ${configFile} is not valid JSON`, { cause: err });
    }
  }
  if (keyValues) {
    params = { ...params, ...parseKeyValues(keyValues) };
  }
  return params;
}

/** Entries of one scope, e.g. scopedParams(p, 'boxgen') → { 'boxgen.pdg': '13' } */
export function scopedParams(params: GeneratorParams, ...scopes: string[]): Record<string, string> {
  const out: Record<string, string> = {};
  for (const [key, value] of Object.entries(params)) {
    if (scopes.some((scope) => key.startsWith(`${scope}.`))) {
      out[key] = value;
    }
  }
  return out;
}

export function numberParam(params: GeneratorParams, key: string, fallback: number): number {
  const raw = params[key];
  if (raw === undefined) return fallback;
  const value = Number(raw);
  if (!Number.isFinite(value)) {
    throw new ConfigurationError(`Parameter ${key}="${raw}" is not a number`);
  }
  return value;
}

export function integerParam(params: GeneratorParams, key: string, fallback: number): number {
  const value = numberParam(params, key, fallback);
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(`Parameter ${key}=${value} is not an integer`);
  }
  return value;
}
