/**
 * Method Catalog
 *
 * Client-side view of a peer's `__get_methods__` reply.
 */

import { isRecord } from '@/utils/objects.js';

export interface ParameterInfo {
  name: string;
  required: boolean;
  type?: string;
}

export interface MethodInfo {
  parameters: ParameterInfo[];
  return: { type?: string };
  doc: string;
}

export type MethodCatalog = Record<string, MethodInfo>;

/**
 * Parse a `__get_methods__` reply into a catalog.
 *
 * Accepts either the full reply (`{ methods: {...} }`) or the inner mapping.
 * Malformed entries are skipped rather than failing the whole catalog.
 */
export function parseMethodCatalog(value: unknown): MethodCatalog {
  const methods = isRecord(value) && isRecord(value['methods']) ? value['methods'] : value;
  const catalog: MethodCatalog = {};

  if (!isRecord(methods)) {
    return catalog;
  }

  for (const [name, entry] of Object.entries(methods)) {
    const info = parseMethodInfo(entry);
    if (info) {
      catalog[name] = info;
    }
  }
  return catalog;
}

function parseMethodInfo(entry: unknown): MethodInfo | null {
  if (!isRecord(entry)) {
    return null;
  }

  const rawParameters = entry['parameters'];
  const parameters: ParameterInfo[] = [];
  if (Array.isArray(rawParameters)) {
    for (const raw of rawParameters) {
      const parameter = parseParameterInfo(raw);
      if (parameter) {
        parameters.push(parameter);
      }
    }
  }

  const rawReturn = entry['return'];
  const returnType = isRecord(rawReturn) ? rawReturn['type'] : undefined;
  const doc = entry['doc'];

  return {
    parameters,
    return: typeof returnType === 'string' ? { type: returnType } : {},
    doc: typeof doc === 'string' ? doc : '',
  };
}

function parseParameterInfo(raw: unknown): ParameterInfo | null {
  if (!isRecord(raw) || typeof raw['name'] !== 'string') {
    return null;
  }

  const info: ParameterInfo = {
    name: raw['name'],
    required: raw['required'] !== false,
  };
  const type = raw['type'];
  if (typeof type === 'string') {
    info.type = type;
  }
  return info;
}
