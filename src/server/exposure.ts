/**
 * Method Exposure
 *
 * Builds the registration table for methods exposed as commands: one
 * descriptor per method, computed once at registration, holding the ordered
 * parameter list that inbound `data` is bound against.
 *
 * Parameter lists come from an explicit `MethodSpec` when one is declared,
 * otherwise from the method's own source text. Parsing understands plain
 * identifiers, defaults (optional), `...rest` and destructuring patterns;
 * declare a spec for anything more exotic, or to attach type labels.
 */

import { filterDefined, isRecord } from '@/utils/objects.js';

import { HandlerArgumentError } from './errors.js';

/**
 * Declared shape of one parameter.
 */
export interface ParameterSpec {
  name: string;
  /** Defaults to true */
  required?: boolean | undefined;
  /** Free-form type label reported by `__get_methods__` */
  type?: string | undefined;
  /** Collects the remaining positional values from an array */
  rest?: boolean | undefined;
}

/**
 * Declared metadata for an exposed method.
 */
export interface MethodSpec {
  parameters?: readonly ParameterSpec[] | undefined;
  doc?: string | undefined;
  returns?: string | undefined;
}

export type MethodSpecs = Readonly<Record<string, MethodSpec>>;

/**
 * Any callable that can be exposed as a command.
 */
export type ExposableMethod = (...args: never[]) => unknown;

export function isExposableMethod(value: unknown): value is ExposableMethod {
  return typeof value === 'function';
}

export interface ParameterDescriptor {
  readonly name: string;
  readonly required: boolean;
  readonly rest: boolean;
  /** Destructuring pattern: receives the whole mapping */
  readonly pattern: boolean;
  readonly type: string | undefined;
}

export interface MethodDescriptor {
  readonly name: string;
  readonly parameters: readonly ParameterDescriptor[];
  readonly doc: string;
  readonly returns: string | undefined;
  readonly invoke: (args: unknown[]) => unknown;
}

/**
 * Catalog entry returned by `__get_methods__`.
 */
export interface MethodCatalogEntry {
  parameters: Array<Record<string, unknown>>;
  return: Record<string, unknown>;
  doc: string;
}

// ============================================================================
// Descriptor construction
// ============================================================================

/**
 * Build the descriptor for a method bound to `target`.
 */
export function describeMethod(
  name: string,
  method: ExposableMethod,
  target: unknown,
  spec: MethodSpec = {}
): MethodDescriptor {
  const parameters = spec.parameters
    ? spec.parameters.map(fromSpec)
    : parseParameters(method);

  return {
    name,
    parameters,
    doc: spec.doc ?? '',
    returns: spec.returns,
    invoke: (args) => {
      const result: unknown = Reflect.apply(method, target, args);
      return result;
    },
  };
}

function fromSpec(spec: ParameterSpec): ParameterDescriptor {
  const rest = spec.rest ?? false;
  return {
    name: spec.name,
    required: rest ? false : (spec.required ?? true),
    rest,
    pattern: false,
    type: spec.type,
  };
}

/**
 * Render a descriptor for the `__get_methods__` catalog.
 */
export function toCatalogEntry(descriptor: MethodDescriptor): MethodCatalogEntry {
  return {
    parameters: descriptor.parameters.map((param) =>
      filterDefined({ name: param.name, required: param.required, type: param.type })
    ),
    return: filterDefined({ type: descriptor.returns }),
    doc: descriptor.doc,
  };
}

/**
 * List the methods an object exposes.
 *
 * Walks the prototype chain from `instance` up to (not including) `stopAt`,
 * collecting own function-valued properties. Names starting with `_`, the
 * constructor, and accessors are skipped; a subclass override shadows its
 * parent's method. `includeOwn` also takes `instance`'s own properties, for
 * object literals whose methods live on the object itself.
 */
export function collectExposedMethods(
  instance: object,
  stopAt: object,
  includeOwn = false
): Array<{ name: string; method: ExposableMethod }> {
  const found: Array<{ name: string; method: ExposableMethod }> = [];
  const seen = new Set<string>();

  let proto: unknown = includeOwn ? instance : Object.getPrototypeOf(instance);
  while (typeof proto === 'object' && proto !== null && proto !== stopAt) {
    for (const name of Object.getOwnPropertyNames(proto)) {
      if (name === 'constructor' || name.startsWith('_') || seen.has(name)) {
        continue;
      }
      seen.add(name);

      const property = Object.getOwnPropertyDescriptor(proto, name);
      const value: unknown = property?.value;
      if (isExposableMethod(value)) {
        found.push({ name, method: value });
      }
    }
    proto = Object.getPrototypeOf(proto);
  }

  return found;
}

// ============================================================================
// Argument binding
// ============================================================================

/**
 * Bind inbound command data to a method's parameters.
 *
 * - Mapping data: each parameter is looked up by name; missing optional
 *   parameters are left out, missing required ones fail.
 * - Other non-null data: passed as the first parameter.
 * - null/undefined data: no arguments.
 *
 * @throws HandlerArgumentError when a required parameter has no value
 */
export function bindArguments(descriptor: MethodDescriptor, data: unknown): unknown[] {
  const { parameters } = descriptor;
  const args: unknown[] = [];

  if (data === undefined || data === null) {
    assertSupplied(descriptor, 0);
    return args;
  }

  if (isRecord(data)) {
    parameters.forEach((param, index) => {
      if (param.pattern) {
        args[index] = data;
      } else if (param.rest) {
        const values = data[param.name];
        if (Array.isArray(values)) {
          args.length = index;
          args.push(...values);
        } else if (param.name in data) {
          args[index] = values;
        }
      } else if (param.name in data) {
        args[index] = data[param.name];
      } else if (param.required) {
        throw new HandlerArgumentError(descriptor.name, param.name);
      }
    });
    return args;
  }

  const first = parameters[0];
  if (!first) {
    return args;
  }
  if (first.rest && Array.isArray(data)) {
    return [...data];
  }
  args.push(data);
  assertSupplied(descriptor, 1);
  return args;
}

function assertSupplied(descriptor: MethodDescriptor, suppliedCount: number): void {
  const missing = descriptor.parameters.slice(suppliedCount).find((param) => param.required);
  if (missing) {
    throw new HandlerArgumentError(descriptor.name, missing.name);
  }
}

// ============================================================================
// Parameter parsing
// ============================================================================

/**
 * Parse a function's declared parameters from its source text.
 *
 * @example
 * ```typescript
 * parseParameters(function add(a, b = 2) {})
 * // [{ name: 'a', required: true, ... }, { name: 'b', required: false, ... }]
 * ```
 */
export function parseParameters(fn: ExposableMethod): ParameterDescriptor[] {
  const list = extractParameterList(Function.prototype.toString.call(fn));
  return splitTopLevel(list)
    .map((raw) => raw.trim())
    .filter((raw) => raw.length > 0)
    .map((raw, index) => parseParameter(raw, index));
}

function parseParameter(raw: string, index: number): ParameterDescriptor {
  const rest = raw.startsWith('...');
  const body = rest ? raw.slice(3).trim() : raw;
  const equals = findTopLevelAssignment(body);
  const hasDefault = equals !== -1;
  const target = (hasDefault ? body.slice(0, equals) : body).trim();
  const pattern = target.startsWith('{') || target.startsWith('[');

  return {
    name: pattern ? `arg${index}` : target,
    required: !rest && !hasDefault,
    rest,
    pattern,
    type: undefined,
  };
}

/**
 * Return the text between a function's parameter parentheses.
 * Handles `name(...) {}`, `function (...) {}`, `(...) =>` and `x =>` forms.
 */
function extractParameterList(source: string): string {
  const text = stripComments(source);
  const arrow = text.indexOf('=>');
  const open = text.indexOf('(');

  if (arrow !== -1 && (open === -1 || arrow < open)) {
    return text.slice(0, arrow).replace(/^async\s+/, '');
  }
  if (open === -1) {
    return '';
  }

  let depth = 0;
  let quote: string | null = null;
  for (let i = open; i < text.length; i++) {
    const char = text.charAt(i);
    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if (char === '(') {
      depth++;
    } else if (char === ')') {
      depth--;
      if (depth === 0) {
        return text.slice(open + 1, i);
      }
    }
  }
  return text.slice(open + 1);
}

function stripComments(source: string): string {
  let out = '';
  let quote: string | null = null;

  for (let i = 0; i < source.length; i++) {
    const char = source.charAt(i);
    const next = source.charAt(i + 1);

    if (quote) {
      out += char;
      if (char === '\\') {
        out += next;
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }

    if (char === '/' && next === '*') {
      const end = source.indexOf('*/', i + 2);
      i = end === -1 ? source.length : end + 1;
      continue;
    }
    if (char === '/' && next === '/') {
      const end = source.indexOf('\n', i + 2);
      i = end === -1 ? source.length : end - 1;
      continue;
    }
    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    }
    out += char;
  }

  return out;
}

function splitTopLevel(list: string): string[] {
  const parts: string[] = [];
  let depth = 0;
  let quote: string | null = null;
  let start = 0;

  for (let i = 0; i < list.length; i++) {
    const char = list.charAt(i);
    if (quote) {
      if (char === '\\') {
        i++;
      } else if (char === quote) {
        quote = null;
      }
      continue;
    }
    if (char === '"' || char === "'" || char === '`') {
      quote = char;
    } else if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
    } else if (char === ',' && depth === 0) {
      parts.push(list.slice(start, i));
      start = i + 1;
    }
  }
  parts.push(list.slice(start));
  return parts;
}

function findTopLevelAssignment(param: string): number {
  let depth = 0;
  for (let i = 0; i < param.length; i++) {
    const char = param.charAt(i);
    if (char === '(' || char === '[' || char === '{') {
      depth++;
    } else if (char === ')' || char === ']' || char === '}') {
      depth--;
    } else if (char === '=' && depth === 0) {
      const next = param.charAt(i + 1);
      const prev = param.charAt(i - 1);
      if (next !== '=' && next !== '>' && prev !== '=' && prev !== '!' && prev !== '<' && prev !== '>') {
        return i;
      }
    }
  }
  return -1;
}
