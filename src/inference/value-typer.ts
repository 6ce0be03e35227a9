/**
 * Value Typer - runtime category of an observed value
 *
 * Values may come from another realm (the vm sandbox), so checks go through
 * `Array.isArray` and `Object.prototype.toString` rather than `instanceof`.
 */

export type ValueCategory =
  | 'undefined'
  | 'null'
  | 'boolean'
  | 'number'
  | 'bigint'
  | 'string'
  | 'symbol'
  | 'function'
  | 'array'
  | 'map'
  | 'set'
  | 'date'
  | 'regexp'
  | 'promise'
  | 'error'
  | 'object'
  | 'instance';

const TAGGED_CATEGORIES: Readonly<Record<string, ValueCategory>> = {
  '[object Map]': 'map',
  '[object Set]': 'set',
  '[object Date]': 'date',
  '[object RegExp]': 'regexp',
  '[object Promise]': 'promise',
  '[object Error]': 'error',
};

const CATEGORY_TYPE_NAMES: Readonly<Record<Exclude<ValueCategory, 'instance'>, string>> = {
  undefined: 'undefined',
  null: 'null',
  boolean: 'boolean',
  number: 'number',
  bigint: 'bigint',
  string: 'string',
  symbol: 'symbol',
  function: 'Function',
  array: 'unknown[]',
  map: 'Map<unknown, unknown>',
  set: 'Set<unknown>',
  date: 'Date',
  regexp: 'RegExp',
  promise: 'Promise<unknown>',
  error: 'Error',
  object: 'object',
};

const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export function classify(value: unknown): ValueCategory {
  if (value === null) return 'null';
  switch (typeof value) {
    case 'undefined':
    case 'boolean':
    case 'number':
    case 'bigint':
    case 'string':
    case 'symbol':
    case 'function':
      return typeof value;
    default:
      break;
  }

  if (Array.isArray(value)) return 'array';

  const tagged = TAGGED_CATEGORIES[Object.prototype.toString.call(value)];
  if (tagged) return tagged;

  return className(value) === undefined ? 'object' : 'instance';
}

/**
 * TypeScript type name for a value
 */
export function typeOf(value: unknown): string {
  const category = classify(value);
  if (category === 'instance') {
    return className(value) ?? 'object';
  }
  return CATEGORY_TYPE_NAMES[category];
}

/**
 * Constructor name of a class instance; undefined for plain objects
 */
function className(value: unknown): string | undefined {
  if (typeof value !== 'object' || value === null) return undefined;
  const proto: unknown = Object.getPrototypeOf(value);
  if (proto === null || typeof proto !== 'object') return undefined;

  const ctor = Object.getOwnPropertyDescriptor(proto, 'constructor')?.value;
  if (typeof ctor !== 'function') return undefined;

  // A plain object's prototype is Object.prototype, whose own prototype is null
  if (Object.getPrototypeOf(proto) === null) return undefined;

  // A data property only; a `name` getter would run user code
  const name: unknown = Object.getOwnPropertyDescriptor(ctor, 'name')?.value;
  return typeof name === 'string' && IDENTIFIER.test(name) ? name : undefined;
}
