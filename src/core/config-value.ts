import { err, ok } from '../utils/result.js';
import type { Result } from '../utils/result.js';

export type ConfigScalar = string | number | bigint | boolean | Date | null;

export type ConfigValue = ConfigScalar | ConfigValue[] | ConfigMap;

export interface ConfigMap {
  [key: string]: ConfigValue;
}

export function isConfigMap(value: ConfigValue | undefined): value is ConfigMap {
  return (
    typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date)
  );
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Date);
}

/** Own-property lookup; inherited names such as `constructor` are absent. */
export function getEntry(map: ConfigMap, key: string): ConfigValue | undefined {
  return Object.hasOwn(map, key) ? map[key] : undefined;
}

/**
 * Sets an own enumerable property, so keys such as `__proto__` stay plain
 * data instead of replacing the map's prototype.
 */
export function setEntry(map: ConfigMap, key: string, value: ConfigValue): void {
  Object.defineProperty(map, key, { value, enumerable: true, writable: true, configurable: true });
}

/**
 * Validates an arbitrary parser result into a ConfigValue tree. JSON and YAML
 * `null` is kept as a value; anything else that does not fit the tree is an
 * error naming its dotted path.
 */
export function toConfigValue(value: unknown, path = '$'): Result<ConfigValue> {
  if (value === null) return ok(null);

  switch (typeof value) {
    case 'string':
    case 'number':
    case 'bigint':
    case 'boolean':
      return ok(value);
    default:
      break;
  }

  if (value instanceof Date) return ok(value);

  if (Array.isArray(value)) {
    const items: ConfigValue[] = [];
    for (let i = 0; i < value.length; i++) {
      const item = toConfigValue(value[i], `${path}[${i}]`);
      if (!item.ok) return item;
      items.push(item.value);
    }
    return ok(items);
  }

  if (isPlainObject(value)) {
    return toConfigMap(value, path);
  }

  return err(new Error(`Unsupported value at ${path}: ${typeof value}`));
}

export function toConfigMap(value: unknown, path = '$'): Result<ConfigMap> {
  if (value === null || value === undefined) return ok({});
  if (!isPlainObject(value)) {
    return err(new Error(`Expected a mapping at ${path}`));
  }

  const map: ConfigMap = {};
  for (const [key, child] of Object.entries(value)) {
    if (child === undefined) continue;
    const converted = toConfigValue(child, path === '$' ? key : `${path}.${key}`);
    if (!converted.ok) return converted;
    setEntry(map, key, converted.value);
  }
  return ok(map);
}

/**
 * Copies arrays and mappings. Dates are shared so that TOML local dates and
 * times keep their Date subclass.
 */
export function cloneConfigValue<T extends ConfigValue>(value: T): T;
export function cloneConfigValue(value: ConfigValue): ConfigValue {
  if (Array.isArray(value)) return value.map((item) => cloneConfigValue(item));
  if (isConfigMap(value)) {
    const copy: ConfigMap = {};
    for (const [key, child] of Object.entries(value)) {
      setEntry(copy, key, cloneConfigValue(child));
    }
    return copy;
  }
  return value;
}

/** Reads a nested value by dotted path without creating anything. */
export function getAtPath(doc: ConfigMap, dottedPath: string): ConfigValue | undefined {
  let current: ConfigValue | undefined = doc;
  for (const segment of dottedPath.split('.')) {
    if (!isConfigMap(current)) return undefined;
    current = getEntry(current, segment);
  }
  return current;
}
