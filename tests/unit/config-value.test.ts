import {
  cloneConfigValue,
  getAtPath,
  isConfigMap,
  toConfigMap,
  toConfigValue,
} from '../../src/core/config-value.js';
import type { ConfigMap } from '../../src/core/config-value.js';

describe('isConfigMap', () => {
  it('should accept plain objects only', () => {
    expect(isConfigMap({})).toBe(true);
    expect(isConfigMap({ a: 1 })).toBe(true);
    expect(isConfigMap([])).toBe(false);
    expect(isConfigMap(new Date(0))).toBe(false);
    expect(isConfigMap('table')).toBe(false);
    expect(isConfigMap(undefined)).toBe(false);
  });
});

describe('toConfigMap', () => {
  it('should treat null and undefined as an empty document', () => {
    expect(toConfigMap(null)).toEqual({ ok: true, value: {} });
    expect(toConfigMap(undefined)).toEqual({ ok: true, value: {} });
  });

  it('should keep null entries and drop undefined ones', () => {
    const result = toConfigMap({ a: 1, b: null, c: { d: [1, null, 'x'], e: undefined } });
    expect(result).toEqual({ ok: true, value: { a: 1, b: null, c: { d: [1, null, 'x'] } } });
  });

  it('should store a __proto__ key as an own property', () => {
    const result = toConfigMap(JSON.parse('{"__proto__": {"x": 1}}'));
    if (!result.ok) throw result.error;

    expect(Object.hasOwn(result.value, '__proto__')).toBe(true);
    expect(Object.getPrototypeOf(result.value)).toBe(Object.prototype);
  });

  it('should reject a top-level array', () => {
    const result = toConfigMap([1, 2]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Expected a mapping at $');
    }
  });

  it('should keep dates and bigints', () => {
    const when = new Date('2024-01-02T03:04:05Z');
    const result = toConfigMap({ when, big: 10n });
    expect(result).toEqual({ ok: true, value: { when, big: 10n } });
  });
});

describe('toConfigValue', () => {
  it('should name the dotted path of an unsupported nested value', () => {
    const result = toConfigValue({ a: { b: [Symbol('x')] } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Unsupported value at a.b[0]: symbol');
    }
  });

  it('should reject functions', () => {
    const result = toConfigValue(() => 1);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe('Unsupported value at $: function');
    }
  });
});

describe('cloneConfigValue', () => {
  it('should copy containers and share dates', () => {
    const original: ConfigMap = { tool: { ruff: { select: ['E', 'F'] } }, when: new Date(0) };
    const copy = cloneConfigValue(original);

    expect(copy).toEqual(original);
    expect(copy.when).toBe(original.when);
    expect(copy.tool).not.toBe(original.tool);

    const tool = copy.tool;
    if (isConfigMap(tool) && isConfigMap(tool.ruff)) {
      tool.ruff.select = ['ALL'];
    }
    expect(getAtPath(original, 'tool.ruff.select')).toEqual(['E', 'F']);
  });
});

describe('getAtPath', () => {
  const doc: ConfigMap = { tool: { ruff: { 'line-length': 120 } } };

  it('should read nested values', () => {
    expect(getAtPath(doc, 'tool.ruff.line-length')).toBe(120);
    expect(getAtPath(doc, 'tool')).toEqual({ ruff: { 'line-length': 120 } });
  });

  it('should return undefined for missing or non-table segments', () => {
    expect(getAtPath(doc, 'tool.mypy')).toBeUndefined();
    expect(getAtPath(doc, 'tool.ruff.line-length.deeper')).toBeUndefined();
  });
});
