/**
 * Deep merge for config.yaml + config.local.yaml.
 *
 * Semantics:
 * - Objects: recursive deep merge
 * - Arrays: replace entirely
 * - null values: delete the key from result
 * - Scalars: override
 */

type Mapping = Record<string, unknown>;

function isPlainObject(value: unknown): value is Mapping {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function deepMerge(base: Mapping, override: Mapping): Mapping {
  const result: Mapping = { ...base };

  for (const [key, overrideValue] of Object.entries(override)) {
    if (overrideValue === null) {
      delete result[key];
      continue;
    }

    const baseValue = result[key];
    if (isPlainObject(baseValue) && isPlainObject(overrideValue)) {
      result[key] = deepMerge(baseValue, overrideValue);
      continue;
    }

    result[key] = overrideValue;
  }

  return result;
}
