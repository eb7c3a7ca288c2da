/**
 * Path parameter converters
 *
 * A converter owns the regular expression a parameter segment must match and the
 * function turning the matched text into a typed value. Conversion may be async.
 *
 * @module routing/converters
 */

export interface Converter<T = unknown> {

  /**
   * Regular expression source for the segment, without anchors or capture groups
   */
  readonly pattern: string;

  convert(raw: string): T | Promise<T>;
}

export type ConverterMap = Record<string, Converter>;

export const StringConverter: Converter<string> = {
  pattern: '[^/]+',
  convert: (raw) => raw,
};

export const IntConverter: Converter<number> = {
  pattern: '[0-9]+',
  convert: (raw) => {
    const value = Number.parseInt(raw, 10);

    if (!Number.isSafeInteger(value)) {
      throw new RangeError(`${raw} is outside the safe integer range`);
    }

    return value;
  },
};

export const FloatConverter: Converter<number> = {
  pattern: '[0-9]+(?:\\.[0-9]+)?',
  convert: (raw) => Number.parseFloat(raw),
};

export const UUIDConverter: Converter<string> = {
  pattern: '[0-9a-fA-F]{8}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{4}-[0-9a-fA-F]{12}',
  convert: (raw) => raw.toLowerCase(),
};

// Spans separators; only sensible as the last parameter
export const PathConverter: Converter<string> = {
  pattern: '.+',
  convert: (raw) => raw,
};

export const DEFAULT_CONVERTER_TYPE = 'str';

export const BASE_CONVERTERS: Readonly<ConverterMap> = Object.freeze({
  str: StringConverter,
  int: IntConverter,
  float: FloatConverter,
  uuid: UUIDConverter,
  path: PathConverter,
});

/**
 * Merges converter maps; later maps win for the same type tag
 *
 * @example
 * ```typescript
 * mergeConverters(BASE_CONVERTERS, routerConverters, routeConverters);
 * ```
 */
export function mergeConverters(...maps: Array<ConverterMap | undefined>): ConverterMap {
  const merged: ConverterMap = {};

  for (const map of maps) {
    if (map) {
      Object.assign(merged, map);
    }
  }

  return merged;
}
