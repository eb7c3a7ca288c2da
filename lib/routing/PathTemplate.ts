import { PathTemplateError } from '../errors';
import { type Converter, type ConverterMap, DEFAULT_CONVERTER_TYPE, StringConverter } from './converters';

const IDENTIFIER = /^[A-Za-z_][A-Za-z0-9_-]*$/;

export interface LiteralSegment {
  kind: 'literal';
  value: string;
}

export interface ParamSegment {
  kind: 'param';
  name: string;
  type: string;
  converter: Converter;
}

export type PathSegment = LiteralSegment | ParamSegment;

function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

/**
 * Compiled path template
 *
 * Immutable once built. A template without parameters matches by string equality;
 * any other template matches through an anchored expression, so `/items/{id}` never
 * matches `/items/1/extra`.
 *
 * @example
 * ```typescript
 * const template = compilePath('/items/{id:int}', BASE_CONVERTERS);
 *
 * template.match('/items/42'); // { id: '42' }
 * await template.convert({ id: '42' }); // { id: 42 }
 * template.match('/items/abc'); // null
 * ```
 */
export class PathTemplate {

  public readonly raw: string;

  public readonly segments: readonly PathSegment[];

  /**
   * Parameter name → converter
   */
  public readonly converters: ReadonlyMap<string, Converter>;

  private readonly expression: RegExp | null;

  /**
   * Capture group name → parameter name (parameter names may contain `-`)
   */
  private readonly groups: ReadonlyMap<string, string>;

  public constructor(raw: string, segments: PathSegment[]) {
    const converters = new Map<string, Converter>();
    const groups = new Map<string, string>();
    let source = '';

    for (const segment of segments) {
      if (segment.kind === 'literal') {
        source += escapeRegExp(segment.value);
        continue;
      }

      const group = `p${groups.size}`;

      groups.set(group, segment.name);
      converters.set(segment.name, segment.converter);
      source += `(?<${group}>${segment.converter.pattern})`;
    }

    this.raw = raw;
    this.segments = Object.freeze([...segments]);
    this.converters = converters;
    this.groups = groups;
    this.expression = groups.size === 0 ? null : new RegExp(`^${source}$`);
  }

  /**
   * True when the template has no parameters
   */
  public get isStatic(): boolean {
    return this.expression === null;
  }

  public get paramNames(): string[] {
    return Array.from(this.converters.keys());
  }

  /**
   * Structural match; returns the raw parameter text or null
   */
  public match(path: string): Record<string, string> | null {
    if (!this.expression) {
      return path === this.raw ? {} : null;
    }

    return this.extract(this.expression.exec(path));
  }

  /**
   * Runs every parameter's converter; converters may be async
   */
  public async convert(rawParams: Record<string, string>): Promise<Record<string, unknown>> {
    const converted: Record<string, unknown> = {};

    for (const [name, value] of Object.entries(rawParams)) {
      const converter = this.converters.get(name) ?? StringConverter;

      converted[name] = await converter.convert(value);
    }

    return converted;
  }

  public toString(): string {
    return this.raw;
  }

  private extract(result: RegExpExecArray | null): Record<string, string> | null {
    if (!result) {
      return null;
    }

    const params: Record<string, string> = {};

    for (const [group, name] of this.groups) {
      const value = result.groups?.[group];

      if (value !== undefined) {
        params[name] = value;
      }
    }

    return params;
  }

}

/**
 * Compiles a path template with `{name}` and `{name:type}` markers
 *
 * Unknown type tags fall back to the string converter.
 *
 * @param template - Path template, e.g. `/users/{id:int}/posts/{slug}`
 * @param converters - Type tag → converter, already merged by priority
 * @throws PathTemplateError when braces are unbalanced, a marker is malformed or a name repeats
 */
export function compilePath(template: string, converters: ConverterMap): PathTemplate {
  const segments: PathSegment[] = [];
  const seen = new Set<string>();
  let cursor = 0;

  const pushLiteral = (value: string): void => {
    if (value.includes('}')) {
      throw new PathTemplateError(template, "unbalanced '}'");
    }

    if (value) {
      segments.push({ kind: 'literal', value });
    }
  };

  while (cursor < template.length) {
    const open = template.indexOf('{', cursor);

    if (open === -1) {
      break;
    }

    const close = template.indexOf('}', open);

    if (close === -1) {
      throw new PathTemplateError(template, "unbalanced '{'");
    }

    const marker = template.slice(open + 1, close);

    if (marker.includes('{')) {
      throw new PathTemplateError(template, 'nested parameter markers');
    }

    const [name = '', type = DEFAULT_CONVERTER_TYPE, ...rest] = marker.split(':');

    if (rest.length > 0 || !IDENTIFIER.test(name) || !IDENTIFIER.test(type)) {
      throw new PathTemplateError(template, `malformed parameter marker "{${marker}}"`);
    }

    if (seen.has(name)) {
      throw new PathTemplateError(template, `duplicate parameter "${name}"`);
    }

    seen.add(name);
    pushLiteral(template.slice(cursor, open));
    // Own keys only: tags such as "constructor" must not resolve to Object.prototype members
    const converter = Object.hasOwn(converters, type) ? converters[type] : StringConverter;

    segments.push({ kind: 'param', name, type, converter });
    cursor = close + 1;
  }

  pushLiteral(template.slice(cursor));

  return new PathTemplate(template, segments);
}
