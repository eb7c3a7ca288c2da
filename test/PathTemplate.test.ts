import { describe, expect, it } from 'vitest';
import { BASE_CONVERTERS, compilePath, mergeConverters, PathTemplateError, type Converter } from '../lib';

describe('compilePath', () => {
  describe('static templates', () => {
    it('should match by string equality', () => {
      const template = compilePath('/users/me', BASE_CONVERTERS);

      expect(template.isStatic).toBe(true);
      expect(template.match('/users/me')).toEqual({});
      expect(template.match('/users/me/')).toBeNull();
      expect(template.match('/users')).toBeNull();
    });

    it('should treat regex characters literally', () => {
      const template = compilePath('/files/a.b+c', BASE_CONVERTERS);

      expect(template.match('/files/a.b+c')).toEqual({});
      expect(template.match('/files/aXb+c')).toBeNull();
    });
  });

  describe('parameters', () => {
    it('should capture a string parameter by default', () => {
      const template = compilePath('/users/{name}', BASE_CONVERTERS);

      expect(template.isStatic).toBe(false);
      expect(template.paramNames).toEqual(['name']);
      expect(template.match('/users/ada')).toEqual({ name: 'ada' });
    });

    it('should anchor at both ends', () => {
      const template = compilePath('/items/{id}', BASE_CONVERTERS);

      expect(template.match('/items/1/extra')).toBeNull();
      expect(template.match('/prefix/items/1')).toBeNull();
    });

    it('should keep literal text around parameters', () => {
      const template = compilePath('/files/{name}.{ext}', BASE_CONVERTERS);

      expect(template.match('/files/report.pdf')).toEqual({ name: 'report', ext: 'pdf' });
    });

    it('should convert typed parameters', async () => {
      const template = compilePath('/items/{id:int}/price/{amount:float}', BASE_CONVERTERS);
      const raw = template.match('/items/42/price/9.5');

      expect(raw).toEqual({ id: '42', amount: '9.5' });
      expect(await template.convert({ id: '42', amount: '9.5' })).toEqual({ id: 42, amount: 9.5 });
    });

    it('should reject text outside the converter pattern', () => {
      const template = compilePath('/items/{id:int}', BASE_CONVERTERS);

      expect(template.match('/items/abc')).toBeNull();
    });

    it('should lowercase uuids', async () => {
      const template = compilePath('/orders/{id:uuid}', BASE_CONVERTERS);
      const raw = template.match('/orders/ABCDEF01-2345-6789-ABCD-EF0123456789');

      expect(raw).not.toBeNull();
      expect(await template.convert({ id: 'ABCDEF01-2345-6789-ABCD-EF0123456789' })).toEqual({
        id: 'abcdef01-2345-6789-abcd-ef0123456789',
      });
    });

    it('should let the path converter span separators', () => {
      const template = compilePath('/static/{file:path}', BASE_CONVERTERS);

      expect(template.match('/static/css/site/main.css')).toEqual({ file: 'css/site/main.css' });
    });

    it('should fall back to the string converter for unknown types', () => {
      const template = compilePath('/tags/{tag:colour}', BASE_CONVERTERS);

      expect(template.match('/tags/red')).toEqual({ tag: 'red' });
      expect(template.match('/tags/red/blue')).toBeNull();
    });

    it.each(['constructor', 'toString', 'valueOf', '__proto__'])(
      'should treat the %s tag as an unknown type',
      (type) => {
        const template = compilePath(`/x/{id:${type}}`, BASE_CONVERTERS);

        expect(template.match('/x/abc')).toEqual({ id: 'abc' });
        expect(template.match('/x/undefined')).toEqual({ id: 'undefined' });
      },
    );

    it('should refuse integers beyond the safe range', async () => {
      const template = compilePath('/items/{id:int}', BASE_CONVERTERS);

      expect(await template.convert({ id: '9007199254740991' })).toEqual({ id: 9007199254740991 });
      await expect(template.convert({ id: '9007199254740993' })).rejects.toThrow(RangeError);
    });

    it('should accept dashes in parameter names', () => {
      const template = compilePath('/posts/{post-id:int}', BASE_CONVERTERS);

      expect(template.match('/posts/7')).toEqual({ 'post-id': '7' });
    });

    it('should use custom converters, including async ones', async () => {
      const upper: Converter<string> = {
        pattern: '[a-z]+',
        convert: async (raw) => raw.toUpperCase(),
      };
      const template = compilePath('/codes/{code:upper}', mergeConverters(BASE_CONVERTERS, { upper }));

      expect(template.match('/codes/X1')).toBeNull();
      expect(await template.convert({ code: 'abc' })).toEqual({ code: 'ABC' });
    });
  });

  describe('malformed templates', () => {
    it.each([
      ['/users/{id', "Invalid path template \"/users/{id\": unbalanced '{'"],
      ['/users/id}', "Invalid path template \"/users/id}\": unbalanced '}'"],
      ['/users/{a{b}}', 'Invalid path template "/users/{a{b}}": nested parameter markers'],
      ['/users/{}', 'Invalid path template "/users/{}": malformed parameter marker "{}"'],
      ['/users/{1id}', 'Invalid path template "/users/{1id}": malformed parameter marker "{1id}"'],
      ['/users/{id:}', 'Invalid path template "/users/{id:}": malformed parameter marker "{id:}"'],
      ['/users/{id:int:x}', 'Invalid path template "/users/{id:int:x}": malformed parameter marker "{id:int:x}"'],
      ['/{id}/{id}', 'Invalid path template "/{id}/{id}": duplicate parameter "id"'],
    ])('should reject %s', (template, message) => {
      expect(() => compilePath(template, BASE_CONVERTERS)).toThrow(PathTemplateError);
      expect(() => compilePath(template, BASE_CONVERTERS)).toThrow(message);
    });
  });
});

describe('mergeConverters', () => {
  it('should let later maps win', () => {
    const first: Converter = { pattern: 'a', convert: (raw) => raw };
    const second: Converter = { pattern: 'b', convert: (raw) => raw };

    const merged = mergeConverters(BASE_CONVERTERS, { custom: first }, undefined, { custom: second });

    expect(merged.custom).toBe(second);
    expect(merged.int).toBe(BASE_CONVERTERS.int);
  });
});
