/**
 * Unit Tests: Directive Parser
 *
 * compile() is the only place a format string is interpreted, so these tests
 * pin the segment list it produces for every directive form and the byte
 * offsets it reports for malformed input.
 */
import { compile } from '@application/format/DirectiveParser';
import { TemplateSyntaxError } from '@shared/errors/AppError';

function compileError(source: string): TemplateSyntaxError {
  try {
    compile(source);
  } catch (err) {
    if (err instanceof TemplateSyntaxError) return err;
    throw err;
  }
  throw new Error(`expected "${source}" to fail compilation`);
}

describe('compile()', () => {
  describe('literals', () => {
    it('should keep a directive-free template as one literal segment', () => {
      const template = compile('plain text,  with  spaces\t');

      expect(template.segments).toEqual([{ kind: 'literal', text: 'plain text,  with  spaces\t' }]);
    });

    it('should produce no segments for an empty template', () => {
      expect(compile('').segments).toEqual([]);
    });

    it('should turn %% into a literal percent merged with the surrounding text', () => {
      expect(compile('100%% done').segments).toEqual([{ kind: 'literal', text: '100% done' }]);
    });

    it('should not treat parentheses after %% as a sub-format', () => {
      expect(compile('%%(x)').segments).toEqual([{ kind: 'literal', text: '%(x)' }]);
    });

    it('should keep the source string on the template', () => {
      expect(compile('%s %b').source).toBe('%s %b');
    });
  });

  describe('built-in directives', () => {
    it('should compile single-character keys with the literal between them', () => {
      expect(compile('%s %b').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'builtin', key: 's' } } },
        { kind: 'literal', text: ' ' },
        { kind: 'directive', spec: { directive: { type: 'builtin', key: 'b' } } },
      ]);
    });

    it.each(['t', 'a', 'r', 'M', 'U', 'Q', 'V', 's', 'b', 'T', 'D'])(
      'should accept %%%s',
      (key) => {
        expect(compile(`%${key}`).segments).toEqual([
          { kind: 'directive', spec: { directive: { type: 'builtin', key } } },
        ]);
      },
    );
  });

  describe('named directives', () => {
    it('should compile request and response headers', () => {
      expect(compile('%{User-Agent}i|%{Content-Type}o').segments).toEqual([
        {
          kind: 'directive',
          spec: { directive: { type: 'header', name: 'User-Agent', direction: 'request' } },
        },
        { kind: 'literal', text: '|' },
        {
          kind: 'directive',
          spec: { directive: { type: 'header', name: 'Content-Type', direction: 'response' } },
        },
      ]);
    });

    it('should compile custom request and response tags', () => {
      expect(compile('%{X}xi%{Y_2}xo').segments).toEqual([
        {
          kind: 'directive',
          spec: { directive: { type: 'customTag', name: 'X', direction: 'request' } },
        },
        {
          kind: 'directive',
          spec: { directive: { type: 'customTag', name: 'Y_2', direction: 'response' } },
        },
      ]);
    });

    it('should compile the peer address and environment directives', () => {
      expect(compile('%{r}a %{HOME}e').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'peerAddress' } } },
        { kind: 'literal', text: ' ' },
        { kind: 'directive', spec: { directive: { type: 'environment', name: 'HOME' } } },
      ]);
    });

    it('should leave characters after a header suffix as literal text', () => {
      expect(compile('%{Host}ix').segments).toEqual([
        {
          kind: 'directive',
          spec: { directive: { type: 'header', name: 'Host', direction: 'request' } },
        },
        { kind: 'literal', text: 'x' },
      ]);
    });
  });

  describe('sub-formats', () => {
    it('should attach trailing parenthesised text to the directive', () => {
      expect(compile('%b(bytes)').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'builtin', key: 'b' }, subFormat: 'bytes' } },
      ]);
    });

    it('should keep directives inside a sub-format unparsed', () => {
      expect(compile('%s(%T)').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'builtin', key: 's' }, subFormat: '%T' } },
      ]);
    });

    it('should allow balanced nested parentheses', () => {
      expect(compile('%D(ms (approx)) end').segments).toEqual([
        {
          kind: 'directive',
          spec: { directive: { type: 'builtin', key: 'D' }, subFormat: 'ms (approx)' },
        },
        { kind: 'literal', text: ' end' },
      ]);
    });

    it('should attach a sub-format to named directives too', () => {
      expect(compile('%{r}a(peer)').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'peerAddress' }, subFormat: 'peer' } },
      ]);
    });

    it('should treat a parenthesis after a space as literal text', () => {
      expect(compile('%b (bytes)').segments).toEqual([
        { kind: 'directive', spec: { directive: { type: 'builtin', key: 'b' } } },
        { kind: 'literal', text: ' (bytes)' },
      ]);
    });
  });

  describe('errors', () => {
    it('should reject an unterminated brace', () => {
      const err = compileError('%{FOO');

      expect(err.offset).toBe(0);
      expect(err.message).toBe("Invalid access log format at byte 0: unterminated '{'");
    });

    it('should reject an unknown single-character key', () => {
      const err = compileError('%Z');

      expect(err.offset).toBe(0);
      expect(err.message).toContain("unknown directive '%Z'");
    });

    it('should treat directive keys as case-sensitive', () => {
      expect(() => compile('%S')).toThrow(TemplateSyntaxError);
    });

    it('should report the offset of the failing directive', () => {
      expect(compileError('abc %Z').offset).toBe(4);
    });

    it('should report offsets in UTF-8 bytes', () => {
      expect(compileError('é %Z').offset).toBe(3);
    });

    it('should reject an unterminated sub-format and point at the parenthesis', () => {
      const err = compileError('%b(bytes');

      expect(err.offset).toBe(2);
      expect(err.message).toContain("unterminated '('");
    });

    it('should reject a dangling percent sign', () => {
      const err = compileError('100%');

      expect(err.offset).toBe(3);
      expect(err.message).toContain("dangling '%'");
    });

    it('should reject an empty name', () => {
      expect(compileError('%{}i').message).toContain('empty directive name');
    });

    it('should reject invalid characters in a name', () => {
      expect(compileError('%{x y}i').message).toContain("invalid character ' '");
    });

    it('should reject a missing or unknown suffix', () => {
      expect(compileError('%{FOO}').message).toContain("expected i, o, xi, xo, a or e after '%{FOO}'");
      expect(compileError('%{FOO}xz').message).toContain('expected i, o, xi, xo, a or e');
    });

    it('should only accept r as an address name', () => {
      expect(compileError('%{q}a').message).toContain("unsupported address directive '%{q}a'");
    });

    it('should fail the whole template when any directive is malformed', () => {
      expect(() => compile('%s %b %Z %T')).toThrow(TemplateSyntaxError);
    });
  });
});

describe('Template', () => {
  it('should be frozen', () => {
    const template = compile('%s %b(bytes)');

    expect(Object.isFrozen(template)).toBe(true);
    expect(Object.isFrozen(template.segments)).toBe(true);
  });

  it('should list referenced custom tags per direction without duplicates', () => {
    const template = compile('%{A}xi %{B}xo %{A}xi %{C}i');

    expect(template.customTags('request')).toEqual(['A']);
    expect(template.customTags('response')).toEqual(['B']);
  });
});
