import { Lexer } from '../src/lexer/lexer';
import { Token, TokenKind, charKind, tokenName } from '../src/lexer/tokens';

describe('Lexer', () => {
  function tokenize(source: string): Token[] {
    return new Lexer().tokenize(source);
  }

  function kinds(source: string): number[] {
    return tokenize(source).map(t => t.kind);
  }

  function tokenValues(source: string) {
    return tokenize(source)
      .filter(t => t.kind !== TokenKind.EOF)
      .map(t => ({ kind: t.kind, text: t.text }));
  }

  describe('basic tokens', () => {
    it('should tokenize an empty source', () => {
      expect(tokenize('')).toEqual([{ kind: TokenKind.EOF, text: '', line: 1 }]);
    });

    it('should tokenize keywords', () => {
      expect(kinds('List print foreach load filter filter_out in')).toEqual([
        TokenKind.LIST,
        TokenKind.PRINT,
        TokenKind.FOREACH,
        TokenKind.LOAD,
        TokenKind.FILTER,
        TokenKind.FILTER_OUT,
        TokenKind.IN,
        TokenKind.EOF,
      ]);
    });

    it('should treat longer words that start with a keyword as identifiers', () => {
      expect(tokenValues('Lists printer filters in2 _x list')).toEqual([
        { kind: TokenKind.IDENTIFIER, text: 'Lists' },
        { kind: TokenKind.IDENTIFIER, text: 'printer' },
        { kind: TokenKind.IDENTIFIER, text: 'filters' },
        { kind: TokenKind.IDENTIFIER, text: 'in2' },
        { kind: TokenKind.IDENTIFIER, text: '_x' },
        { kind: TokenKind.IDENTIFIER, text: 'list' },
      ]);
    });

    it('should prefer the longest match', () => {
      expect(tokenValues('filter_out filter_outs')).toEqual([
        { kind: TokenKind.FILTER_OUT, text: 'filter_out' },
        { kind: TokenKind.IDENTIFIER, text: 'filter_outs' },
      ]);
    });

    it('should tokenize punctuation as single-character kinds', () => {
      expect(tokenValues('List a = "cat";')).toEqual([
        { kind: TokenKind.LIST, text: 'List' },
        { kind: TokenKind.IDENTIFIER, text: 'a' },
        { kind: charKind('='), text: '=' },
        { kind: TokenKind.STRING, text: '"cat"' },
        { kind: charKind(';'), text: ';' },
      ]);
    });
  });

  describe('strings', () => {
    it('should keep the quotes in the lexeme', () => {
      expect(tokenValues('"hello world"')).toEqual([
        { kind: TokenKind.STRING, text: '"hello world"' },
      ]);
    });

    it('should read an escaped quote as part of the string', () => {
      expect(tokenValues('"a\\"b"')).toEqual([
        { kind: TokenKind.STRING, text: '"a\\"b"' },
      ]);
    });

    it('should fall back to a raw quote for an unterminated string', () => {
      expect(tokenValues('"abc')).toEqual([
        { kind: charKind('"'), text: '"' },
        { kind: TokenKind.IDENTIFIER, text: 'abc' },
      ]);
    });

    it('should not let a string cross a newline', () => {
      expect(kinds('"ab\ncd"')).toEqual([
        charKind('"'),
        TokenKind.IDENTIFIER,
        TokenKind.IDENTIFIER,
        charKind('"'),
        TokenKind.EOF,
      ]);
    });
  });

  describe('comments and whitespace', () => {
    it('should drop comments and whitespace', () => {
      expect(kinds('List a; // comment here\nprint(a);')).toEqual([
        TokenKind.LIST,
        TokenKind.IDENTIFIER,
        charKind(';'),
        TokenKind.PRINT,
        charKind('('),
        TokenKind.IDENTIFIER,
        charKind(')'),
        charKind(';'),
        TokenKind.EOF,
      ]);
    });

    it('should treat a single slash as punctuation', () => {
      expect(kinds('a / b')).toEqual([
        TokenKind.IDENTIFIER,
        charKind('/'),
        TokenKind.IDENTIFIER,
        TokenKind.EOF,
      ]);
    });
  });

  describe('line tracking', () => {
    it('should stamp each token with its starting line', () => {
      const tokens = tokenize('a\n\nb // note\nc');
      expect(tokens.map(t => t.line)).toEqual([1, 3, 4, 4]);
    });

    it('should count newlines inside comments', () => {
      const tokens = tokenize('// one\n// two\nx');
      expect(tokens[0]).toEqual({ kind: TokenKind.IDENTIFIER, text: 'x', line: 3 });
    });
  });

  describe('fallback', () => {
    it('should emit unknown characters as their code point', () => {
      expect(tokenValues('é')).toEqual([{ kind: 0xe9, text: 'é' }]);
    });

    it('should keep surrogate pairs together', () => {
      expect(tokenValues('😀')).toEqual([{ kind: 0x1f600, text: '😀' }]);
    });
  });

  describe('nextToken', () => {
    it('should consume one lexeme per call, whitespace included', () => {
      const lexer = new Lexer();
      const input = 'List  x';
      const seen: Token[] = [];
      for (let i = 0; i < 5; i++) seen.push(lexer.nextToken(input));
      expect(seen.map(t => [t.kind, t.text])).toEqual([
        [TokenKind.LIST, 'List'],
        [TokenKind.WHITESPACE, ' '],
        [TokenKind.WHITESPACE, ' '],
        [TokenKind.IDENTIFIER, 'x'],
        [TokenKind.EOF, ''],
      ]);
    });
  });

  describe('tokenName', () => {
    it('should quote single characters and name the rest', () => {
      expect(tokenName(charKind(';'))).toBe("';'");
      expect(tokenName(TokenKind.LIST)).toBe('LIST');
      expect(tokenName(TokenKind.EOF)).toBe('EOF');
    });
  });

  describe('non-ASCII input', () => {
    it('should end a comment at a non-ASCII character', () => {
      expect(tokenValues('a // é x')).toEqual([
        { kind: TokenKind.IDENTIFIER, text: 'a' },
        { kind: charKind('é'), text: 'é' },
        { kind: TokenKind.IDENTIFIER, text: 'x' },
      ]);
    });
  });
});
