import { Token, TokenKind, isIgnoredKind } from './tokens';
import { TransitionTable, WORDLANG_TABLE, NO_STATE, SYMBOL_START, SYMBOL_STOP } from './dfa';

/**
 * Maximal-munch scanner driven by a transition table.
 *
 * `nextToken` is incremental: each call consumes one lexeme from the input
 * it is given, starting where the previous call stopped.
 */
export class Lexer {
  private table: TransitionTable;
  private pos = 0;
  private line = 1;

  constructor(table: TransitionTable = WORDLANG_TABLE) {
    this.table = table;
  }

  reset(): void {
    this.pos = 0;
    this.line = 1;
  }

  nextToken(input: string): Token {
    if (this.pos >= input.length) {
      return { kind: TokenKind.EOF, text: '', line: this.line };
    }

    const start = this.pos;
    let cur = start;
    let bestPos = start;
    let bestKind: number = TokenKind.EOF;
    let state = 0;

    if (start === 0 || input[start - 1] === '\n') {
      state = this.table.next(state, SYMBOL_START);
    }

    while (state !== NO_STATE && cur < input.length) {
      state = this.table.next(state, input.charCodeAt(cur++));
      const stop = this.table.getStop(state);
      if (stop > 0) {
        bestPos = cur;
        bestKind = stop;
      }
      // Probe the end-of-line symbol where a line ends.
      if (cur === input.length || input[cur] === '\n') {
        const eolStop = this.table.getStop(this.table.next(state, SYMBOL_STOP));
        if (eolStop > 0) {
          bestPos = cur;
          bestKind = eolStop;
        }
      }
    }

    // Nothing matched: emit one raw character as its own token.
    if (bestPos === start) {
      const code = input.codePointAt(start) ?? 0;
      bestKind = code;
      bestPos = start + (code > 0xffff ? 2 : 1);
    }

    const text = input.slice(start, bestPos);
    this.pos = bestPos;

    const line = this.line;
    for (const ch of text) {
      if (ch === '\n') this.line++;
    }

    return { kind: bestKind, text, line };
  }

  /** Scan the whole source, dropping comments and whitespace. Ends with EOF. */
  tokenize(source: string): Token[] {
    this.reset();
    const tokens: Token[] = [];
    for (;;) {
      const token = this.nextToken(source);
      if (token.kind === TokenKind.EOF) {
        tokens.push(token);
        return tokens;
      }
      if (!isIgnoredKind(token.kind)) tokens.push(token);
    }
  }
}
