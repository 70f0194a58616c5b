import { TokenKind, KEYWORDS } from './tokens';

export const NUM_SYMBOLS = 128;
export const NO_STATE = -1;

/** Symbol fed before the first character of a line. */
export const SYMBOL_START = 2;
/** Symbol probed after the last character of a line. */
export const SYMBOL_STOP = 3;
/** Symbols below this are control symbols, not input. */
export const SYMBOL_MIN_INPUT = 9;

/**
 * Deterministic finite automaton stored as a dense transition table.
 * State 0 is the start state. A stop id of 0 marks a non-accepting state;
 * any other stop id is the token kind accepted there.
 */
export class TransitionTable {
  private rows: Int32Array[] = [];
  private stops: number[] = [];

  constructor() {
    this.addState();
  }

  addState(stop = 0): number {
    this.rows.push(new Int32Array(NUM_SYMBOLS).fill(NO_STATE));
    this.stops.push(stop);
    return this.rows.length - 1;
  }

  /** Create a state with the same transitions and stop id as `source`. */
  cloneState(source: number): number {
    const state = this.addState(this.stops[source]);
    this.rows[state].set(this.rows[source]);
    return state;
  }

  setStop(state: number, stop: number): void {
    this.stops[state] = stop;
  }

  getStop(state: number): number {
    return state >= 0 ? this.stops[state] : 0;
  }

  connect(from: number, symbols: Iterable<number>, to: number): void {
    for (const symbol of symbols) {
      this.rows[from][symbol] = to;
    }
  }

  /** Raw table entry, without the control-symbol rule. */
  target(state: number, symbol: number): number {
    if (state < 0 || symbol < 0 || symbol >= NUM_SYMBOLS) return NO_STATE;
    return this.rows[state][symbol];
  }

  next(state: number, symbol: number): number {
    const nextState = this.target(state, symbol);
    // An unused control symbol leaves the automaton where it was.
    if (symbol < SYMBOL_MIN_INPUT && nextState === NO_STATE) return state;
    return nextState;
  }

  nextString(state: number, text: string): number {
    for (let i = 0; i < text.length; i++) {
      state = this.next(state, text.charCodeAt(i));
    }
    return state;
  }

  /** Stop id for a whole line of text, or 0 if the text is not one token. */
  test(text: string): number {
    let state = this.next(0, SYMBOL_START);
    state = this.nextString(state, text);
    const eolState = this.next(state, SYMBOL_STOP);
    return Math.max(this.getStop(state), this.getStop(eolState));
  }
}

// ─── Symbol Classes ──────────────────────────────────────

export function range(first: string, last: string): number[] {
  const out: number[] = [];
  for (let code = first.charCodeAt(0); code <= last.charCodeAt(0); code++) {
    out.push(code);
  }
  return out;
}

export function chars(text: string): number[] {
  return Array.from(text, ch => ch.charCodeAt(0));
}

/** Every input symbol except the listed characters. */
export function allExcept(excluded: string): number[] {
  const skip = new Set(chars(excluded));
  const out: number[] = [];
  for (let code = SYMBOL_MIN_INPUT; code < NUM_SYMBOLS; code++) {
    if (!skip.has(code)) out.push(code);
  }
  return out;
}

const LETTERS = [...range('a', 'z'), ...range('A', 'Z'), ...chars('_')];
const WORD_CHARS = [...LETTERS, ...range('0', '9')];
const SPACE_CHARS = chars(' \t\n\v\f\r');

// ─── WordLang Rules ──────────────────────────────────────

function addComments(table: TransitionTable): void {
  const slash = table.addState();
  const body = table.addState(TokenKind.COMMENT);
  table.connect(0, chars('/'), slash);
  table.connect(slash, chars('/'), body);
  table.connect(body, allExcept('\n'), body);
}

function addWhitespace(table: TransitionTable): void {
  const space = table.addState(TokenKind.WHITESPACE);
  table.connect(0, SPACE_CHARS, space);
}

/**
 * Strings: `"` then any run of non-quote, non-newline characters or
 * backslash pairs, then `"`. A backslash is also an ordinary character, so
 * `\"` both escapes a quote and may close the string; the accepting states
 * keep the in-string transitions to cover that.
 */
function addStrings(table: TransitionTable): void {
  const body = table.addState();
  const escape = table.addState();
  const closed = table.addState(TokenKind.STRING);
  const closedOrBody = table.addState(TokenKind.STRING);

  table.connect(0, chars('"'), body);

  for (const state of [body, closedOrBody]) {
    table.connect(state, allExcept('\n"\\'), body);
    table.connect(state, chars('"'), closed);
    table.connect(state, chars('\\'), escape);
  }

  table.connect(escape, allExcept('\n"\\'), body);
  table.connect(escape, chars('"'), closedOrBody);
  table.connect(escape, chars('\\'), escape);
}

/**
 * Identifiers, with the keywords threaded through as a trie of identifier
 * states so that `filter` accepts FILTER while `filters` stays IDENTIFIER.
 */
function addIdentifiers(table: TransitionTable): void {
  const ident = table.addState(TokenKind.IDENTIFIER);
  table.connect(0, LETTERS, ident);
  table.connect(ident, WORD_CHARS, ident);

  for (const [word, kind] of Object.entries(KEYWORDS)) {
    let state = 0;
    for (const symbol of chars(word)) {
      let nextState = table.target(state, symbol);
      if (nextState === ident) {
        nextState = table.cloneState(ident);
        table.connect(state, [symbol], nextState);
      }
      state = nextState;
    }
    table.setStop(state, kind);
  }
}

export function buildWordLangTable(): TransitionTable {
  const table = new TransitionTable();
  addComments(table);
  addWhitespace(table);
  addStrings(table);
  addIdentifiers(table);
  return table;
}

export const WORDLANG_TABLE = buildWordLangTable();
