export { Lexer } from './lexer/lexer';
export { Token, TokenKind, KEYWORDS, tokenName } from './lexer/tokens';
export { TransitionTable, WORDLANG_TABLE, buildWordLangTable, SYMBOL_START, SYMBOL_STOP } from './lexer/dfa';
export { Parser, ParserOptions } from './parser/parser';
export { ScopeResolver } from './parser/scope';
export { formatTree } from './parser/printer';
export * as AST from './parser/ast';
export { Interpreter, InterpreterOptions } from './runtime/interpreter';
export { WordLangError, InternalError, Outcome, attempt } from './runtime/errors';
export { WordSet, PrintFormat, union, difference, filterWords, formatWords } from './runtime/words';
export { WordLangConfig, loadConfig, loadConfigForScript } from './runtime/config';

import { Lexer } from './lexer/lexer';
import { Parser, ParserOptions } from './parser/parser';
import { Interpreter, InterpreterOptions } from './runtime/interpreter';
import { Outcome, attempt } from './runtime/errors';
import * as AST from './parser/ast';

export type ExecuteOptions = ParserOptions & InterpreterOptions;

/**
 * Tokenize and parse a WordLang source string.
 */
export function compile(source: string, options?: ParserOptions): Outcome<AST.Program> {
  return attempt(() => {
    const tokens = new Lexer().tokenize(source);
    return new Parser(options).parse(tokens);
  });
}

/**
 * Compile and run a WordLang source string. Nothing runs unless the whole
 * source parses.
 */
export function execute(source: string, options: ExecuteOptions = {}): Outcome<AST.Program> {
  const compiled = compile(source, options);
  if (!compiled.ok) return compiled;
  return attempt(() => {
    new Interpreter(options).run(compiled.value);
    return compiled.value;
  });
}
