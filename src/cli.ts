import * as fs from 'fs';
import * as path from 'path';
import { Lexer } from './lexer/lexer';
import { tokenName } from './lexer/tokens';
import { Parser } from './parser/parser';
import { formatTree } from './parser/printer';
import { Interpreter } from './runtime/interpreter';
import { WordLangError, InternalError } from './runtime/errors';
import { loadConfig, loadConfigForScript, WordLangConfig } from './runtime/config';

const USAGE = `
wordlang - set operations over the words in text files

Usage:
  wordlang <file>            Run a WordLang program
  wordlang --lex <file>      Tokenize and print tokens
  wordlang --ast <file>      Parse and print the syntax tree
  wordlang --help            Show this help message

Options:
  --trace                    Trace statements and file loads to stderr
  --config <path>            Path to wordlang.config.json (auto-detected by default)

Environment Variables:
  WORDLANG_TRACE             Set to "1" to enable tracing by default
`;

export interface CliIO {
  stdout: (line: string) => void;
  stderr: (line: string) => void;
}

const consoleIO: CliIO = {
  stdout: line => console.log(line),
  stderr: line => console.error(line),
};

const FLAGS_WITH_VALUES = new Set(['--config']);

function getArg(args: string[], flag: string): string | undefined {
  const idx = args.indexOf(flag);
  if (idx !== -1 && idx + 1 < args.length) {
    return args[idx + 1];
  }
  return undefined;
}

/**
 * Run the CLI with the given arguments. Returns the process exit status.
 */
export function runCli(args: string[], io: CliIO = consoleIO): number {
  if (args.includes('--help') || args.includes('-h')) {
    io.stdout(USAGE);
    return 0;
  }

  const flags = new Set(args.filter(a => a.startsWith('--')));
  const files: string[] = [];
  for (let i = 0; i < args.length; i++) {
    if (args[i].startsWith('--')) {
      if (FLAGS_WITH_VALUES.has(args[i])) i++;
      continue;
    }
    files.push(args[i]);
  }

  if (files.length !== 1) {
    io.stderr(`Error: Expected exactly one source file, got ${files.length}.`);
    io.stderr(USAGE);
    return 1;
  }

  const filePath = path.resolve(files[0]);
  if (!fs.existsSync(filePath)) {
    io.stderr(`Error: File not found: ${filePath}`);
    return 1;
  }

  try {
    const source = fs.readFileSync(filePath, 'utf-8');
    const explicitConfig = getArg(args, '--config');
    const config: WordLangConfig = explicitConfig
      ? loadConfig(explicitConfig)
      : loadConfigForScript(filePath);

    const tokens = new Lexer().tokenize(source);

    // Lex-only mode
    if (flags.has('--lex')) {
      for (const tok of tokens) {
        const text = tok.text ? ` ${JSON.stringify(tok.text)}` : '';
        io.stdout(`${tok.line}\t${tokenName(tok.kind)}${text}`);
      }
      return 0;
    }

    const program = new Parser({ decodeEscapes: config.decodeEscapes }).parse(tokens);

    // Parse-only mode
    if (flags.has('--ast')) {
      for (const line of formatTree(program.root)) io.stdout(line);
      return 0;
    }

    const interpreter = new Interpreter({
      output: io.stdout,
      diagnostics: io.stderr,
      baseDir: config.baseDir,
      printFormat: config.printFormat,
      warnOnUnreadableFiles: config.warnOnUnreadableFiles,
      trace: flags.has('--trace') || process.env.WORDLANG_TRACE === '1' || config.trace,
    });
    interpreter.run(program);
    return 0;
  } catch (e) {
    if (e instanceof WordLangError) {
      io.stderr(e.format());
      return 1;
    }
    if (e instanceof Error && !(e instanceof InternalError)) {
      io.stderr(`Error: ${e.message}`);
      return 1;
    }
    throw e;
  }
}
