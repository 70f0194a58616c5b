import * as path from 'path';
import * as AST from '../parser/ast';
import { InternalError } from './errors';
import { SlotTable } from './slots';
import { readWordFile, isFileSystemError } from './files';
import {
  WordSet,
  PrintFormat,
  EMPTY_WORDS,
  wordSet,
  union,
  difference,
  filterWords,
  formatWords,
  sortedWords,
} from './words';

export interface InterpreterOptions {
  /** Receives each line written by `print`. Defaults to console.log. */
  output?: (line: string) => void;
  /** Receives trace and warning lines. Defaults to console.error. */
  diagnostics?: (line: string) => void;
  /** Directory that relative paths in load() resolve against. Defaults to cwd. */
  baseDir?: string;
  printFormat?: PrintFormat;
  /** Report files that load() cannot read instead of skipping them silently. */
  warnOnUnreadableFiles?: boolean;
  trace?: boolean;
}

export class Interpreter {
  private slots = new SlotTable();
  private output: (line: string) => void;
  private diagnostics: (line: string) => void;
  private baseDir: string;
  private printFormat: PrintFormat;
  private warnOnUnreadableFiles: boolean;
  private traceEnabled: boolean;

  constructor(options: InterpreterOptions = {}) {
    this.output = options.output ?? (line => console.log(line));
    this.diagnostics = options.diagnostics ?? (line => console.error(line));
    this.baseDir = options.baseDir ?? process.cwd();
    this.printFormat = options.printFormat ?? 'legacy';
    this.warnOnUnreadableFiles = options.warnOnUnreadableFiles ?? false;
    this.traceEnabled = options.trace ?? false;
  }

  run(program: AST.Program): void {
    this.slots = new SlotTable(program.variables.length);
    this.evaluate(program.root);
  }

  evaluate(node: AST.Node): WordSet {
    switch (node.type) {
      case 'StatementBlock':
        for (const stmt of node.body) {
          if (this.traceEnabled && stmt.type !== 'StatementBlock') {
            this.trace(`line ${stmt.line}: ${stmt.type}`);
          }
          this.evaluate(stmt);
        }
        return EMPTY_WORDS;
      case 'Assign':
        return this.slots.set(node.target.slot, this.evaluate(node.value));
      case 'BinarySetOp':
        return this.evalBinary(node);
      case 'VariableRef':
        return this.slots.get(node.slot);
      case 'Literal':
        return wordSet(node.words);
      case 'Load':
        return this.evalLoad(node);
      case 'Print':
        for (const arg of node.args) {
          this.output(formatWords(this.evaluate(arg), this.printFormat));
        }
        return EMPTY_WORDS;
      case 'Filter':
      case 'FilterOut': {
        const words = this.evaluate(node.source);
        const patterns = this.evaluate(node.patterns);
        return filterWords(words, patterns, node.type === 'FilterOut');
      }
      default:
        return assertNever(node);
    }
  }

  private evalBinary(node: AST.BinarySetOp): WordSet {
    const left = this.evaluate(node.left);
    const right = this.evaluate(node.right);
    switch (node.operator) {
      case '+':
        return union(left, right);
      case '-':
        return difference(left, right);
      default:
        return assertNever(node.operator);
    }
  }

  private evalLoad(node: AST.Load): WordSet {
    const names = this.evaluate(node.source);
    const words = new Set<string>();

    for (const name of sortedWords(names)) {
      const filePath = path.resolve(this.baseDir, name);
      let fileWords: string[];
      try {
        fileWords = readWordFile(filePath);
      } catch (error) {
        if (!isFileSystemError(error)) throw error;
        if (this.warnOnUnreadableFiles) {
          this.diagnostics(`  [warn] line ${node.line}: cannot read "${name}" (${error.code})`);
        }
        this.trace(`load skipped "${filePath}": ${error.message}`);
        continue;
      }
      for (const word of fileWords) words.add(word);
      this.trace(`load read ${fileWords.length} words from "${filePath}"`);
    }

    return words;
  }

  private trace(message: string): void {
    if (this.traceEnabled) {
      this.diagnostics(`  [trace] ${message}`);
    }
  }
}

function assertNever(value: never): never {
  throw new InternalError(`unexpected node ${JSON.stringify(value)}`);
}
