import { Token, TokenKind, charKind, tokenName } from '../lexer/tokens';
import { WordLangError } from '../runtime/errors';
import { ScopeResolver } from './scope';
import * as AST from './ast';

export interface ParserOptions {
  /** Decode backslash escapes in string literals instead of keeping them verbatim. */
  decodeEscapes?: boolean;
}

const SEMICOLON = charKind(';');
const COMMA = charKind(',');
const EQUALS = charKind('=');
const PLUS = charKind('+');
const MINUS = charKind('-');
const PIPE = charKind('|');
const LPAREN = charKind('(');
const RPAREN = charKind(')');
const LBRACE = charKind('{');
const RBRACE = charKind('}');

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;
  private scope = new ScopeResolver();
  private decodeEscapes: boolean;

  constructor(options: ParserOptions = {}) {
    this.decodeEscapes = options.decodeEscapes ?? false;
  }

  parse(tokens: Token[]): AST.Program {
    this.tokens = tokens;
    this.pos = 0;
    this.scope = new ScopeResolver();

    const body: AST.Node[] = [];
    while (!this.check(TokenKind.EOF)) {
      const stmt = this.parseStatement();
      if (stmt) body.push(stmt);
    }

    return {
      root: { type: 'StatementBlock', body, line: 1 },
      variables: this.scope.variables,
    };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatement(): AST.Node | null {
    const tok = this.peek();

    switch (tok.kind) {
      case TokenKind.PRINT:
        return this.parsePrint();
      case TokenKind.LIST:
        return this.parseDeclaration();
      case TokenKind.FOREACH:
        throw this.error(`'foreach' loops are not supported.`);
      case LBRACE:
        return this.parseBlock();
      case SEMICOLON:
        this.advance();
        return null;
      default: {
        const expr = this.parseExpression();
        this.expect(SEMICOLON);
        return expr;
      }
    }
  }

  private parsePrint(): AST.Print {
    const line = this.expect(TokenKind.PRINT).line;
    this.expect(LPAREN);
    const args: AST.Expression[] = [];
    do {
      args.push(this.parseExpression());
    } while (this.match(COMMA));
    this.expect(RPAREN);
    this.expect(SEMICOLON);
    return { type: 'Print', args, line };
  }

  /** `List name;` declares only; `List name = expr;` also assigns. */
  private parseDeclaration(): AST.Assign | null {
    this.expect(TokenKind.LIST);
    const nameTok = this.expect(TokenKind.IDENTIFIER);
    const slot = this.scope.declare(nameTok.line, nameTok.text);

    if (this.match(SEMICOLON)) return null;

    this.expect(EQUALS, `Expected ';' or '='.`);
    const target: AST.VariableRef = {
      type: 'VariableRef',
      slot,
      name: nameTok.text,
      line: nameTok.line,
    };
    const value = this.parseExpression();
    this.expect(SEMICOLON);
    return { type: 'Assign', target, value, line: nameTok.line };
  }

  private parseBlock(): AST.StatementBlock {
    const line = this.expect(LBRACE).line;
    this.scope.pushScope();

    const body: AST.Node[] = [];
    while (!this.check(RBRACE)) {
      if (this.check(TokenKind.EOF)) this.expect(RBRACE);
      const stmt = this.parseStatement();
      if (stmt) body.push(stmt);
    }

    this.scope.popScope();
    this.expect(RBRACE);
    return { type: 'StatementBlock', body, line };
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Expression {
    return this.parseAssignment();
  }

  /** Right-associative: `a = b = c` assigns c to b, then the result to a. */
  private parseAssignment(): AST.Expression {
    const target = this.parseAdditive();
    if (!this.check(EQUALS)) return target;

    const eq = this.advance();
    if (target.type !== 'VariableRef') {
      throw new WordLangError(`Left side of '=' must be a variable.`, eq.line);
    }
    const value = this.parseAssignment();
    return { type: 'Assign', target, value, line: eq.line };
  }

  private parseAdditive(): AST.Expression {
    let left = this.parsePipe();
    while (this.check(PLUS) || this.check(MINUS)) {
      const op = this.advance();
      const right = this.parsePipe();
      left = {
        type: 'BinarySetOp',
        operator: op.kind === PLUS ? '+' : '-',
        left,
        right,
        line: op.line,
      };
    }
    return left;
  }

  private parsePipe(): AST.Expression {
    let source = this.parseTerm();
    while (this.match(PIPE)) {
      const filterTok = this.advance();
      if (filterTok.kind !== TokenKind.FILTER && filterTok.kind !== TokenKind.FILTER_OUT) {
        throw new WordLangError(
          `Expected filter or filter_out after '|'. Found ${tokenName(filterTok.kind)}.`,
          filterTok.line,
        );
      }
      this.expect(LPAREN);
      const patterns = this.parseExpression();
      this.expect(RPAREN);
      source = filterTok.kind === TokenKind.FILTER
        ? { type: 'Filter', source, patterns, line: filterTok.line }
        : { type: 'FilterOut', source, patterns, line: filterTok.line };
    }
    return source;
  }

  private parseTerm(): AST.Expression {
    const tok = this.advance();

    switch (tok.kind) {
      case TokenKind.IDENTIFIER: {
        const slot = this.scope.lookup(tok.text);
        if (slot === undefined) {
          throw new WordLangError(`Unknown variable '${tok.text}'.`, tok.line);
        }
        return { type: 'VariableRef', slot, name: tok.text, line: tok.line };
      }
      case TokenKind.LOAD: {
        this.expect(LPAREN);
        const source = this.parseExpression();
        this.expect(RPAREN);
        return { type: 'Load', source, line: tok.line };
      }
      case TokenKind.STRING:
        return { type: 'Literal', words: [this.stringValue(tok.text)], line: tok.line };
      case LPAREN: {
        const expr = this.parseExpression();
        this.expect(RPAREN);
        return expr;
      }
      default:
        throw new WordLangError(`Expected expression. Found ${tokenName(tok.kind)}.`, tok.line);
    }
  }

  private stringValue(lexeme: string): string {
    const body = lexeme.slice(1, -1);
    if (!this.decodeEscapes) return body;

    let text = '';
    for (let i = 0; i < body.length; i++) {
      const ch = body[i];
      if (ch !== '\\' || i + 1 >= body.length) {
        text += ch;
        continue;
      }
      const escaped = body[++i];
      switch (escaped) {
        case 'n': text += '\n'; break;
        case 't': text += '\t'; break;
        case '\\': text += '\\'; break;
        case '"': text += '"'; break;
        default: text += '\\' + escaped;
      }
    }
    return text;
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] || { kind: TokenKind.EOF, text: '', line: this.lastLine() };
  }

  private advance(): Token {
    const tok = this.peek();
    if (this.pos < this.tokens.length) this.pos++;
    return tok;
  }

  private check(kind: number): boolean {
    return this.peek().kind === kind;
  }

  private match(kind: number): boolean {
    if (this.check(kind)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(kind: number, message?: string): Token {
    const tok = this.peek();
    if (tok.kind !== kind) {
      throw this.error(
        message ?? `Expected token type ${tokenName(kind)}, but found ${tokenName(tok.kind)}`,
      );
    }
    return this.advance();
  }

  private lastLine(): number {
    return this.tokens.length > 0 ? this.tokens[this.tokens.length - 1].line : 1;
  }

  private error(message: string): WordLangError {
    return new WordLangError(message, this.peek().line);
  }
}
