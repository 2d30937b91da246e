import { Token, TokenType } from '../lexer/tokens';
import { CorvoError } from '../runtime/errors';
import { corvoNumber, corvoString } from '../runtime/values';
import * as AST from './ast';

/** Human-readable names for tokens in syntax errors. */
const TOKEN_DESCRIPTIONS: Partial<Record<TokenType, string>> = {
  [TokenType.STRING]: 'a string',
  [TokenType.NUMBER]: 'a number',
  [TokenType.IDENTIFIER]: 'a name',
  [TokenType.LBRACKET]: "'['",
  [TokenType.RBRACKET]: "']'",
  [TokenType.COMMA]: "','",
  [TokenType.COLON]: "':'",
  [TokenType.EOF]: 'end of input',
};

export class Parser {
  private tokens: Token[] = [];
  private pos = 0;

  parse(tokens: Token[]): AST.Program {
    this.tokens = tokens;
    this.pos = 0;

    const body: AST.Statement[] = [];
    while (!this.check(TokenType.EOF)) {
      if (this.check(TokenType.RBRACKET)) {
        throw this.error(this.peek(), "Unmatched ']'");
      }
      body.push(this.parseStatement());
    }

    return {
      type: 'Program',
      body,
      position: { line: 1, column: 1 },
    };
  }

  // ─── Statements ────────────────────────────────────────

  private parseStatement(): AST.Statement {
    const tok = this.peek();

    switch (tok.type) {
      case TokenType.THE: return this.parseAssign();
      case TokenType.DISPLAY: return this.parseDisplay();
      case TokenType.ASK: return this.parseAsk();
      case TokenType.IF: return this.parseIf();
      case TokenType.WHILE: return this.parseWhile();
      case TokenType.REPEAT: return this.parseRepeat();
      case TokenType.FOR: return this.parseForEach();
      case TokenType.SECTION: return this.parseSectionDef();
      case TokenType.APPEND: return this.parseAppend();
      case TokenType.REMOVE: return this.parseRemove();
      case TokenType.WRITE: return this.parseWrite();
      case TokenType.READ: return this.parseRead();
      case TokenType.SET: return this.parseSetCell();
      case TokenType.IDENTIFIER: {
        this.advance();
        return { type: 'SectionCall', name: tok.value, position: this.positionOf(tok) };
      }
      default:
        throw this.error(tok, `Expected a statement but found ${this.describe(tok)}`);
    }
  }

  private parseAssign(): AST.Assign {
    const pos = this.position();
    this.expect(TokenType.THE);
    const name = this.expectName();
    this.expect(TokenType.IS);
    const value = this.parseExpression();
    return { type: 'Assign', name, value, position: pos };
  }

  private parseDisplay(): AST.Display {
    const pos = this.position();
    this.expect(TokenType.DISPLAY);
    const value = this.parseExpression();
    return { type: 'Display', value, position: pos };
  }

  private parseAsk(): AST.Ask {
    const pos = this.position();
    this.expect(TokenType.ASK);
    const prompt = this.parseExpression();
    const target = this.parseRememberAs();
    return { type: 'Ask', prompt, target, position: pos };
  }

  // ─── Control Flow ──────────────────────────────────────

  private parseIf(): AST.If {
    const pos = this.position();
    this.expect(TokenType.IF);
    const condition = this.parseCondition();
    this.expect(TokenType.THEN);
    const thenBody = this.parseBody();

    let elseBody: AST.Statement[] | undefined;
    if (this.match(TokenType.OTHERWISE)) {
      elseBody = this.parseBody();
    }

    return { type: 'If', condition, thenBody, elseBody, position: pos };
  }

  private parseWhile(): AST.While {
    const pos = this.position();
    this.expect(TokenType.WHILE);
    const condition = this.parseCondition();
    this.expect(TokenType.DO);
    const body = this.parseBody();
    return { type: 'While', condition, body, position: pos };
  }

  private parseRepeat(): AST.Repeat {
    const pos = this.position();
    this.expect(TokenType.REPEAT);
    const count = this.parseExpression();
    this.expect(TokenType.LOOPS);
    const body = this.parseBody();
    return { type: 'Repeat', count, body, position: pos };
  }

  private parseForEach(): AST.ForEach {
    const pos = this.position();
    this.expect(TokenType.FOR);
    this.expect(TokenType.EACH);
    const variable = this.expectName();
    this.expect(TokenType.IN);
    const iterable = this.parseExpression();
    const body = this.parseBody();
    return { type: 'ForEach', variable, iterable, body, position: pos };
  }

  private parseSectionDef(): AST.SectionDef {
    const pos = this.position();
    this.expect(TokenType.SECTION);
    const name = this.expectName();
    this.expect(TokenType.IS);
    this.match(TokenType.COLON);
    const body = this.parseBlock();
    return { type: 'SectionDef', name, body, position: pos };
  }

  // ─── Lists ─────────────────────────────────────────────

  private parseAppend(): AST.ListAppend {
    const pos = this.position();
    this.expect(TokenType.APPEND);
    const value = this.parseExpression();
    this.expect(TokenType.TO);
    const list = this.parseExpression();
    return { type: 'ListAppend', list, value, position: pos };
  }

  private parseRemove(): AST.ListRemove {
    const pos = this.position();
    this.expect(TokenType.REMOVE);
    const value = this.parseExpression();
    this.expect(TokenType.FROM);
    const list = this.parseExpression();
    return { type: 'ListRemove', list, value, position: pos };
  }

  // ─── Files and CSV ─────────────────────────────────────

  /**
   * `write EXPR to EXPR` writes a text file;
   * `write EXPR to csv EXPR` writes a table.
   */
  private parseWrite(): AST.FileWrite | AST.CsvWrite {
    const pos = this.position();
    this.expect(TokenType.WRITE);
    const content = this.parseExpression();
    this.expect(TokenType.TO);
    if (this.match(TokenType.CSV)) {
      const path = this.parseExpression();
      return { type: 'CsvWrite', table: content, path, position: pos };
    }
    const path = this.parseExpression();
    return { type: 'FileWrite', content, path, position: pos };
  }

  /**
   * `read from EXPR remember as NAME` reads a text file;
   * `read csv EXPR remember as NAME` reads a table.
   */
  private parseRead(): AST.FileRead | AST.CsvRead {
    const pos = this.position();
    this.expect(TokenType.READ);
    if (this.match(TokenType.CSV)) {
      const path = this.parseExpression();
      const target = this.parseRememberAs();
      return { type: 'CsvRead', path, target, position: pos };
    }
    if (!this.check(TokenType.FROM)) {
      throw this.error(this.peek(), `Expected 'from' or 'csv' after 'read' but found ${this.describe(this.peek())}`);
    }
    this.advance();
    const path = this.parseExpression();
    const target = this.parseRememberAs();
    return { type: 'FileRead', path, target, position: pos };
  }

  private parseSetCell(): AST.CsvSetCell {
    const pos = this.position();
    this.expect(TokenType.SET);
    const table = this.parsePrimary();
    this.expect(TokenType.ROW);
    const row = this.parseExpression();
    this.expect(TokenType.COLUMN);
    const column = this.parseExpression();
    this.expect(TokenType.TO);
    const value = this.parseExpression();
    return { type: 'CsvSetCell', table, row, column, value, position: pos };
  }

  private parseRememberAs(): string {
    this.expect(TokenType.REMEMBER);
    this.expect(TokenType.AS);
    return this.expectName();
  }

  // ─── Blocks ────────────────────────────────────────────

  /**
   * A body is a bracketed block or a single statement. Both produce the
   * same statement list, so `repeat 3 loops display "x"` and
   * `repeat 3 loops : [ display "x" ]` are the same tree.
   */
  private parseBody(): AST.Statement[] {
    if (this.check(TokenType.COLON) || this.check(TokenType.LBRACKET)) {
      this.match(TokenType.COLON);
      return this.parseBlock();
    }
    return [this.parseStatement()];
  }

  private parseBlock(): AST.Statement[] {
    const open = this.expect(TokenType.LBRACKET);
    const body: AST.Statement[] = [];
    while (!this.check(TokenType.RBRACKET)) {
      if (this.check(TokenType.EOF)) {
        throw this.error(open, "Unmatched '[': block is never closed");
      }
      body.push(this.parseStatement());
    }
    this.expect(TokenType.RBRACKET);
    return body;
  }

  // ─── Conditions ────────────────────────────────────────

  private parseCondition(): AST.Expression {
    let left = this.parseConjunction();
    while (this.check(TokenType.OR)) {
      const pos = this.position();
      this.advance();
      const right = this.parseConjunction();
      left = { type: 'BinaryOp', operator: 'or', left, right, position: pos };
    }
    return left;
  }

  private parseConjunction(): AST.Expression {
    let left = this.parseComparison();
    while (this.check(TokenType.AND)) {
      const pos = this.position();
      this.advance();
      const right = this.parseComparison();
      left = { type: 'BinaryOp', operator: 'and', left, right, position: pos };
    }
    return left;
  }

  private parseComparison(): AST.Expression {
    const left = this.parseExpression();
    const pos = this.position();
    this.expect(TokenType.IS);

    let operator: AST.ComparisonOperator;
    const tok = this.peek();
    switch (tok.type) {
      case TokenType.EQUAL:
        this.advance();
        this.expect(TokenType.TO);
        operator = 'is-equal';
        break;
      case TokenType.GREATER:
        this.advance();
        this.expect(TokenType.THAN);
        operator = 'is-greater-than';
        break;
      case TokenType.LESS:
        this.advance();
        this.expect(TokenType.THAN);
        operator = 'is-less-than';
        break;
      default:
        throw this.error(tok, `Expected 'equal to', 'greater than' or 'less than' after 'is' but found ${this.describe(tok)}`);
    }

    const right = this.parseExpression();
    return { type: 'BinaryOp', operator, left, right, position: pos };
  }

  // ─── Expressions ───────────────────────────────────────

  private parseExpression(): AST.Expression {
    return this.parseAdditive();
  }

  private parseAdditive(): AST.Expression {
    let left = this.parseMultiplicative();
    while (this.check(TokenType.PLUS) || this.check(TokenType.MINUS)) {
      const pos = this.position();
      const operator = this.advance().type === TokenType.PLUS ? 'plus' : 'minus';
      const right = this.parseMultiplicative();
      left = { type: 'BinaryOp', operator, left, right, position: pos };
    }
    return left;
  }

  private parseMultiplicative(): AST.Expression {
    let left = this.parsePostfix();
    while (this.check(TokenType.TIMES) || this.check(TokenType.DIVIDED)) {
      const pos = this.position();
      let operator: AST.ArithmeticOperator;
      if (this.advance().type === TokenType.DIVIDED) {
        this.expect(TokenType.BY);
        operator = 'divide';
      } else {
        operator = 'times';
      }
      const right = this.parsePostfix();
      left = { type: 'BinaryOp', operator, left, right, position: pos };
    }
    return left;
  }

  private parsePostfix(): AST.Expression {
    let expr = this.parsePrimary();
    while (this.check(TokenType.AT)) {
      const pos = this.position();
      this.advance();
      const index = this.parsePrimary();
      expr = { type: 'IndexAccess', list: expr, index, position: pos };
    }
    return expr;
  }

  private parsePrimary(): AST.Expression {
    const tok = this.peek();
    const pos = this.positionOf(tok);

    switch (tok.type) {
      case TokenType.NUMBER: {
        this.advance();
        const value = parseFloat(tok.value);
        if (!Number.isFinite(value)) {
          throw this.error(tok, 'Number is too large to represent');
        }
        return { type: 'Literal', value: corvoNumber(value), position: pos };
      }
      case TokenType.STRING:
        this.advance();
        return { type: 'Literal', value: corvoString(tok.value), position: pos };
      case TokenType.IDENTIFIER:
        this.advance();
        return { type: 'VarRef', name: tok.value, position: pos };
      case TokenType.LBRACKET:
        return this.parseListLiteral();
      case TokenType.COUNT: {
        this.advance();
        this.expect(TokenType.OF);
        const list = this.parsePostfix();
        return { type: 'ListCount', list, position: pos };
      }
      case TokenType.LENGTH: {
        this.advance();
        this.expect(TokenType.OF);
        const value = this.parsePostfix();
        return { type: 'LengthOf', value, position: pos };
      }
      case TokenType.GET:
        return this.parseGet();
      default:
        throw this.error(tok, `Expected a value but found ${this.describe(tok)}`);
    }
  }

  private parseListLiteral(): AST.ListLiteral {
    const open = this.expect(TokenType.LBRACKET);
    const elements: AST.Expression[] = [];
    if (!this.check(TokenType.RBRACKET)) {
      elements.push(this.parseExpression());
      while (this.match(TokenType.COMMA)) {
        elements.push(this.parseExpression());
      }
    }
    if (this.check(TokenType.EOF)) {
      throw this.error(open, "Unmatched '[': list is never closed");
    }
    this.expect(TokenType.RBRACKET);
    return { type: 'ListLiteral', elements, position: this.positionOf(open) };
  }

  /**
   * `get column N from TABLE` or `get row R column C from TABLE`.
   */
  private parseGet(): AST.ColumnAccess | AST.CellAccess {
    const pos = this.position();
    this.expect(TokenType.GET);

    if (this.match(TokenType.ROW)) {
      const row = this.parseExpression();
      this.expect(TokenType.COLUMN);
      const column = this.parseExpression();
      this.expect(TokenType.FROM);
      const table = this.parsePrimary();
      return { type: 'CellAccess', table, row, column, position: pos };
    }

    if (!this.check(TokenType.COLUMN)) {
      throw this.error(this.peek(), `Expected 'column' or 'row' after 'get' but found ${this.describe(this.peek())}`);
    }
    this.advance();
    const index = this.parseExpression();
    this.expect(TokenType.FROM);
    const table = this.parsePrimary();
    return { type: 'ColumnAccess', table, index, position: pos };
  }

  // ─── Helpers ───────────────────────────────────────────

  private peek(): Token {
    return this.tokens[this.pos] ?? this.tokens[this.tokens.length - 1];
  }

  private advance(): Token {
    const tok = this.peek();
    if (tok.type !== TokenType.EOF) this.pos++;
    return tok;
  }

  private check(type: TokenType): boolean {
    return this.peek().type === type;
  }

  private match(type: TokenType): boolean {
    if (this.check(type)) {
      this.advance();
      return true;
    }
    return false;
  }

  private expect(type: TokenType): Token {
    const tok = this.peek();
    if (tok.type !== type) {
      throw this.error(tok, `Expected ${this.describeType(type)} but found ${this.describe(tok)}`);
    }
    return this.advance();
  }

  private expectName(): string {
    const tok = this.peek();
    if (tok.type !== TokenType.IDENTIFIER) {
      const found = tok.type in TOKEN_DESCRIPTIONS
        ? this.describe(tok)
        : `the reserved word '${tok.value}'`;
      throw this.error(tok, `Expected a name but found ${found}`);
    }
    return this.advance().value;
  }

  private describeType(type: TokenType): string {
    return TOKEN_DESCRIPTIONS[type] ?? `'${type.toLowerCase()}'`;
  }

  private describe(tok: Token): string {
    switch (tok.type) {
      case TokenType.STRING: return `the string "${tok.value}"`;
      case TokenType.NUMBER: return `the number ${tok.value}`;
      case TokenType.IDENTIFIER: return `the name '${tok.value}'`;
      default: return TOKEN_DESCRIPTIONS[tok.type] ?? `'${tok.value}'`;
    }
  }

  private position(): AST.Position {
    return this.positionOf(this.peek());
  }

  private positionOf(tok: Token): AST.Position {
    return { line: tok.line, column: tok.column };
  }

  private error(tok: Token, message: string): CorvoError {
    return new CorvoError('SyntaxError', message, this.positionOf(tok));
  }
}
