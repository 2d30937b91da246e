import { Token, TokenType, KEYWORDS } from './tokens';
import { CorvoError } from '../runtime/errors';

export class Lexer {
  private source: string;
  private tokens: Token[] = [];
  private pos = 0;
  private line = 1;
  private column = 1;

  constructor(source: string) {
    this.source = source;
  }

  tokenize(): Token[] {
    this.tokens = [];
    this.pos = 0;
    this.line = 1;
    this.column = 1;

    while (this.pos < this.source.length) {
      const ch = this.source[this.pos];

      if (ch === ' ' || ch === '\t' || ch === '\r') {
        this.advance();
        continue;
      }

      // Newlines separate tokens but carry no meaning
      if (ch === '\n') {
        this.pos++;
        this.line++;
        this.column = 1;
        continue;
      }

      if (ch === '#') {
        this.skipComment();
        continue;
      }

      if (ch === '"') {
        this.readString();
        continue;
      }

      if (this.isDigit(ch) || (ch === '-' && this.isDigit(this.peekChar(1)))) {
        this.readNumber();
        continue;
      }

      if (this.isAlpha(ch)) {
        this.readWord();
        continue;
      }

      this.readPunctuation();
    }

    this.addToken(TokenType.EOF, '');
    return this.tokens;
  }

  private skipComment(): void {
    while (this.pos < this.source.length && this.source[this.pos] !== '\n') {
      this.advance();
    }
  }

  private readString(): void {
    const startLine = this.line;
    const startCol = this.column;
    this.advance(); // skip opening quote
    let text = '';
    while (this.pos < this.source.length && this.source[this.pos] !== '"') {
      const ch = this.source[this.pos];
      if (ch === '\\') {
        this.advance();
        if (this.pos < this.source.length) {
          const escaped = this.source[this.pos];
          switch (escaped) {
            case 'n': text += '\n'; break;
            case 't': text += '\t'; break;
            case '\\': text += '\\'; break;
            case '"': text += '"'; break;
            default: text += '\\' + escaped;
          }
          this.advance();
        }
      } else if (ch === '\n') {
        throw this.error('Unterminated string', startLine, startCol);
      } else {
        text += ch;
        this.advance();
      }
    }
    if (this.pos >= this.source.length) {
      throw this.error('Unterminated string', startLine, startCol);
    }
    this.advance(); // skip closing quote
    this.addTokenAt(TokenType.STRING, text, startLine, startCol);
  }

  private readNumber(): void {
    const startCol = this.column;
    let num = '';
    if (this.source[this.pos] === '-') {
      num += '-';
      this.advance();
    }
    while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
      num += this.source[this.pos];
      this.advance();
    }
    // A fraction needs at least one digit after the dot
    if (this.source[this.pos] === '.' && this.isDigit(this.peekChar(1))) {
      num += '.';
      this.advance();
      while (this.pos < this.source.length && this.isDigit(this.source[this.pos])) {
        num += this.source[this.pos];
        this.advance();
      }
    }
    if (this.isAlpha(this.peekChar(0))) {
      throw this.error(`Invalid number '${num}${this.peekChar(0)}'`, this.line, startCol);
    }
    this.addTokenAt(TokenType.NUMBER, num, this.line, startCol);
  }

  private readWord(): void {
    const startCol = this.column;
    let word = '';
    while (this.pos < this.source.length && this.isAlphaNumeric(this.source[this.pos])) {
      word += this.source[this.pos];
      this.advance();
    }

    if (Object.prototype.hasOwnProperty.call(KEYWORDS, word)) {
      this.addTokenAt(KEYWORDS[word], word, this.line, startCol);
    } else {
      this.addTokenAt(TokenType.IDENTIFIER, word, this.line, startCol);
    }
  }

  private readPunctuation(): void {
    const ch = this.source[this.pos];
    const startCol = this.column;

    switch (ch) {
      case '[':
        this.advance();
        this.addTokenAt(TokenType.LBRACKET, '[', this.line, startCol);
        break;
      case ']':
        this.advance();
        this.addTokenAt(TokenType.RBRACKET, ']', this.line, startCol);
        break;
      case ',':
        this.advance();
        this.addTokenAt(TokenType.COMMA, ',', this.line, startCol);
        break;
      case ':':
        this.advance();
        this.addTokenAt(TokenType.COLON, ':', this.line, startCol);
        break;
      default:
        throw this.error(`Unexpected character '${ch}'`, this.line, startCol);
    }
  }

  private advance(): void {
    this.pos++;
    this.column++;
  }

  private peekChar(offset: number): string {
    const index = this.pos + offset;
    return index < this.source.length ? this.source[index] : '';
  }

  private addToken(type: TokenType, value: string): void {
    this.tokens.push({ type, value, line: this.line, column: this.column });
  }

  private addTokenAt(type: TokenType, value: string, line: number, column: number): void {
    this.tokens.push({ type, value, line, column });
  }

  private isDigit(ch: string): boolean {
    return ch >= '0' && ch <= '9';
  }

  private isAlpha(ch: string): boolean {
    return (ch >= 'a' && ch <= 'z') || (ch >= 'A' && ch <= 'Z') || ch === '_';
  }

  private isAlphaNumeric(ch: string): boolean {
    return this.isAlpha(ch) || this.isDigit(ch);
  }

  private error(message: string, line: number, column: number): CorvoError {
    return new CorvoError('SyntaxError', message, { line, column });
  }
}
