import { TemplateSyntaxError } from './errors.js';

export type Token =
  | { type: 'number'; value: number; pos: number }
  | { type: 'string'; value: string; pos: number }
  | { type: 'boolean'; value: boolean; pos: number }
  | { type: 'null'; pos: number }
  | { type: 'identifier'; value: string; pos: number }
  | { type: 'punct'; value: '(' | ')' | '[' | ']' | '.' | '?' | ':'; pos: number }
  | { type: 'op'; value: OperatorToken; pos: number }
  | { type: 'eof'; pos: number };

export type OperatorToken =
  | '+'
  | '-'
  | '*'
  | '/'
  | '%'
  | '!'
  | '<'
  | '<='
  | '>'
  | '>='
  | '=='
  | '!='
  | '&&'
  | '||';

const TWO_CHAR_OPS: readonly OperatorToken[] = ['<=', '>=', '==', '!=', '&&', '||'];
const ONE_CHAR_OPS: readonly OperatorToken[] = ['+', '-', '*', '/', '%', '!', '<', '>'];
const PUNCT = ['(', ')', '[', ']', '.', '?', ':'] as const;

const ESCAPES: Record<string, string> = {
  n: '\n',
  t: '\t',
  r: '\r',
  '\\': '\\',
  "'": "'",
  '"': '"',
};

function isIdentStart(ch: string): boolean {
  return /[A-Za-z_]/.test(ch);
}

function isIdentPart(ch: string): boolean {
  return /[A-Za-z0-9_]/.test(ch);
}

function isDigit(ch: string): boolean {
  return ch >= '0' && ch <= '9';
}

/**
 * Tokenizer over a single `${...}` expression body
 */
export class Tokenizer {
  private pos = 0;
  private peeked?: Token;

  constructor(private readonly src: string) {}

  peek(): Token {
    if (!this.peeked) this.peeked = this.read();
    return this.peeked;
  }

  next(): Token {
    const tok = this.peek();
    this.peeked = undefined;
    return tok;
  }

  private read(): Token {
    const src = this.src;

    while (this.pos < src.length && /\s/.test(src[this.pos])) this.pos++;

    const start = this.pos;
    if (start >= src.length) return { type: 'eof', pos: start };

    const ch = src[start];

    if (isDigit(ch)) return this.readNumber();
    if (ch === '"' || ch === "'") return this.readString(ch);

    if (isIdentStart(ch)) {
      let end = start + 1;
      while (end < src.length && isIdentPart(src[end])) end++;
      const word = src.slice(start, end);
      this.pos = end;

      if (word === 'true' || word === 'false') {
        return { type: 'boolean', value: word === 'true', pos: start };
      }
      if (word === 'null') return { type: 'null', pos: start };
      return { type: 'identifier', value: word, pos: start };
    }

    const two = src.slice(start, start + 2);
    const twoOp = TWO_CHAR_OPS.find((op) => op === two);
    if (twoOp) {
      this.pos += 2;
      return { type: 'op', value: twoOp, pos: start };
    }

    const oneOp = ONE_CHAR_OPS.find((op) => op === ch);
    if (oneOp) {
      this.pos += 1;
      return { type: 'op', value: oneOp, pos: start };
    }

    const punct = PUNCT.find((p) => p === ch);
    if (punct) {
      this.pos += 1;
      return { type: 'punct', value: punct, pos: start };
    }

    throw new TemplateSyntaxError(`Unexpected character '${ch}'`, start);
  }

  private readNumber(): Token {
    const src = this.src;
    const start = this.pos;
    let end = start;

    while (end < src.length && isDigit(src[end])) end++;

    if (src[end] === '.' && isDigit(src[end + 1] ?? '')) {
      end++;
      while (end < src.length && isDigit(src[end])) end++;
    }

    if (src[end] === 'e' || src[end] === 'E') {
      let expEnd = end + 1;
      if (src[expEnd] === '+' || src[expEnd] === '-') expEnd++;
      if (isDigit(src[expEnd] ?? '')) {
        end = expEnd;
        while (end < src.length && isDigit(src[end])) end++;
      }
    }

    if (end < src.length && isIdentStart(src[end])) {
      throw new TemplateSyntaxError(`Invalid number literal '${src.slice(start, end + 1)}'`, start);
    }

    const text = src.slice(start, end);
    const value = Number(text);
    if (!Number.isFinite(value)) {
      throw new TemplateSyntaxError(`Number literal '${text}' is out of range`, start);
    }

    this.pos = end;
    return { type: 'number', value, pos: start };
  }

  private readString(quote: string): Token {
    const src = this.src;
    const start = this.pos;
    let i = start + 1;
    let out = '';

    while (i < src.length) {
      const ch = src[i];

      if (ch === quote) {
        this.pos = i + 1;
        return { type: 'string', value: out, pos: start };
      }

      if (ch === '\\') {
        const esc = src[i + 1];
        if (esc === undefined) break;
        const mapped = ESCAPES[esc];
        if (mapped === undefined) {
          throw new TemplateSyntaxError(`Unknown escape sequence '\\${esc}'`, i);
        }
        out += mapped;
        i += 2;
        continue;
      }

      out += ch;
      i++;
    }

    throw new TemplateSyntaxError('Unterminated string literal', start);
  }
}
