/**
 * Malformed marker, malformed expression, unknown reference or an operator
 * applied to values it does not accept.
 */
export class TemplateEvalError extends Error {
  public readonly expression: string;
  public readonly detail: string;
  public readonly position?: number;

  constructor(expression: string, detail: string, position?: number) {
    super(`Template evaluation failed for '${expression}': ${detail}`);
    this.name = 'TemplateEvalError';
    this.expression = expression;
    this.detail = detail;
    this.position = position;
  }
}

/**
 * Raised by the tokenizer and parser; converted to TemplateEvalError with the
 * expression text attached.
 */
export class TemplateSyntaxError extends Error {
  public readonly position: number;

  constructor(message: string, position: number) {
    super(message);
    this.name = 'TemplateSyntaxError';
    this.position = position;
  }
}
