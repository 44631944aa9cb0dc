/**
 * Lexer and recursive-descent parser for the registry expression subset:
 *
 *   expr     := primary accessor*
 *   primary  := literal | '@' identifier | '(' expr ')'
 *   accessor := ('.' | '?.') identifier ('(' (expr (',' expr)*)? ')')?
 */

import { ExpressionEvaluationError } from "../../utils/errors.js";
import type { ExpressionNode, Token, TokenType } from "./types.js";

const IDENTIFIER_START = /[A-Za-z_$]/;
const IDENTIFIER_PART = /[A-Za-z0-9_$]/;
const DIGIT = /[0-9]/;

function syntaxError(source: string, message: string, position: number): ExpressionEvaluationError {
  return new ExpressionEvaluationError(`${message} at position ${position}`, {
    expression: source,
    position,
  });
}

function readString(source: string, start: number): { text: string; end: number } {
  const quote = source.charAt(start);
  let text = "";
  let i = start + 1;
  while (i < source.length) {
    const ch = source.charAt(i);
    if (ch === quote) {
      // doubled quote is an escaped quote
      if (source.charAt(i + 1) === quote) {
        text += quote;
        i += 2;
        continue;
      }
      return { text, end: i + 1 };
    }
    text += ch;
    i++;
  }
  throw syntaxError(source, "Unterminated string literal", start);
}

export function tokenize(source: string): Token[] {
  const tokens: Token[] = [];
  let i = 0;

  const push = (type: TokenType, text: string, position: number) => {
    tokens.push({ type, text, position });
  };

  while (i < source.length) {
    const ch = source.charAt(i);

    if (/\s/.test(ch)) {
      i++;
    } else if (ch === "'" || ch === '"') {
      const { text, end } = readString(source, i);
      push("string", text, i);
      i = end;
    } else if (DIGIT.test(ch) || (ch === "-" && DIGIT.test(source.charAt(i + 1)))) {
      const match = /^-?\d+(\.\d+)?/.exec(source.slice(i));
      const text = match ? match[0] : ch;
      push("number", text, i);
      i += text.length;
    } else if (IDENTIFIER_START.test(ch)) {
      let end = i + 1;
      while (end < source.length && IDENTIFIER_PART.test(source.charAt(end))) {
        end++;
      }
      push("identifier", source.slice(i, end), i);
      i = end;
    } else if (ch === "?" && source.charAt(i + 1) === ".") {
      push("safe-dot", "?.", i);
      i += 2;
    } else if (ch === "@") {
      push("at", ch, i++);
    } else if (ch === ".") {
      push("dot", ch, i++);
    } else if (ch === "(") {
      push("lparen", ch, i++);
    } else if (ch === ")") {
      push("rparen", ch, i++);
    } else if (ch === ",") {
      push("comma", ch, i++);
    } else {
      throw syntaxError(source, `Unexpected character '${ch}'`, i);
    }
  }

  push("eof", "", source.length);
  return tokens;
}

class Parser {
  private index = 0;

  constructor(
    private readonly source: string,
    private readonly tokens: Token[],
  ) {}

  parse(): ExpressionNode {
    const node = this.parseExpression();
    const trailing = this.peek();
    if (trailing.type !== "eof") {
      throw syntaxError(this.source, `Unexpected token '${trailing.text}'`, trailing.position);
    }
    return node;
  }

  private peek(): Token {
    return this.tokens[this.index] ?? this.tokens[this.tokens.length - 1] ?? {
      type: "eof",
      text: "",
      position: this.source.length,
    };
  }

  private next(): Token {
    const token = this.peek();
    if (token.type !== "eof") {
      this.index++;
    }
    return token;
  }

  private expect(type: TokenType, description: string): Token {
    const token = this.next();
    if (token.type !== type) {
      const found = token.type === "eof" ? "end of expression" : `'${token.text}'`;
      throw syntaxError(this.source, `Expected ${description} but found ${found}`, token.position);
    }
    return token;
  }

  private parseExpression(): ExpressionNode {
    let node = this.parsePrimary();

    for (;;) {
      const token = this.peek();
      if (token.type !== "dot" && token.type !== "safe-dot") {
        return node;
      }
      this.next();
      const nullSafe = token.type === "safe-dot";
      const name = this.expect("identifier", "property or method name").text;

      if (this.peek().type === "lparen") {
        this.next();
        node = { type: "call", target: node, name, args: this.parseArguments(), nullSafe };
      } else {
        node = { type: "property", target: node, name, nullSafe };
      }
    }
  }

  private parseArguments(): ExpressionNode[] {
    const args: ExpressionNode[] = [];
    if (this.peek().type === "rparen") {
      this.next();
      return args;
    }
    for (;;) {
      args.push(this.parseExpression());
      const token = this.next();
      if (token.type === "rparen") {
        return args;
      }
      if (token.type !== "comma") {
        throw syntaxError(this.source, "Expected ',' or ')' in argument list", token.position);
      }
    }
  }

  private parsePrimary(): ExpressionNode {
    const token = this.next();
    switch (token.type) {
      case "string":
        return { type: "literal", value: token.text };
      case "number":
        return { type: "literal", value: Number(token.text) };
      case "at":
        return { type: "service", name: this.expect("identifier", "service name").text };
      case "lparen": {
        const inner = this.parseExpression();
        this.expect("rparen", "')'");
        return inner;
      }
      case "identifier":
        if (token.text === "true" || token.text === "false") {
          return { type: "literal", value: token.text === "true" };
        }
        if (token.text === "null") {
          return { type: "literal", value: null };
        }
        throw syntaxError(
          this.source,
          `Unsupported reference '${token.text}', services are referenced as '@${token.text}'`,
          token.position,
        );
      default:
        throw syntaxError(
          this.source,
          token.type === "eof" ? "Unexpected end of expression" : `Unexpected token '${token.text}'`,
          token.position,
        );
    }
  }
}

export function parseExpression(source: string): ExpressionNode {
  return new Parser(source, tokenize(source)).parse();
}
