/**
 * Expression module types
 */

export type LiteralValue = string | number | boolean | null;

export type TemplatePart =
  | { type: "literal"; text: string }
  | { type: "expression"; source: string; offset: number };

export type ExpressionNode =
  | { type: "literal"; value: LiteralValue }
  | { type: "service"; name: string }
  | { type: "property"; target: ExpressionNode; name: string; nullSafe: boolean }
  | {
      type: "call";
      target: ExpressionNode;
      name: string;
      args: ExpressionNode[];
      nullSafe: boolean;
    };

export type TokenType =
  | "string"
  | "number"
  | "identifier"
  | "at"
  | "dot"
  | "safe-dot"
  | "lparen"
  | "rparen"
  | "comma"
  | "eof";

export interface Token {
  type: TokenType;
  text: string;
  position: number;
}
