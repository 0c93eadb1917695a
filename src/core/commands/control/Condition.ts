/**
 * Condition expressions used by If().
 *
 * ```text
 * Value1 Operator Value2
 * True | False
 * ```
 *
 * @module
 */

export type ConditionOperator = "<" | "<=" | ">" | ">=" | "==" | "!=" | "contains" | "!contains";

export type ConditionResult =
  | { readonly ok: true; readonly value: boolean }
  | { readonly ok: false; readonly message: string };

// Two-character operators first so "<=" is not read as "<"
const SYMBOL_OPERATORS = ["<=", ">=", "==", "!=", "<", ">"] as const;

const WORD_OPERATOR = /^(.*?)\s+(!contains|contains)\s+(.*)$/i;

const NUMBER = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

interface ParsedCondition {
  readonly left: string;
  readonly operator: ConditionOperator;
  readonly right: string;
}

function parse(condition: string): ParsedCondition | undefined {
  const word = WORD_OPERATOR.exec(condition);
  if (word) {
    const operator = word[2].toLowerCase() === "contains" ? "contains" : "!contains";
    return { left: word[1].trim(), operator, right: word[3].trim() };
  }

  for (const operator of SYMBOL_OPERATORS) {
    const index = condition.indexOf(operator);
    if (index > 0) {
      return {
        left: condition.slice(0, index).trim(),
        operator,
        right: condition.slice(index + operator.length).trim(),
      };
    }
  }
  return undefined;
}

function compare<T extends string | number>(left: T, operator: ConditionOperator, right: T): boolean {
  switch (operator) {
    case "<":
      return left < right;
    case "<=":
      return left <= right;
    case ">":
      return left > right;
    case ">=":
      return left >= right;
    case "==":
      return left === right;
    case "!=":
      return left !== right;
    case "contains":
      return String(left).includes(String(right));
    case "!contains":
      return !String(left).includes(String(right));
  }
}

/**
 * Evaluates a condition after property expansion.
 *
 * Operands compare as numbers when both look numeric, unless
 * `compareAsStrings` is set. `contains` always compares text.
 */
export function evaluateCondition(condition: string, compareAsStrings = false): ConditionResult {
  const text = condition.trim();

  if (/^true$/i.test(text)) return { ok: true, value: true };
  if (/^false$/i.test(text)) return { ok: true, value: false };

  const parsed = parse(text);
  if (!parsed) {
    return {
      ok: false,
      message: `Condition "${condition}" is not of the form "Value1 Operator Value2".`,
    };
  }

  const { left, operator, right } = parsed;
  if (left === "" || right === "") {
    return { ok: false, message: `Condition "${condition}" is missing an operand.` };
  }

  const numeric =
    !compareAsStrings &&
    operator !== "contains" &&
    operator !== "!contains" &&
    NUMBER.test(left) &&
    NUMBER.test(right);

  return {
    ok: true,
    value: numeric ? compare(Number(left), operator, Number(right)) : compare(left, operator, right),
  };
}
