import { ConfigurationError } from "./errors";
import type { AttributeValue, AttributeView } from "./record";

export type ComparisonOperator = "<" | "<=" | ">" | ">=" | "==" | "!=";

export type ConditionExpr =
  | { kind: "always" }
  | { kind: "compare"; attribute: string; op: ComparisonOperator; value: AttributeValue; source: string };

const COMPARISON = /^([A-Za-z_][A-Za-z0-9_.]*)\s*(<=|>=|==|!=|<|>)\s*(.+)$/;

const OPERATORS: readonly ComparisonOperator[] = ["<=", ">=", "==", "!=", "<", ">"];

const ORDERING: ReadonlySet<ComparisonOperator> = new Set<ComparisonOperator>(["<", "<=", ">", ">="]);

function parseLiteral(raw: string, source: string): AttributeValue {
  const text = raw.trim();
  if (/^-?\d+(?:\.\d+)?$/.test(text)) return Number(text);
  if (text === "true") return true;
  if (text === "false") return false;
  const quoted = text.match(/^"([^"]*)"$/) ?? text.match(/^'([^']*)'$/);
  if (quoted) return quoted[1];
  if (/^[A-Za-z_][A-Za-z0-9_-]*$/.test(text)) return text;
  throw new ConfigurationError(`Malformed literal "${text}" in condition "${source}"`);
}

/** Parse a `when.condition` string once, at profile load. */
export function compileCondition(source: string | undefined): ConditionExpr {
  const text = String(source ?? "true").trim();
  if (!text || text === "true") return { kind: "always" };

  const match = text.match(COMPARISON);
  if (!match) throw new ConfigurationError(`Malformed condition "${text}"`);

  const [, attribute, op, rawValue] = match;
  const value = parseLiteral(rawValue, text);
  const operator = OPERATORS.find((o) => o === op);
  if (!operator) throw new ConfigurationError(`Unsupported operator "${op}" in condition "${text}"`);
  if (ORDERING.has(operator) && typeof value !== "number") {
    throw new ConfigurationError(`Operator ${operator} needs a numeric literal in condition "${text}"`);
  }
  return { kind: "compare", attribute, op: operator, value, source: text };
}

export function conditionAttributes(expr: ConditionExpr): string[] {
  return expr.kind === "compare" ? [expr.attribute] : [];
}

/** Categorical labels are strings, so `stage == 2` matches the label "2". */
function equals(actual: AttributeValue, literal: AttributeValue): boolean {
  if (typeof actual === "string" && typeof literal !== "string") return actual === String(literal);
  return actual === literal;
}

export function evaluateCondition(expr: ConditionExpr, view: AttributeView): boolean {
  if (expr.kind === "always") return true;

  if (!Object.prototype.hasOwnProperty.call(view, expr.attribute)) {
    throw new ConfigurationError(`Condition "${expr.source}" references unknown attribute "${expr.attribute}"`);
  }
  const actual = view[expr.attribute];

  switch (expr.op) {
    case "==":
      return equals(actual, expr.value);
    case "!=":
      return !equals(actual, expr.value);
    default: {
      if (typeof actual !== "number" || typeof expr.value !== "number") {
        throw new ConfigurationError(
          `Condition "${expr.source}" compares non-numeric attribute "${expr.attribute}" (${String(actual)}) with ${expr.op}`
        );
      }
      if (expr.op === "<") return actual < expr.value;
      if (expr.op === "<=") return actual <= expr.value;
      if (expr.op === ">") return actual > expr.value;
      return actual >= expr.value;
    }
  }
}
