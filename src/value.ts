import type { OperatorKind } from "./tokens";
import { type Result, ok, err } from "./result";

export type IntValue = { kind: "int"; value: number };
export type RealValue = { kind: "real"; value: number };

/**
 * Accumulator value. Division always yields `real`, so `8 / 2` is `4.0`
 * rather than `4`.
 */
export type Value = IntValue | RealValue;

export const int = (value: number): Value => ({ kind: "int", value });
export const real = (value: number): Value => ({ kind: "real", value });

function combine(lhs: Value, rhs: Value, result: number): Value {
  if (lhs.kind === "int" && rhs.kind === "int" && Number.isSafeInteger(result))
    return int(result);
  return real(result);
}

export function applyOperator(
  op: OperatorKind,
  lhs: Value,
  rhs: Value
): Result<Value, "division_by_zero"> {
  switch (op) {
    case "plus":
      return ok(combine(lhs, rhs, lhs.value + rhs.value));
    case "minus":
      return ok(combine(lhs, rhs, lhs.value - rhs.value));
    case "times":
      return ok(combine(lhs, rhs, lhs.value * rhs.value));
    case "divide":
      if (rhs.value === 0) return err("division_by_zero" as const);
      return ok(real(lhs.value / rhs.value));
  }
}

export function formatValue(v: Value): string {
  const text = String(v.value);
  if (v.kind === "int") return text;
  if (Object.is(v.value, -0)) return "-0.0";
  // whole reals keep a fractional digit: 4 -> "4.0"
  return /^-?\d+$/.test(text) ? `${text}.0` : text;
}
