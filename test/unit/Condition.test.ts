import { describe, it, expect } from "vitest";
import { evaluateCondition } from "../../src/core/commands/control/Condition.js";

describe("evaluateCondition", () => {
  it.each([
    ["3 < 10", true],
    ["10 <= 10", true],
    ["1.5 > 1.25", true],
    ["5 >= 6", false],
    ["abc == abc", true],
    ["abc != abc", false],
    ["Hello World contains World", true],
    ["x !contains y", true],
    ["TRUE", true],
    [" false ", false],
  ])("%s is %s", (condition, expected) => {
    expect(evaluateCondition(condition)).toEqual({ ok: true, value: expected });
  });

  it("compares numeric-looking operands as text when asked", () => {
    expect(evaluateCondition("3 < 10", true)).toEqual({ ok: true, value: false });
  });

  it("compares mixed operands as text", () => {
    expect(evaluateCondition("10 < abc")).toEqual({ ok: true, value: true });
  });

  it("rejects a condition without an operator", () => {
    expect(evaluateCondition("nothing here")).toEqual({
      ok: false,
      message: 'Condition "nothing here" is not of the form "Value1 Operator Value2".',
    });
  });

  it("rejects a missing operand", () => {
    expect(evaluateCondition("5 ==")).toEqual({
      ok: false,
      message: 'Condition "5 ==" is missing an operand.',
    });
  });
});
