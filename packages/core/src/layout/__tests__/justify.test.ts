import { assert, describe, test } from "@cellframe/testkit";
import { distributeEvenly, justifyGaps, justifyLine } from "../justify.js";

describe("distributeEvenly", () => {
  test("the remainder goes to the first slots", () => {
    assert.deepEqual(distributeEvenly(7, 3), [3, 2, 2]);
    assert.deepEqual(distributeEvenly(2, 4), [1, 1, 0, 0]);
  });

  test("zero slots and negative totals", () => {
    assert.deepEqual(distributeEvenly(5, 0), []);
    assert.deepEqual(distributeEvenly(-3, 2), [0, 0]);
  });
});

describe("justify", () => {
  test("N items get N+1 gaps", () => {
    assert.deepEqual(justifyGaps([2, 2], 10), [2, 2, 2]);
  });

  test("the leftmost gaps take the remainder", () => {
    assert.equal(justifyLine(["ab", "cd"], 9), "  ab  cd ");
  });

  test("overflowing items get no gaps", () => {
    assert.equal(justifyLine(["abc", "def"], 4), "abcdef");
  });

  test("widths are measured without escapes", () => {
    assert.equal(justifyLine(["\u001b[1mab\u001b[0m"], 4), " \u001b[1mab\u001b[0m ");
  });
});
