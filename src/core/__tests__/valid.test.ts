import { describe, it, expect, vi } from "vitest";
import * as fc from "fast-check";
import { Valid, ValidationError } from "../valid";

function messagesOf<T, E>(valid: Valid<T, E>): E[] {
  const result = valid.toResult();
  return result.ok ? [] : result.error.messages();
}

// ─── Construction ────────────────────────────────────────────────────

describe("Valid", () => {
  it("succeed holds the value", () => {
    const valid = Valid.succeed(42);
    expect(valid.isSucceed()).toBe(true);
    expect(valid.unwrap()).toBe(42);
    expect(valid.toResult()).toEqual({ ok: true, value: 42 });
  });

  it("fail holds exactly one cause", () => {
    const valid = Valid.fail("boom");
    expect(valid.isSucceed()).toBe(false);
    expect(messagesOf(valid)).toEqual(["boom"]);
  });

  it("fromOption fails on null and undefined only", () => {
    expect(Valid.fromOption(0, "missing").unwrap()).toBe(0);
    expect(Valid.fromOption("", "missing").unwrap()).toBe("");
    expect(messagesOf(Valid.fromOption(undefined, "missing"))).toEqual(["missing"]);
    expect(messagesOf(Valid.fromOption(null, "missing"))).toEqual(["missing"]);
  });

  it("unwrap throws the accumulated ValidationError", () => {
    const valid = Valid.fromIter(["a", "b"], (s) => Valid.fail(`bad ${s}`));
    expect(() => valid.unwrap()).toThrow(ValidationError);
    expect(() => valid.unwrap()).toThrow("bad a\nbad b");
  });

  // ─── Combinators ──────────────────────────────────────────────────

  it("map transforms a success", () => {
    expect(Valid.succeed(2).map((n) => n * 10).unwrap()).toBe(20);
  });

  it("map is a no-op on a failure", () => {
    const f = vi.fn((n: number) => n + 1);
    const valid = Valid.fail<string, number>("nope").map(f);
    expect(f).not.toHaveBeenCalled();
    expect(messagesOf(valid)).toEqual(["nope"]);
  });

  it("andThen chains successes and stops at a failure", () => {
    const half = (n: number): Valid<number, string> =>
      n % 2 === 0 ? Valid.succeed(n / 2) : Valid.fail(`${n} is odd`);

    const eight = Valid.succeed<number, string>(8);
    const six = Valid.succeed<number, string>(6);
    expect(eight.andThen(half).andThen(half).unwrap()).toBe(2);
    expect(messagesOf(six.andThen(half).andThen(half))).toEqual(["3 is odd"]);
  });

  it("zip pairs successes and merges failures left to right", () => {
    expect(Valid.succeed(1).zip(Valid.succeed("a")).unwrap()).toEqual([1, "a"]);
    expect(messagesOf(Valid.fail("left").zip(Valid.succeed(1)))).toEqual(["left"]);
    expect(
      messagesOf(Valid.succeed<number, string>(1).zip(Valid.fail("right"))),
    ).toEqual(["right"]);
    expect(messagesOf(Valid.fail("left").zip(Valid.fail("right")))).toEqual([
      "left",
      "right",
    ]);
  });

  it("trace prefixes every cause, outermost segment first", () => {
    const valid = Valid.fromIter(["x", "y"], (s) => Valid.fail(s))
      .trace("inner")
      .trace("outer");
    const result = valid.toResult();
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.causes).toEqual([
      { message: "x", trace: ["outer", "inner"] },
      { message: "y", trace: ["outer", "inner"] },
    ]);
    expect(result.error.message).toBe("[outer, inner] x\n[outer, inner] y");
  });

  it("trace leaves a success untouched", () => {
    expect(Valid.succeed("ok").trace("a").unwrap()).toBe("ok");
  });
});

// ─── fromIter ────────────────────────────────────────────────────────

describe("Valid.fromIter", () => {
  it("collects every value in input order", () => {
    const valid = Valid.fromIter([1, 2, 3], (n) => Valid.succeed(n * n));
    expect(valid.unwrap()).toEqual([1, 4, 9]);
  });

  it("succeeds with an empty array for no input", () => {
    expect(Valid.fromIter([], () => Valid.fail("never")).unwrap()).toEqual([]);
  });

  it("invokes the callback for every input, even after a failure", () => {
    const f = vi.fn((n: number): Valid<number, string> =>
      n === 1 ? Valid.fail("first") : Valid.succeed(n),
    );
    Valid.fromIter([1, 2, 3], f);
    expect(f).toHaveBeenCalledTimes(3);
  });

  it("concatenates failures in input order", () => {
    const valid = Valid.fromIter(["a", "ok", "b", "c"], (s): Valid<string, string> =>
      s === "ok" ? Valid.succeed(s) : Valid.fail(`missing ${s}`),
    );
    expect(messagesOf(valid)).toEqual(["missing a", "missing b", "missing c"]);
  });

  it("reports one error per failing input", () => {
    fc.assert(
      fc.property(fc.array(fc.integer()), (numbers) => {
        const valid = Valid.fromIter(numbers, (n): Valid<number, number> =>
          n < 0 ? Valid.fail(n) : Valid.succeed(n),
        );
        const negatives = numbers.filter((n) => n < 0);
        if (negatives.length === 0) {
          expect(valid.unwrap()).toEqual(numbers);
        } else {
          expect(messagesOf(valid)).toEqual(negatives);
        }
      }),
    );
  });
});

// ─── ValidationError ─────────────────────────────────────────────────

describe("ValidationError", () => {
  it("combine keeps the left causes before the right", () => {
    const combined = ValidationError.new("b").combine(ValidationError.new("c"));
    expect(combined.messages()).toEqual(["b", "c"]);
    expect(combined.message).toBe("b\nc");
  });

  it("is an Error named ValidationError", () => {
    const error = ValidationError.new("oops");
    expect(error).toBeInstanceOf(Error);
    expect(error.name).toBe("ValidationError");
  });
});
