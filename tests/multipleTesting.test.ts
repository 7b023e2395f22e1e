import { describe, test, expect } from "vitest";
import { benjaminiHochberg, bonferroni } from "@/lib/multipleTesting";

describe("bonferroni", () => {
  test("multiplies by the number of tests and caps at 1", () => {
    const adjusted = bonferroni([0.01, null, 0.4]);
    expect(adjusted[0]).toBeCloseTo(0.02, 12);
    expect(adjusted[1]).toBeNull();
    expect(adjusted[2]).toBeCloseTo(0.8, 12);
    expect(bonferroni([0.6, 0.7])).toEqual([1, 1]);
  });
});

describe("benjaminiHochberg", () => {
  test("step-up adjustment keeps input order", () => {
    const adjusted = benjaminiHochberg([0.01, 0.04, 0.03, 0.005]);
    const expected = [0.02, 0.04, 0.04, 0.02];
    expected.forEach((value, i) => expect(adjusted[i]).toBeCloseTo(value, 12));
  });

  test("null p-values pass through and are not counted", () => {
    const adjusted = benjaminiHochberg([null, 0.02, null, 0.04]);
    expect(adjusted[0]).toBeNull();
    expect(adjusted[1]).toBeCloseTo(0.04, 12);
    expect(adjusted[2]).toBeNull();
    expect(adjusted[3]).toBeCloseTo(0.04, 12);
  });

  test("empty input", () => {
    expect(benjaminiHochberg([])).toEqual([]);
  });
});
