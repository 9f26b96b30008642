import { expect, test } from "vitest";
import { InvalidInputError } from "../Errors.ts";
import {
  type ComparisonResult,
  defaultThresholds,
  isClaimValid,
  PerformanceValidator,
  type Violation,
} from "../ValidationPolicy.ts";
import { constantSample, spreadSample } from "./TestUtils.ts";

test("default thresholds follow the validation protocol", () => {
  expect(new PerformanceValidator().thresholds).toEqual({
    minSampleSize: 30,
    significanceLevel: 0.05,
    minEffectSize: 0.5,
    confidenceLevel: 0.95,
    maxCv: 0.3,
  });
});

test("partial thresholds override defaults", () => {
  const validator = new PerformanceValidator({ minSampleSize: 5, maxCv: 0.1 });
  expect(validator.thresholds).toEqual({
    ...defaultThresholds,
    minSampleSize: 5,
    maxCv: 0.1,
  });
  expect(Object.isFrozen(validator.thresholds)).toBe(true);
});

test("flags both undersized samples", () => {
  const validator = new PerformanceValidator();
  const { comparison, violations, valid } = validator.validate(
    constantSample(1, 5),
    constantSample(1, 5),
  );

  expect(comparison.sampleAdequate).toBe(false);
  expect(violations.map(v => v.message)).toEqual([
    "Insufficient baseline sample size: 5 < 30",
    "Insufficient optimized sample size: 5 < 30",
  ]);
  expect(violations[0]).toMatchObject({
    kind: "sample-size",
    side: "baseline",
    actual: 5,
    required: 30,
  });
  expect(comparison.pValue).toBe(1);
  expect(comparison.statisticalSignificance).toBe(false);
  expect(valid).toBe(false);
});

test("validates a large, stable improvement", () => {
  const validator = new PerformanceValidator();
  const { comparison, violations, valid } = validator.validate(
    spreadSample(100, 5, 40),
    spreadSample(80, 5, 40),
  );

  expect(comparison.baselineStats.mean).toBeCloseTo(100, 9);
  expect(comparison.optimizedStats.stdDev).toBeCloseTo(5, 9);
  expect(comparison.improvementAbsolute).toBeCloseTo(-20, 9);
  expect(comparison.improvementPercent).toBeCloseTo(-20, 9);
  expect(comparison.cohensD).toBeCloseTo(-4, 6);
  expect(comparison.statisticalSignificance).toBe(true);
  expect(comparison.practicalSignificance).toBe(true);
  expect(comparison.sampleAdequate).toBe(true);
  expect(violations).toEqual([]);
  expect(valid).toBe(true);
});

test("repeated validation gives identical outcomes", () => {
  const baseline = spreadSample(100, 8, 36);
  const optimized = [...spreadSample(90, 6, 34), 120, 60];

  const first = new PerformanceValidator().validate(baseline, optimized);
  const second = new PerformanceValidator().validate(baseline, optimized);
  expect(second).toEqual(first);

  const validator = new PerformanceValidator();
  const again = validator.validate(baseline, optimized);
  expect(validator.validate(baseline, optimized)).toEqual(again);
  expect(again).toEqual(first);
});

test("violations do not leak between calls", () => {
  const validator = new PerformanceValidator();
  const small = validator.validate(constantSample(1, 5), constantSample(1, 5));
  const large = validator.validate(
    spreadSample(100, 5, 40),
    spreadSample(80, 5, 40),
  );

  expect(small.violations).toHaveLength(2);
  expect(large.violations).toEqual([]);
});

test("high variability invalidates an otherwise strong result", () => {
  const validator = new PerformanceValidator();
  const { comparison, violations, valid } = validator.validate(
    spreadSample(100, 40, 40),
    spreadSample(50, 5, 40),
  );

  expect(comparison.statisticalSignificance).toBe(true);
  expect(comparison.practicalSignificance).toBe(true);
  expect(comparison.sampleAdequate).toBe(true);
  expect(violations.map(v => v.message)).toEqual([
    "High baseline variability: CV=0.400 > 0.3",
  ]);
  expect(violations[0]).toMatchObject({ kind: "variability", side: "baseline" });
  expect(valid).toBe(false);
});

test("negligible shift is neither statistically nor practically significant", () => {
  const validator = new PerformanceValidator();
  const { comparison, valid } = validator.validate(
    spreadSample(100, 5, 40),
    spreadSample(100.5, 5, 40),
  );

  expect(comparison.cohensD).toBeCloseTo(0.1, 6);
  expect(comparison.statisticalSignificance).toBe(false);
  expect(comparison.practicalSignificance).toBe(false);
  expect(valid).toBe(false);
});

test("statistical significance alone is not enough", () => {
  const validator = new PerformanceValidator();
  const { comparison, violations, valid } = validator.validate(
    spreadSample(100, 5, 2000),
    spreadSample(100.5, 5, 2000),
  );

  expect(comparison.pValue).toBeLessThan(0.05);
  expect(comparison.statisticalSignificance).toBe(true);
  expect(comparison.practicalSignificance).toBe(false);
  expect(violations).toEqual([]);
  expect(valid).toBe(false);
});

test("zero baseline mean reports zero percent change", () => {
  const validator = new PerformanceValidator();
  const { comparison } = validator.validate(
    constantSample(0, 30),
    spreadSample(10, 1, 30),
  );

  expect(comparison.improvementPercent).toBe(0);
  expect(comparison.improvementAbsolute).toBeCloseTo(10, 9);
});

test("constant samples are never a validated claim", () => {
  const { comparison, violations, valid } = new PerformanceValidator().validate(
    constantSample(0.1, 30),
    constantSample(0.3, 30),
  );

  expect(comparison.statisticalSignificance).toBe(false);
  expect(comparison.practicalSignificance).toBe(false);
  expect(violations).toEqual([]);
  expect(valid).toBe(false);
});

test("empty samples propagate InvalidInputError", () => {
  const validator = new PerformanceValidator();
  expect(() => validator.validate([], [1, 2, 3])).toThrow(InvalidInputError);
  expect(() => validator.validate([1, 2, 3], [])).toThrow(InvalidInputError);
});

test("custom minimum sample size admits small samples", () => {
  const validator = new PerformanceValidator({ minSampleSize: 5 });
  const { comparison, violations } = validator.validate(
    constantSample(1, 5),
    constantSample(1, 5),
  );

  expect(comparison.sampleAdequate).toBe(true);
  expect(violations).toEqual([]);
});

test("claim validity requires every criterion", () => {
  const { comparison } = new PerformanceValidator().validate(
    spreadSample(100, 5, 40),
    spreadSample(80, 5, 40),
  );
  const violation: Violation = {
    kind: "variability",
    side: "optimized",
    cv: 0.5,
    max: 0.3,
    message: "High optimized variability: CV=0.500 > 0.3",
  };
  const failing: Partial<ComparisonResult>[] = [
    { sampleAdequate: false },
    { statisticalSignificance: false },
    { practicalSignificance: false },
  ];

  expect(isClaimValid(comparison, [])).toBe(true);
  expect(isClaimValid(comparison, [violation])).toBe(false);
  for (const override of failing) {
    expect(isClaimValid({ ...comparison, ...override }, [])).toBe(false);
  }
});
