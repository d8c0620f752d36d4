import { CostCalculationResultBuilder, ResultAlreadySetError } from "../src/cost/costResult.js";
import { DEFAULT_COST_FACTORS } from "../src/model/costFactors.js";

function builder(repository = "svc"): CostCalculationResultBuilder {
  return new CostCalculationResultBuilder({ repository, division: "Computing", status: "Active" });
}

describe("CostCalculationResultBuilder", () => {
  it("below every threshold produces no alerts", () => {
    const r = builder().setCalculationResult(0.599, 59.9);
    expect(r.governanceAlerts).toEqual([]);
    expect(r.sinphaseViolations).toEqual([]);
    expect(r.requiresIsolation).toBe(false);
  });

  it("score 60 raises a governance alert only", () => {
    const r = builder().setCalculationResult(0.6, 60);
    expect(r.governanceAlerts).toEqual(["Governance threshold exceeded: 60.0 >= 60"]);
    expect(r.sinphaseViolations).toEqual([]);
    expect(r.requiresIsolation).toBe(false);
  });

  it("score 85 requires isolation", () => {
    const r = builder().setCalculationResult(0.85, 85);
    expect(r.governanceAlerts).toEqual(["Governance threshold exceeded: 85.0 >= 60"]);
    expect(r.sinphaseViolations).toEqual(["Isolation threshold exceeded: 85.0 >= 80"]);
    expect(r.requiresIsolation).toBe(true);
  });

  it("configured isolation holds below the isolation threshold", () => {
    const r = new CostCalculationResultBuilder({
      repository: "legacy",
      division: "Computing",
      status: "Legacy",
      isolationRequired: true,
    }).setCalculationResult(0.1, 10);
    expect(r.requiresIsolation).toBe(true);
    expect(r.sinphaseViolations).toEqual([]);
    expect(r.governanceAlerts).toEqual([]);
  });

  it("score 100 stacks the reorganization violation", () => {
    const r = builder().setCalculationResult(1, 100);
    expect(r.sinphaseViolations).toEqual([
      "Isolation threshold exceeded: 100.0 >= 80",
      "Architectural reorganization required: 100.0 >= 100",
    ]);
  });

  it("keeps caller alerts ahead of threshold alerts", () => {
    const r = builder().setCalculationResult(0.7, 70, ["Manual override applied: 0.70"]);
    expect(r.governanceAlerts).toEqual(["Manual override applied: 0.70", "Governance threshold exceeded: 70.0 >= 60"]);
  });

  it("result is frozen and carries defaults for metrics and factors", () => {
    const r = builder().setCalculationResult(0.1, 10);
    expect(Object.isFrozen(r)).toBe(true);
    expect(Object.isFrozen(r.governanceAlerts)).toBe(true);
    expect(r.rawMetrics.name).toBe("svc");
    expect(r.costFactors).toBe(DEFAULT_COST_FACTORS);
    expect(r.calculatedScore).toBe(0.1);
    expect(r.normalizedScore).toBe(10);
  });

  it("a second calculation is rejected", () => {
    const b = builder("payments");
    b.setCalculationResult(0.1, 10);
    expect(() => b.setCalculationResult(0.2, 20)).toThrow(ResultAlreadySetError);
    expect(() => b.setCalculationResult(0.2, 20)).toThrow("Calculation result already set for payments");
  });
});
