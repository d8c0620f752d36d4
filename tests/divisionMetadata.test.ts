import { DivisionBoundsError, DivisionMetadata, defaultDivisionMetadata } from "../src/model/divisionMetadata.js";
import { defaultPriorityBoost, isDivision, parseDivision } from "../src/model/divisions.js";

describe("DivisionMetadata", () => {
  it("applies defaults", () => {
    const d = new DivisionMetadata({ division: "TDA" });
    expect(d.governanceThreshold).toBe(0.6);
    expect(d.isolationThreshold).toBe(0.8);
    expect(d.priorityBoost).toBe(1.0);
    expect(d.description).toBe("TDA Division");
    expect(d.responsibleArchitect).toBeNull();
  });

  it("rejects out-of-range thresholds and boosts", () => {
    expect(() => new DivisionMetadata({ division: "TDA", governanceThreshold: 1.5 })).toThrow(
      "Governance threshold out of bounds: 1.5",
    );
    expect(() => new DivisionMetadata({ division: "TDA", isolationThreshold: 1.2 })).toThrow(
      "Isolation threshold out of bounds: 1.2",
    );
    expect(() => new DivisionMetadata({ division: "TDA", priorityBoost: 5 })).toThrow("Priority boost out of bounds: 5");
  });

  it("rejects governance above isolation", () => {
    let caught: unknown;
    try {
      new DivisionMetadata({ division: "TDA", governanceThreshold: 0.9, isolationThreshold: 0.8 });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(DivisionBoundsError);
    if (!(caught instanceof DivisionBoundsError)) return;
    expect(caught.message).toBe("Governance threshold 0.9 cannot exceed isolation threshold 0.8");
    expect(caught.field).toBe("governanceThreshold");
  });

  it("rejects an isolation threshold below governance", () => {
    expect(() => new DivisionMetadata({ division: "TDA", governanceThreshold: 0.7, isolationThreshold: 0.5 })).toThrow(
      DivisionBoundsError,
    );
  });

  it("compliance is strict, isolation inclusive", () => {
    const d = new DivisionMetadata({ division: "TDA" });
    expect(d.isGovernanceCompliant(0.59)).toBe(true);
    expect(d.isGovernanceCompliant(0.6)).toBe(false);
    expect(d.requiresIsolation(0.79)).toBe(false);
    expect(d.requiresIsolation(0.8)).toBe(true);
  });

  it("priority boost is capped at 1.0", () => {
    const d = new DivisionMetadata({ division: "UCHE Nnamdi", priorityBoost: 1.5 });
    expect(d.applyPriorityBoost(0.5)).toBeCloseTo(0.75, 10);
    expect(d.applyPriorityBoost(0.9)).toBe(1);
  });

  it("generates a governance report; absent scores count as 0", () => {
    const d = new DivisionMetadata({ division: "Publishing", responsibleArchitect: "a.architect" });
    const now = new Date("2026-02-01T12:00:00.000Z");
    const report = d.generateGovernanceReport([{ costScore: 0.2 }, { costScore: 0.7 }, { costScore: 0.9 }, {}], now);
    expect(report).toEqual({
      division: "Publishing",
      totalRepositories: 4,
      compliantRepositories: 2,
      complianceRate: 0.5,
      isolationCandidates: 1,
      governanceThreshold: 0.6,
      isolationThreshold: 0.8,
      responsibleArchitect: "a.architect",
      generatedAt: "2026-02-01T12:00:00.000Z",
    });
  });

  it("empty report has rate 0", () => {
    expect(new DivisionMetadata({ division: "TDA" }).generateGovernanceReport([]).complianceRate).toBe(0);
  });

  it("default metadata carries the built-in priority boost", () => {
    expect(defaultDivisionMetadata("UCHE Nnamdi").priorityBoost).toBe(1.5);
    expect(defaultDivisionMetadata("Publishing").priorityBoost).toBe(0.9);
    expect(defaultPriorityBoost("Aegis Engineering")).toBe(1.3);
  });
});

describe("division tags", () => {
  it("recognizes only known divisions", () => {
    expect(isDivision("Nkwakọba")).toBe(true);
    expect(isDivision("Marketing")).toBe(false);
    expect(() => parseDivision("Marketing")).toThrow("unknown division: Marketing");
  });
});
