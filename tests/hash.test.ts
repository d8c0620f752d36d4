import { generateConfigHash, normalizeForHashing, stableStringify } from "../src/config/hash.js";

describe("stableStringify", () => {
  it("sorts keys and drops undefined values", () => {
    expect(stableStringify({ b: 1, a: [2, 1], c: undefined })).toBe('{"a":[2,1],"b":1}');
  });

  it("renders non-finite numbers and dates", () => {
    expect(stableStringify({ n: Number.NaN, d: new Date("2026-01-01T00:00:00.000Z") })).toBe(
      '{"d":"2026-01-01T00:00:00.000Z","n":null}',
    );
  });
});

describe("generateConfigHash", () => {
  it("is a sha256 hex digest", () => {
    expect(generateConfigHash({ version: "1.0.0" })).toMatch(/^[0-9a-f]{64}$/);
  });

  it("ignores key order, scalar list order and float noise", () => {
    const a = generateConfigHash({ organization: "acme", tags: ["b", "a"], weight: 0.1 + 0.2 });
    const b = generateConfigHash({ weight: 0.3, tags: ["a", "b"], organization: "acme" });
    expect(a).toBe(b);
  });

  it("changes when a value changes", () => {
    expect(generateConfigHash({ organization: "acme" })).not.toBe(generateConfigHash({ organization: "acme-labs" }));
  });

  it("normalization keeps integers and nested structure", () => {
    expect(normalizeForHashing({ n: 3, nested: { xs: [3, 1, 2] } })).toEqual({ n: 3, nested: { xs: [1, 2, 3] } });
  });
});
