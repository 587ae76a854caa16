import {
  compareVersions,
  parseVersionComponents,
  satisfiesMinimumVersion,
} from "../../src/probe/version.js";

describe("compareVersions", () => {
  it("orders numeric components numerically", () => {
    expect(compareVersions("1.0.2", "1.0.10")).toBe(-1);
    expect(compareVersions("1.0.10", "1.0.2")).toBe(1);
    expect(compareVersions("2.0", "1.9.9")).toBe(1);
  });

  it("treats a longer numeric version as newer", () => {
    expect(compareVersions("1.0", "1.0.1")).toBe(-1);
    expect(compareVersions("1.0.1", "1.0")).toBe(1);
    expect(compareVersions("1.0", "")).toBe(1);
  });

  it("reports equal versions", () => {
    expect(compareVersions("1.2.13", "1.2.13")).toBe(0);
    expect(compareVersions("1.0RC1", "1.0rc1")).toBe(0);
  });

  it("ranks release tags below the release", () => {
    expect(compareVersions("1.0rc1", "1.0")).toBe(-1);
    expect(compareVersions("1.0", "1.0dev")).toBe(1);
    expect(compareVersions("1.0.0-beta", "1.0.0-alpha")).toBe(1);
    expect(compareVersions("1.0.rc", "1.0.1")).toBe(-1);
    expect(compareVersions("1.0-foo", "1.0-dev")).toBe(-1);
  });

  it("ranks patch-level tags above the release", () => {
    expect(compareVersions("1.0pl1", "1.0")).toBe(1);
  });

  it("ignores build metadata", () => {
    expect(compareVersions("3.0.13+quic", "3.0.13")).toBe(0);
  });

  it("compares component versions as reported by the runtime", () => {
    expect(compareVersions("1.3.0.1-motley", "1.2.13")).toBe(1);
    expect(compareVersions("11.3.244.8-node.19", "11.3")).toBe(1);
  });
});

describe("parseVersionComponents", () => {
  it("splits on separators and digit/letter boundaries", () => {
    expect(parseVersionComponents("1.0RC1")).toEqual([
      { kind: "number", value: 1 },
      { kind: "number", value: 0 },
      { kind: "word", value: "rc" },
      { kind: "number", value: 1 },
    ]);
    expect(parseVersionComponents("1.2+build-7_9")).toEqual([
      { kind: "number", value: 1 },
      { kind: "number", value: 2 },
    ]);
    expect(parseVersionComponents("2_1-beta+build.5")).toEqual([
      { kind: "number", value: 2 },
      { kind: "number", value: 1 },
      { kind: "word", value: "beta" },
    ]);
  });
});

describe("satisfiesMinimumVersion", () => {
  it("accepts versions at or above the floor", () => {
    expect(satisfiesMinimumVersion("1.2.13", "1.2.13")).toBe(true);
    expect(satisfiesMinimumVersion("1.2.13", "1.2")).toBe(true);
    expect(satisfiesMinimumVersion("1.2.13", "1.3")).toBe(false);
  });

  it("is monotonic in the floor", () => {
    const floors = ["0.9", "1.0", "1.2", "1.2.13", "1.3"];
    const satisfied = floors.map((floor) =>
      satisfiesMinimumVersion("1.2.13", floor),
    );
    expect(satisfied).toEqual([true, true, true, true, false]);
  });
});
