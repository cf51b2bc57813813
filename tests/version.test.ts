import { InvalidArgumentError } from "../src/errors.js";
import { Version, classifyQualifier, describeQualifier } from "../src/version/version.js";

describe("Version", () => {
  it("parses major.minor.maintenance with a qualifier", () => {
    const v = Version.parse("1.2.3-RC1");
    expect([v.major, v.minor, v.maintenance]).toEqual([1, 2, 3]);
    expect(v.qualifier).toBe("RC1");
    expect(v.isReleaseCandidate()).toBe(true);
    expect(v.isRelease()).toBe(false);
  });

  it("defaults maintenance to 0", () => {
    const v = Version.parse("4.7");
    expect(v.maintenance).toBe(0);
    expect(v.toString()).toBe("4.7.0");
    expect(v.isQualifierPresent()).toBe(false);
  });

  it("formats back to the parsed text", () => {
    for (const text of ["1.2.3", "1.2.3-M2", "0.9.1-SNAPSHOT", "10.0.0-RC12"]) {
      expect(Version.parse(text).toString()).toBe(text);
    }
  });

  it("keeps everything after the first dash as the qualifier", () => {
    expect(Version.parse("2.0.0-RC1-hotfix").qualifier).toBe("RC1-hotfix");
  });

  it("rejects malformed text with an error naming it", () => {
    expect(() => Version.parse("")).toThrow(InvalidArgumentError);
    expect(() => Version.parse("1")).toThrow("[1]");
    expect(() => Version.parse("1.2.3.4")).toThrow("[1.2.3.4]");
    expect(() => Version.parse("1.x")).toThrow("[1.x] is not valid");
  });

  it("rejects numbers too large to represent exactly", () => {
    expect(() => Version.parse("1.2.9007199254740993")).toThrow("[1.2.9007199254740993]");
    expect(() => Version.parse("1.2.99999999999999999999999")).toThrow(InvalidArgumentError);
    expect(Version.parse("1.2.9007199254740991").toString()).toBe("1.2.9007199254740991");
  });

  it("parses what it formats into an equal version", () => {
    const cases: Array<[number, number, number, string | undefined]> = [
      [0, 0, 0, undefined],
      [1, 2, 3, "RC1"],
      [4, 10, 0, "M2"],
      [2, 0, 7, "SNAPSHOT"],
      [12, 34, 56, "beta"],
    ];
    for (const [major, minor, maintenance, qualifier] of cases) {
      const version = Version.of(major, minor, maintenance).withQualifier(qualifier);
      expect(Version.parse(version.toString()).equals(version)).toBe(true);
    }
  });

  it("clamps negative numbers to zero", () => {
    expect(Version.of(-1, 2, -3).toString()).toBe("0.2.0");
  });

  it("sorts in descending precedence", () => {
    const sorted = ["1.0.0-SNAPSHOT", "1.0.0-M1", "1.0.0", "1.0.0-M2", "1.0.0-RC1"]
      .map((t) => Version.parse(t))
      .sort(Version.compare)
      .map(String);
    expect(sorted).toEqual(["1.0.0", "1.0.0-RC1", "1.0.0-M2", "1.0.0-M1", "1.0.0-SNAPSHOT"]);
  });

  it("orders by numbers before qualifiers", () => {
    const sorted = [Version.parse("2.0.1-RC1"), Version.parse("3.0.0-SNAPSHOT")].sort(Version.compare).map(String);
    expect(sorted).toEqual(["3.0.0-SNAPSHOT", "2.0.1-RC1"]);
    const mixed = ["1.0.0", "2.0.1-RC1", "1.1.0-M1"].map((t) => Version.parse(t)).sort(Version.compare).map(String);
    expect(mixed).toEqual(["2.0.1-RC1", "1.1.0-M1", "1.0.0"]);
  });

  it("classifies qualifiers ignoring case", () => {
    expect(Version.parse("1.0.0-rc2").isReleaseCandidate()).toBe(true);
    expect(Version.parse("1.0.0-m3").isMilestone()).toBe(true);
    expect(Version.parse("1.0.0-snapshot").isSnapshot()).toBe(true);
    expect(classifyQualifier("RC7")).toEqual({ kind: "release-candidate", number: 7 });
    expect(classifyQualifier(undefined)).toEqual({ kind: "release" });
  });

  it("treats an unrecognized qualifier as a release ranked below snapshots", () => {
    const beta = Version.parse("1.0.0-beta");
    expect(beta.isRelease()).toBe(true);
    expect(describeQualifier(beta)).toBe("Release (beta)");
    const sorted = [beta, Version.parse("1.0.0-SNAPSHOT")].sort(Version.compare).map(String);
    expect(sorted).toEqual(["1.0.0-SNAPSHOT", "1.0.0-beta"]);
  });

  it("normalizes a blank qualifier to absent", () => {
    const v = Version.of(1, 0).withQualifier("   ");
    expect(v.isQualifierPresent()).toBe(false);
    expect(v.isRelease()).toBe(true);
    expect(v.toString()).toBe("1.0.0");
  });

  it("compares structurally", () => {
    expect(Version.parse("1.2.3-RC1").equals(Version.parse("1.2.3-RC1"))).toBe(true);
    expect(Version.parse("1.2.3-RC1").equals(Version.parse("1.2.3"))).toBe(false);
    expect(Version.parse("1.2").equals(Version.of(1, 2, 0))).toBe(true);
  });

  it("describes the release status", () => {
    expect(describeQualifier(Version.parse("1.0.0"))).toBe("Release");
    expect(describeQualifier(Version.parse("1.0.0-M3"))).toBe("Milestone 3");
    expect(describeQualifier(Version.parse("1.0.0-RC2"))).toBe("Release Candidate 2");
    expect(describeQualifier(Version.parse("1.0.0-SNAPSHOT"))).toBe("Snapshot");
  });
});
