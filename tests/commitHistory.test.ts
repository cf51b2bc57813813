import { CommitHistory } from "../src/history/commitHistory.js";
import { CommitRecord } from "../src/history/commitRecord.js";
import { not } from "../src/history/queries.js";
import { Author } from "../src/model/author.js";
import { commit, sampleCommits, sampleHistory } from "./fixtures.js";

function hashes(history: Iterable<CommitRecord>): string[] {
  return [...history].map((r) => r.hash);
}

describe("CommitHistory", () => {
  const [a, b, c, d] = sampleCommits();
  let history: CommitHistory;

  beforeEach(() => {
    history = CommitHistory.of([c, a, null, d, undefined, b]);
  });

  it("orders records newest first and drops absent ones", () => {
    expect(history.size).toBe(4);
    expect(hashes(history)).toEqual([d.hash, c.hash, b.hash, a.hash]);
    const times = history.toArray().map((r) => r.timestamp.getTime());
    for (let i = 1; i < times.length; i++) expect(times[i - 1]).toBeGreaterThan(times[i]);
  });

  it("keeps input order for equal timestamps", () => {
    const at = new Date(2024, 5, 1, 12, 0);
    const x = commit("xxxxxxx", at);
    const y = commit("yyyyyyy", at);
    expect(hashes(CommitHistory.of([x, y]))).toEqual(["xxxxxxx", "yyyyyyy"]);
    expect(hashes(CommitHistory.of([y, x]))).toEqual(["yyyyyyy", "xxxxxxx"]);
  });

  it("keeps duplicate hashes", () => {
    expect(CommitHistory.of([a, a]).size).toBe(2);
  });

  it("matches nothing for an absent predicate", () => {
    expect(history.findBy(null).isEmpty()).toBe(true);
    expect(history.findBy(undefined).size).toBe(0);
  });

  it("finds nothing when filtering a result by the negated predicate", () => {
    const byJane = (r: CommitRecord) => r.author.name === "Jane Doe";
    const matched = history.findBy(byJane);
    expect(hashes(matched)).toEqual([c.hash, a.hash]);
    expect(matched.findBy(not(byJane)).isEmpty()).toBe(true);
  });

  it("finds by author, date, hash and source file", () => {
    expect(hashes(history.findByAuthor(Author.as("Sam Roe")))).toEqual([d.hash, b.hash]);
    expect(hashes(history.findByDate(new Date(2024, 0, 5, 23, 59)))).toEqual([b.hash, a.hash]);
    expect(history.findByHash("CCCCCCC3333")).toBe(c);
    expect(history.findByHash("0000000")).toBeUndefined();
    expect(hashes(history.findBySourceFile("src/index.ts"))).toEqual([d.hash, a.hash]);
  });

  it("slices after and before a hash, sharing the target", () => {
    const after = history.findAllCommitsAfterHash(c.hash);
    const before = history.findAllCommitsBeforeHash(c.hash);
    expect(hashes(after)).toEqual([d.hash, c.hash]);
    expect(hashes(before)).toEqual([c.hash, b.hash, a.hash]);
    expect([...hashes(after), ...hashes(before).slice(1)]).toEqual(hashes(history));
  });

  it("returns empty slices for an unknown or blank hash", () => {
    expect(history.findAllCommitsAfterHash("0000000").isEmpty()).toBe(true);
    expect(history.findAllCommitsBeforeHash("0000000").isEmpty()).toBe(true);
    expect(history.findAllCommitsAfterHash("").isEmpty()).toBe(true);
    expect(history.findAllCommitsBeforeHash(" ").isEmpty()).toBe(true);
  });

  it("pairs first and last commit with the ends of the history", () => {
    expect(history.firstCommit()).toBe(a);
    expect(history.lastCommit()).toBe(d);
    expect(CommitHistory.empty().firstCommit()).toBeUndefined();
    expect(CommitHistory.empty().lastCommit()).toBeUndefined();
  });

  it("groups by day, month and year in ascending key order", () => {
    const h = sampleHistory();
    const days = h.groupByDay();
    expect(days.map((g) => g.key)).toEqual(["2024-01-05", "2024-02-10", "2025-01-01"]);
    expect(days.map((g) => g.size)).toEqual([2, 1, 1]);
    expect(h.groupByMonth().map((g) => g.key)).toEqual(["2024-01", "2024-02", "2025-01"]);
    const years = h.groupByYear();
    expect(years.map((g) => g.key)).toEqual([2024, 2025]);
    expect(years.map((g) => g.size)).toEqual([3, 1]);
  });

  it("holds each hash once per group", () => {
    const groups = CommitHistory.of([a, a, b]).groupByDay();
    expect(groups).toHaveLength(1);
    expect(groups[0].size).toBe(2);
    expect(groups[0].has(b)).toBe(true);
  });

  it("groups by an arbitrary key", () => {
    const groups = history.groupBy((r) => r.author.name);
    expect(groups.map((g) => [g.key, g.size])).toEqual([
      ["Jane Doe", 2],
      ["Sam Roe", 2],
    ]);
  });

  it("sorts in place and returns the same history", () => {
    const sorted = history.sort(CommitRecord.compareChronologically);
    expect(sorted).toBe(history);
    expect(hashes(history)).toEqual([a.hash, b.hash, c.hash, d.hash]);
    expect(history.firstCommit()).toBe(d);
  });

  it("derives a source file set with first and last revisions", () => {
    const files = history.toSourceFileSet();
    expect(files.toArray().map((f) => f.path)).toEqual([
      "README.md",
      "scripts/release.ts",
      "src/index.ts",
      "src/parser.ts",
    ]);
    const index = files.findByFile("src/index.ts");
    expect(index?.revisionCount).toBe(2);
    expect(index?.firstRevision?.id).toBe(a.hash);
    expect(index?.lastRevision?.id).toBe(d.hash);
  });
});
