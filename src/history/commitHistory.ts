/**
 * The repository log as an ordered, queryable collection of CommitRecords.
 *
 * Records are materialized newest first. Queries return new histories in the current order;
 * `sort` is the only operation that reorders an existing instance.
 */

import { InvalidArgumentError } from "../errors.js";
import type { Author } from "../model/author.js";
import { Revision } from "../source/sourceFile.js";
import { SourceFileSet } from "../source/sourceFileSet.js";
import { formatLocalMonth, sameLocalDay } from "../time/dates.js";
import { hasText, nonMatchingWhenAbsent, numberCompare, stringCompareBinary } from "../util/order.js";
import type { Comparator, Predicate } from "../util/order.js";
import { CommitRecord } from "./commitRecord.js";

export type GroupKey = string | number;

/** Commits sharing one grouping key. Members are unique by hash. */
export class Group<K extends GroupKey = GroupKey> implements Iterable<CommitRecord> {
  private readonly byHash = new Map<string, CommitRecord>();

  constructor(
    readonly key: K,
    records: Iterable<CommitRecord> = [],
  ) {
    for (const r of records) this.add(r);
  }

  get size(): number {
    return this.byHash.size;
  }

  isEmpty(): boolean {
    return this.byHash.size === 0;
  }

  add(record: CommitRecord): void {
    if (!this.byHash.has(record.hash)) this.byHash.set(record.hash, record);
  }

  has(record: CommitRecord): boolean {
    return this.byHash.has(record.hash);
  }

  toArray(): CommitRecord[] {
    return [...this.byHash.values()];
  }

  [Symbol.iterator](): Iterator<CommitRecord> {
    return this.toArray()[Symbol.iterator]();
  }
}

function compareKeys(a: GroupKey, b: GroupKey): number {
  if (typeof a === "number" && typeof b === "number") return numberCompare(a, b);
  return stringCompareBinary(String(a), String(b));
}

/** Local `yyyy-MM-dd` of the commit. */
export function dayKey(record: CommitRecord): string {
  return record.date;
}

/** Local `yyyy-MM` of the commit. */
export function monthKey(record: CommitRecord): string {
  return formatLocalMonth(record.timestamp);
}

export function yearKey(record: CommitRecord): number {
  return record.timestamp.getFullYear();
}

export class CommitHistory implements Iterable<CommitRecord> {
  private readonly records: CommitRecord[];

  private constructor(records: CommitRecord[]) {
    this.records = records;
  }

  static empty(): CommitHistory {
    return new CommitHistory([]);
  }

  /** Drops null entries and orders the rest newest first. Equal timestamps keep their input order. */
  static of(records: Iterable<CommitRecord | null | undefined>): CommitHistory {
    const present = [...records].filter((r): r is CommitRecord => r != null);
    return new CommitHistory(present.sort(CommitRecord.compare));
  }

  private derive(records: CommitRecord[]): CommitHistory {
    return new CommitHistory(records);
  }

  get size(): number {
    return this.records.length;
  }

  isEmpty(): boolean {
    return this.records.length === 0;
  }

  toArray(): CommitRecord[] {
    return [...this.records];
  }

  [Symbol.iterator](): Iterator<CommitRecord> {
    return this.toArray()[Symbol.iterator]();
  }

  /** A null or undefined predicate matches nothing. */
  findBy(predicate: Predicate<CommitRecord> | null | undefined): CommitHistory {
    return this.derive(this.records.filter(nonMatchingWhenAbsent(predicate)));
  }

  findByAuthor(author: Author): CommitHistory {
    return this.findBy((r) => r.author.equals(author));
  }

  /** Commits on the same local day, regardless of time. */
  findByDate(date: Date): CommitHistory {
    return this.findBy((r) => sameLocalDay(r.timestamp, date));
  }

  /** First commit whose hash equals the given one, ignoring case. */
  findByHash(hash: string): CommitRecord | undefined {
    if (!hasText(hash)) return undefined;
    const needle = hash.trim().toLowerCase();
    return this.records.find((r) => r.hash.toLowerCase() === needle);
  }

  findBySourceFile(path: string): CommitHistory {
    return this.findBy((r) => r.contains(path));
  }

  private indexOfHash(hash: string): number {
    if (!hasText(hash)) return -1;
    const target = hash.trim();
    return this.records.findIndex((r) => r.hash === target);
  }

  /** From the newest commit through the commit with the given hash. Empty when the hash is not present. */
  findAllCommitsAfterHash(hash: string): CommitHistory {
    const i = this.indexOfHash(hash);
    return i < 0 ? CommitHistory.empty() : this.derive(this.records.slice(0, i + 1));
  }

  /** From the commit with the given hash through the oldest commit. Empty when the hash is not present. */
  findAllCommitsBeforeHash(hash: string): CommitHistory {
    const i = this.indexOfHash(hash);
    return i < 0 ? CommitHistory.empty() : this.derive(this.records.slice(i));
  }

  /** Oldest commit (last in iteration order). */
  firstCommit(): CommitRecord | undefined {
    return this.records[this.records.length - 1];
  }

  /** Newest commit (first in iteration order). */
  lastCommit(): CommitRecord | undefined {
    return this.records[0];
  }

  /** Partition by key; groups come back in ascending key order. */
  groupBy<K extends GroupKey>(keyFn: (record: CommitRecord) => K): Group<K>[] {
    if (typeof keyFn !== "function") {
      throw new InvalidArgumentError("Group by function is required");
    }
    const groups = new Map<K, Group<K>>();
    for (const r of this.records) {
      const key = keyFn(r);
      let group = groups.get(key);
      if (!group) {
        group = new Group(key);
        groups.set(key, group);
      }
      group.add(r);
    }
    return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
  }

  groupByDay(): Group<string>[] {
    return this.groupBy(dayKey);
  }

  groupByMonth(): Group<string>[] {
    return this.groupBy(monthKey);
  }

  groupByYear(): Group<number>[] {
    return this.groupBy(yearKey);
  }

  /** Reorders this history in place. */
  sort(comparator: Comparator<CommitRecord>): this {
    if (typeof comparator !== "function") {
      throw new InvalidArgumentError("Comparator is required");
    }
    this.records.sort(comparator);
    return this;
  }

  /** Per-file revision index over every touched file of every commit. */
  toSourceFileSet(): SourceFileSet {
    const set = SourceFileSet.empty();
    for (const r of this.records) {
      for (const path of r) {
        set.resolve(path).withRevision(Revision.of(r.author, r.timestamp, r.hash));
      }
    }
    return set;
  }
}
