/**
 * A repository file and the revisions that modified it, oldest first.
 */

import { basename, extname } from "path";
import { InvalidArgumentError } from "../errors.js";
import { Author } from "../model/author.js";
import { formatLocalDate } from "../time/dates.js";
import type { TimePeriods } from "../time/timePeriods.js";
import { hasText, numberCompare, stringCompareBinary } from "../util/order.js";

export type SourceFileType = "c" | "c++" | "groovy" | "java" | "js" | "kt" | "properties" | "ts" | "unknown";

const TYPES_BY_EXTENSION: ReadonlyMap<string, SourceFileType> = new Map([
  ["c", "c"],
  ["c++", "c++"],
  ["cpp", "c++"],
  ["groovy", "groovy"],
  ["java", "java"],
  ["js", "js"],
  ["kt", "kt"],
  ["properties", "properties"],
  ["ts", "ts"],
]);

export class Revision {
  constructor(
    readonly author: Author,
    readonly timestamp: Date,
    readonly id: string,
  ) {
    if (!hasText(id)) {
      throw new InvalidArgumentError(`Revision ID [${id}] is required`);
    }
  }

  static of(author: Author, timestamp: Date, id: string): Revision {
    return new Revision(author, timestamp, id);
  }

  /** Local `yyyy-MM-dd`. */
  get date(): string {
    return formatLocalDate(this.timestamp);
  }

  equals(that: unknown): boolean {
    return that instanceof Revision && that.id === this.id;
  }

  /** Oldest first. */
  compareTo(that: Revision): number {
    return numberCompare(this.timestamp.getTime(), that.timestamp.getTime());
  }

  toString(): string {
    return this.id;
  }
}

function authoredBy(author: Author | string): (revision: Revision) => boolean {
  return typeof author === "string" ? (r) => r.author.matches(author) : (r) => r.author.equals(author);
}

export class SourceFile implements Iterable<Revision> {
  readonly path: string;
  private readonly revisions: Revision[] = [];
  private readonly ids = new Set<string>();

  constructor(path: string) {
    if (!hasText(path)) {
      throw new InvalidArgumentError(`Source file path [${path}] is required`);
    }
    this.path = path.trim();
  }

  static from(path: string): SourceFile {
    return new SourceFile(path);
  }

  /** File name without directory or extensions. */
  get name(): string {
    const base = basename(this.path);
    const dot = base.indexOf(".");
    return dot > 0 ? base.slice(0, dot) : base;
  }

  get type(): SourceFileType {
    return TYPES_BY_EXTENSION.get(extname(this.path).slice(1).toLowerCase()) ?? "unknown";
  }

  get revisionCount(): number {
    return this.revisions.length;
  }

  get revisionIds(): Set<string> {
    return new Set(this.ids);
  }

  get authors(): Author[] {
    const byName = new Map<string, Author>();
    for (const r of this.revisions) {
      if (!byName.has(r.author.name)) byName.set(r.author.name, r.author);
    }
    return [...byName.values()].sort((a, b) => a.compareTo(b));
  }

  get firstRevision(): Revision | undefined {
    return this.revisions[0];
  }

  get lastRevision(): Revision | undefined {
    return this.revisions[this.revisions.length - 1];
  }

  getRevision(id: string): Revision | undefined {
    return this.revisions.find((r) => r.id === id);
  }

  /** By Author identity, or by name/email text (case-insensitive). */
  revisionsBy(author: Author | string): Revision[] {
    return this.revisions.filter(authoredBy(author));
  }

  revisionsDuring(timePeriods: TimePeriods | null | undefined): Revision[] {
    if (timePeriods == null) return [];
    return this.revisions.filter((r) => timePeriods.isDuring(r.timestamp));
  }

  wasModifiedBy(author: Author | string): boolean {
    return this.revisions.some(authoredBy(author));
  }

  wasModifiedDuring(timePeriods: TimePeriods | null | undefined): boolean {
    return this.revisionsDuring(timePeriods).length > 0;
  }

  /** Adds the revision unless one with the same ID is present; keeps chronological order. */
  withRevision(revision: Revision): this {
    if (!(revision instanceof Revision)) {
      throw new InvalidArgumentError("Revision is required");
    }
    if (this.ids.has(revision.id)) return this;
    // After any revisions with the same timestamp.
    let lo = 0;
    let hi = this.revisions.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      if (this.revisions[mid].compareTo(revision) <= 0) lo = mid + 1;
      else hi = mid;
    }
    this.revisions.splice(lo, 0, revision);
    this.ids.add(revision.id);
    return this;
  }

  compareTo(that: SourceFile): number {
    return stringCompareBinary(this.path, that.path);
  }

  equals(that: unknown): boolean {
    return that instanceof SourceFile && that.path === this.path;
  }

  [Symbol.iterator](): Iterator<Revision> {
    return [...this.revisions][Symbol.iterator]();
  }

  toString(): string {
    return this.path;
  }
}
