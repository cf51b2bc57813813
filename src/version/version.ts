/**
 * Project version: major.minor.maintenance with an optional qualifier
 * (M<n> milestone, RC<n> release candidate, SNAPSHOT).
 *
 * Natural order is descending: newer and higher-precedence versions sort first.
 */

import { InvalidArgumentError } from "../errors.js";
import { hasText, invert, numberCompare, trimmed } from "../util/order.js";

const QUALIFIER_SEPARATOR = "-";
const NUMBER_SEPARATOR = ".";
const INTEGER_PATTERN = /^[+-]?\d+$/;
const FIRST_DIGITS_PATTERN = /\d+/;

export type QualifierKind =
  | { kind: "release" }
  | { kind: "release-candidate"; number: number }
  | { kind: "milestone"; number: number }
  | { kind: "snapshot" }
  | { kind: "unrecognized"; number: number };

const QUALIFIER_RANK: Record<QualifierKind["kind"], number> = {
  release: 4,
  "release-candidate": 3,
  milestone: 2,
  snapshot: 1,
  unrecognized: 0,
};

function firstNumberIn(text: string): number {
  const m = text.match(FIRST_DIGITS_PATTERN);
  return m ? Number.parseInt(m[0], 10) : 0;
}

/** Classify a qualifier. Prefix and exact matches are case-insensitive. */
export function classifyQualifier(qualifier: string | undefined): QualifierKind {
  const text = trimmed(qualifier);
  if (text.length === 0) return { kind: "release" };
  const upper = text.toUpperCase();
  if (upper.startsWith("RC")) return { kind: "release-candidate", number: firstNumberIn(text) };
  if (upper.startsWith("M")) return { kind: "milestone", number: firstNumberIn(text) };
  if (upper === "SNAPSHOT") return { kind: "snapshot" };
  return { kind: "unrecognized", number: firstNumberIn(text) };
}

function qualifierNumber(q: QualifierKind): number {
  return q.kind === "release" || q.kind === "snapshot" ? 0 : q.number;
}

function clamp(n: number): number {
  return Number.isFinite(n) ? Math.max(0, Math.trunc(n)) : 0;
}

export class Version {
  private _qualifier: string | undefined;

  private constructor(
    readonly major: number,
    readonly minor: number,
    readonly maintenance: number,
  ) {}

  static of(major: number, minor: number, maintenance = 0): Version {
    return new Version(clamp(major), clamp(minor), clamp(maintenance));
  }

  /**
   * Parse `major.minor[.maintenance][-qualifier]`. The qualifier is everything after the first `-`.
   * Negative numbers are clamped to 0, not rejected.
   */
  static parse(text: string): Version {
    if (!hasText(text)) {
      throw new InvalidArgumentError(`Version string [${text}] is required`);
    }
    const source = text.trim();
    const sep = source.indexOf(QUALIFIER_SEPARATOR);
    const numbers = sep > -1 ? source.slice(0, sep) : source;
    const qualifier = sep > -1 ? source.slice(sep + 1) : undefined;

    const parts = numbers.split(NUMBER_SEPARATOR);
    if (parts.length !== 2 && parts.length !== 3) {
      throw new InvalidArgumentError(
        `Version string [${text}] must consist of major, minor and optional maintenance version numbers`,
      );
    }
    const values = parts.map((p) => {
      if (!INTEGER_PATTERN.test(p)) {
        throw new InvalidArgumentError(`Version string [${text}] is not valid; [${p}] is not a number`);
      }
      const value = Number.parseInt(p, 10);
      if (!Number.isSafeInteger(value)) {
        throw new InvalidArgumentError(`Version string [${text}] is not valid; [${p}] is out of range`);
      }
      return value;
    });

    return Version.of(values[0], values[1], values[2] ?? 0).withQualifier(qualifier);
  }

  /** Descending order, for use with Array.prototype.sort. */
  static compare(a: Version, b: Version): number {
    return a.compareTo(b);
  }

  get qualifier(): string | undefined {
    return this._qualifier;
  }

  get qualifierKind(): QualifierKind {
    return classifyQualifier(this._qualifier);
  }

  /** Attach the qualifier. Call before the instance is shared. Blank clears it. */
  withQualifier(qualifier: string | null | undefined): this {
    this._qualifier = hasText(qualifier) ? qualifier.trim() : undefined;
    return this;
  }

  isQualifierPresent(): boolean {
    return this._qualifier !== undefined;
  }

  isMilestone(): boolean {
    return this.qualifierKind.kind === "milestone";
  }

  isReleaseCandidate(): boolean {
    return this.qualifierKind.kind === "release-candidate";
  }

  isSnapshot(): boolean {
    return this.qualifierKind.kind === "snapshot";
  }

  isRelease(): boolean {
    return !(this.isMilestone() || this.isReleaseCandidate() || this.isSnapshot());
  }

  compareTo(that: Version): number {
    let result =
      numberCompare(this.major, that.major) ||
      numberCompare(this.minor, that.minor) ||
      numberCompare(this.maintenance, that.maintenance);

    if (result === 0) {
      const a = this.qualifierKind;
      const b = that.qualifierKind;
      result =
        numberCompare(QUALIFIER_RANK[a.kind], QUALIFIER_RANK[b.kind]) ||
        numberCompare(qualifierNumber(a), qualifierNumber(b));
    }

    return invert(result);
  }

  equals(that: unknown): boolean {
    if (this === that) return true;
    if (!(that instanceof Version)) return false;
    return (
      this.major === that.major &&
      this.minor === that.minor &&
      this.maintenance === that.maintenance &&
      this._qualifier === that._qualifier
    );
  }

  toString(): string {
    const numbers = [this.major, this.minor, this.maintenance].join(NUMBER_SEPARATOR);
    return this._qualifier !== undefined ? numbers + QUALIFIER_SEPARATOR + this._qualifier : numbers;
  }
}

/** Human label for a version's release status. */
export function describeQualifier(version: Version): string {
  const q = version.qualifierKind;
  switch (q.kind) {
    case "release":
      return "Release";
    case "release-candidate":
      return `Release Candidate ${q.number}`;
    case "milestone":
      return `Milestone ${q.number}`;
    case "snapshot":
      return "Snapshot";
    case "unrecognized":
      return `Release (${version.qualifier ?? ""})`;
  }
}
