/**
 * Source files keyed by path, iterated in path order. Queries return new sets sharing the same SourceFiles.
 */

import type { Author } from "../model/author.js";
import type { TimePeriods } from "../time/timePeriods.js";
import { nonMatchingWhenAbsent, sortStrings, type Predicate } from "../util/order.js";
import { SourceFile } from "./sourceFile.js";

export class SourceFileSet implements Iterable<SourceFile> {
  private readonly byPath = new Map<string, SourceFile>();

  private constructor() {}

  static empty(): SourceFileSet {
    return new SourceFileSet();
  }

  static of(files: Iterable<SourceFile | null | undefined>): SourceFileSet {
    const set = new SourceFileSet();
    for (const f of files) {
      if (f != null) set.add(f);
    }
    return set;
  }

  get size(): number {
    return this.byPath.size;
  }

  isEmpty(): boolean {
    return this.byPath.size === 0;
  }

  /** Registers the file unless its path is already present. Returns the registered instance. */
  add(file: SourceFile): SourceFile {
    const existing = this.byPath.get(file.path);
    if (existing) return existing;
    this.byPath.set(file.path, file);
    return file;
  }

  contains(path: string | null | undefined): boolean {
    return path != null && this.byPath.has(path.trim());
  }

  /** Existing SourceFile for the path, or a new empty one registered in this set. */
  resolve(path: string): SourceFile {
    return this.findByFile(path) ?? this.add(SourceFile.from(path));
  }

  findByFile(path: string): SourceFile | undefined {
    return this.byPath.get(path.trim());
  }

  findBy(predicate: Predicate<SourceFile> | null | undefined): SourceFileSet {
    return SourceFileSet.of(this.toArray().filter(nonMatchingWhenAbsent(predicate)));
  }

  findByAuthor(author: Author | string): SourceFileSet {
    return this.findBy((f) => f.wasModifiedBy(author));
  }

  findByRevisionId(revisionId: string): SourceFileSet {
    return this.findBy((f) => f.getRevision(revisionId) !== undefined);
  }

  findDuring(timePeriods: TimePeriods | null | undefined): SourceFileSet {
    return this.findBy((f) => f.wasModifiedDuring(timePeriods));
  }

  toArray(): SourceFile[] {
    const files: SourceFile[] = [];
    for (const path of sortStrings(this.byPath.keys())) {
      const f = this.byPath.get(path);
      if (f) files.push(f);
    }
    return files;
  }

  [Symbol.iterator](): Iterator<SourceFile> {
    return this.toArray()[Symbol.iterator]();
  }
}
