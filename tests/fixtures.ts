import { CommitHistory } from "../src/history/commitHistory.js";
import { CommitRecord } from "../src/history/commitRecord.js";
import { Author } from "../src/model/author.js";

export interface CommitOptions {
  author?: string;
  email?: string;
  message?: string;
  files?: string[];
}

export function commit(hash: string, timestamp: Date, options: CommitOptions = {}): CommitRecord {
  const record = CommitRecord.of(Author.as(options.author ?? "Jane Doe", options.email), timestamp, hash);
  if (options.message !== undefined) record.withMessage(options.message);
  return record.add(...(options.files ?? []));
}

export const JANE = { author: "Jane Doe", email: "jane@example.com" };
export const SAM = { author: "Sam Roe", email: "sam@example.com" };

/** Fri 10:00, Fri 19:30, Sat 09:30, Wed 12:00 (local time). */
export function sampleCommits(): CommitRecord[] {
  return [
    commit("aaaaaaa1111", new Date(2024, 0, 5, 10, 0), {
      ...JANE,
      message: "Add parser",
      files: ["src/parser.ts", "src/index.ts"],
    }),
    commit("bbbbbbb2222", new Date(2024, 0, 5, 19, 30), {
      ...SAM,
      message: "Fix parser bug",
      files: ["src/parser.ts"],
    }),
    commit("ccccccc3333", new Date(2024, 1, 10, 9, 30), {
      ...JANE,
      message: "Add docs",
      files: ["README.md"],
    }),
    commit("ddddddd4444", new Date(2025, 0, 1, 12, 0), {
      ...SAM,
      message: "Fix release script",
      files: ["scripts/release.ts", "src/index.ts"],
    }),
  ];
}

export function sampleHistory(): CommitHistory {
  const [a, b, c, d] = sampleCommits();
  return CommitHistory.of([c, a, d, b]);
}
