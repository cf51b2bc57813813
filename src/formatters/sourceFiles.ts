import type { SourceFileSet } from "../source/sourceFileSet.js";

/** One path per line in path order, then the count. */
export function formatSourceFiles(files: SourceFileSet): string {
  const lines = files.toArray().map((f) => f.path);
  if (lines.length > 0) lines.push("");
  lines.push(`Count: ${files.size}`);
  return lines.join("\n");
}
