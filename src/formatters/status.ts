import type { GitStatus } from "../git/status.js";

export const CLEAN_STATUS = "Nothing to commit, working tree clean";

/** Non-empty sections in a fixed order, one indented path per line. */
export function formatStatus(status: GitStatus): string {
  if (status.isClean()) return CLEAN_STATUS;
  const sections: Array<[string, string[]]> = [
    ["Added", status.added],
    ["Changed", status.changed],
    ["Conflicts", status.conflicts],
    ["Ignored", status.ignored],
    ["Missing", status.missing],
    ["Removed", status.removed],
    ["Untracked", status.untracked],
  ];
  return sections
    .filter(([, paths]) => paths.length > 0)
    .map(([title, paths]) => [`${title}:`, ...paths.map((p) => `    ${p}`)].join("\n"))
    .join("\n\n");
}
