export * from "./errors.js";
export { Version, classifyQualifier, describeQualifier, type QualifierKind } from "./version/version.js";
export { Author } from "./model/author.js";
export { CommitRecord, SHORT_HASH_LENGTH } from "./history/commitRecord.js";
export { CommitHistory, Group, dayKey, monthKey, yearKey, type GroupKey } from "./history/commitHistory.js";
export * from "./history/queries.js";
export { commitHistoryFrom, loadCommitHistory, toCommitRecord } from "./history/load.js";
export { Revision, SourceFile, type SourceFileType } from "./source/sourceFile.js";
export { SourceFileSet } from "./source/sourceFileSet.js";
export { DateRange, TimePeriods } from "./time/timePeriods.js";
export { getRepoRoot, loadRawCommits, parseGitLog, runGit } from "./git/log.js";
export { GitStatus, loadStatus, parseStatus, type GitStatusEntries } from "./git/status.js";
export type { RawCommit, RawCommitLoader } from "./git/types.js";
export { Project, type Artifact, type Developer } from "./project/project.js";
export { loadProject, projectFromDescriptor } from "./project/descriptor.js";
export {
  defaultStoreDir,
  loadRecentProjects,
  rememberProject,
  saveRecentProjects,
  type RecentProject,
} from "./project/recentProjects.js";
export { loadProjlensConfig, parseProjlensConfig, type ProjlensConfig } from "./config/projlensYaml.js";
export { runCommand, USAGE, type CommandContext } from "./cli/commands.js";
