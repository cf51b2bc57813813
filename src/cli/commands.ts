/**
 * projlens commands. Each command turns the loaded history (and project) into report text.
 */

import { addDays } from "date-fns";
import { InvalidArgumentError } from "../errors.js";
import type { ProjlensConfig } from "../config/projlensYaml.js";
import { formatCommitLog, formatCommitRecord, NO_COMMITS } from "../formatters/commitLog.js";
import { formatGroupCounts, type PeriodUnit } from "../formatters/groupCounts.js";
import { formatProjectDescription } from "../formatters/projectDescription.js";
import { formatSourceFiles } from "../formatters/sourceFiles.js";
import { formatStatus } from "../formatters/status.js";
import type { GitStatus } from "../git/status.js";
import type { CommitHistory, Group } from "../history/commitHistory.js";
import type { CommitRecord } from "../history/commitRecord.js";
import {
  afterHours,
  and,
  byAuthorLike,
  byTime,
  duringWorkHours,
  excludingDates,
  touchingPath,
  withAnyMessage,
  withMessage,
  type CommitPredicate,
  type WorkHours,
} from "../history/queries.js";
import type { Project } from "../project/project.js";
import type { RecentProject } from "../project/recentProjects.js";
import type { SourceFileSet } from "../source/sourceFileSet.js";
import { parseLocalDate } from "../time/dates.js";
import { hasText } from "../util/order.js";
import { getFlagValue, getLimit, hasFlag, positionals } from "./args.js";

export const USAGE = `Usage: projlens <command> [args] [--flags]

Commands:
  describe [--dir <path>]          Project metadata and development span
  recent                           Remembered projects
  commit-count                     Number of matching commits
  commit-count-group [--by-day|--by-month|--by-year]
                                   Commit counts per period (default by day), largest first
  commit-log [hash]                One commit, or the log of matching commits
                                   [--after-hash <hash>] [--before-hash <hash>]
  commits-after-hours              Commits on weekends or outside working hours
  commits-during-work              Commits on weekdays within working hours
  commits-by <committer>           Commits by an author name or email
  commits-to <path>                Commits touching a matching file path
  commits-with <message>           Commits whose message contains the text
  first-commit | last-commit       Oldest / newest matching commit [--source <path>]
  source-files <msg[|msg...]>      Files touched by commits with any of the messages
                                   [--include-filter <s>] [--exclude-filter <s>] [--strict]
  status                           Working tree changes not yet committed

Flags:
  --author <text>  --since <yyyy-MM-dd>  --until <yyyy-MM-dd>
  --during <periods>  --exclude-dates <periods>  --limit <n>  --count  --show-files`;

export interface CommandContext {
  history: CommitHistory;
  config: ProjlensConfig;
  project?: Project;
  recent?: RecentProject[];
  status?: GitStatus;
}

type Command = (args: string[], context: CommandContext) => string;

function workHours(config: ProjlensConfig): WorkHours {
  return { startHour: config.workdayStart, endHour: config.workdayEnd };
}

/** --author, --since, --until, --during and --exclude-dates, plus the configured exclusions. */
export function commonCriteria(args: string[], config: ProjlensConfig): CommitPredicate {
  return and(
    byAuthorLike(getFlagValue(args, "--author") ?? undefined),
    byTime({
      since: getFlagValue(args, "--since") ?? undefined,
      until: getFlagValue(args, "--until") ?? undefined,
      during: getFlagValue(args, "--during") ?? undefined,
      excluding: getFlagValue(args, "--exclude-dates") ?? undefined,
    }),
    excludingDates(config.excludeDates),
  );
}

/** Common criteria plus --source, a fragment of a touched file path. */
function sourceCriteria(args: string[], config: ProjlensConfig): CommitPredicate {
  return and(commonCriteria(args, config), touchingPath(getFlagValue(args, "--source") ?? undefined));
}

function requiredArgument(args: string[], what: string): string {
  const value = positionals(args)[0];
  if (!hasText(value)) {
    throw new InvalidArgumentError(`Missing ${what}`);
  }
  return value;
}

function renderCommits(history: CommitHistory, args: string[], config: ProjlensConfig): string {
  if (hasFlag(args, "--count")) return `Commits: ${history.size}`;
  return formatCommitLog(history, getLimit(args, config.logLimit), hasFlag(args, "--show-files"));
}

function renderOne(record: CommitRecord | undefined, args: string[]): string {
  return record ? formatCommitRecord(record, hasFlag(args, "--show-files")) : NO_COMMITS;
}

function listing(extra: (args: string[], context: CommandContext) => CommitPredicate): Command {
  return (args, context) => {
    const predicate = and(commonCriteria(args, context.config), extra(args, context));
    return renderCommits(context.history.findBy(predicate), args, context.config);
  };
}

function periodUnit(args: string[]): PeriodUnit {
  if (hasFlag(args, "--by-year")) return "year";
  if (hasFlag(args, "--by-month")) return "month";
  return "day";
}

function groupsOf(history: CommitHistory, unit: PeriodUnit): Group[] {
  switch (unit) {
    case "day":
      return history.groupByDay();
    case "month":
      return history.groupByMonth();
    case "year":
      return history.groupByYear();
  }
}

/** History narrowed by --after-hash and --before-hash, in that order. */
function slicedHistory(history: CommitHistory, args: string[]): CommitHistory {
  let sliced = history;
  const after = getFlagValue(args, "--after-hash");
  if (after !== null) sliced = sliced.findAllCommitsAfterHash(after);
  const before = getFlagValue(args, "--before-hash");
  if (before !== null) sliced = sliced.findAllCommitsBeforeHash(before);
  return sliced;
}

/**
 * --include-filter / --exclude-filter on the path. --strict keeps files whose whole history,
 * first revision to last, lies within --since and --until.
 */
function filterSourceFiles(files: SourceFileSet, history: CommitHistory, args: string[]): SourceFileSet {
  const include = getFlagValue(args, "--include-filter");
  const exclude = getFlagValue(args, "--exclude-filter");
  let result = files.findBy((f) => (hasText(include) ? f.path.includes(include) : true));
  if (hasText(exclude)) result = result.findBy((f) => !f.path.includes(exclude));

  if (hasFlag(args, "--strict")) {
    const since = getFlagValue(args, "--since");
    const until = getFlagValue(args, "--until");
    const from = hasText(since) ? parseLocalDate(since).getTime() : Number.NEGATIVE_INFINITY;
    const to = hasText(until) ? addDays(parseLocalDate(until), 1).getTime() : Number.POSITIVE_INFINITY;
    const everyRevision = history.toSourceFileSet();
    result = result.findBy((f) => {
      const whole = everyRevision.findByFile(f.path) ?? f;
      const first = whole.firstRevision;
      const last = whole.lastRevision;
      return first !== undefined && last !== undefined && first.timestamp.getTime() >= from && last.timestamp.getTime() < to;
    });
  }
  return result;
}

const COMMANDS: Record<string, Command> = {
  describe: (_args, { project, history }) => {
    if (!project) {
      throw new InvalidArgumentError("No project to describe");
    }
    return formatProjectDescription(project, history);
  },

  recent: (_args, { recent }) => {
    if (!recent || recent.length === 0) return "No recent projects";
    return recent.map((p) => `${p.name} -> ${p.location}`).join("\n");
  },

  "commit-count": (args, { history, config }) => `Commits: ${history.findBy(commonCriteria(args, config)).size}`,

  "commit-count-group": (args, { history, config }) => {
    const unit = periodUnit(args);
    const groups = groupsOf(history.findBy(commonCriteria(args, config)), unit);
    return formatGroupCounts(groups, getLimit(args, config.groupLimit), unit);
  },

  "commit-log": (args, { history, config }) => {
    const hash = positionals(args)[0];
    if (hasText(hash)) {
      const record = history.findByHash(hash);
      if (!record) {
        throw new InvalidArgumentError(`Commit [${hash}] not found`);
      }
      return formatCommitRecord(record, hasFlag(args, "--show-files"));
    }
    return renderCommits(slicedHistory(history, args).findBy(commonCriteria(args, config)), args, config);
  },

  "commits-after-hours": listing((_args, { config }) => afterHours(workHours(config))),

  "commits-during-work": listing((_args, { config }) => duringWorkHours(workHours(config))),

  "commits-by": listing((args) => byAuthorLike(requiredArgument(args, "committer"))),

  "commits-to": listing((args) => touchingPath(requiredArgument(args, "file path"))),

  "commits-with": listing((args) => withMessage(requiredArgument(args, "commit message"))),

  "first-commit": (args, { history, config }) =>
    renderOne(history.findBy(sourceCriteria(args, config)).firstCommit(), args),

  "last-commit": (args, { history, config }) =>
    renderOne(history.findBy(sourceCriteria(args, config)).lastCommit(), args),

  "source-files": (args, { history, config }) => {
    const messages = requiredArgument(args, "commit message(s)");
    const commits = history.findBy(and(commonCriteria(args, config), withAnyMessage(messages)));
    return formatSourceFiles(filterSourceFiles(commits.toSourceFileSet(), history, args));
  },

  status: (_args, { status }) => {
    if (!status) {
      throw new InvalidArgumentError("No working tree status");
    }
    return formatStatus(status);
  },
};

export function isCommand(name: string): boolean {
  return Object.prototype.hasOwnProperty.call(COMMANDS, name);
}

/** Report text for the command. Unknown commands and bad arguments throw InvalidArgumentError. */
export function runCommand(name: string, args: string[], context: CommandContext): string {
  if (!isCommand(name)) {
    throw new InvalidArgumentError(`Unknown command [${name}]; run "projlens help" for usage`);
  }
  return COMMANDS[name](args, context);
}
