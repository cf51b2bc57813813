/**
 * Project summary: build metadata plus the span of its commit history.
 */

import { differenceInCalendarDays } from "date-fns";
import type { CommitHistory } from "../history/commitHistory.js";
import type { Developer, Project } from "../project/project.js";
import { describeQualifier } from "../version/version.js";

export function formatDeveloper(developer: Developer): string {
  let text = developer.name;
  if (developer.email) text += ` <${developer.email}>`;
  if (developer.url) text += ` (${developer.url})`;
  return text;
}

/** Calendar days from the first to the last commit; 0 for an empty history. */
export function developmentDays(history: CommitHistory): number {
  const first = history.firstCommit();
  const last = history.lastCommit();
  if (!first || !last) return 0;
  return differenceInCalendarDays(last.timestamp, first.timestamp);
}

export function formatProjectDescription(project: Project, history: CommitHistory): string {
  const lines = [`Project: ${project.name}`];
  if (project.description) lines.push(`Description: ${project.description}`);
  if (project.version) {
    lines.push(`Version: ${project.version.toString()} (${describeQualifier(project.version)})`);
  }
  const coordinates = project.artifactCoordinates();
  if (coordinates) lines.push(`Artifact: ${coordinates}`);
  if (project.licenses.length > 0) lines.push(`Licenses: ${project.licenses.join(", ")}`);
  if (project.developers.length > 0) {
    lines.push(`Developers: ${project.developers.map(formatDeveloper).join(", ")}`);
  }
  if (project.sourceRepository) lines.push(`Repository: ${project.sourceRepository}`);
  if (project.issueTracker) lines.push(`Issue Tracker: ${project.issueTracker}`);

  lines.push(`Commits: ${history.size}`);
  const first = history.firstCommit();
  const last = history.lastCommit();
  if (first && last) {
    lines.push(`First Commit: ${first.date}`);
    lines.push(`Last Commit: ${last.date}`);
    lines.push(`Duration: ${developmentDays(history)} days`);
  }
  return lines.join("\n");
}
