#!/usr/bin/env node
/**
 * projlens CLI. Reports on the project and commit history of the git working tree it runs in.
 * Exit: 0 ok, 1 invalid arguments or git failure, 2 invalid .projlens.yml.
 */

import { resolve } from "path";
import { getFlagValue, hasFlag } from "../src/cli/args.js";
import { runCommand, USAGE, type CommandContext } from "../src/cli/commands.js";
import { defaultConfig, loadProjlensConfig } from "../src/config/projlensYaml.js";
import { ConfigError, errorMessage } from "../src/errors.js";
import { getRepoRoot } from "../src/git/log.js";
import { loadStatus } from "../src/git/status.js";
import { CommitHistory } from "../src/history/commitHistory.js";
import { loadCommitHistory } from "../src/history/load.js";
import { loadProject } from "../src/project/descriptor.js";
import {
  defaultStoreDir,
  loadRecentProjects,
  rememberProject,
  saveRecentProjects,
} from "../src/project/recentProjects.js";

function main(): number {
  const [command = "help", ...args] = process.argv.slice(2);
  if (command === "help" || command === "--help" || hasFlag(args, "--help")) {
    console.log(USAGE);
    return 0;
  }

  const storeDir = defaultStoreDir();
  if (command === "recent") {
    const context: CommandContext = {
      history: CommitHistory.empty(),
      config: defaultConfig(),
      recent: loadRecentProjects(storeDir),
    };
    console.log(runCommand(command, args, context));
    return 0;
  }

  const dir = resolve(getFlagValue(args, "--dir") ?? process.cwd());
  const repoRoot = getRepoRoot(dir);
  if (!repoRoot) {
    console.error("projlens: not inside a git repository");
    return 1;
  }
  const config = loadProjlensConfig(repoRoot);

  if (command === "describe") {
    const project = loadProject(dir);
    const history = project.resolveCommitHistory();
    saveRecentProjects(storeDir, rememberProject(loadRecentProjects(storeDir), project));
    console.log(runCommand(command, args, { history, config, project }));
    return 0;
  }

  if (command === "status") {
    console.log(runCommand(command, args, { history: CommitHistory.empty(), config, status: loadStatus(repoRoot) }));
    return 0;
  }

  console.log(runCommand(command, args, { history: loadCommitHistory(repoRoot), config }));
  return 0;
}

try {
  process.exitCode = main();
} catch (err) {
  console.error(`projlens: ${errorMessage(err)}`);
  process.exitCode = err instanceof ConfigError ? 2 : 1;
}
