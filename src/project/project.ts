/**
 * Build metadata of a project plus its (lazily loaded) commit history.
 */

import { InvalidArgumentError } from "../errors.js";
import type { RawCommitLoader } from "../git/types.js";
import type { CommitHistory } from "../history/commitHistory.js";
import { loadCommitHistory } from "../history/load.js";
import { hasText, stringCompareBinary } from "../util/order.js";
import type { Version } from "../version/version.js";

export interface Artifact {
  groupId?: string;
  id: string;
}

export interface Developer {
  name: string;
  email?: string;
  url?: string;
}

export class Project {
  readonly name: string;
  directory?: string;
  description?: string;
  version?: Version;
  artifact?: Artifact;
  sourceRepository?: string;
  issueTracker?: string;
  readonly licenses: string[] = [];
  readonly developers: Developer[] = [];
  private history: CommitHistory | undefined;

  constructor(name: string) {
    if (!hasText(name)) {
      throw new InvalidArgumentError(`Name [${name}] for project is required`);
    }
    this.name = name.trim();
  }

  static named(name: string): Project {
    return new Project(name);
  }

  get commitHistory(): CommitHistory | undefined {
    return this.history;
  }

  withCommitHistory(history: CommitHistory | undefined): this {
    this.history = history;
    return this;
  }

  /** Cached history, loaded from the project directory on first use. */
  resolveCommitHistory(loader?: RawCommitLoader): CommitHistory {
    if (this.history) return this.history;
    if (!this.directory) {
      throw new InvalidArgumentError(`Project [${this.name}] has no directory to load commit history from`);
    }
    this.history = loadCommitHistory(this.directory, loader);
    return this.history;
  }

  withLicense(license: string): this {
    if (hasText(license) && !this.licenses.includes(license.trim())) this.licenses.push(license.trim());
    return this;
  }

  developedBy(developer: Developer): this {
    if (hasText(developer.name) && !this.developers.some((d) => d.name === developer.name)) {
      this.developers.push(developer);
    }
    return this;
  }

  /** `group:id:version`, omitting the parts that are not set. */
  artifactCoordinates(): string | undefined {
    if (!this.artifact) return undefined;
    return [this.artifact.groupId, this.artifact.id, this.version?.toString()].filter(hasText).join(":");
  }

  compareTo(that: Project): number {
    return stringCompareBinary(this.name, that.name);
  }

  toString(): string {
    return this.name;
  }
}
