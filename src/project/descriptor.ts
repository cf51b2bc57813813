/**
 * Reads project metadata from the package.json descriptor in a project directory.
 */

import { existsSync, readFileSync } from "fs";
import { join, resolve } from "path";
import { InvalidArgumentError, errorMessage } from "../errors.js";
import { hasText } from "../util/order.js";
import { Version } from "../version/version.js";
import { Project, type Developer } from "./project.js";

export const DESCRIPTOR_FILE = "package.json";

type Json = Record<string, unknown>;

function isObject(value: unknown): value is Json {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function stringField(obj: Json, key: string): string | undefined {
  const value = obj[key];
  return typeof value === "string" && hasText(value) ? value.trim() : undefined;
}

/** `Name <email> (url)` person shorthand, or `{ name, email, url }`. */
export function parsePerson(value: unknown): Developer | undefined {
  if (typeof value === "string") {
    const m = value.trim().match(/^([^<(]+?)\s*(?:<([^>]*)>)?\s*(?:\(([^)]*)\))?$/);
    if (!m || !hasText(m[1])) return undefined;
    return {
      name: m[1].trim(),
      ...(hasText(m[2]) ? { email: m[2].trim() } : {}),
      ...(hasText(m[3]) ? { url: m[3].trim() } : {}),
    };
  }
  if (isObject(value)) {
    const name = stringField(value, "name");
    if (!name) return undefined;
    const email = stringField(value, "email");
    const url = stringField(value, "url");
    return { name, ...(email ? { email } : {}), ...(url ? { url } : {}) };
  }
  return undefined;
}

function urlOf(value: unknown): string | undefined {
  if (typeof value === "string" && hasText(value)) return value.trim();
  if (isObject(value)) return stringField(value, "url");
  return undefined;
}

function licensesOf(obj: Json): string[] {
  const out: string[] = [];
  const single = obj.license;
  if (typeof single === "string" && hasText(single)) out.push(single.trim());
  else if (isObject(single)) {
    const type = stringField(single, "type");
    if (type) out.push(type);
  }
  const many = obj.licenses;
  if (Array.isArray(many)) {
    for (const l of many) {
      if (typeof l === "string" && hasText(l)) out.push(l.trim());
      else if (isObject(l)) {
        const type = stringField(l, "type");
        if (type) out.push(type);
      }
    }
  }
  return out;
}

/** Build a Project from descriptor JSON. `dir` is recorded as the project directory. */
export function projectFromDescriptor(descriptor: unknown, dir: string): Project {
  if (!isObject(descriptor)) {
    throw new InvalidArgumentError(`${DESCRIPTOR_FILE}: root must be an object`);
  }
  const name = stringField(descriptor, "name");
  if (!name) {
    throw new InvalidArgumentError(`${DESCRIPTOR_FILE}: name is required`);
  }

  const project = Project.named(name);
  project.directory = dir;
  project.description = stringField(descriptor, "description");

  const version = stringField(descriptor, "version");
  if (version) {
    try {
      project.version = Version.parse(version);
    } catch (err) {
      throw new InvalidArgumentError(`${DESCRIPTOR_FILE}: version "${version}" — ${errorMessage(err)}`, err);
    }
  }

  const scoped = name.match(/^@([^/]+)\/(.+)$/);
  project.artifact = scoped ? { groupId: scoped[1], id: scoped[2] } : { id: name };

  for (const license of licensesOf(descriptor)) project.withLicense(license);

  const people = [descriptor.author, ...(Array.isArray(descriptor.contributors) ? descriptor.contributors : [])];
  for (const p of people) {
    const developer = parsePerson(p);
    if (developer) project.developedBy(developer);
  }

  project.sourceRepository = urlOf(descriptor.repository);
  project.issueTracker = urlOf(descriptor.bugs);

  return project;
}

/** Load the Project in `dir`. Throws InvalidArgumentError when there is no readable descriptor. */
export function loadProject(dir: string): Project {
  const root = resolve(dir);
  const path = join(root, DESCRIPTOR_FILE);
  if (!existsSync(path)) {
    throw new InvalidArgumentError(`Cannot create project from [${root}]; ${DESCRIPTOR_FILE} not found`);
  }
  let descriptor: unknown;
  try {
    descriptor = JSON.parse(readFileSync(path, "utf8"));
  } catch (err) {
    throw new InvalidArgumentError(`${DESCRIPTOR_FILE}: invalid JSON — ${errorMessage(err)}`, err);
  }
  return projectFromDescriptor(descriptor, root);
}
