import { mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "fs";
import { homedir, tmpdir } from "os";
import { join } from "path";
import { Project } from "../src/project/project.js";
import {
  defaultStoreDir,
  loadRecentProjects,
  rememberProject,
  saveRecentProjects,
} from "../src/project/recentProjects.js";

describe("recent projects", () => {
  let storeDir: string;
  let workDir: string;
  let prevHome: string | undefined;

  beforeEach(() => {
    storeDir = mkdtempSync(join(tmpdir(), "projlens-store-"));
    workDir = mkdtempSync(join(tmpdir(), "projlens-work-"));
    prevHome = process.env.PROJLENS_HOME;
  });

  afterEach(() => {
    rmSync(storeDir, { recursive: true, force: true });
    rmSync(workDir, { recursive: true, force: true });
    if (prevHome !== undefined) process.env.PROJLENS_HOME = prevHome;
    else delete process.env.PROJLENS_HOME;
  });

  it("starts empty", () => {
    expect(loadRecentProjects(storeDir)).toEqual([]);
  });

  it("ignores a corrupt store", () => {
    writeFileSync(join(storeDir, "recent-projects.json"), "not json", "utf8");
    expect(loadRecentProjects(storeDir)).toEqual([]);
  });

  it("saves existing locations with stable key order and drops missing ones", () => {
    const alpha = join(workDir, "alpha");
    const beta = join(workDir, "beta");
    mkdirSync(alpha);
    mkdirSync(beta);
    saveRecentProjects(storeDir, [
      { name: "beta", location: beta },
      { name: "gone", location: join(workDir, "gone") },
      { name: "alpha", location: alpha },
    ]);
    const raw = readFileSync(join(storeDir, "recent-projects.json"), "utf8");
    expect(raw).toBe(JSON.stringify({ alpha, beta }) + "\n");
    expect(loadRecentProjects(storeDir)).toEqual([
      { name: "alpha", location: alpha },
      { name: "beta", location: beta },
    ]);
  });

  it("remembers a project by name, replacing its old location", () => {
    const project = Project.named("widgets");
    project.directory = "/work/widgets-v2";
    const list = rememberProject(
      [
        { name: "widgets", location: "/work/widgets" },
        { name: "gadgets", location: "/work/gadgets" },
      ],
      project,
    );
    expect(list).toEqual([
      { name: "gadgets", location: "/work/gadgets" },
      { name: "widgets", location: "/work/widgets-v2" },
    ]);
    expect(rememberProject([], Project.named("nowhere"))).toEqual([]);
  });

  it("keeps the store under PROJLENS_HOME or the home directory", () => {
    process.env.PROJLENS_HOME = storeDir;
    expect(defaultStoreDir()).toBe(storeDir);
    delete process.env.PROJLENS_HOME;
    expect(defaultStoreDir()).toBe(join(homedir(), ".projlens"));
  });
});
