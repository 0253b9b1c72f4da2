import { mkdir, mkdtemp, readFile, rm, utimes, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, resolve } from "path";
import { resolveBuildOptions, type BuildOptions, type BuildOverrides, type PagewrightConfig } from "../config";

export type FileTree = Record<string, string>;

export async function writeTree(root: string, files: FileTree): Promise<void> {
  for (const [path, content] of Object.entries(files)) {
    const target = resolve(root, path);
    await mkdir(dirname(target), { recursive: true });
    await writeFile(target, content);
  }
}

/** A throwaway project directory with a `site/` source tree */
export class FixtureProject {
  readonly root: string;

  private constructor(root: string) {
    this.root = root;
  }

  static async create(name: string, files: FileTree = {}): Promise<FixtureProject> {
    const base = await mkdtemp(resolve(tmpdir(), "pagewright-"));
    const project = new FixtureProject(resolve(base, name));
    await mkdir(project.root, { recursive: true });
    await writeTree(resolve(project.root, "site"), files);
    return project;
  }

  options(overrides: BuildOverrides = {}, config: PagewrightConfig = {}): BuildOptions {
    return resolveBuildOptions(this.root, { config, path: null }, overrides);
  }

  source(path: string): string {
    return resolve(this.root, "site", path);
  }

  output(path: string, tag = "debug"): string {
    return resolve(this.root, "build", tag, path);
  }

  write(files: FileTree): Promise<void> {
    return writeTree(resolve(this.root, "site"), files);
  }

  read(path: string, tag = "debug"): Promise<string> {
    return readFile(this.output(path, tag), "utf8");
  }

  /** Move a source file's modification time forward by `seconds` */
  async touch(path: string, seconds = 10): Promise<void> {
    const time = new Date(Date.now() + seconds * 1000);
    await utimes(this.source(path), time, time);
  }

  async dispose(): Promise<void> {
    await rm(dirname(this.root), { recursive: true, force: true });
  }
}
