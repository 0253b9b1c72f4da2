import ignore, { type Ignore } from "ignore";
import { readFile } from "fs/promises";
import { posix, resolve } from "path";

export const IGNORE_FILES = [".ignore", ".gitignore"];

interface IgnoreLevel {
  /** POSIX directory relative to the source root ("" for the root) */
  base: string;
  matcher: Ignore;
}

export function isHiddenName(name: string): boolean {
  return name.startsWith(".");
}

/**
 * Gitignore-style rules layered from the source root down. The last level
 * with an opinion about a path wins, so a deeper `!pattern` re-includes what
 * a shallower level (or the hidden-file convention) excluded.
 */
export class IgnoreRules {
  private readonly levels: IgnoreLevel[];

  constructor(levels: IgnoreLevel[] = []) {
    this.levels = levels;
  }

  static fromPatterns(patterns: string[]): IgnoreRules {
    if (patterns.length === 0) return new IgnoreRules();
    return new IgnoreRules([{ base: "", matcher: ignore().add(patterns) }]);
  }

  /** Rules for a child directory, extended with that directory's own ignore files */
  async descend(absoluteDir: string, relativeDir: string): Promise<IgnoreRules> {
    const patterns: string[] = [];
    for (const name of IGNORE_FILES) {
      const content = await readOptional(resolve(absoluteDir, name));
      if (content !== null) patterns.push(content);
    }
    if (patterns.length === 0) return this;
    return new IgnoreRules([...this.levels, { base: relativeDir, matcher: ignore().add(patterns) }]);
  }

  ignores(relativePath: string, isDirectory: boolean): boolean {
    let ignored = isHiddenName(posix.basename(relativePath));

    for (const level of this.levels) {
      const local = level.base ? posix.relative(level.base, relativePath) : relativePath;
      if (!local || local.startsWith("..")) continue;
      const result = level.matcher.test(isDirectory ? `${local}/` : local);
      if (result.ignored) ignored = true;
      else if (result.unignored) ignored = false;
    }

    return ignored;
  }
}

async function readOptional(path: string): Promise<string | null> {
  try {
    return await readFile(path, "utf8");
  } catch (err) {
    if (isMissing(err)) return null;
    throw err;
  }
}

export function isMissing(err: unknown): boolean {
  return err instanceof Error && "code" in err && (err.code === "ENOENT" || err.code === "ENOTDIR");
}
