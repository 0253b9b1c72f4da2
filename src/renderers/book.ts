import { spawn } from "child_process";
import { mkdir, mkdtemp, readFile, readdir, rm, stat, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { dirname, join, relative, resolve } from "path";
import { parse as parseToml } from "toml";
import type { BuildOptions } from "../config";
import { toPosix } from "../content/scan";
import type { BookProject } from "../content/model";
import { BookBuildError, errorMessage, type BuildWarning } from "../errors";
import { injectLiveReload } from "../render";

export interface BookCompileRequest {
  /** Book root, the directory holding `book.toml` */
  sourceDir: string;
  outputDir: string;
  themeDir?: string;
}

/** Compiles a book project into `outputDir`. */
export interface BookCompiler {
  compile(request: BookCompileRequest): Promise<void>;
}

export const BOOK_THEME_ENV = "MDBOOK_OUTPUT__HTML__THEME";

export class MdBookCompiler implements BookCompiler {
  private readonly command: string;

  constructor(command = "mdbook") {
    this.command = command;
  }

  compile(request: BookCompileRequest): Promise<void> {
    const env = { ...process.env };
    if (request.themeDir) env[BOOK_THEME_ENV] = request.themeDir;

    return new Promise((resolvePromise, reject) => {
      const proc = spawn(this.command, ["build", request.sourceDir, "--dest-dir", request.outputDir], {
        cwd: request.sourceDir,
        env,
        stdio: ["ignore", "ignore", "pipe"],
      });
      let stderr = "";
      proc.stderr.on("data", (chunk: Buffer) => {
        stderr += chunk.toString();
      });
      proc.on("error", (err) => {
        reject(new BookBuildError(request.sourceDir, `Cannot run ${this.command}: ${err.message}`, { cause: err }));
      });
      proc.on("close", (code) => {
        if (code === 0) {
          resolvePromise();
          return;
        }
        const detail = stderr.trim() ? `\n${stderr.trim()}` : "";
        reject(new BookBuildError(request.sourceDir, `${this.command} exited with code ${code}${detail}`));
      });
    });
  }
}

export interface BookResult {
  book: BookProject;
  /** Written files, relative to the destination root */
  files: string[];
  warnings: BuildWarning[];
}

async function listFiles(dir: string): Promise<string[]> {
  const files: string[] = [];
  for (const dirent of await readdir(dir, { withFileTypes: true })) {
    const path = join(dir, dirent.name);
    if (dirent.isDirectory()) {
      files.push(...(await listFiles(path)));
    } else if (dirent.isFile()) {
      files.push(path);
    }
  }
  return files.sort();
}

/** `[site] draft = true` in `book.toml` keeps a book out of release builds */
export async function isDraftBook(book: BookProject): Promise<boolean> {
  let parsed: unknown;
  try {
    parsed = parseToml(await readFile(book.marker, "utf8"));
  } catch (err) {
    throw new BookBuildError(book.relativePath, `Malformed ${book.marker}: ${errorMessage(err)}`, { cause: err });
  }
  if (typeof parsed !== "object" || parsed === null || !("site" in parsed)) return false;
  const { site } = parsed;
  return typeof site === "object" && site !== null && "draft" in site && site.draft === true;
}

export type BookDelegateOptions = Pick<BuildOptions, "destination" | "live" | "book">;

/**
 * Hands book projects to an external compiler and mirrors its output into
 * the destination tree.
 */
export class BookDelegate {
  private readonly options: BookDelegateOptions;
  private readonly compiler: BookCompiler;

  constructor(options: BookDelegateOptions, compiler: BookCompiler = new MdBookCompiler(options.book.command)) {
    this.options = options;
    this.compiler = compiler;
  }

  private async themeDir(warnings: BuildWarning[], book: BookProject): Promise<string | undefined> {
    const { theme } = this.options.book;
    if (!theme) return undefined;
    const info = await stat(theme).catch(() => null);
    if (info?.isDirectory()) return theme;
    warnings.push({
      code: "missing-book-theme",
      message: `Book theme ${theme} does not exist; building ${book.relativePath || "."} with the default theme`,
      path: book.relativePath,
    });
    return undefined;
  }

  async build(book: BookProject): Promise<BookResult> {
    const warnings: BuildWarning[] = [];
    const themeDir = await this.themeDir(warnings, book);
    const outputDir = await mkdtemp(join(tmpdir(), "pagewright-book-"));

    try {
      try {
        await this.compiler.compile({ sourceDir: book.root, outputDir, themeDir });
      } catch (err) {
        if (err instanceof BookBuildError && err.path === book.relativePath) throw err;
        throw new BookBuildError(book.relativePath, `Book ${book.relativePath || "."} failed: ${errorMessage(err)}`, {
          cause: err,
        });
      }

      const files: string[] = [];
      for (const file of await listFiles(outputDir)) {
        const rel = toPosix(relative(outputDir, file));
        const destinationRel = book.relativePath ? `${book.relativePath}/${rel}` : rel;
        const destination = resolve(this.options.destination, destinationRel);
        await mkdir(dirname(destination), { recursive: true });

        const content = await readFile(file);
        if (this.options.live && file.endsWith(".html")) {
          await writeFile(destination, injectLiveReload(content.toString("utf8")));
        } else {
          await writeFile(destination, content);
        }
        files.push(destinationRel);
      }

      return { book, files, warnings };
    } finally {
      await rm(outputDir, { recursive: true, force: true });
    }
  }
}
