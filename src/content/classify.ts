import { posix } from "path";
import type { BuildWarning } from "../errors";
import type { DocumentFormat, SourceKind } from "./model";

export const INDEX_STEM = "index";
export const LAYOUT_FILE = "layout.njk";
export const TEMPLATE_EXT = ".njk";
export const BOOK_MARKER = "book.toml";
export const DIRECTORY_DATA_FILES = ["_data.yml", "_data.yaml"];
export const DATA_EXTENSIONS = [".yml", ".yaml"];

const DOCUMENT_FORMATS: Record<string, DocumentFormat> = {
  ".md": "markdown",
  ".html": "html",
};

/** Document extensions in precedence order when two share a stem */
export const DOCUMENT_EXTENSIONS = Object.keys(DOCUMENT_FORMATS);

export interface ClassifyInput {
  /** POSIX path relative to the source root */
  relativePath: string;
  /** File names in the same directory */
  siblings: ReadonlySet<string>;
  /** True when the file lives in the reserved templates directory */
  inTemplates: boolean;
  /** Result of the ignore rules */
  ignored: boolean;
}

export interface Classification {
  kind: SourceKind;
  format?: DocumentFormat;
  /** Relative path of the document a data fragment belongs to */
  owner?: string;
  /** A higher-precedence document that shares this document's stem */
  collidesWith?: string;
  warning?: BuildWarning;
}

export function documentFormat(name: string): DocumentFormat | undefined {
  return DOCUMENT_FORMATS[posix.extname(name).toLowerCase()];
}

function stemOf(name: string): string {
  return name.slice(0, name.length - posix.extname(name).length);
}

/** The first sibling document (in extension precedence order) with this stem */
function siblingDocument(stem: string, siblings: ReadonlySet<string>): string | undefined {
  return DOCUMENT_EXTENSIONS.map((ext) => `${stem}${ext}`).find((name) => siblings.has(name));
}

/**
 * Assign a kind to one file from its path and the names around it. Book
 * subtrees are detected by the scanner before files reach this function.
 */
export function classify(input: ClassifyInput): Classification {
  const { relativePath, siblings } = input;
  const name = posix.basename(relativePath);
  const dir = posix.dirname(relativePath);
  const ext = posix.extname(name).toLowerCase();
  const stem = stemOf(name);

  if (input.ignored) {
    return { kind: "ignored" };
  }

  if (input.inTemplates) {
    if (ext !== TEMPLATE_EXT) return { kind: "ignored" };
    const document = siblingDocument(stem, siblings);
    if (document) {
      return {
        kind: "partial",
        warning: {
          code: "classification-ambiguous",
          message: `${relativePath} is both a partial and a same-named fragment of ${document}; treating it as a partial`,
          path: relativePath,
        },
      };
    }
    return { kind: "partial" };
  }

  if (name === LAYOUT_FILE) {
    return { kind: "layout" };
  }

  if (ext === TEMPLATE_EXT) {
    return {
      kind: "ignored",
      warning: {
        code: "unused-template",
        message: `${relativePath} is neither a layout nor a partial in the templates directory; it is not published`,
        path: relativePath,
      },
    };
  }

  const format = documentFormat(name);
  if (format) {
    const first = siblingDocument(stem, siblings);
    if (first && first !== name) {
      return { kind: "document", format, collidesWith: dir === "." ? first : `${dir}/${first}` };
    }
    return { kind: "document", format };
  }

  if (DIRECTORY_DATA_FILES.includes(name)) {
    return { kind: "data" };
  }

  if (DATA_EXTENSIONS.includes(ext)) {
    const document = siblingDocument(stem, siblings);
    if (document) {
      return { kind: "data", owner: dir === "." ? document : `${dir}/${document}` };
    }
  }

  return { kind: "passthrough" };
}
