export type SourceKind = "document" | "partial" | "layout" | "data" | "passthrough" | "ignored";

export type DocumentFormat = "markdown" | "html";

export interface SourceEntry {
  absolutePath: string;
  /** POSIX-style path relative to the source root */
  relativePath: string;
  kind: SourceKind;
  mtimeMs: number;
  /** Set for documents */
  format?: DocumentFormat;
  /** Set for document data fragments: the relative path of the owning document */
  owner?: string;
  /** Set for a document that shares its stem with a higher-precedence document */
  collidesWith?: string;
}

export interface BookProject {
  /** Absolute subtree root */
  root: string;
  /** POSIX-style subtree root relative to the source root ("" for the root) */
  relativePath: string;
  /** Absolute path of the marker file */
  marker: string;
}
