import { marked } from "marked";
import type { Environment } from "nunjucks";
import { hrefFor } from "./build/destination";
import type { ResolvedContext } from "./data/resolve";
import { RenderError, errorMessage } from "./errors";
import type { LayoutChain } from "./presentation/layout";
import { createTemplateEnvironment } from "./presentation/template";

export const LIVE_RELOAD_SCRIPT_PATH = "/__livereload.js";
export const LIVE_RELOAD_SNIPPET = `<script src="${LIVE_RELOAD_SCRIPT_PATH}"></script>`;

export interface RendererOptions {
  templatesDir: string;
  tag: string;
  release: boolean;
  live: boolean;
  dateLocale?: string;
}

/** Build facts templates can read as `context.*` */
export interface RenderContext {
  tag: string;
  release: boolean;
  live: boolean;
  source: string;
  destination: string;
  href: string;
}

/** Insert the reload snippet before the last `</body>`, or append it. */
export function injectLiveReload(html: string): string {
  const index = html.toLowerCase().lastIndexOf("</body>");
  if (index === -1) return `${html}\n${LIVE_RELOAD_SNIPPET}\n`;
  return `${html.slice(0, index)}${LIVE_RELOAD_SNIPPET}\n${html.slice(index)}`;
}

export class Renderer {
  private readonly options: RendererOptions;
  private readonly env: Environment;

  constructor(options: RendererOptions) {
    this.options = options;
    this.env = createTemplateEnvironment({
      templatesDir: options.templatesDir,
      dateLocale: options.dateLocale,
    });
  }

  contextFor(resolved: ResolvedContext): RenderContext {
    return {
      tag: this.options.tag,
      release: this.options.release,
      live: this.options.live,
      source: resolved.document.relativePath,
      destination: resolved.destination,
      href: hrefFor(resolved.destination),
    };
  }

  private renderString(template: string, variables: object, origin: string, document: string): string {
    try {
      return this.env.renderString(template, variables);
    } catch (err) {
      throw new RenderError(document, `Cannot render ${origin}: ${errorMessage(err)}`, { cause: err });
    }
  }

  /**
   * Template the document body, convert Markdown, then wrap the result in
   * each layout of `chain` from the nearest outward.
   */
  async render(resolved: ResolvedContext, chain: LayoutChain): Promise<string> {
    const path = resolved.document.relativePath;
    const context = this.contextFor(resolved);

    let html = this.renderString(resolved.body, { ...resolved.data, context }, path, path);
    if (resolved.document.format === "markdown") {
      try {
        html = await marked.parse(html);
      } catch (err) {
        throw new RenderError(path, `Cannot convert Markdown in ${path}: ${errorMessage(err)}`, { cause: err });
      }
    }

    for (const layout of chain) {
      html = this.renderString(layout.body, { ...resolved.data, content: html, context }, layout.source.path, path);
    }

    return this.options.live ? injectLiveReload(html) : html;
  }
}
