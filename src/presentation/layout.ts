import { ancestorDirectories, type AncestorIndex, type LayoutTemplate } from "../build/ancestors";
import type { ResolvedContext } from "../data/resolve";
import { LayoutValidationError, type BuildWarning } from "../errors";

/** Layouts to apply, nearest first */
export type LayoutChain = LayoutTemplate[];

export interface ResolvedLayouts {
  chain: LayoutChain;
  warnings: BuildWarning[];
}

export class LayoutResolver {
  private readonly index: AncestorIndex;

  constructor(index: AncestorIndex) {
    this.index = index;
  }

  async resolve(context: ResolvedContext): Promise<ResolvedLayouts> {
    const path = context.document.relativePath;
    const warnings: BuildWarning[] = [];
    if (context.standalone) return { chain: [], warnings };

    const chain: LayoutChain = [];
    let walkFrom = path;

    if (context.layout !== undefined) {
      const explicit = this.index.byPath.get(context.layout);
      if (explicit?.kind === "document") {
        throw new LayoutValidationError(path, `Layout ${context.layout} of ${path} is a document`);
      }
      if (explicit?.kind === "layout" || explicit?.kind === "partial") {
        const template = await this.index.templates.get(explicit.relativePath);
        chain.push(template);
        if (!template.inherit) return { chain, warnings };
        walkFrom = explicit.relativePath;
      } else {
        warnings.push({
          code: "missing-layout",
          message: `Layout ${context.layout} of ${path} does not exist; using the directory layout`,
          path,
        });
      }
    }

    for (const dir of ancestorDirectories(walkFrom).reverse()) {
      const layout = await this.index.layouts.get(dir);
      if (!layout || chain.some((item) => item.source.path === layout.source.path)) continue;
      if (layout.source.path === path) {
        throw new LayoutValidationError(path, `${path} cannot be its own layout`);
      }
      chain.push(layout);
      if (!layout.inherit) break;
    }

    return { chain, warnings };
  }
}
