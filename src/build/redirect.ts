import { posix } from "path";
import { RedirectError } from "../errors";

/** Longest chain of redirects that lead into each other */
export const MAX_REDIRECTS = 4;

export interface RedirectPlan {
  /** Request path from the config, such as `/old/` */
  from: string;
  /** Location the page sends the browser to */
  to: string;
  /** Destination path relative to the destination root */
  destination: string;
}

export interface RedirectPlanResult {
  plans: RedirectPlan[];
  errors: RedirectError[];
}

/**
 * File that serves a redirect's request path. Paths without an extension
 * follow the clean-URL layout: `/old` and `/old/` both become
 * `old/index.html`. Null when the path climbs out of the destination root.
 */
export function redirectDestination(from: string): string | null {
  const segments = from.split("/").filter((segment) => segment.length > 0);
  if (segments.some((segment) => segment === "." || segment === "..")) return null;
  const path = segments.join("/");
  if (!path) return "index.html";
  if (from.endsWith("/") || posix.extname(path) === "") return `${path}/index.html`;
  return path;
}

function stripTrailingSlash(path: string): string {
  const stripped = path.replace(/\/+$/, "");
  return stripped || path;
}

function lookup(map: ReadonlyMap<string, string>, target: string): [string, string] | undefined {
  const stripped = stripTrailingSlash(target);
  for (const candidate of [target, stripped, `${stripped}/`]) {
    const next = map.get(candidate);
    if (next !== undefined) return [candidate, next];
  }
  return undefined;
}

/** Follow `from` through the map; an error message for cycles and long chains */
export function checkRedirectChain(map: ReadonlyMap<string, string>, from: string): string | null {
  const stack: string[] = [];
  let key = from;
  let target = map.get(from);

  while (target !== undefined) {
    if (stack.length >= MAX_REDIRECTS) {
      return `Too many redirects from ${from}, limit is ${MAX_REDIRECTS}`;
    }
    const normalized = stripTrailingSlash(key);
    if (stack.includes(normalized)) {
      return `Cyclic redirect: ${[...stack, normalized].join(" <-> ")}`;
    }
    stack.push(normalized);

    const next = lookup(map, target);
    if (!next) return null;
    [key, target] = next;
  }
  return null;
}

/**
 * Validate the configured redirects against each other and against the
 * destinations the pass already claims. Invalid redirects are returned as
 * errors and are not planned.
 */
export function planRedirects(redirects: Record<string, string>, taken: ReadonlySet<string>): RedirectPlanResult {
  const map = new Map(Object.entries(redirects));
  const result: RedirectPlanResult = { plans: [], errors: [] };
  const claimed = new Map<string, string>();

  const sources = Array.from(map.keys()).sort((a, b) => (a < b ? -1 : a > b ? 1 : 0));
  for (const from of sources) {
    const to = map.get(from) ?? "";
    const destination = redirectDestination(from);
    if (destination === null) {
      result.errors.push(new RedirectError(from, `Redirect ${from} points outside the destination root`));
      continue;
    }

    const chainError = checkRedirectChain(map, from);
    if (chainError) {
      result.errors.push(new RedirectError(from, chainError));
      continue;
    }

    if (taken.has(destination)) {
      result.errors.push(new RedirectError(from, `Redirect ${from} would overwrite ${destination}`));
      continue;
    }

    const other = claimed.get(destination);
    if (other !== undefined) {
      result.errors.push(new RedirectError(from, `Redirect ${from} writes ${destination}, already used by ${other}`));
      continue;
    }

    claimed.set(destination, from);
    result.plans.push({ from, to, destination });
  }

  return result;
}

function escapeAttribute(value: string): string {
  return value
    .replace(/&/g, "&amp;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;");
}

/** Page that forwards to `location` by script, with a meta refresh fallback */
export function redirectPage(location: string): string {
  const href = escapeAttribute(location);
  const script = escapeAttribute(`document.location.replace(${JSON.stringify(location)});`);
  return [
    "<!doctype html>",
    "<html>",
    "<head>",
    `<link rel="canonical" href="${href}">`,
    `<noscript><meta http-equiv="refresh" content="0; url=${href}"></noscript>`,
    "</head>",
    `<body onload="${script}"></body>`,
    "</html>",
    "",
  ].join("\n");
}
