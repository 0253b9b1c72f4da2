import nunjucks from "nunjucks";
import { humanize, slugify } from "./text";

const DATE_DD_MM_YYYY_RE = /^(\d{2})-(\d{2})-(\d{4})$/;
const DATE_ISO_RE = /^\d{4}-\d{2}-\d{2}(?:T[\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export interface TemplateEnvOptions {
  /** Directory `{% include %}` and `{% extends %}` resolve against */
  templatesDir?: string;
  /** BCP 47 locale for month names in the `date` filter */
  dateLocale?: string;
}

function pad(value: number): string {
  return String(value).padStart(2, "0");
}

/** Dates in data arrive as ISO strings; `DD-MM-YYYY` is accepted as well */
export function parseDate(value: unknown): Date | null {
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value;
  if (typeof value !== "string") return null;

  const match = value.match(DATE_DD_MM_YYYY_RE);
  if (match) {
    const day = Number(match[1]);
    const month = Number(match[2]);
    const year = Number(match[3]);
    const date = new Date(Date.UTC(year, month - 1, day));
    if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) {
      return null;
    }
    return date;
  }

  if (!DATE_ISO_RE.test(value)) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function monthName(date: Date, locale: string, month: "long" | "short"): string {
  return new Intl.DateTimeFormat(locale, { month, timeZone: "UTC" }).format(date);
}

export function formatDate(date: Date, format: string, locale = "en"): string {
  const replacements: Record<string, () => string> = {
    YYYY: () => String(date.getUTCFullYear()),
    YY: () => String(date.getUTCFullYear()).slice(-2),
    MMMM: () => monthName(date, locale, "long"),
    MMM: () => monthName(date, locale, "short"),
    MM: () => pad(date.getUTCMonth() + 1),
    M: () => String(date.getUTCMonth() + 1),
    DD: () => pad(date.getUTCDate()),
    D: () => String(date.getUTCDate()),
  };

  return format.replace(/YYYY|YY|MMMM|MMM|MM|M|DD|D/g, (token) => replacements[token]?.() ?? token);
}

export function createTemplateEnvironment(options: TemplateEnvOptions = {}): nunjucks.Environment {
  const loader = options.templatesDir ? new nunjucks.FileSystemLoader(options.templatesDir) : undefined;
  const env = new nunjucks.Environment(loader, { autoescape: false, throwOnUndefined: false });
  const locale = options.dateLocale ?? "en";

  env.addFilter("date", (value: unknown, outputFormat = "YYYY-MM-DD") => {
    const date = parseDate(value);
    if (!date) return String(value ?? "");
    return formatDate(date, String(outputFormat), locale);
  });
  env.addFilter("slug", (value: unknown) => slugify(String(value ?? "")));
  env.addFilter("humanize", (value: unknown) => humanize(String(value ?? "")));
  env.addFilter("json", (value: unknown) => JSON.stringify(value ?? null));

  return env;
}
