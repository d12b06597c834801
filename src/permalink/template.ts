/**
 * Permalink templates.
 *
 * A template is a path with `:placeholder` tokens, or one of the built-in
 * style names. Dates are always read in UTC.
 */

import type { DocumentType } from "../content/types.js";

export const PERMALINK_STYLES: Record<string, string> = {
  date: "/:categories/:year/:month/:day/:title:output_ext",
  pretty: "/:categories/:year/:month/:day/:title/",
  ordinal: "/:categories/:year/:y_day/:title:output_ext",
  none: "/:categories/:title:output_ext",
};

export const OUTPUT_EXT = ".html";

/** Everything a permalink can be built from */
export interface PermalinkInput {
  type: DocumentType;
  /** Relative path of the source file */
  relativePath: string;
  slug: string;
  categories: string[];
  date?: Date;
  /** Document-local `permalink` */
  permalink?: string;
}

/** Expand a style name to its template; other strings are returned as-is */
export function expandStyle(permalink: string): string {
  return PERMALINK_STYLES[permalink] ?? permalink;
}

/** Replace runs of URL-unsafe characters with `-`, keeping case */
export function slugify(text: string, lower = false): string {
  const pattern = lower ? /[^\p{L}\p{N}]+/gu : /[^\p{L}\p{N}._~!$&'()+,;=@]+/gu;
  const slug = text.replace(pattern, "-").replace(/^-+|-+$/g, "");
  return lower ? slug.toLowerCase() : slug;
}

function pad(value: number, width = 2): string {
  return String(value).padStart(width, "0");
}

function dayOfYear(date: Date): number {
  const start = Date.UTC(date.getUTCFullYear(), 0, 1);
  return Math.floor((date.getTime() - start) / 86_400_000) + 1;
}

function dateTokens(date: Date | undefined): Record<string, string> {
  if (!date) {
    return {
      year: "", month: "", i_month: "", short_year: "", day: "", i_day: "",
      y_day: "", hour: "", minute: "", second: "",
    };
  }
  return {
    year: String(date.getUTCFullYear()),
    month: pad(date.getUTCMonth() + 1),
    i_month: String(date.getUTCMonth() + 1),
    short_year: pad(date.getUTCFullYear() % 100),
    day: pad(date.getUTCDate()),
    i_day: String(date.getUTCDate()),
    y_day: pad(dayOfYear(date), 3),
    hour: pad(date.getUTCHours()),
    minute: pad(date.getUTCMinutes()),
    second: pad(date.getUTCSeconds()),
  };
}

function splitPath(relativePath: string): { dir: string; basename: string } {
  const segments = relativePath.split("/");
  const file = segments.pop() ?? "";
  const dot = file.lastIndexOf(".");
  return {
    dir: segments.join("/"),
    basename: dot > 0 ? file.slice(0, dot) : file,
  };
}

/** Placeholder values for a document */
export function placeholders(input: PermalinkInput): Record<string, string> {
  const { dir, basename } = splitPath(input.relativePath);
  const categories = [...new Set(input.categories.map((c) => c.toLowerCase()))];
  return {
    ...dateTokens(input.date),
    categories: categories.join("/"),
    title: slugify(input.slug),
    slug: slugify(input.slug, true),
    path: dir,
    basename,
    name: basename,
    output_ext: OUTPUT_EXT,
  };
}

/** Substitute `:name` tokens, longest names first */
export function fillTemplate(template: string, values: Record<string, string>): string {
  const names = Object.keys(values).sort((a, b) => b.length - a.length);
  if (names.length === 0) return template;
  const pattern = new RegExp(`:(${names.join("|")})`, "g");
  return template.replace(pattern, (_match, name: string) => values[name] ?? "");
}

/** Collapse repeated slashes, force a leading slash, percent-encode unsafe characters */
export function sanitizeUrl(url: string): string {
  const collapsed = `/${url}`.replace(/\/{2,}/g, "/");
  return encodeURI(collapsed).replace(/[#?]/g, (c) => encodeURIComponent(c));
}

/** Template used for a page that has no `permalink` of its own */
export function pageTemplate(sitePermalink: string): string {
  return expandStyle(sitePermalink).endsWith("/")
    ? "/:path/:basename/"
    : "/:path/:basename:output_ext";
}

/** Resolve the published path of a document (without baseurl) */
export function resolvePermalink(input: PermalinkInput, sitePermalink: string): string {
  const values = placeholders(input);

  let template: string;
  if (input.permalink) {
    template = expandStyle(input.permalink);
  } else if (input.type === "pages") {
    template = values.basename === "index" ? "/:path/" : pageTemplate(sitePermalink);
  } else {
    template = expandStyle(sitePermalink);
  }

  return sanitizeUrl(fillTemplate(template, values));
}

/** Prefix a site path with `baseurl` */
export function withBaseurl(baseurl: string, path: string): string {
  const base = baseurl.replace(/\/+$/, "");
  if (!base) return path;
  return `/${base}/${path}`.replace(/\/{2,}/g, "/");
}
