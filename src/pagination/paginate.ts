/**
 * Split the post list into index pages.
 *
 * Page 1 lives at the directory that holds `paginate_path`
 * (`/blog/page:num/` → `/blog/`); page n ≥ 2 substitutes `:num`.
 */

import type { SiteConfig } from "../config/schema.js";
import { withBaseurl } from "../permalink/template.js";
import type { ResolvedDocument } from "../resolve/types.js";
import { compareByDateDesc } from "../archive/order.js";

export interface Paginator<T = ResolvedDocument> {
  page: number;
  perPage: number;
  posts: T[];
  totalPosts: number;
  totalPages: number;
  previousPage: number | null;
  previousPagePath: string | null;
  nextPage: number | null;
  nextPagePath: string | null;
}

/** Path of the first index page for a `paginate_path` */
export function firstPagePath(paginatePath: string): string {
  const trimmed = paginatePath.replace(/\/+$/, "");
  const cut = trimmed.lastIndexOf("/");
  const dir = cut <= 0 ? "" : trimmed.slice(0, cut);
  if (!dir) return "/";
  return `${dir.startsWith("/") ? "" : "/"}${dir}/`;
}

/** Site path (without baseurl) of page `num` */
export function pagePath(paginatePath: string, num: number): string {
  if (!paginatePath.includes(":num")) {
    throw new Error(
      `Invalid paginate_path "${paginatePath}": it must contain ":num"`
    );
  }
  if (num <= 1) return firstPagePath(paginatePath);
  const path = paginatePath.replace(":num", String(num));
  return path.startsWith("/") ? path : `/${path}`;
}

/**
 * Paginate posts newest first. Returns an empty list when pagination is
 * off (`paginate` unset); zero posts still give one empty page.
 */
export function paginate<T extends Pick<ResolvedDocument, "date" | "url">>(
  posts: T[],
  config: Pick<SiteConfig, "paginate" | "paginate_path" | "baseurl">
): Paginator<T>[] {
  const perPage = config.paginate;
  if (!perPage) return [];

  // validates paginate_path up front
  pagePath(config.paginate_path, 2);

  const sorted = [...posts].sort(compareByDateDesc);
  const totalPosts = sorted.length;
  const totalPages = Math.max(1, Math.ceil(totalPosts / perPage));
  const pathFor = (num: number) =>
    withBaseurl(config.baseurl, pagePath(config.paginate_path, num));

  const pages: Paginator<T>[] = [];
  for (let page = 1; page <= totalPages; page++) {
    const previousPage = page > 1 ? page - 1 : null;
    const nextPage = page < totalPages ? page + 1 : null;
    pages.push({
      page,
      perPage,
      posts: sorted.slice((page - 1) * perPage, page * perPage),
      totalPosts,
      totalPages,
      previousPage,
      previousPagePath: previousPage === null ? null : pathFor(previousPage),
      nextPage,
      nextPagePath: nextPage === null ? null : pathFor(nextPage),
    });
  }
  return pages;
}
