/**
 * Zod schema for `_config.yml`.
 * Known keys get defaults; anything else (analytics, comments, footer…) passes
 * through untouched so theme settings survive a load.
 */

import { z } from "zod";

export const DEPRECATED_TYPES: Record<string, string> = {
  page: "pages",
  post: "posts",
  draft: "drafts",
};

const scopeSchema = z
  .object({
    path: z.string().default(""),
    type: z.string().optional(),
  })
  .passthrough();

const defaultRuleSchema = z.object({
  scope: scopeSchema.default({}),
  values: z.record(z.unknown()).nullable().default({}).transform((v) => v ?? {}),
});

const authorSchema = z.union([
  z.string(),
  z.object({ name: z.string() }).passthrough(),
]);

const titlesFromHeadingsSchema = z.object({
  enabled: z.boolean().default(true),
  strip_title: z.boolean().default(false),
  collections: z.boolean().default(false),
});

export const siteConfigSchema = z
  .object({
    title: z.string().default(""),
    subtitle: z.string().optional(),
    description: z.string().optional(),
    author: authorSchema.optional(),
    url: z.string().default(""),
    baseurl: z.string().default(""),
    theme: z.string().optional(),
    plugins: z.array(z.string()).default([]),
    permalink: z.string().default("date"),
    paginate: z.number().int().positive().optional(),
    paginate_path: z.string().default("/page:num/"),
    show_excerpts: z.boolean().default(false),
    excerpt_separator: z.string().default("\n\n"),
    titles_from_headings: titlesFromHeadingsSchema.default({}),
    include: z.array(z.string()).default([]),
    exclude: z.array(z.string()).default([]),
    destination: z.string().default("_site"),
    show_drafts: z.boolean().default(false),
    future: z.boolean().default(false),
    unpublished: z.boolean().default(false),
    defaults: z.array(defaultRuleSchema).default([]),
  })
  .passthrough();

export type SiteConfig = z.infer<typeof siteConfigSchema>;
export type DefaultRule = z.infer<typeof defaultRuleSchema>;
export type DefaultScope = DefaultRule["scope"];
export type AuthorSetting = z.infer<typeof authorSchema>;

/** Validate an already-parsed config object */
export function validateConfig(
  data: unknown
): { success: true; data: SiteConfig } | { success: false; error: string } {
  const result = siteConfigSchema.safeParse(data ?? {});
  if (result.success) {
    return { success: true, data: result.data };
  }
  return {
    success: false,
    error: result.error.issues
      .map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`)
      .join("; "),
  };
}
