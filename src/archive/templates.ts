/**
 * Default + user-definable archive templates.
 * Templates control the HTML fragment emitted for each category or tag.
 */

import type { ArchiveEntry, ArchiveGroup } from "./group.js";

export interface ArchiveTemplate {
  /** File name pattern. Use {slug} and {name} placeholders. */
  filePattern: string;
  /** Render one listing entry */
  renderEntry: (entry: ArchiveEntry) => string;
  /** Wrap the rendered entries of a group */
  renderGroup: (group: ArchiveGroup, slug: string, items: string[]) => string;
}

const HTML_ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(text: string): string {
  return text.replace(/[&<>"']/g, (ch) => HTML_ESCAPES[ch] ?? ch);
}

/** `2021-03-14` */
export function isoDay(date: Date): string {
  return date.toISOString().slice(0, 10);
}

/** Markup shaped after the usual taxonomy archive layout */
export const defaultArchiveTemplate: ArchiveTemplate = {
  filePattern: "{slug}.html",

  renderEntry(entry) {
    const parts = [`<a href="${escapeHtml(entry.url)}">${escapeHtml(entry.title)}</a>`];
    if (entry.date) {
      const day = isoDay(entry.date);
      parts.push(`<time datetime="${day}">${day}</time>`);
    }
    if (entry.excerpt) {
      parts.push(`<p class="archive__item-excerpt">${escapeHtml(entry.excerpt)}</p>`);
    }
    return `<li class="archive__item">${parts.join(" ")}</li>`;
  },

  renderGroup(group, slug, items) {
    return [
      `<section id="${escapeHtml(slug)}" class="taxonomy__section">`,
      `  <h2 class="archive__subtitle">${escapeHtml(group.name)}</h2>`,
      `  <ul class="archive__list">`,
      ...items.map((item) => `    ${item}`),
      `  </ul>`,
      `</section>`,
      "",
    ].join("\n");
  },
};

/** Create a template from partial overrides */
export function createArchiveTemplate(overrides: Partial<ArchiveTemplate>): ArchiveTemplate {
  return { ...defaultArchiveTemplate, ...overrides };
}

/** Resolve file pattern to a relative output path */
export function resolveFilePattern(pattern: string, group: ArchiveGroup, slug: string): string {
  return pattern.replace("{slug}", slug).replace("{name}", group.name);
}
