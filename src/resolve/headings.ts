/**
 * Leading-heading detection for documents without a `title`.
 */

const ATX = /^ {0,3}#{1,6}[ \t]+(.+?)(?:[ \t]+#+)?[ \t]*$/;
const SETEXT_UNDERLINE = /^ {0,3}(?:=+|-+)[ \t]*$/;

export interface LeadingHeading {
  title: string;
  /** Content with the heading (and blank lines after it) removed */
  rest: string;
}

/** The heading at the very start of the body, if there is one */
export function leadingHeading(content: string): LeadingHeading | null {
  const lines = content.split(/\r?\n/);
  let i = 0;
  while (i < lines.length && lines[i].trim() === "") i++;
  if (i >= lines.length) return null;

  let title: string | null = null;
  let end = i + 1;

  const atx = ATX.exec(lines[i]);
  if (atx) {
    title = atx[1].trim();
  } else if (i + 1 < lines.length && SETEXT_UNDERLINE.test(lines[i + 1])) {
    title = lines[i].trim();
    end = i + 2;
  }

  if (!title) return null;

  while (end < lines.length && lines[end].trim() === "") end++;
  return { title, rest: lines.slice(end).join("\n") };
}

/** `bayesian-networks` → `Bayesian Networks` */
export function titleizeSlug(slug: string): string {
  return slug
    .split("-")
    .filter(Boolean)
    .map((word) => word.charAt(0).toUpperCase() + word.slice(1))
    .join(" ");
}
