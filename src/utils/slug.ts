import crypto from "crypto";

const MAX_SLUG_LENGTH = 50;
const MIN_SLUG_LENGTH = 3;

export const SLUG_PATTERN = /^[a-z0-9-]{3,50}$/;

export function slugify(title: string): string {
  let slug = title
    .toLowerCase()
    .replace(/[^\w\s-]/g, "")
    .replace(/_/g, "-")
    .replace(/[-\s]+/g, "-")
    .replace(/^-+|-+$/g, "");

  if (slug.length > MAX_SLUG_LENGTH) {
    slug = slug.slice(0, MAX_SLUG_LENGTH).replace(/-+$/, "");
  }

  return slug;
}

/**
 * Builds a URL-safe slug for a vote title, appending -1, -2... until it is
 * not in `existing`. Titles with too few usable characters get a random
 * `vote-xxxxxxxx` slug.
 */
export function generateSlug(title: string, existing: ReadonlySet<string> = new Set()): string {
  let base = slugify(title);
  if (base.length < MIN_SLUG_LENGTH) {
    base = `vote-${crypto.randomBytes(4).toString("hex")}`;
  }

  let slug = base;
  let counter = 1;
  while (existing.has(slug)) {
    slug = `${base}-${counter}`;
    counter += 1;
  }
  return slug;
}
