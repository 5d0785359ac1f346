/**
 * Convert a workspace or page title to a directory-safe slug.
 */
export function slugify(text: string, maxLength = 60): string {
  return text
    .toLowerCase()
    .normalize("NFD")
    .replace(/[\u0300-\u036f]/g, "") // diacritics
    .replace(/[_\s]+/g, "-")
    .replace(/[^a-z0-9-]/g, "")
    .replace(/-+/g, "-")
    .replace(/^-|-$/g, "")
    .slice(0, maxLength)
    .replace(/-$/, "");
}

/**
 * Slug suffixed with the first 8 hex chars of the id, so two workspaces
 * with the same name never share a cache directory.
 */
export function uniqueSlug(text: string, id: string, maxLength = 60): string {
  const shortId = id.replace(/-/g, "").slice(0, 8);
  const base = slugify(text, maxLength - shortId.length - 1);
  return base ? `${base}-${shortId}` : shortId;
}

/** Strip path separators and shell-hostile characters from a file name. */
export function sanitizeFilename(name: string, maxLength = 200): string {
  return name
    .replace(/[/\\:*?"<>|\u0000-\u001f]/g, "_")
    .replace(/\s+/g, "_")
    .slice(0, maxLength);
}
