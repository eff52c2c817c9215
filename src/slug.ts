const MAX_SLUG_LENGTH = 50;
const ID_WIDTH = 4;

/**
 * Derive a filesystem-safe slug from a post title.
 *
 * Lowercases, collapses every run of characters outside `[a-z0-9]` into a single hyphen,
 * trims hyphens from both ends and caps the length at 50. Titles with no usable
 * characters fall back to `post` so the directory and markdown file keep a name.
 */
export const slugify = (title: string): string => {
  const slug = title
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '-')
    .replace(/^-+|-+$/g, '')
    .slice(0, MAX_SLUG_LENGTH)
    // Truncation can land right after a separator.
    .replace(/-+$/, '');

  return slug || 'post';
};

export const formatPostId = (n: number): string => String(n).padStart(ID_WIDTH, '0');

/**
 * Normalize an id typed on the command line: bare numbers shorter than four digits are
 * zero-padded (`7` -> `0007`); anything else is passed through trimmed.
 */
export const normalizePostId = (input: string): string => {
  const trimmed = input.trim();
  return /^\d+$/.test(trimmed) && trimmed.length < ID_WIDTH
    ? trimmed.padStart(ID_WIDTH, '0')
    : trimmed;
};

export const postDirName = (id: string, title: string): string => `${id}-${slugify(title)}`;
