const FALLBACK_SLUG = "video";

/**
 * Generates the filesystem-safe identifier used as a video's file stem.
 * Normalizes the title by removing accents, lowercases it and collapses every
 * run of characters outside [a-z0-9] into a single hyphen.
 * @param title The video title
 * @returns A kebab-case identifier, or "video" when nothing usable is left
 * @example
 * generateSlug("Keynote: Python 4.0 & Beyond!")
 * // returns "keynote-python-4-0-beyond"
 */
export function generateSlug(title: string): string {
  const slug = title
    .normalize("NFKD") // Handle accents/special chars
    .replace(/[\u0300-\u036f]/g, "") // Remove accents
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");

  return slug || FALLBACK_SLUG;
}

/**
 * Returns `base` when it is free, otherwise the first free `base-2`, `base-3`, ...
 * @param base The preferred identifier
 * @param isTaken Predicate telling whether an identifier is already used
 */
export function nextFreeIdentifier(
  base: string,
  isTaken: (id: string) => boolean
): string {
  if (!isTaken(base)) return base;

  let duplicateNum = 2;
  while (isTaken(`${base}-${duplicateNum}`)) {
    duplicateNum++;
  }
  return `${base}-${duplicateNum}`;
}

/**
 * Async flavour of {@link nextFreeIdentifier} for checks that touch the disk.
 */
export async function nextFreeIdentifierAsync(
  base: string,
  isTaken: (id: string) => Promise<boolean>
): Promise<string> {
  if (!(await isTaken(base))) return base;

  let duplicateNum = 2;
  while (await isTaken(`${base}-${duplicateNum}`)) {
    duplicateNum++;
  }
  return `${base}-${duplicateNum}`;
}
