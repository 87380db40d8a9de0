/**
 * Characters removed from titles before they become file names: anything that is not
 * a letter, digit, space, hyphen or underscore.
 */
const UNSAFE_TITLE_CHARS = /[^\p{L}\p{N} _-]/gu

export const FALLBACK_TITLE = 'audio'

/**
 * Turn a resolved media title into a safe file name stem.
 * - Path separators become underscores (so "AC/DC" stays readable as "AC_DC")
 * - Everything outside the safe set is dropped
 * - Leading/trailing whitespace trimmed
 * - Empty result falls back to "audio"
 */
export function sanitizeTitle(title: string | undefined): string {
  if (title == null) return FALLBACK_TITLE
  const safe = title
    .replace(/\0/g, '')
    .replace(/[/\\]/g, '_')
    .replace(UNSAFE_TITLE_CHARS, '')
    .trim()
  return safe.length > 0 ? safe : FALLBACK_TITLE
}

/** Lowercase slug of a profile name, used to keep same-extension outputs apart: "MP3 320kbps" -> "mp3_320kbps". */
export function profileSlug(name: string): string {
  return name
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, '_')
    .replace(/^_+|_+$/g, '')
}
