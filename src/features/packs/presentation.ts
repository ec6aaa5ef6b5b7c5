// Display-side normalisation of pack metadata.

const MARKDOWN_LINK = /\[(.*?)\]\((https?:\/\/[^)]+)\)/gi;
const BARE_URL = /https?:\/\/\S+/gi;
const WWW_LINK = /\bwww\.[^\s]+/gi;

/** Strips links from community-authored text; markdown links keep their label. */
export function sanitizeDescription(text: string): string {
  return text
    .replace(MARKDOWN_LINK, '$1')
    .replace(BARE_URL, '')
    .replace(WWW_LINK, '')
    .replaceAll('  ', ' ')
    .trim();
}

const ISO_DAY = /^(\d{4})-(\d{2})-(\d{2})$/;

/** Strict `yyyy-MM-dd` to a UTC-midnight Date; anything else is undefined. */
export function parsePackDate(value: string): Date | undefined {
  const m = ISO_DAY.exec(value);
  if (!m) return undefined;
  const [year, month, day] = [Number(m[1]), Number(m[2]), Number(m[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  if (date.getUTCFullYear() !== year || date.getUTCMonth() !== month - 1 || date.getUTCDate() !== day) return undefined;
  return date;
}

export function parseAuthorURL(value: string | undefined): string | undefined {
  if (!value) return undefined;
  try {
    return new URL(value).toString();
  } catch {
    return undefined;
  }
}

export function scaleTitle(title: string): string {
  return title === '' ? 'Untitled Scale' : title;
}
