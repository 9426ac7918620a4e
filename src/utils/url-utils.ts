import path from 'path';

/**
 * True when the candidate parses as an absolute URL with a scheme, a host and a
 * path component (`https://host` alone does not qualify).
 */
export function isAbsoluteUrl(candidate: string): boolean {
  let parsed: URL;
  try {
    parsed = new URL(candidate);
  } catch {
    return false;
  }

  if (!parsed.protocol || !parsed.host) {
    return false;
  }

  // Checked on the raw text: URL drops default ports and may add a trailing slash.
  return /^[a-z][a-z0-9+.-]*:\/\/[^/?#]+\//i.test(candidate);
}

export function stripQuery(url: string): string {
  const queryIndex = url.indexOf('?');
  return queryIndex >= 0 ? url.slice(0, queryIndex) : url;
}

export function getFilenameFromUrl(url: string): string {
  const withoutQuery = stripQuery(url).split('#')[0] ?? '';
  return path.posix.basename(withoutQuery);
}

/** Lower-cased extension of the URL's file name, with `.jpeg` folded to `.jpg`. */
export function getExtensionFromUrl(url: string): string {
  return normalizeExtension(path.posix.extname(getFilenameFromUrl(url)));
}

export function normalizeExtension(ext: string): string {
  if (!ext) return '';
  const lower = ext.toLowerCase();
  const dotted = lower.startsWith('.') ? lower : `.${lower}`;
  return dotted === '.jpeg' ? '.jpg' : dotted;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}

export function endsWithExtension(url: string, ext: string): boolean {
  return url.toLowerCase().endsWith(`.${ext.toLowerCase()}`);
}
