import { DigestUrlError } from "./errors";

export const FIRST_ARCHIVE_YEAR = 2000;

const DIGEST_SEGMENT = /^(\d{4})-(\d{2})f\.html$/;

function withoutTrailingSlash(value: string): string {
  return value.endsWith("/") ? value.slice(0, -1) : value;
}

// e.g. https://list.genealogy.net/mm/archiv/westfalengen/2024-06/2024-06f.html
export function digestUrl(archiveBaseUrl: string, year: number, month: number): string {
  const period = `${year}-${String(month).padStart(2, "0")}`;
  return `${withoutTrailingSlash(archiveBaseUrl)}/${period}/${period}f.html`;
}

/**
 * Every candidate digest URL from January of `firstYear` through December of
 * the current year, year-major.
 */
export function enumerateDigestUrls(
  archiveBaseUrl: string,
  firstYear = FIRST_ARCHIVE_YEAR,
  now = new Date(),
): string[] {
  const urls: string[] = [];
  for (let year = firstYear; year <= now.getFullYear(); year += 1) {
    for (let month = 1; month <= 12; month += 1) {
      urls.push(digestUrl(archiveBaseUrl, year, month));
    }
  }
  return urls;
}

export function digestFilename(finalUrl: string): string {
  let pathname: string;
  try {
    pathname = new URL(finalUrl).pathname;
  } catch {
    throw new DigestUrlError(finalUrl);
  }

  const lastSegment = pathname.split("/").pop() ?? "";
  const match = DIGEST_SEGMENT.exec(lastSegment);
  if (!match) {
    throw new DigestUrlError(finalUrl);
  }

  const [, year, month] = match;
  return `wggf-monthly-digest-${year}-${month}.html`;
}
