import type { Author } from '../types/paper';

export function truncateText(text: string, maxLength: number): string {
  if (text.length <= maxLength) return text;
  return `${text.substring(0, maxLength)}...`;
}

export function formatAuthors(authors: readonly Author[]): string {
  return authors.length > 0 ? authors.map((a) => a.name).join(', ') : 'Unknown';
}

export function formatYear(year: number | undefined): string {
  return year === undefined ? 'Unknown' : String(year);
}

export const TITLE_LABEL_LENGTH = 50;
export const VENUE_LABEL_LENGTH = 40;
