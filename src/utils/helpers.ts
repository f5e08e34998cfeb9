const MONTH_NAMES = [
  'January',
  'February',
  'March',
  'April',
  'May',
  'June',
  'July',
  'August',
  'September',
  'October',
  'November',
  'December',
];

function pad2(value: number): string {
  return value.toString().padStart(2, '0');
}

export function slugify(topic: string): string {
  return topic.toLowerCase().replace(/ /g, '-');
}

export function titleCase(word: string): string {
  if (!word) return word;
  return word.charAt(0).toUpperCase() + word.slice(1).toLowerCase();
}

// Local calendar date as YYYYMMDD
export function formatDateStamp(date: Date): string {
  return [
    date.getFullYear().toString(),
    pad2(date.getMonth() + 1),
    pad2(date.getDate()),
  ].join('');
}

export function formatIsoDate(date: Date): string {
  return [
    date.getFullYear().toString(),
    pad2(date.getMonth() + 1),
    pad2(date.getDate()),
  ].join('-');
}

/**
 * e.g. "October 05, 2026"
 */
export function formatLongDate(date: Date): string {
  return `${MONTH_NAMES[date.getMonth()]} ${pad2(date.getDate())}, ${date.getFullYear()}`;
}

export function formatDateToken(token: string): string {
  const match = /^(\d{4})(\d{2})(\d{2})$/.exec(token);
  if (!match) {
    return token;
  }
  return `${match[1]}-${match[2]}-${match[3]}`;
}

export function escapeHtml(value: string): string {
  return value
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#39;');
}
