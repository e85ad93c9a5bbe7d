export function dateStamp(date = new Date()): string {
  return date.toISOString().slice(0, 10);
}

export function compactDateStamp(date = new Date()): string {
  return dateStamp(date).replace(/-/g, '');
}

export function fileTimestamp(date = new Date()): string {
  const iso = date.toISOString();
  return `${compactDateStamp(date)}_${iso.slice(11, 19).replace(/:/g, '')}`;
}
