/** `mm:ss`, minutes not wrapped at the hour. */
export function formatOffset(seconds: number): string {
  const s = Math.max(0, Math.trunc(seconds));
  const minutes = Math.floor(s / 60);
  return `${String(minutes).padStart(2, '0')}:${String(s % 60).padStart(2, '0')}`;
}

/** Compact duration such as `1h2m3s`, `4m5s` or `45s`. */
export function formatDuration(seconds: number): string {
  const s = Math.trunc(seconds);
  if (s === 0) return '0s';

  const sign = s < 0 ? '-' : '';
  const abs = Math.abs(s);
  const h = Math.floor(abs / 3600);
  const m = Math.floor((abs % 3600) / 60);
  const sec = abs % 60;

  if (h > 0) return `${sign}${h}h${m}m${sec}s`;
  if (m > 0) return `${sign}${m}m${sec}s`;
  return `${sign}${sec}s`;
}
