function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/**
 * `{prefix}-{DDMMYYYY}-{HHMM}` in local time, e.g. `config-push-05032025-1430`
 */
export function timestampedName(prefix: string, now: Date = new Date()): string {
  const date = `${pad(now.getDate())}${pad(now.getMonth() + 1)}${now.getFullYear()}`;
  const time = `${pad(now.getHours())}${pad(now.getMinutes())}`;
  return `${prefix}-${date}-${time}`;
}
