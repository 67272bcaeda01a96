const clockFormatter = new Intl.DateTimeFormat('en-GB', {
  hour: '2-digit',
  minute: '2-digit',
  hourCycle: 'h23',
});

/**
 * Local wall-clock time as HH:MM
 */
export function formatClock(date: Date): string {
  return clockFormatter.format(date);
}
