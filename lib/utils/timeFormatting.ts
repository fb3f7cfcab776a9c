/**
 * Duration parsing for the "Duration" / "Flight time" lines of confirmations.
 * Handles "2h 10m", "2h10min", "2 hrs 5 mins", "135 min", "1h" and "02:10".
 */
export function parseDurationMinutes(raw: string): number | undefined {
  const text = raw.trim().toLowerCase();
  if (!text) return undefined;

  const clock = text.match(/^(\d{1,2}):(\d{2})$/);
  if (clock) {
    const minutes = parseInt(clock[2], 10);
    return minutes < 60 ? parseInt(clock[1], 10) * 60 + minutes : undefined;
  }

  const match = text.match(
    /^(?:(\d+)\s*(?:hours|hour|hrs|hr|h)\.?)?\s*(?:(\d+)\s*(?:minutes|minute|mins|min|m)\.?)?$/
  );
  if (!match || (match[1] === undefined && match[2] === undefined)) {
    return undefined;
  }

  const hours = match[1] ? parseInt(match[1], 10) : 0;
  const minutes = match[2] ? parseInt(match[2], 10) : 0;
  const total = hours * 60 + minutes;

  return total > 0 ? total : undefined;
}
