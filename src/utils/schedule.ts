import { validate } from 'node-cron';
import { parseExpression } from 'cron-parser';

/**
 * The platform takes classic five-field cron (minute hour day month weekday).
 * node-cron also accepts a leading seconds field, which is rejected here.
 */
export function isValidSchedule(cronExpr: string): boolean {
  const fields = cronExpr.trim().split(/\s+/);
  if (fields.length !== 5) {
    return false;
  }
  if (!validate(cronExpr.trim())) {
    return false;
  }

  // node-cron accepts dates that never occur, such as 30 February
  try {
    parseExpression(cronExpr.trim(), { tz: 'UTC' });
    return true;
  } catch {
    return false;
  }
}

export function nextRunAt(cronExpr: string, from: Date = new Date()): Date {
  const interval = parseExpression(cronExpr.trim(), {
    currentDate: from,
    tz: 'UTC',
  });
  return interval.next().toDate();
}
