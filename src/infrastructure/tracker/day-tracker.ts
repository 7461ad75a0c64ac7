/** Records that the office was prayed on a given day. */
export interface DayTracker {
  markCompleted(dayKey: string): Promise<void>;
}

export const DAY_KEY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

/** Local calendar date as `YYYY-MM-DD`. */
export function dayKey(date: Date): string {
  const yyyy = String(date.getFullYear()).padStart(4, "0");
  const mm = String(date.getMonth() + 1).padStart(2, "0");
  const dd = String(date.getDate()).padStart(2, "0");
  return `${yyyy}-${mm}-${dd}`;
}
