/** A date with no time-of-day component. */
export interface CalendarDate {
  /** Full year, e.g. 2025 */
  year: number;
  /** Month 1-12 */
  month: number;
  /** Day 1-31 */
  day: number;
}

export interface CollectionRecord {
  readonly date: CalendarDate;
  /** Normalized collection type, e.g. "General Waste". */
  readonly type: string;
}

export type Logger = Pick<Console, "log" | "warn" | "error">;

export const DEFAULT_TIMEZONE = "Europe/London";
