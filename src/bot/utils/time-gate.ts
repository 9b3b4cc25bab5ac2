export type RunWindow = {
  /** Minutes after local midnight, inclusive */
  startMinutes: number;
  /** Minutes after local midnight, exclusive */
  endMinutes: number;
  timeZone: string;
};

/**
 * Parse "HH:MM" (24h). Returns undefined for anything else.
 */
export function parseTimeOfDay(value: string): number | undefined {
  const match = /^(\d{1,2}):(\d{2})$/.exec(value.trim());
  if (!match) return undefined;
  const hour = Number(match[1]);
  const minute = Number(match[2]);
  if (hour > 23 || minute > 59) return undefined;
  return hour * 60 + minute;
}

export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

/**
 * Local wall-clock minutes after midnight for `now` in `timeZone`.
 */
export function localMinutesOfDay(now: number, timeZone: string): number {
  const parts = new Intl.DateTimeFormat("en-US", {
    timeZone,
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(new Date(now));
  const hour = Number(parts.find((p) => p.type === "hour")?.value ?? "0");
  const minute = Number(parts.find((p) => p.type === "minute")?.value ?? "0");
  return (hour % 24) * 60 + minute;
}

export function isWithinWindow(minutes: number, window: RunWindow): boolean {
  const { startMinutes, endMinutes } = window;
  if (startMinutes === endMinutes) return true;
  if (startMinutes < endMinutes) {
    return minutes >= startMinutes && minutes < endMinutes;
  }
  // wraps past midnight
  return minutes >= startMinutes || minutes < endMinutes;
}

export class TimeGate {
  private readonly window?: RunWindow;

  constructor(window?: RunWindow) {
    this.window = window;
  }

  isOpen(now: number): boolean {
    if (!this.window) return true;
    return isWithinWindow(localMinutesOfDay(now, this.window.timeZone), this.window);
  }

  describe(): string {
    if (!this.window) return "always";
    const fmt = (m: number) =>
      `${String(Math.floor(m / 60)).padStart(2, "0")}:${String(m % 60).padStart(2, "0")}`;
    return `${fmt(this.window.startMinutes)}-${fmt(this.window.endMinutes)} ${this.window.timeZone}`;
  }
}
