import type { HourWindow } from '../types.js';

export interface SchedulePolicyOptions {
  intervalSeconds: number;
  peakIntervalSeconds?: number;
  peakHours?: HourWindow;
  quietHours?: HourWindow;
  timezone?: string;
}

/** Windows wrap past midnight when `end <= start`, e.g. 22→6. */
export function inWindow(hour: number, window: HourWindow): boolean {
  if (window.start === window.end) return false;
  if (window.start < window.end) {
    return hour >= window.start && hour < window.end;
  }
  return hour >= window.start || hour < window.end;
}

export class SchedulePolicy {
  private options: SchedulePolicyOptions;
  private hourFormat: Intl.DateTimeFormat;

  constructor(options: SchedulePolicyOptions) {
    this.options = options;
    this.hourFormat = new Intl.DateTimeFormat('en-US', {
      timeZone: options.timezone ?? 'UTC',
      hour: 'numeric',
      hourCycle: 'h23',
    });
  }

  hourAt(date: Date): number {
    const part = this.hourFormat.formatToParts(date).find(p => p.type === 'hour');
    return part ? Number(part.value) % 24 : date.getUTCHours();
  }

  isQuiet(date: Date): boolean {
    const { quietHours } = this.options;
    return quietHours !== undefined && inWindow(this.hourAt(date), quietHours);
  }

  isPeak(date: Date): boolean {
    const { peakHours, peakIntervalSeconds } = this.options;
    return peakHours !== undefined && peakIntervalSeconds !== undefined && inWindow(this.hourAt(date), peakHours);
  }

  intervalMs(date: Date): number {
    const seconds = this.isPeak(date) && this.options.peakIntervalSeconds !== undefined
      ? this.options.peakIntervalSeconds
      : this.options.intervalSeconds;
    return seconds * 1000;
  }

  describe(date: Date): string {
    if (this.isQuiet(date)) return 'quiet hours (checks paused)';
    const minutes = this.intervalMs(date) / 60_000;
    const label = this.isPeak(date) ? 'peak' : 'normal';
    return `${label} hours, every ${Number.isInteger(minutes) ? minutes : minutes.toFixed(1)} min`;
  }
}
