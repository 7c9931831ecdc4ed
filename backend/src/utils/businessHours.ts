import { WEEKDAY_KEYS } from '../types/menuContracts';
import type { BusinessHoursInfo, BusinessHoursPeriod, WeekdayKey } from '../types/menuContracts';

export type WeeklyHours = BusinessHoursInfo['weeklyHours'];

const pad = (value: number) => String(value).padStart(2, '0');

export const toWeekdayKey = (value: string): WeekdayKey | null => {
  const normalized = value.trim().slice(0, 3).toUpperCase();
  return WEEKDAY_KEYS.find((key) => key === normalized) ?? null;
};

// Clover sends opening and closing times as HHMM integers (900 is 09:00).
export const formatHhmm = (value: number): string => {
  const hours = Math.floor(value / 100) % 24;
  const minutes = value % 100;
  return `${pad(hours)}:${pad(minutes)}`;
};

const trimSeconds = (time: string) => time.slice(0, 5);

const formatClock = (date: Date) => `${pad(date.getHours())}:${pad(date.getMinutes())}`;

const isTimeInRange = (current: string, period: BusinessHoursPeriod): boolean => {
  const start = trimSeconds(period.startTime);
  const end = trimSeconds(period.endTime);

  if (start > end) {
    // Spans midnight, e.g. 22:00 to 02:00.
    return current >= start || current <= end;
  }

  return current >= start && current <= end;
};

export const isOpenAt = (weeklyHours: WeeklyHours, now: Date): boolean => {
  const today = weeklyHours[WEEKDAY_KEYS[now.getDay()]];
  if (!today || today.length === 0) {
    return false;
  }

  const current = formatClock(now);
  return today.some((period) => isTimeInRange(current, period));
};

export const addPeriod = (
  weeklyHours: WeeklyHours,
  day: WeekdayKey,
  period: BusinessHoursPeriod,
): void => {
  const periods = weeklyHours[day] ?? [];
  periods.push(period);
  weeklyHours[day] = periods;
};

export const buildBusinessHoursInfo = (weeklyHours: WeeklyHours, now: Date): BusinessHoursInfo => ({
  weeklyHours,
  isCurrentlyOpen: isOpenAt(weeklyHours, now),
});
