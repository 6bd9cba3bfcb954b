import { Inject, Injectable } from '@nestjs/common';
import { addDays, format, nextDay } from 'date-fns';
import type { Day } from 'date-fns';
import { CLOCK, Clock, ClockTime, DateConverter, ResolvedDate } from './date-converter.types';

const WEEKDAYS: ReadonlyArray<{ name: string; day: Day }> = [
  { name: 'monday', day: 1 },
  { name: 'tuesday', day: 2 },
  { name: 'wednesday', day: 3 },
  { name: 'thursday', day: 4 },
  { name: 'friday', day: 5 },
  { name: 'saturday', day: 6 },
  { name: 'sunday', day: 0 },
];

const CLOCK_TIME_PATTERN = /\b(1[0-2]|[1-9])\s*(am|pm)\b/;

@Injectable()
export class DateConverterService implements DateConverter {
  constructor(@Inject(CLOCK) private readonly clock: Clock) {}

  toAbsolute(relativePhrase: string): string {
    return this.resolve(relativePhrase)?.formatted ?? relativePhrase;
  }

  resolve(relativePhrase: string): ResolvedDate | undefined {
    const text = relativePhrase.trim().toLowerCase();
    const date = this.resolveDate(text, this.clock.now());
    if (!date) {
      return undefined;
    }
    const time = extractClockTime(text);
    const timeSuffix = time ? ` at ${time.hour}:00 ${time.period}` : '';
    return {
      original: relativePhrase,
      date,
      time,
      formatted: `${format(date, 'MMMM dd, yyyy')}${timeSuffix}`,
    };
  }

  private resolveDate(text: string, today: Date): Date | undefined {
    if (text.includes('tomorrow')) {
      return addDays(today, 1);
    }
    // weekday names always mean the next future occurrence, never today
    const weekday = WEEKDAYS.find(({ name }) => text.includes(name));
    if (weekday) {
      return nextDay(today, weekday.day);
    }
    if (text.includes('next week')) {
      return addDays(today, 7);
    }
    if (text.includes('two weeks') || text.includes('2 weeks')) {
      return addDays(today, 14);
    }
    return undefined;
  }
}

const extractClockTime = (text: string): ClockTime | undefined => {
  const match = CLOCK_TIME_PATTERN.exec(text);
  if (!match) {
    return undefined;
  }
  return {
    hour: Number(match[1]),
    period: match[2] === 'pm' ? 'PM' : 'AM',
  };
};
