export type Clock = {
  now(): Date;
};

export const CLOCK = Symbol('CLOCK');

export const systemClock: Clock = {
  now: () => new Date(),
};

export type ClockTime = {
  hour: number;
  period: 'AM' | 'PM';
};

export type ResolvedDate = {
  original: string;
  date: Date;
  time?: ClockTime;
  formatted: string;
};

export interface DateConverter {
  /** Absolute form of a relative phrase, or the phrase itself when no date keyword is recognized. */
  toAbsolute(relativePhrase: string): string;
}
