export const OFFERED_SLOTS = ['tomorrow at 3pm', 'next Monday at 10am', 'next Wednesday at 11am'] as const;

export type OfferedSlot = (typeof OFFERED_SLOTS)[number];

export const CUSTOM_TIME_REQUESTED = 'Custom time requested';

export type AppointmentRuleName = 'none_work' | 'any_works' | 'tomorrow' | 'monday' | 'wednesday' | 'default';

export type AppointmentChoice = {
  rule: AppointmentRuleName;
  appointment: string;
  customRequested: boolean;
};

type AppointmentRule = {
  name: Exclude<AppointmentRuleName, 'default'>;
  keywords: readonly string[];
  select(customTime?: string): string;
};

const [TOMORROW, MONDAY, WEDNESDAY] = OFFERED_SLOTS;

/**
 * First match wins. Offered days are listed in the order they are presented to
 * the caller, so an utterance naming two of them resolves to the earlier one.
 */
export const APPOINTMENT_RULES: readonly AppointmentRule[] = [
  {
    name: 'none_work',
    keywords: ['nothing works', 'none work', 'not available'],
    select: (customTime) => customTime || CUSTOM_TIME_REQUESTED,
  },
  { name: 'any_works', keywords: ['anything works', 'any time', 'all work'], select: () => TOMORROW },
  { name: 'tomorrow', keywords: ['tomorrow'], select: () => TOMORROW },
  { name: 'monday', keywords: ['monday'], select: () => MONDAY },
  { name: 'wednesday', keywords: ['wednesday'], select: () => WEDNESDAY },
];

export const classifyAppointmentChoice = (utterance: string, customTime?: string): AppointmentChoice => {
  const text = utterance.toLowerCase();
  const rule = APPOINTMENT_RULES.find((candidate) => candidate.keywords.some((keyword) => text.includes(keyword)));
  if (!rule) {
    return { rule: 'default', appointment: TOMORROW, customRequested: false };
  }
  return {
    rule: rule.name,
    appointment: rule.select(customTime),
    customRequested: rule.name === 'none_work',
  };
};
