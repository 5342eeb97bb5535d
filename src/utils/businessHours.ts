import { DateTime } from 'luxon';

export interface OpeningHours {
  open: string;
  close: string;
}

export interface BusinessHoursConfig {
  monday: OpeningHours | null;
  tuesday: OpeningHours | null;
  wednesday: OpeningHours | null;
  thursday: OpeningHours | null;
  friday: OpeningHours | null;
  saturday: OpeningHours | null;
  sunday: OpeningHours | null;
}

export const DEFAULT_BUSINESS_HOURS: BusinessHoursConfig = {
  monday: { open: '09:00', close: '18:00' },
  tuesday: { open: '09:00', close: '18:00' },
  wednesday: { open: '09:00', close: '18:00' },
  thursday: { open: '09:00', close: '18:00' },
  friday: { open: '09:00', close: '18:00' },
  saturday: { open: '09:00', close: '17:00' },
  sunday: null,
};

const DAY_NAMES: (keyof BusinessHoursConfig)[] = [
  'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday',
];

function toMinutes(time: string): number {
  const [hours, minutes] = time.split(':').map(Number);
  return hours * 60 + minutes;
}

function hoursFor(moment: DateTime, config: BusinessHoursConfig): OpeningHours | null {
  // Luxon weekday is 1-based (Mon=1)
  return config[DAY_NAMES[moment.weekday - 1]];
}

export function isWithinBusinessHours(moment: DateTime, config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS): boolean {
  const dayHours = hoursFor(moment, config);
  if (!dayHours) return false;

  const minutes = moment.hour * 60 + moment.minute;
  return minutes >= toMinutes(dayHours.open) && minutes < toMinutes(dayHours.close);
}

/** The next opening window starting after `from`, looking at most a week ahead. */
export function getNextBusinessWindow(
  from: DateTime,
  config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS
): { start: DateTime; end: DateTime } | null {
  let check = from;

  for (let i = 0; i < 8; i++) {
    const dayHours = hoursFor(check, config);

    if (dayHours) {
      const open = toMinutes(dayHours.open);
      const close = toMinutes(dayHours.close);
      const start = check.startOf('day').plus({ minutes: open });
      const end = check.startOf('day').plus({ minutes: close });

      if (start > from) {
        return { start, end };
      }
    }

    check = check.plus({ days: 1 }).startOf('day');
  }

  return null;
}

export function describeBusinessHours(config: BusinessHoursConfig = DEFAULT_BUSINESS_HOURS): string {
  return DAY_NAMES.map((day) => {
    const hours = config[day];
    const label = day.charAt(0).toUpperCase() + day.slice(1, 3);
    return hours ? `${label} ${hours.open}-${hours.close}` : `${label} closed`;
  }).join(', ');
}
