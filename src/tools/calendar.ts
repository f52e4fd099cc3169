import { addHours, format, isBefore, isValid, parse, startOfDay, subDays } from 'date-fns';
import { CalendarClient } from '../api/calendarClient.js';
import { logger } from '../logger.js';

export type EventTypeOption = 'auto' | 'all_day' | 'timed';

export interface CreateEventArgs {
  title: string;
  date: string;
  description: string;
  location: string;
  eventType: EventTypeOption;
  startTime: string;
  durationHours: number;
}

export interface CreateReminderArgs {
  title: string;
  mainEventDate: string;
  reminderDaysBefore: number;
  description: string;
}

function parseDay(value: string): Date | undefined {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) {
    return undefined;
  }
  const parsed = parse(value, 'yyyy-MM-dd', new Date());
  return isValid(parsed) ? parsed : undefined;
}

function parseClock(value: string): Date | undefined {
  if (!/^\d{1,2}:\d{2}$/.test(value)) {
    return undefined;
  }
  const parsed = parse(value, 'HH:mm', new Date());
  return isValid(parsed) ? parsed : undefined;
}

const ALL_DAY_FLAGS: Record<EventTypeOption, boolean | undefined> = {
  auto: undefined,
  all_day: true,
  timed: false,
};

export async function createCalendarEvent(calendar: CalendarClient, args: CreateEventArgs): Promise<string> {
  const { title, date, description, location, eventType, startTime, durationHours } = args;
  logger.info(`Creating calendar event: ${title} on ${date}`);

  if (!parseDay(date)) {
    return `Error: Invalid date format '${date}'. Please use YYYY-MM-DD format.`;
  }
  const allDay = ALL_DAY_FLAGS[eventType];
  const start = parseClock(startTime);
  if (allDay !== true && !start) {
    return `Error: Invalid start_time format '${startTime}'. Please use HH:MM format.`;
  }

  const result = await calendar.createEvent({
    title,
    date,
    description,
    location,
    allDay,
    startTime,
    durationHours,
  });
  if (!result.success) {
    logger.error(`Calendar event creation failed: ${title}`);
    return `Failed to create calendar event: ${result.message}`;
  }

  const lines = [`Successfully created ${result.eventType ?? 'unknown'} calendar event: '${title}'`, `Date: ${date}`];
  if (result.eventType === 'timed' && start) {
    lines.push(`Time: ${startTime} - ${format(addHours(start, durationHours), 'HH:mm')}`);
  }
  if (location) {
    lines.push(`Location: ${location}`);
  }
  if (result.eventId) {
    lines.push(`Event ID: ${result.eventId}`);
  }
  if (description) {
    lines.push('', `Description: ${description}`);
  }
  return lines.join('\n');
}

/**
 * Schedule an all-day reminder `reminderDaysBefore` days ahead of the main
 * event. Reminder dates before today are refused with a warning.
 */
export async function createReminder(
  calendar: CalendarClient,
  args: CreateReminderArgs,
  now: Date = new Date()
): Promise<string> {
  const { title, mainEventDate, reminderDaysBefore, description } = args;
  logger.info(`Creating reminder for: ${title}, ${reminderDaysBefore} days before ${mainEventDate}`);

  const mainDate = parseDay(mainEventDate);
  if (!mainDate) {
    return `Error: Invalid main_event_date format '${mainEventDate}'. Please use YYYY-MM-DD format.`;
  }
  const reminderDate = subDays(mainDate, reminderDaysBefore);
  const reminderDay = format(reminderDate, 'yyyy-MM-dd');
  if (isBefore(reminderDate, startOfDay(now))) {
    return `Warning: Reminder date ${reminderDay} is in the past. The main event is too soon for a ${reminderDaysBefore}-day reminder.`;
  }

  let reminderDescription = `Reminder for upcoming event: ${title}`;
  if (description) {
    reminderDescription += `\n\nAdditional details: ${description}`;
  }

  const result = await calendar.createReminder(title, reminderDay, mainEventDate, reminderDescription);
  if (!result.success) {
    logger.error(`Reminder creation failed for: ${title}`);
    return `Failed to create reminder: ${result.message}`;
  }

  const lines = [
    `Successfully created reminder for '${title}'`,
    `Reminder Date: ${reminderDay}`,
    `Main Event Date: ${mainEventDate}`,
    `Days Before: ${reminderDaysBefore}`,
  ];
  if (result.eventId) {
    lines.push(`Reminder ID: ${result.eventId}`);
  }
  return lines.join('\n');
}

export async function createEventWithReminder(
  calendar: CalendarClient,
  args: CreateEventArgs & { createReminder: boolean; reminderDaysBefore: number },
  now: Date = new Date()
): Promise<string> {
  logger.info(`Creating event with reminder: ${args.title} on ${args.date}`);
  const eventMessage = await createCalendarEvent(calendar, args);
  if (!args.createReminder) {
    return eventMessage;
  }
  const reminderMessage = await createReminder(
    calendar,
    {
      title: args.title,
      mainEventDate: args.date,
      reminderDaysBefore: args.reminderDaysBefore,
      description: args.description,
    },
    now
  );
  return `${eventMessage}\n\n${reminderMessage}`;
}
