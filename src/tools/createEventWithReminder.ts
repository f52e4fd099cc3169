import { z } from "zod";
import { eventTypeArg, parseArgs, requiredText } from "./args.js";
import { eventProperties } from "./createCalendarEvent.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  title: requiredText,
  date: requiredText,
  description: z.string().optional(),
  location: z.string().optional(),
  event_type: eventTypeArg,
  start_time: z.string().optional(),
  duration_hours: z.number().positive().optional(),
  create_reminder_flag: z.boolean().optional(),
  reminder_days_before: z.number().int().nonnegative().optional(),
});

export const createEventWithReminderTool: Tool = {
  name: "create_event_with_reminder",
  description: "Create a calendar event and, optionally, an all-day reminder ahead of it",
  inputSchema: {
    type: "object",
    properties: {
      ...eventProperties,
      create_reminder_flag: { type: "boolean", description: "Whether to also create a reminder (default: true)", default: true },
      reminder_days_before: { type: "integer", description: "Days before the event to remind (default: 3)", default: 3 },
    },
    required: ["title", "date"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("create_event_with_reminder", argsSchema, rawArgs);
    return schoolTools.createEventWithReminder({
      title: args.title,
      date: args.date,
      description: args.description,
      location: args.location,
      eventType: args.event_type,
      startTime: args.start_time,
      durationHours: args.duration_hours,
      createReminder: args.create_reminder_flag,
      reminderDaysBefore: args.reminder_days_before,
    });
  },
};
