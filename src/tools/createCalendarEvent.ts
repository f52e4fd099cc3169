import { z } from "zod";
import { eventTypeArg, parseArgs, requiredText } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  title: requiredText,
  date: requiredText,
  description: z.string().optional(),
  location: z.string().optional(),
  event_type: eventTypeArg,
  start_time: z.string().optional(),
  duration_hours: z.number().positive().optional(),
});

export const eventProperties = {
  title: { type: "string", description: "Event title" },
  date: { type: "string", description: "Event date in YYYY-MM-DD format" },
  description: { type: "string", description: "Event description (optional)", default: "" },
  location: { type: "string", description: "Event location (optional)", default: "" },
  event_type: {
    type: "string",
    enum: ["auto", "all_day", "timed"],
    description: "Event type: 'auto' (detect from content), 'all_day', or 'timed'",
    default: "auto",
  },
  start_time: { type: "string", description: "Start time in HH:MM format for timed events (default: 09:00)", default: "09:00" },
  duration_hours: { type: "number", description: "Duration in hours for timed events (default: 1)", default: 1 },
};

export const createCalendarEventTool: Tool = {
  name: "create_calendar_event",
  description:
    "Create a calendar event through the calendar webhook. Automatically detects all-day vs timed events from the title and description.",
  inputSchema: {
    type: "object",
    properties: eventProperties,
    required: ["title", "date"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("create_calendar_event", argsSchema, rawArgs);
    return schoolTools.createCalendarEvent({
      title: args.title,
      date: args.date,
      description: args.description,
      location: args.location,
      eventType: args.event_type,
      startTime: args.start_time,
      durationHours: args.duration_hours,
    });
  },
};
