import { z } from "zod";
import { parseArgs, requiredText } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  title: requiredText,
  main_event_date: requiredText,
  reminder_days_before: z.number().int().nonnegative().optional(),
  description: z.string().optional(),
});

export const createReminderTool: Tool = {
  name: "create_reminder",
  description: "Create an all-day reminder a number of days before an event",
  inputSchema: {
    type: "object",
    properties: {
      title: { type: "string", description: "Title of the main event" },
      main_event_date: { type: "string", description: "Date of the main event in YYYY-MM-DD format" },
      reminder_days_before: { type: "integer", description: "Days before the event to remind (default: 3)", default: 3 },
      description: { type: "string", description: "Additional reminder details (optional)", default: "" },
    },
    required: ["title", "main_event_date"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("create_reminder", argsSchema, rawArgs);
    return schoolTools.createReminder({
      title: args.title,
      mainEventDate: args.main_event_date,
      reminderDaysBefore: args.reminder_days_before,
      description: args.description,
    });
  },
};
