import { z } from "zod";
import { limitArg, parseArgs, requiredText } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  date_query: requiredText,
  limit: limitArg,
});

export const getAnnouncementsByDateTool: Tool = {
  name: "get_announcements_by_date",
  description: "Get announcements from a date range described in natural language.",
  inputSchema: {
    type: "object",
    properties: {
      date_query: {
        type: "string",
        description: "Natural language date query (e.g., 'in May 2025', 'last week', 'today', 'yesterday', 'last 10 days')",
      },
      limit: { type: "integer", description: "Maximum number of results to return (default: 15)", default: 15 },
    },
    required: ["date_query"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("get_announcements_by_date", argsSchema, rawArgs);
    return schoolTools.getAnnouncementsByDate({ dateQuery: args.date_query, limit: args.limit });
  },
};
