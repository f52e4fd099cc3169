import { z } from "zod";
import { limitArg, parseArgs } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  query: z.string(),
  sender: z.string().optional(),
  date_filter: z.string().optional(),
  limit: limitArg,
});

export const searchAnnouncementsTool: Tool = {
  name: "search_announcements",
  description:
    "Search school announcements with relevance ranking. Supports text search, sender filtering, and natural-language date filtering.",
  inputSchema: {
    type: "object",
    properties: {
      query: { type: "string", description: "Search text to find in announcements (e.g., 'field trip', 'lemonade sale'). May be empty to list by sender or date only" },
      sender: { type: "string", description: "Optional: Filter by sender name (e.g., 'Jessica')" },
      date_filter: { type: "string", description: "Optional: Date filter in natural language (e.g., 'in May', 'last week', 'today')" },
      limit: { type: "integer", description: "Maximum number of results to return (default: 15, max: 50)", default: 15 },
    },
    required: ["query"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("search_announcements", argsSchema, rawArgs);
    return schoolTools.searchAnnouncements({
      query: args.query,
      sender: args.sender,
      dateFilter: args.date_filter,
      limit: args.limit,
    });
  },
};
