import { z } from "zod";
import { limitArg, parseArgs } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({ limit: limitArg });

export const getRecentAnnouncementsTool: Tool = {
  name: "get_recent_announcements",
  description: "Get the most recent school announcements",
  inputSchema: {
    type: "object",
    properties: {
      limit: { type: "integer", description: "Number of recent announcements to retrieve (default: 10)", default: 10 },
    },
    required: [],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("get_recent_announcements", argsSchema, rawArgs);
    return schoolTools.getRecentAnnouncements({ limit: args.limit ?? 10 });
  },
};
