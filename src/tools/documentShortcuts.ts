import { z } from "zod";
import { AnalysisType } from "../types.js";
import { parseArgs } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({ text: z.string() });

// Single-purpose wrappers around analyze_document, one per analysis type
function documentShortcut(name: string, description: string, analysisType: AnalysisType): Tool {
  return {
    name,
    description,
    inputSchema: {
      type: "object",
      properties: {
        text: { type: "string", description: "The announcement text to analyze" },
      },
      required: ["text"],
    },
    execute: async (rawArgs, { schoolTools }) => {
      const args = parseArgs(name, argsSchema, rawArgs);
      return schoolTools.analyzeDocument({ text: args.text, analysisType });
    },
  };
}

export const summarizeAnnouncementTool = documentShortcut(
  "summarize_announcement",
  "Summarize an announcement with key points, important dates, and action items",
  "summary"
);

export const extractEventsTool = documentShortcut(
  "extract_events",
  "Extract events and important dates that parents and students need to know about",
  "events"
);

export const extractActionItemsTool = documentShortcut(
  "extract_action_items",
  "Extract tasks parents or students need to do, with deadlines and priority",
  "action_items"
);
