import { z } from "zod";
import { ANALYSIS_TYPES } from "./documents.js";
import { parseArgs } from "./args.js";
import { Tool } from "./types.js";

const argsSchema = z.object({
  text: z.string(),
  analysis_type: z.enum(ANALYSIS_TYPES).optional(),
});

export const analyzeDocumentTool: Tool = {
  name: "analyze_document",
  description: "Analyze announcement or document text with AI: summary, events, or action items",
  inputSchema: {
    type: "object",
    properties: {
      text: { type: "string", description: "The document or announcement text to analyze" },
      analysis_type: {
        type: "string",
        enum: [...ANALYSIS_TYPES],
        description: "Type of analysis to perform (default: summary)",
        default: "summary",
      },
    },
    required: ["text"],
  },
  execute: async (rawArgs, { schoolTools }) => {
    const args = parseArgs("analyze_document", argsSchema, rawArgs);
    return schoolTools.analyzeDocument({ text: args.text, analysisType: args.analysis_type ?? "summary" });
  },
};
