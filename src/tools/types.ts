import { SchoolTools } from "../schoolTools.js";
import { ToolResult } from "../types.js";

export interface ToolContext {
  schoolTools: SchoolTools;
}

// Must stay a type alias: the SDK's tool schema type carries an index signature
export type ToolInputSchema = {
  type: "object";
  properties: Record<string, object>;
  required?: string[];
};

export interface Tool {
  name: string;
  description: string;
  inputSchema: ToolInputSchema;
  execute: (args: Record<string, unknown>, context: ToolContext) => Promise<ToolResult>;
}
