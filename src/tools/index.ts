import { Tool } from "./types.js";
import { searchAnnouncementsTool } from "./searchAnnouncements.js";
import { getAnnouncementsByDateTool } from "./getAnnouncementsByDate.js";
import { getRecentAnnouncementsTool } from "./getRecentAnnouncements.js";
import { createCalendarEventTool } from "./createCalendarEvent.js";
import { createReminderTool } from "./createReminder.js";
import { createEventWithReminderTool } from "./createEventWithReminder.js";
import { analyzeDocumentTool } from "./analyzeDocument.js";
import { extractActionItemsTool, extractEventsTool, summarizeAnnouncementTool } from "./documentShortcuts.js";

export const tools: Tool[] = [
  searchAnnouncementsTool,
  getAnnouncementsByDateTool,
  getRecentAnnouncementsTool,
  createCalendarEventTool,
  createReminderTool,
  createEventWithReminderTool,
  analyzeDocumentTool,
  summarizeAnnouncementTool,
  extractEventsTool,
  extractActionItemsTool,
];

export type { Tool, ToolContext } from "./types.js";
