import { logger } from '../logger.js';
import { AnnouncementSearch } from '../search/announcementSearch.js';
import { Announcement, ToolResult } from '../types.js';
import { formatSentTime, truncate } from '../utils.js';

const DESCRIPTION_PREVIEW_LENGTH = 200;

const textResult = (text: string): ToolResult => ({ content: [{ type: 'text', text }] });

export function formatAnnouncement(announcement: Announcement, position: number): string {
  const lines = [
    `${position}. Title: ${announcement.title || 'No title'}`,
    `   Sent By: ${announcement.sender || 'Unknown sender'}`,
    `   Sent Time: ${formatSentTime(announcement.sentAt)}`,
    `   Description: ${truncate(announcement.description || 'No description', DESCRIPTION_PREVIEW_LENGTH)}`,
  ];
  const attachmentNames = announcement.attachments
    .map(attachment => attachment.filename || attachment.url)
    .filter((name): name is string => Boolean(name));
  if (attachmentNames.length > 0) {
    lines.push(`   Attachments: ${attachmentNames.join(', ')}`);
  }
  return lines.join('\n');
}

export function formatAnnouncementList(announcements: Announcement[]): string {
  if (announcements.length === 0) {
    return 'No announcements to display.';
  }
  return announcements.map((announcement, i) => formatAnnouncement(announcement, i + 1)).join('\n\n');
}

/**
 * Search announcements by text with optional sender and date filters, ranked by relevance.
 */
export async function searchAnnouncements(
  search: AnnouncementSearch,
  args: { query: string; sender?: string; dateFilter?: string; limit?: number }
): Promise<ToolResult> {
  const limit = search.clampLimit(args.limit);
  logger.info(`Searching announcements: query='${args.query}', sender='${args.sender ?? ''}', date='${args.dateFilter ?? ''}'`);

  const range = args.dateFilter?.trim() ? search.resolveDateExpression(args.dateFilter) : undefined;
  const scope = range ? ` (${range.start} to ${range.end})` : '';

  const announcements = await search.searchAnnouncements(args.query, args.sender, args.dateFilter, limit);
  if (announcements.length === 0) {
    return textResult(`No announcements found matching '${args.query}'${scope}`);
  }

  let text = `Found ${announcements.length} announcements matching '${args.query}'${scope}:\n\n${formatAnnouncementList(announcements)}`;
  if (announcements.length >= limit) {
    text += `\n\nShowing first ${limit} results. Would you like to see more announcements or filter further?`;
  }
  logger.info(`Search completed: ${announcements.length} results returned`);
  return textResult(text);
}

export async function getAnnouncementsByDate(
  search: AnnouncementSearch,
  args: { dateQuery: string; limit?: number }
): Promise<ToolResult> {
  logger.info(`Getting announcements by date: '${args.dateQuery}'`);
  const { range, announcements } = await search.announcementsByDate(args.dateQuery, args.limit);
  const span = `${range.start} to ${range.end}`;

  if (announcements.length === 0) {
    return textResult(`No announcements found for '${args.dateQuery}' (${span})`);
  }
  return textResult(
    `Found ${announcements.length} announcements from ${args.dateQuery} (${span}):\n\n${formatAnnouncementList(announcements)}`
  );
}

export async function getRecentAnnouncements(
  search: AnnouncementSearch,
  args: { limit?: number }
): Promise<ToolResult> {
  const announcements = await search.recentAnnouncements(args.limit);
  if (announcements.length === 0) {
    return textResult('No recent announcements found');
  }
  return textResult(`Found ${announcements.length} recent announcements:\n\n${formatAnnouncementList(announcements)}`);
}
