import { AirtableAnnouncementStore } from './api/airtableClient.js';
import { AiAnalysis, OpenAIAnalysisModel } from './api/analysisClient.js';
import { CalendarClient } from './api/calendarClient.js';
import { AnnouncementSearch } from './search/announcementSearch.js';
import { StopWordFilter } from './search/stopWords.js';
import * as announcementTools from './tools/announcements.js';
import * as calendarTools from './tools/calendar.js';
import { analyzeDocument } from './tools/documents.js';
import { AnalysisType, SchoolConfig, ToolResult } from './types.js';

export interface CalendarDefaults {
  startTime: string;
  durationHours: number;
  reminderDaysBefore: number;
}

export interface SchoolToolsDeps {
  search: AnnouncementSearch;
  calendar: CalendarClient;
  analysis: AiAnalysis;
  calendarDefaults?: Partial<CalendarDefaults>;
  now?: () => Date;
}

export interface EventToolArgs {
  title: string;
  date: string;
  description?: string;
  location?: string;
  eventType?: calendarTools.EventTypeOption;
  startTime?: string;
  durationHours?: number;
}

export interface ReminderToolArgs {
  title: string;
  mainEventDate: string;
  reminderDaysBefore?: number;
  description?: string;
}

const textResult = (text: string): ToolResult => ({ content: [{ type: 'text', text }] });

// Main class binding the MCP tools to the announcement store, calendar webhook and AI model
export class SchoolTools {
  private readonly search: AnnouncementSearch;
  private readonly calendar: CalendarClient;
  private readonly analysis: AiAnalysis;
  private readonly calendarDefaults: CalendarDefaults;
  private readonly now: () => Date;

  constructor(deps: SchoolToolsDeps) {
    this.search = deps.search;
    this.calendar = deps.calendar;
    this.analysis = deps.analysis;
    this.calendarDefaults = {
      startTime: deps.calendarDefaults?.startTime ?? '09:00',
      durationHours: deps.calendarDefaults?.durationHours ?? 1,
      reminderDaysBefore: deps.calendarDefaults?.reminderDaysBefore ?? 3,
    };
    this.now = deps.now ?? (() => new Date());
  }

  static fromConfig(config: SchoolConfig): SchoolTools {
    const search = new AnnouncementSearch(AirtableAnnouncementStore.fromConfig(config.airtable), {
      stopWords: new StopWordFilter(config.vocabulary.stopWords),
      defaultLimit: config.announcements.defaultLimit,
      maxLimit: config.announcements.maxLimit,
    });
    const calendar = new CalendarClient({
      webhookUrl: config.calendar.webhookUrl,
      timeIndicators: config.vocabulary.timeIndicators,
      defaultStartTime: config.calendar.defaultStartTime,
      defaultDurationHours: config.calendar.defaultDurationHours,
    });
    const analysis = new AiAnalysis(new OpenAIAnalysisModel(config.openai));
    return new SchoolTools({
      search,
      calendar,
      analysis,
      calendarDefaults: {
        startTime: config.calendar.defaultStartTime,
        durationHours: config.calendar.defaultDurationHours,
        reminderDaysBefore: config.calendar.reminderDaysBefore,
      },
    });
  }

  /**
   * Search announcements by text, ranked by relevance, with optional sender and date filters
   */
  async searchAnnouncements(args: { query: string; sender?: string; dateFilter?: string; limit?: number }) {
    return announcementTools.searchAnnouncements(this.search, args);
  }

  async getAnnouncementsByDate(args: { dateQuery: string; limit?: number }) {
    return announcementTools.getAnnouncementsByDate(this.search, args);
  }

  async getRecentAnnouncements(args: { limit?: number }) {
    return announcementTools.getRecentAnnouncements(this.search, args);
  }

  async createCalendarEvent(args: EventToolArgs): Promise<ToolResult> {
    return textResult(await calendarTools.createCalendarEvent(this.calendar, this.eventArgs(args)));
  }

  async createReminder(args: ReminderToolArgs): Promise<ToolResult> {
    return textResult(await calendarTools.createReminder(this.calendar, this.reminderArgs(args), this.now()));
  }

  async createEventWithReminder(
    args: EventToolArgs & { createReminder?: boolean; reminderDaysBefore?: number }
  ): Promise<ToolResult> {
    return textResult(
      await calendarTools.createEventWithReminder(
        this.calendar,
        {
          ...this.eventArgs(args),
          createReminder: args.createReminder ?? true,
          reminderDaysBefore: args.reminderDaysBefore ?? this.calendarDefaults.reminderDaysBefore,
        },
        this.now()
      )
    );
  }

  async analyzeDocument(args: { text: string; analysisType: AnalysisType }): Promise<ToolResult> {
    return textResult(await analyzeDocument(this.analysis, args.text, args.analysisType));
  }

  private eventArgs(args: EventToolArgs): calendarTools.CreateEventArgs {
    return {
      title: args.title,
      date: args.date,
      description: args.description ?? '',
      location: args.location ?? '',
      eventType: args.eventType ?? 'auto',
      startTime: args.startTime ?? this.calendarDefaults.startTime,
      durationHours: args.durationHours ?? this.calendarDefaults.durationHours,
    };
  }

  private reminderArgs(args: ReminderToolArgs): calendarTools.CreateReminderArgs {
    return {
      title: args.title,
      mainEventDate: args.mainEventDate,
      reminderDaysBefore: args.reminderDaysBefore ?? this.calendarDefaults.reminderDaysBefore,
      description: args.description ?? '',
    };
  }
}
