export interface SchoolConfig {
  airtable: {
    apiKey: string;
    baseId: string;
    tableName: string;
    baseUrl: string;
  };
  openai: {
    apiKey: string;
    model: string;
  };
  calendar: {
    webhookUrl: string;
    defaultStartTime: string; // HH:mm
    defaultDurationHours: number;
    reminderDaysBefore: number;
  };
  announcements: {
    defaultLimit: number;
    maxLimit: number;
  };
  vocabulary: SearchVocabulary;
  logLevel: string;
}

export interface SearchVocabulary {
  stopWords: string[];
  timeIndicators: string[];
}

// Airtable attachment object; only the keys we display are typed
export interface AnnouncementAttachment {
  filename?: string;
  url?: string;
  type?: string;
  size?: number;
  [key: string]: unknown;
}

export interface Announcement {
  id: string;
  title: string;
  sender: string;
  sentAt: string; // ISO 8601 as stored in Airtable, or '' when absent
  description: string;
  attachments: AnnouncementAttachment[];
}

export interface SearchQuery {
  queryText?: string;
  senderFilter?: string;
  dateExpression?: string;
  limit: number;
}

export interface ScoredCandidate {
  record: Announcement;
  score: number;
}

// Calendar dates in YYYY-MM-DD form, start <= end
export interface DateRange {
  start: string;
  end: string;
}

export interface AnnouncementStore {
  fetchAll(): Promise<Announcement[]>;
  fetchByDateRange(start: string, end: string): Promise<Announcement[]>;
}

export type EventKind = 'all-day' | 'timed';

export interface CalendarEventPayload {
  action: 'create_event';
  title: string;
  description: string;
  location: string;
  all_day: boolean;
  start_date: string;
  end_date: string;
  start_datetime: string;
  end_datetime: string;
}

export interface CalendarEventRequest {
  title: string;
  date: string; // YYYY-MM-DD
  description?: string;
  location?: string;
  allDay?: boolean; // undefined means detect from the text
  startTime?: string; // HH:mm
  durationHours?: number;
}

export interface CalendarEventResult {
  success: boolean;
  message: string;
  eventId: string | null;
  eventType?: EventKind;
  webhookResponse?: unknown;
}

export type AnalysisType = 'summary' | 'events' | 'action_items';

export interface DocumentSummary {
  summary: string;
  key_points: string[];
  important_dates: string[];
  action_items: string[];
}

export interface ExtractedEvent {
  title: string;
  date: string;
  time: string;
  location: string;
  description: string;
  supplies_needed: string;
  supplies_deadline: string;
}

export interface EventExtraction {
  events_found: ExtractedEvent[];
  total_events: number;
}

export interface ActionItem {
  task: string;
  who: string;
  deadline: string;
  priority: string;
}

export interface ActionItemExtraction {
  action_items: ActionItem[];
  total_items: number;
}

export type AnalysisOutcome =
  | { success: true; analysisType: 'summary'; result: DocumentSummary }
  | { success: true; analysisType: 'events'; result: EventExtraction }
  | { success: true; analysisType: 'action_items'; result: ActionItemExtraction }
  | { success: false; analysisType: AnalysisType; error: string; rawResponse?: string };

// Type aliases, not interfaces: the SDK's result types carry index signatures
export type TextContent = {
  type: 'text';
  text: string;
};

export type ToolResult = {
  content: TextContent[];
  isError?: boolean;
};
