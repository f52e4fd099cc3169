import axios from 'axios';
import { AiAnalysis, AnalysisModel, CompletionRequest } from '../src/api/analysisClient.js';
import { CalendarClient } from '../src/api/calendarClient.js';
import { SchoolTools } from '../src/schoolTools.js';
import { AnnouncementSearch } from '../src/search/announcementSearch.js';
import { StopWordFilter } from '../src/search/stopWords.js';
import { Announcement, AnnouncementStore, ToolResult } from '../src/types.js';

const NOW = new Date(2024, 4, 15, 10, 30);

const announcement = (id: string, overrides: Partial<Announcement> = {}): Announcement => ({
  id,
  title: '',
  sender: '',
  sentAt: '2024-05-03T15:30:00.000Z',
  description: '',
  attachments: [],
  ...overrides,
});

class InMemoryStore implements AnnouncementStore {
  fetchAll = jest.fn<Promise<Announcement[]>, []>();
  fetchByDateRange = jest.fn<Promise<Announcement[]>, [string, string]>();

  constructor(records: Announcement[] = []) {
    this.fetchAll.mockResolvedValue(records);
    this.fetchByDateRange.mockResolvedValue(records);
  }
}

interface Harness {
  records?: Announcement[];
  webhookUrl?: string;
  webhookReplies?: unknown[];
  modelReply?: string;
}

function createTools({ records = [], webhookUrl = 'https://n8n.test/webhook/calendar', webhookReplies = [], modelReply = '{}' }: Harness = {}) {
  const store = new InMemoryStore(records);
  const posted: unknown[] = [];
  const http = axios.create({
    adapter: async config => {
      posted.push(JSON.parse(config.data));
      const data = webhookReplies[posted.length - 1] ?? { id: `evt-${posted.length}` };
      return { data, status: 200, statusText: 'OK', headers: {}, config };
    },
  });
  const complete = jest.fn<Promise<string>, [CompletionRequest]>().mockResolvedValue(modelReply);
  const model: AnalysisModel = { complete };

  const schoolTools = new SchoolTools({
    search: new AnnouncementSearch(store, {
      stopWords: new StopWordFilter(['the', 'a', 'for', 'in', 'on', 'by']),
      defaultLimit: 15,
      maxLimit: 50,
      now: () => NOW,
    }),
    calendar: new CalendarClient({ webhookUrl, timeIndicators: ['lunch', 'pm', 'am', 'evening'], http }),
    analysis: new AiAnalysis(model),
    now: () => NOW,
  });
  return { schoolTools, store, posted, complete };
}

const text = (result: ToolResult) => result.content.map(item => item.text).join('\n');

describe('SchoolTools announcement tools', () => {
  const fieldTrip = announcement('rec1', {
    title: 'Field Trip Forms',
    sender: 'Jessica',
    description: 'Please return field trip forms by Friday.',
    attachments: [{ filename: 'form.pdf', url: 'https://files.test/form.pdf' }],
  });

  it('formats search results', async () => {
    const { schoolTools } = createTools({ records: [fieldTrip] });

    const result = await schoolTools.searchAnnouncements({ query: 'field trip' });

    expect(text(result)).toBe(
      "Found 1 announcements matching 'field trip':\n\n" +
        '1. Title: Field Trip Forms\n' +
        '   Sent By: Jessica\n' +
        '   Sent Time: May 3, 2024\n' +
        '   Description: Please return field trip forms by Friday.\n' +
        '   Attachments: form.pdf'
    );
  });

  it('adds the date range and a footer when the limit is reached', async () => {
    const { schoolTools, store } = createTools({
      records: [fieldTrip, announcement('rec2', { title: 'Field trip chaperones', sender: 'Office' })],
    });

    const result = await schoolTools.searchAnnouncements({ query: 'field trip', dateFilter: 'May 2024', limit: 1 });

    expect(store.fetchByDateRange).toHaveBeenCalledWith('2024-05-01', '2024-05-31');
    expect(text(result)).toBe(
      "Found 1 announcements matching 'field trip' (2024-05-01 to 2024-05-31):\n\n" +
        '1. Title: Field Trip Forms\n' +
        '   Sent By: Jessica\n' +
        '   Sent Time: May 3, 2024\n' +
        '   Description: Please return field trip forms by Friday.\n' +
        '   Attachments: form.pdf\n\n' +
        'Showing first 1 results. Would you like to see more announcements or filter further?'
    );
  });

  it('says when nothing matched', async () => {
    const { schoolTools } = createTools({ records: [fieldTrip] });

    const result = await schoolTools.searchAnnouncements({ query: 'robotics' });
    expect(text(result)).toBe("No announcements found matching 'robotics'");
  });

  it('truncates long descriptions and fills missing fields', async () => {
    const long = announcement('rec3', { description: 'x'.repeat(250), sentAt: '' });
    const { schoolTools } = createTools({ records: [long] });

    const result = await schoolTools.getRecentAnnouncements({ limit: 5 });
    expect(text(result)).toBe(
      'Found 1 recent announcements:\n\n' +
        '1. Title: No title\n' +
        '   Sent By: Unknown sender\n' +
        '   Sent Time: Unknown date\n' +
        `   Description: ${'x'.repeat(200)}...`
    );
  });

  it('reports the resolved range for date queries', async () => {
    const { schoolTools, store } = createTools();

    const result = await schoolTools.getAnnouncementsByDate({ dateQuery: 'today' });
    expect(store.fetchByDateRange).toHaveBeenCalledWith('2024-05-15', '2024-05-15');
    expect(text(result)).toBe("No announcements found for 'today' (2024-05-15 to 2024-05-15)");
  });

  it('lists announcements for a date query', async () => {
    const { schoolTools } = createTools({ records: [announcement('rec1', { title: 'Picture Day', sender: 'Office' })] });

    const result = await schoolTools.getAnnouncementsByDate({ dateQuery: 'last week' });
    expect(text(result)).toBe(
      'Found 1 announcements from last week (2024-05-06 to 2024-05-12):\n\n' +
        '1. Title: Picture Day\n' +
        '   Sent By: Office\n' +
        '   Sent Time: May 3, 2024\n' +
        '   Description: No description'
    );
  });

  it('says when there are no recent announcements', async () => {
    const { schoolTools } = createTools();
    expect(text(await schoolTools.getRecentAnnouncements({}))).toBe('No recent announcements found');
  });
});

describe('SchoolTools calendar tools', () => {
  it('creates a timed event detected from the title', async () => {
    const { schoolTools, posted } = createTools({ webhookReplies: [{ id: 'evt-9' }] });

    const result = await schoolTools.createCalendarEvent({ title: 'Pizza lunch', date: '2024-05-20', location: 'Cafeteria' });

    expect(text(result)).toBe(
      "Successfully created timed calendar event: 'Pizza lunch'\n" +
        'Date: 2024-05-20\n' +
        'Time: 09:00 - 10:00\n' +
        'Location: Cafeteria\n' +
        'Event ID: evt-9'
    );
    expect(posted[0]).toMatchObject({ all_day: false, start_datetime: '2024-05-20T09:00:00' });
  });

  it('creates an all-day event with a description', async () => {
    const { schoolTools } = createTools({ webhookReplies: ['Event ID: fair-1'] });

    const result = await schoolTools.createCalendarEvent({
      title: 'Book Fair',
      date: '2024-05-20',
      description: 'All week in the library',
      eventType: 'all_day',
    });

    expect(text(result)).toBe(
      "Successfully created all-day calendar event: 'Book Fair'\n" +
        'Date: 2024-05-20\n' +
        'Event ID: fair-1\n' +
        '\n' +
        'Description: All week in the library'
    );
  });

  it('validates date and time formats before calling the webhook', async () => {
    const { schoolTools, posted } = createTools();

    expect(text(await schoolTools.createCalendarEvent({ title: 'Book Fair', date: '05/20/2024' }))).toBe(
      "Error: Invalid date format '05/20/2024'. Please use YYYY-MM-DD format."
    );
    expect(
      text(await schoolTools.createCalendarEvent({ title: 'Recital', date: '2024-05-20', eventType: 'timed', startTime: '7pm' }))
    ).toBe("Error: Invalid start_time format '7pm'. Please use HH:MM format.");
    expect(posted).toHaveLength(0);
  });

  it('reports a missing webhook', async () => {
    const { schoolTools } = createTools({ webhookUrl: '' });

    const result = await schoolTools.createCalendarEvent({ title: 'Book Fair', date: '2024-05-20' });
    expect(text(result)).toBe(
      "Failed to create calendar event: Error creating calendar event 'Book Fair': No webhook URL configured for calendar integration"
    );
  });

  it('creates a reminder that falls today', async () => {
    const { schoolTools, posted } = createTools({ webhookReplies: ['Created event: rem42'] });

    const result = await schoolTools.createReminder({ title: 'Book Fair', mainEventDate: '2024-05-18' });

    expect(text(result)).toBe(
      "Successfully created reminder for 'Book Fair'\n" +
        'Reminder Date: 2024-05-15\n' +
        'Main Event Date: 2024-05-18\n' +
        'Days Before: 3\n' +
        'Reminder ID: rem42'
    );
    expect(posted[0]).toMatchObject({
      title: 'REMINDER: Book Fair',
      description: 'Reminder for upcoming event: Book Fair\n\nMain event date: 2024-05-18',
      start_date: '2024-05-15',
    });
  });

  it('refuses reminders in the past', async () => {
    const { schoolTools, posted } = createTools();

    const result = await schoolTools.createReminder({ title: 'Book Fair', mainEventDate: '2024-05-16' });
    expect(text(result)).toBe(
      'Warning: Reminder date 2024-05-13 is in the past. The main event is too soon for a 3-day reminder.'
    );
    expect(posted).toHaveLength(0);
  });

  it('creates an event followed by its reminder', async () => {
    const { schoolTools, posted } = createTools({ webhookReplies: [{ id: 'evt-1' }, { id: 'rem-1' }] });

    const result = await schoolTools.createEventWithReminder({
      title: 'Science Fair',
      date: '2024-05-25',
      description: 'Bring your poster',
      reminderDaysBefore: 2,
    });

    expect(text(result)).toBe(
      "Successfully created all-day calendar event: 'Science Fair'\n" +
        'Date: 2024-05-25\n' +
        'Event ID: evt-1\n' +
        '\n' +
        'Description: Bring your poster\n' +
        '\n' +
        "Successfully created reminder for 'Science Fair'\n" +
        'Reminder Date: 2024-05-23\n' +
        'Main Event Date: 2024-05-25\n' +
        'Days Before: 2\n' +
        'Reminder ID: rem-1'
    );
    expect(posted[1]).toMatchObject({
      description: 'Reminder for upcoming event: Science Fair\n\nAdditional details: Bring your poster\n\nMain event date: 2024-05-25',
    });
  });

  it('skips the reminder when asked to', async () => {
    const { schoolTools, posted } = createTools();

    await schoolTools.createEventWithReminder({ title: 'Science Fair', date: '2024-05-25', createReminder: false });
    expect(posted).toHaveLength(1);
  });
});

describe('SchoolTools document analysis', () => {
  it('rejects text that is too short', async () => {
    const { schoolTools, complete } = createTools();

    const result = await schoolTools.analyzeDocument({ text: '  short  ', analysisType: 'summary' });
    expect(text(result)).toBe('Error: Document text is too short for meaningful analysis.');
    expect(complete).not.toHaveBeenCalled();
  });

  it('formats a summary', async () => {
    const { schoolTools } = createTools({
      modelReply: JSON.stringify({
        summary: 'Spring concert next week.',
        key_points: ['Concert on Friday'],
        important_dates: ['2024-05-24'],
        action_items: ['Buy tickets'],
      }),
    });

    const result = await schoolTools.analyzeDocument({ text: 'The spring concert is next Friday.', analysisType: 'summary' });
    expect(text(result)).toBe(
      'Document Summary\n\n' +
        'Summary: Spring concert next week.\n\n' +
        'Key Points:\n1. Concert on Friday\n\n' +
        'Important Dates:\n- 2024-05-24\n\n' +
        'Action Items:\n1. Buy tickets'
    );
  });

  it('formats extracted events', async () => {
    const { schoolTools } = createTools({
      modelReply: JSON.stringify({
        events_found: [
          {
            title: 'Science Fair',
            date: '2024-05-22',
            time: '18:00',
            location: 'Gym',
            description: 'Student projects',
            supplies_needed: 'Poster board',
            supplies_deadline: '2024-05-20',
          },
        ],
        total_events: 1,
      }),
    });

    const result = await schoolTools.analyzeDocument({ text: 'Science fair in the gym on Wednesday.', analysisType: 'events' });
    expect(text(result)).toBe(
      'Event Analysis\n\nFound 1 event(s):\n\n' +
        'Event 1: Science Fair\n' +
        'Date: 2024-05-22\n' +
        'Time: 18:00\n' +
        'Location: Gym\n' +
        'Description: Student projects\n' +
        'Supplies Needed: Poster board\n' +
        'Supplies Deadline: 2024-05-20'
    );
  });

  it('formats action items', async () => {
    const { schoolTools } = createTools({
      modelReply: JSON.stringify({
        action_items: [{ task: 'Return permission slip', who: 'parents', deadline: '2024-05-17', priority: 'high' }],
      }),
    });

    const result = await schoolTools.analyzeDocument({ text: 'Return the permission slip by Friday.', analysisType: 'action_items' });
    expect(text(result)).toBe(
      'Action Items Analysis\n\nFound 1 action item(s):\n\n' +
        '1. Return permission slip [HIGH]\n' +
        'Who: parents\n' +
        'Deadline: 2024-05-17\n' +
        'Priority: High'
    );
  });

  it('truncates very long documents before analysis', async () => {
    const { schoolTools, complete } = createTools({ modelReply: '{"summary": "Long."}' });

    await schoolTools.analyzeDocument({ text: 'a'.repeat(10050), analysisType: 'summary' });
    expect(complete.mock.calls[0][0].prompt).toContain(`${'a'.repeat(10000)}... [truncated]`);
    expect(complete.mock.calls[0][0].prompt).not.toContain('a'.repeat(10001));
  });

  it('reports analysis failures', async () => {
    const { schoolTools } = createTools({ modelReply: 'not json' });

    const result = await schoolTools.analyzeDocument({ text: 'Bake sale on Friday afternoon.', analysisType: 'summary' });
    expect(text(result)).toBe('Analysis failed: Failed to parse AI response');
  });
});
