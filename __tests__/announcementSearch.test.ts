import { AnnouncementSearch } from '../src/search/announcementSearch.js';
import { StopWordFilter } from '../src/search/stopWords.js';
import { Announcement, AnnouncementStore } from '../src/types.js';

const announcement = (id: string, overrides: Partial<Announcement> = {}): Announcement => ({
  id,
  title: '',
  sender: '',
  sentAt: '2024-05-01T08:00:00.000Z',
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

const NOW = new Date(2024, 4, 15, 10, 30);

const createSearch = (store: AnnouncementStore) =>
  new AnnouncementSearch(store, {
    stopWords: new StopWordFilter(['the', 'a', 'for', 'in', 'on']),
    defaultLimit: 15,
    maxLimit: 50,
    now: () => NOW,
  });

describe('AnnouncementSearch.combinedFilter', () => {
  it('never returns more than the limit', async () => {
    const records = Array.from({ length: 50 }, (_, i) => announcement(`rec${i}`, { title: `Spirit Week update ${i}` }));
    const search = createSearch(new InMemoryStore(records));

    const results = await search.combinedFilter({ queryText: 'spirit', limit: 5 });
    expect(results).toHaveLength(5);
    expect(results.map(a => a.id)).toEqual(['rec0', 'rec1', 'rec2', 'rec3', 'rec4']);
  });

  it('combines a case-insensitive sender filter with text relevance', async () => {
    const store = new InMemoryStore([
      announcement('jessica-trip', { sender: 'Jessica Smith', title: 'Field trip form' }),
      announcement('mark-trip', { sender: 'Mark', title: 'Field trip bus' }),
      announcement('jessica-bake', { sender: 'JESSICA', title: 'Bake sale' }),
      announcement('jessica-field', { sender: 'jessica', description: 'Field day on Friday' }),
    ]);
    const search = createSearch(store);

    const results = await search.combinedFilter({ queryText: 'field trip', senderFilter: 'Jessica', limit: 15 });
    expect(results.map(a => a.id)).toEqual(['jessica-trip', 'jessica-field']);
  });

  it('keeps fetch order for records with equal scores', async () => {
    const search = createSearch(
      new InMemoryStore([
        announcement('older', { description: 'library books due' }),
        announcement('best', { title: 'Library books due' }),
        announcement('newer', { description: 'library books due' }),
      ])
    );

    const results = await search.combinedFilter({ queryText: 'library books due', limit: 15 });
    expect(results.map(a => a.id)).toEqual(['best', 'older', 'newer']);
  });

  it('fetches by resolved date range when a date expression is given', async () => {
    const store = new InMemoryStore([announcement('may')]);
    const search = createSearch(store);

    const results = await search.combinedFilter({ dateExpression: 'May 2024', limit: 15 });
    expect(store.fetchByDateRange).toHaveBeenCalledWith('2024-05-01', '2024-05-31');
    expect(store.fetchAll).not.toHaveBeenCalled();
    expect(results.map(a => a.id)).toEqual(['may']);
  });

  it('treats blank filters as absent', async () => {
    const store = new InMemoryStore([announcement('a'), announcement('b', { sender: 'Jessica' })]);
    const search = createSearch(store);

    const results = await search.combinedFilter({ queryText: '  ', senderFilter: '', dateExpression: ' ', limit: 15 });
    expect(store.fetchByDateRange).not.toHaveBeenCalled();
    expect(results.map(a => a.id)).toEqual(['a', 'b']);
  });

  it('returns an empty list when the store fails', async () => {
    const store = new InMemoryStore();
    store.fetchAll.mockRejectedValue(new Error('Failed to fetch announcements: timeout'));
    const search = createSearch(store);

    await expect(search.combinedFilter({ queryText: 'concert', limit: 15 })).resolves.toEqual([]);
    await expect(search.recentAnnouncements()).resolves.toEqual([]);
  });
});

describe('AnnouncementSearch limits and helpers', () => {
  const search = createSearch(new InMemoryStore());

  it('clamps requested limits to the configured bounds', () => {
    expect(search.clampLimit(undefined)).toBe(15);
    expect(search.clampLimit(500)).toBe(50);
    expect(search.clampLimit(-3)).toBe(0);
    expect(search.clampLimit(7.9)).toBe(7);
    expect(search.clampLimit(Number.NaN)).toBe(15);
  });

  it('resolves date phrases against the injected clock', () => {
    expect(search.resolveDateExpression('yesterday')).toEqual({ start: '2024-05-14', end: '2024-05-14' });
  });
});

describe('AnnouncementSearch supplementary operations', () => {
  it('returns the newest announcements in store order', async () => {
    const records = Array.from({ length: 20 }, (_, i) => announcement(`rec${i}`));
    const search = createSearch(new InMemoryStore(records));

    const results = await search.recentAnnouncements(3);
    expect(results.map(a => a.id)).toEqual(['rec0', 'rec1', 'rec2']);
  });

  it('reports the resolved range with date-only results', async () => {
    const store = new InMemoryStore([announcement('a'), announcement('b')]);
    const search = createSearch(store);

    const { range, announcements } = await search.announcementsByDate('last week', 1);
    expect(range).toEqual({ start: '2024-05-06', end: '2024-05-12' });
    expect(store.fetchByDateRange).toHaveBeenCalledWith('2024-05-06', '2024-05-12');
    expect(announcements.map(a => a.id)).toEqual(['a']);
  });

  it('delegates searchAnnouncements to the combined filter', async () => {
    const store = new InMemoryStore([
      announcement('a', { title: 'Yearbook orders', sender: 'Office' }),
      announcement('b', { title: 'Yearbook photos', sender: 'Ms. Lee' }),
    ]);
    const search = createSearch(store);

    const results = await search.searchAnnouncements('yearbook', 'lee');
    expect(results.map(a => a.id)).toEqual(['b']);
  });
});
