import { NewNewsItem } from '../../src/types';
import { MemoryNewsStore, MemoryStoreOptions } from './memoryNewsStore';

// Inserted in order, so ids run 1..5.
export const SAMPLE_NEWS: NewNewsItem[] = [
  {
    source: 'Meduza',
    title: 'Мировой кризис углубляется',
    link: 'https://news.example/1',
    published: '2025-08-01T10:00:00.000Z',
    summary: 'Экономисты обсуждают санкции и рынки.'
  },
  {
    source: 'Meduza',
    title: 'Мировой кризис и рынки',
    link: 'https://news.example/2',
    published: '2025-08-02T10:00:00.000Z',
    summary: 'Биржи падают третий день.'
  },
  {
    source: 'Reuters',
    title: 'F-16 jets delivered',
    link: 'https://news.example/3',
    published: '2025-08-03T10:00:00.000Z',
    summary: 'The first F-16 squadron arrives.'
  },
  {
    source: 'Reuters',
    title: 'Spam filters improve',
    link: 'https://news.example/4',
    published: '2025-08-04T10:00:00.000Z',
    summary: 'New spam rules announced.'
  },
  {
    source: 'BBC',
    title: 'Weather update',
    link: 'https://news.example/5',
    published: '2025-08-05T10:00:00.000Z',
    summary: 'Rain expected tomorrow.'
  }
];

export async function seededStore(options: MemoryStoreOptions = {}): Promise<MemoryNewsStore> {
  const store = new MemoryNewsStore(options);
  await store.insertMany(SAMPLE_NEWS);
  return store;
}
