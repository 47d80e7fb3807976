import { readFileSync } from 'fs';
import { join } from 'path';
import { ExtractionRun } from '../extraction-run.entity';
import { toParagraphs } from '../../utils/paragraphs';

export const BULLETIN_PATH = join(__dirname, 'bulletin.txt');

export const BULLETIN = toParagraphs(readFileSync(BULLETIN_PATH, 'utf8'));

type Row = Partial<ExtractionRun>;

// Remplace le Repository<ExtractionRun> de TypeORM dans les tests
export function fakeRunsRepository() {
  const rows: Row[] = [];
  return {
    rows,
    create: jest.fn((data: Row): Row => ({ ...data })),
    save: jest.fn(async (row: Row): Promise<Row> => {
      const saved = { ...row, id: rows.length + 1, created_at: new Date() };
      rows.push(saved);
      return saved;
    }),
    find: jest.fn(
      async (opts: { take?: number }): Promise<Row[]> =>
        [...rows].reverse().slice(0, opts.take),
    ),
  };
}
