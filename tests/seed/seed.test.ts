import path from 'node:path';
import { describe, expect, test } from '@jest/globals';
import { parseSeed, seedLibrary, seedOnStart } from '../../seed/seed';
import { Library } from '../../src/service/library.service';
import { book, member } from '../helpers/library';

const SEED_FILE = path.join(__dirname, '..', '..', 'seed', 'library.seed.json');

describe('seed', () => {
  test('seedOnStart fills an empty library from the seed file', async () => {
    const library = new Library();

    const summary = await seedOnStart(library, SEED_FILE);

    expect(summary).toEqual({ books: 8, members: 3 });
    expect(library.getStatus()).toEqual({
      totalBooks: 8,
      totalMembers: 3,
      totalCopies: 18,
      availableCopies: 18,
      borrowedCopies: 0,
    });
    expect(library.searchBooks('mara quill').map((b) => b.isbn)).toEqual([
      '978-0000000101',
      '978-0000000106',
    ]);
  });

  test('seedOnStart leaves a non-empty library alone', async () => {
    const library = new Library();
    library.addMember(member());

    const summary = await seedOnStart(library, SEED_FILE);

    expect(summary).toBeNull();
    expect(library.getStatus().totalBooks).toBe(0);
  });

  test('parseSeed defaults members to an empty list', () => {
    expect(parseSeed({ books: [book()] })).toEqual({ books: [book()], members: [] });
  });

  test('parseSeed rejects a document without books', () => {
    expect(() => parseSeed({ members: [] })).toThrow(
      'Seed must be an object with a books array',
    );
  });

  test('parseSeed names the malformed entry', () => {
    expect(() =>
      parseSeed({ books: [book(), { isbn: '2', title: 'T', author: 'A', genre: 'Fiction' }] }),
    ).toThrow('books[1] is missing isbn, title, author, genre or copies');
  });

  test('seedLibrary stops at the first rejected entry', () => {
    const library = new Library();

    expect(() =>
      seedLibrary(library, {
        books: [book({ isbn: '1' }), book({ isbn: '1', title: 'Twin' })],
        members: [],
      }),
    ).toThrow('Seed book 1 rejected: Book with ISBN 1 already exists');
  });
});
