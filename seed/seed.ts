import path from 'node:path';
import fs from 'node:fs/promises';
import type { Library } from '../src/service/library.service';
import type { BookInput } from '../src/types/book';
import type { MemberInput } from '../src/types/member';
import type { LibrarySeed, SeedSummary } from '../src/types/seed';

const SEED_FILE = path.resolve(
  process.cwd(),
  process.env.LIBRARY_SEED_FILE ?? path.join('seed', 'library.seed.json')
);

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null && !Array.isArray(value);

function parseBook(value: unknown, index: number): BookInput {
  if (!isRecord(value)) throw new Error(`books[${index}] must be an object`);
  const { isbn, title, author, genre, copies } = value;
  if (
    typeof isbn !== 'string' ||
    typeof title !== 'string' ||
    typeof author !== 'string' ||
    typeof genre !== 'string' ||
    typeof copies !== 'number'
  ) {
    throw new Error(`books[${index}] is missing isbn, title, author, genre or copies`);
  }
  return { isbn, title, author, genre, copies };
}

function parseMember(value: unknown, index: number): MemberInput {
  if (!isRecord(value)) throw new Error(`members[${index}] must be an object`);
  const { memberId, name, email } = value;
  if (typeof memberId !== 'string' || typeof name !== 'string' || typeof email !== 'string') {
    throw new Error(`members[${index}] is missing memberId, name or email`);
  }
  return { memberId, name, email };
}

export function parseSeed(data: unknown): LibrarySeed {
  if (!isRecord(data)) {
    throw new Error('Seed must be an object with a books array');
  }
  const { books, members = [] } = data;
  if (!Array.isArray(books)) {
    throw new Error('Seed must be an object with a books array');
  }
  if (!Array.isArray(members)) {
    throw new Error('Seed members must be an array');
  }

  return {
    books: books.map(parseBook),
    members: members.map(parseMember),
  };
}

/** Adds every seed entry through the normal validation path; the first rejection aborts. */
export function seedLibrary(library: Library, seed: LibrarySeed): SeedSummary {
  for (const book of seed.books) {
    const result = library.addBook(book);
    if (!result.ok) {
      throw new Error(`Seed book ${book.isbn} rejected: ${result.error.message}`);
    }
  }
  for (const member of seed.members) {
    const result = library.addMember(member);
    if (!result.ok) {
      throw new Error(`Seed member ${member.memberId} rejected: ${result.error.message}`);
    }
  }

  return { books: seed.books.length, members: seed.members.length };
}

export async function seedOnStart(
  library: Library,
  file = SEED_FILE
): Promise<SeedSummary | null> {
  const { totalBooks, totalMembers } = library.getStatus();
  if (totalBooks > 0 || totalMembers > 0) {
    return null;
  }

  const raw = await fs.readFile(file, 'utf8');
  const seed = parseSeed(JSON.parse(raw));

  return seedLibrary(library, seed);
}
