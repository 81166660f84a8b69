import { setLibrary } from '../../src/db/library';
import { Library } from '../../src/service/library.service';
import type { BookInput } from '../../src/types/book';
import type { MemberInput } from '../../src/types/member';

export const book = (overrides: Partial<BookInput> = {}): BookInput => ({
  isbn: '111',
  title: 'A',
  author: 'B',
  genre: 'Fiction',
  copies: 2,
  ...overrides,
});

export const member = (overrides: Partial<MemberInput> = {}): MemberInput => ({
  memberId: 'm1',
  name: 'Test Member',
  email: 'test@example.com',
  ...overrides,
});

/** Installs a fresh library as the process-wide instance, filled with the given records. */
export function installLibrary(
  books: BookInput[] = [],
  members: MemberInput[] = [],
): Library {
  const library = setLibrary(new Library());
  for (const b of books) {
    const result = library.addBook(b);
    if (!result.ok) throw result.error;
  }
  for (const m of members) {
    const result = library.addMember(m);
    if (!result.ok) throw result.error;
  }
  return library;
}
