import type { Book, BookInput, BookUpdate, Genre } from "../types/book";
import type { Member, MemberInput, MemberUpdate } from "../types/member";
import type { LibraryStatus, LoanReceipt } from "../types/library";
import { BORROW_LIMIT, EMAIL_PATTERN, GENRES } from "../utils/constants";
import { failure, success, type LibraryResult } from "../utils/errors";

const isBlank = (value: string) => value.trim().length === 0;

const isPositiveInteger = (value: number) =>
  Number.isInteger(value) && value > 0;

const isGenre = (value: string): value is Genre =>
  GENRES.some((genre) => genre === value);

const invalidGenre = () =>
  failure(
    "INVALID_INPUT",
    `Invalid genre. Valid genres are: ${GENRES.join(", ")}`
  );

const bookNotFound = (isbn: string) =>
  failure("NOT_FOUND", `Book with ISBN ${isbn} not found`);

const memberNotFound = (memberId: string) =>
  failure("NOT_FOUND", `Member with ID ${memberId} not found`);

const snapshotBook = (book: Book): Book => ({ ...book });

const snapshotMember = (member: Member): Member => ({
  ...member,
  borrowedIsbns: [...member.borrowedIsbns],
});

/**
 * In-memory catalogue of books and members.
 *
 * Books are keyed by ISBN and keep insertion order; members are kept in the
 * order they joined. Every mutation either applies completely or returns a
 * failure and leaves state untouched. Values handed out are copies.
 */
export class Library {
  private readonly books = new Map<string, Book>();
  private readonly members: Member[] = [];

  addBook(input: BookInput): LibraryResult<Book> {
    const { isbn, title, author, genre, copies } = input;

    if (isBlank(isbn)) return failure("INVALID_INPUT", "ISBN is required");
    if (this.books.has(isbn)) {
      return failure("DUPLICATE_KEY", `Book with ISBN ${isbn} already exists`);
    }
    if (isBlank(title)) return failure("INVALID_INPUT", "Title is required");
    if (isBlank(author)) return failure("INVALID_INPUT", "Author is required");
    if (!isGenre(genre)) return invalidGenre();
    if (!isPositiveInteger(copies)) {
      return failure("INVALID_INPUT", "Total copies must be a positive integer");
    }

    const book: Book = {
      isbn,
      title: title.trim(),
      author: author.trim(),
      genre,
      totalCopies: copies,
      availableCopies: copies,
    };
    this.books.set(isbn, book);

    return success(snapshotBook(book));
  }

  getBook(isbn: string): LibraryResult<Book> {
    const book = this.books.get(isbn);
    if (!book) return bookNotFound(isbn);
    return success(snapshotBook(book));
  }

  updateBook(isbn: string, changes: BookUpdate): LibraryResult<Book> {
    const book = this.books.get(isbn);
    if (!book) return bookNotFound(isbn);

    const { title, author, genre, totalCopies } = changes;

    if (title !== undefined && isBlank(title)) {
      return failure("INVALID_INPUT", "Title is required");
    }
    if (author !== undefined && isBlank(author)) {
      return failure("INVALID_INPUT", "Author is required");
    }
    let nextGenre: Genre | undefined;
    if (genre !== undefined) {
      if (!isGenre(genre)) return invalidGenre();
      nextGenre = genre;
    }

    let availableCopies = book.availableCopies;
    if (totalCopies !== undefined) {
      if (!isPositiveInteger(totalCopies)) {
        return failure("INVALID_INPUT", "Total copies must be a positive integer");
      }
      const onLoan = book.totalCopies - book.availableCopies;
      if (totalCopies < onLoan) {
        return failure(
          "CONSTRAINT_VIOLATION",
          `Cannot reduce total copies below currently borrowed count (${onLoan})`
        );
      }
      availableCopies = totalCopies - onLoan;
    }

    if (title !== undefined) book.title = title.trim();
    if (author !== undefined) book.author = author.trim();
    if (nextGenre !== undefined) book.genre = nextGenre;
    if (totalCopies !== undefined) book.totalCopies = totalCopies;
    book.availableCopies = availableCopies;

    return success(snapshotBook(book));
  }

  removeBook(isbn: string): LibraryResult<Book> {
    const book = this.books.get(isbn);
    if (!book) return bookNotFound(isbn);

    if (book.availableCopies < book.totalCopies) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Cannot delete book ${isbn} - some copies are currently borrowed`
      );
    }

    this.books.delete(isbn);
    return success(snapshotBook(book));
  }

  /** Case-insensitive substring match on title or author, in catalogue order. */
  searchBooks(query: string): Book[] {
    const needle = query.toLowerCase();
    const matches: Book[] = [];

    for (const book of this.books.values()) {
      if (
        book.title.toLowerCase().includes(needle) ||
        book.author.toLowerCase().includes(needle)
      ) {
        matches.push(snapshotBook(book));
      }
    }

    return matches;
  }

  listBooks(): Book[] {
    return Array.from(this.books.values(), snapshotBook);
  }

  addMember(input: MemberInput): LibraryResult<Member> {
    const { memberId, name, email } = input;

    if (isBlank(memberId)) {
      return failure("INVALID_INPUT", "Member ID is required");
    }
    if (this.memberRecord(memberId)) {
      return failure(
        "DUPLICATE_KEY",
        `Member with ID ${memberId} already exists`
      );
    }
    if (isBlank(name)) return failure("INVALID_INPUT", "Name is required");
    if (!EMAIL_PATTERN.test(email)) {
      return failure("INVALID_INPUT", "Invalid email format");
    }

    const member: Member = {
      memberId,
      name: name.trim(),
      email,
      borrowedIsbns: [],
    };
    this.members.push(member);

    return success(snapshotMember(member));
  }

  findMember(memberId: string): LibraryResult<Member> {
    const member = this.memberRecord(memberId);
    if (!member) return memberNotFound(memberId);
    return success(snapshotMember(member));
  }

  updateMember(memberId: string, changes: MemberUpdate): LibraryResult<Member> {
    const member = this.memberRecord(memberId);
    if (!member) return memberNotFound(memberId);

    const { name, email } = changes;

    if (name !== undefined && isBlank(name)) {
      return failure("INVALID_INPUT", "Name is required");
    }
    if (email !== undefined && !EMAIL_PATTERN.test(email)) {
      return failure("INVALID_INPUT", "Invalid email format");
    }

    if (name !== undefined) member.name = name.trim();
    if (email !== undefined) member.email = email;

    return success(snapshotMember(member));
  }

  removeMember(memberId: string): LibraryResult<Member> {
    const index = this.members.findIndex((m) => m.memberId === memberId);
    if (index === -1) return memberNotFound(memberId);

    const member = this.members[index];
    if (member.borrowedIsbns.length > 0) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Cannot delete member ${memberId} - they have ${member.borrowedIsbns.length} borrowed books`
      );
    }

    this.members.splice(index, 1);
    return success(snapshotMember(member));
  }

  listMembers(): Member[] {
    return this.members.map(snapshotMember);
  }

  borrowBook(memberId: string, isbn: string): LibraryResult<LoanReceipt> {
    const member = this.memberRecord(memberId);
    if (!member) return memberNotFound(memberId);

    const book = this.books.get(isbn);
    if (!book) return bookNotFound(isbn);

    if (member.borrowedIsbns.length >= BORROW_LIMIT) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Member ${memberId} has reached the maximum borrowing limit of ${BORROW_LIMIT} books`
      );
    }
    if (book.availableCopies <= 0) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Book ${isbn} is not available for borrowing`
      );
    }
    if (member.borrowedIsbns.includes(isbn)) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Member ${memberId} already has book ${isbn}`
      );
    }

    member.borrowedIsbns.push(isbn);
    book.availableCopies -= 1;

    return success(this.receipt(member, book));
  }

  returnBook(memberId: string, isbn: string): LibraryResult<LoanReceipt> {
    const member = this.memberRecord(memberId);
    if (!member) return memberNotFound(memberId);

    const book = this.books.get(isbn);
    if (!book) return bookNotFound(isbn);

    const position = member.borrowedIsbns.indexOf(isbn);
    if (position === -1) {
      return failure(
        "CONSTRAINT_VIOLATION",
        `Member ${memberId} does not have book ${isbn}`
      );
    }

    member.borrowedIsbns.splice(position, 1);
    book.availableCopies += 1;

    return success(this.receipt(member, book));
  }

  getStatus(): LibraryStatus {
    let totalCopies = 0;
    let availableCopies = 0;
    for (const book of this.books.values()) {
      totalCopies += book.totalCopies;
      availableCopies += book.availableCopies;
    }

    return {
      totalBooks: this.books.size,
      totalMembers: this.members.length,
      totalCopies,
      availableCopies,
      borrowedCopies: totalCopies - availableCopies,
    };
  }

  // linear scan; members are an ordered list, not a keyed map
  private memberRecord(memberId: string): Member | undefined {
    return this.members.find((m) => m.memberId === memberId);
  }

  private receipt(member: Member, book: Book): LoanReceipt {
    return {
      memberId: member.memberId,
      isbn: book.isbn,
      availableCopies: book.availableCopies,
      borrowedIsbns: [...member.borrowedIsbns],
    };
  }
}
