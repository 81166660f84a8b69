import type { BookInput } from "./book";
import type { MemberInput } from "./member";

export interface LibrarySeed {
  books: BookInput[];
  members: MemberInput[];
}

export type SeedSummary = {
  books: number;
  members: number;
};
