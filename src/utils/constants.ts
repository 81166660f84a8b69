export const BORROW_LIMIT = 3;

export const GENRES = [
  "Fiction",
  "Non-Fiction",
  "Sci-Fi",
  "Mystery",
  "Biography",
  "Romance",
  "Thriller",
  "History",
] as const;

export const EMAIL_PATTERN = /^[a-zA-Z0-9._%+-]+@[a-zA-Z0-9.-]+\.[a-zA-Z]{2,}$/;

export const DEFAULT_PAGE_SIZE = 20;
export const MAX_PAGE_SIZE = 100;
