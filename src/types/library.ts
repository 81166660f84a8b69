export type LoanReceipt = {
  memberId: string;
  isbn: string;
  availableCopies: number;
  borrowedIsbns: string[];
};

export type LibraryStatus = {
  totalBooks: number;
  totalMembers: number;
  totalCopies: number;
  availableCopies: number;
  borrowedCopies: number;
};

export type PageMeta = {
  page: number;
  pageSize: number;
  total: number;
  totalPages: number;
};
