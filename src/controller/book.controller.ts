import type { Request, Response } from "express";
import { getLibrary } from "../db/library";
import type { BookUpdate } from "../types/book";
import type { PageMeta } from "../types/library";
import {
  badRequest,
  internalError,
  isInteger,
  isOptionalInteger,
  isOptionalString,
  queryString,
  readPaging,
  sendLibraryError,
} from "../utils/http";

type IsbnParams = { isbn: string };

type AddBookBody = {
  isbn?: unknown;
  title?: unknown;
  author?: unknown;
  genre?: unknown;
  copies?: unknown;
};

type UpdateBookBody = {
  title?: unknown;
  author?: unknown;
  genre?: unknown;
  totalCopies?: unknown;
};

export const searchBooks = (req: Request, res: Response) => {
  try {
    const q = queryString(req.query.q)?.trim() ?? "";
    const { page, pageSize, skip } = readPaging(req.query);

    const matches = getLibrary().searchBooks(q);
    const total = matches.length;

    const meta: PageMeta & { q: string | null } = {
      page,
      pageSize,
      total,
      totalPages: Math.max(1, Math.ceil(total / pageSize)),
      q: q || null,
    };

    return res.json({
      ok: true,
      data: matches.slice(skip, skip + pageSize),
      meta,
    });
  } catch (e) {
    console.error("searchBooks failed:", e);
    return internalError(res);
  }
};

export const addBook = (
  req: Request<Record<string, string>, unknown, AddBookBody>,
  res: Response
) => {
  try {
    const { isbn, title, author, genre, copies } = req.body ?? {};

    if (
      typeof isbn !== "string" ||
      typeof title !== "string" ||
      typeof author !== "string" ||
      typeof genre !== "string"
    ) {
      return badRequest(res, "isbn, title, author and genre are required strings");
    }
    if (!isInteger(copies)) {
      return badRequest(res, "copies must be an integer");
    }

    const result = getLibrary().addBook({ isbn, title, author, genre, copies });
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("addBook failed:", e);
    return internalError(res);
  }
};

export const getBook = (req: Request<IsbnParams>, res: Response) => {
  try {
    const result = getLibrary().getBook(req.params.isbn);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("getBook failed:", e);
    return internalError(res);
  }
};

export const updateBook = (
  req: Request<IsbnParams, unknown, UpdateBookBody>,
  res: Response
) => {
  try {
    const { title, author, genre, totalCopies } = req.body ?? {};

    if (
      !isOptionalString(title) ||
      !isOptionalString(author) ||
      !isOptionalString(genre)
    ) {
      return badRequest(res, "title, author and genre must be strings");
    }
    if (!isOptionalInteger(totalCopies)) {
      return badRequest(res, "totalCopies must be an integer");
    }

    const changes: BookUpdate = { title, author, genre, totalCopies };
    const result = getLibrary().updateBook(req.params.isbn, changes);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("updateBook failed:", e);
    return internalError(res);
  }
};

export const removeBook = (req: Request<IsbnParams>, res: Response) => {
  try {
    const result = getLibrary().removeBook(req.params.isbn);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("removeBook failed:", e);
    return internalError(res);
  }
};
