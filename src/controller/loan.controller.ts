import type { Request, Response } from "express";
import { getLibrary } from "../db/library";
import { badRequest, internalError, sendLibraryError } from "../utils/http";

type LoanBody = { memberId?: unknown; isbn?: unknown };

const readLoan = (body: LoanBody | undefined) => {
  const { memberId, isbn } = body ?? {};
  if (typeof memberId !== "string" || !memberId.trim()) return null;
  if (typeof isbn !== "string" || !isbn.trim()) return null;
  return { memberId, isbn };
};

export const borrowBook = (
  req: Request<Record<string, string>, unknown, LoanBody>,
  res: Response
) => {
  try {
    const loan = readLoan(req.body);
    if (!loan) return badRequest(res, "memberId and isbn are required");

    const result = getLibrary().borrowBook(loan.memberId, loan.isbn);
    if (!result.ok) return sendLibraryError(res, result.error);

    console.log(
      `[loans] ${loan.memberId} borrowed ${loan.isbn}, ${result.data.availableCopies} left`
    );

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("borrowBook failed:", e);
    return internalError(res);
  }
};

export const returnBook = (
  req: Request<Record<string, string>, unknown, LoanBody>,
  res: Response
) => {
  try {
    const loan = readLoan(req.body);
    if (!loan) return badRequest(res, "memberId and isbn are required");

    const result = getLibrary().returnBook(loan.memberId, loan.isbn);
    if (!result.ok) return sendLibraryError(res, result.error);

    console.log(`[loans] ${loan.memberId} returned ${loan.isbn}`);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("returnBook failed:", e);
    return internalError(res);
  }
};
