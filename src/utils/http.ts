import type { Response } from "express";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "./constants";
import type { LibraryError, LibraryErrorCode } from "./errors";

export type HttpErrorCode =
  | "BAD_REQUEST"
  | "NOT_FOUND"
  | "CONFLICT"
  | "INTERNAL_ERROR";

const HTTP_BY_LIBRARY_CODE: Record<
  LibraryErrorCode,
  { status: number; code: HttpErrorCode }
> = {
  INVALID_INPUT: { status: 400, code: "BAD_REQUEST" },
  NOT_FOUND: { status: 404, code: "NOT_FOUND" },
  DUPLICATE_KEY: { status: 409, code: "CONFLICT" },
  CONSTRAINT_VIOLATION: { status: 409, code: "CONFLICT" },
};

export const sendFailure = (
  res: Response,
  status: number,
  code: HttpErrorCode,
  message: string
) => res.status(status).json({ ok: false, error: { code, message } });

export const badRequest = (res: Response, message: string) =>
  sendFailure(res, 400, "BAD_REQUEST", message);

export const internalError = (res: Response) =>
  sendFailure(res, 500, "INTERNAL_ERROR", "Something went wrong");

export const sendLibraryError = (res: Response, error: LibraryError) => {
  const { status, code } = HTTP_BY_LIBRARY_CODE[error.code];
  return sendFailure(res, status, code, error.message);
};

export const queryString = (value: unknown): string | undefined =>
  typeof value === "string" ? value : undefined;

const positiveIntOr = (value: string | undefined, fallback: number) => {
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
};

export const readPaging = (query: { page?: unknown; pageSize?: unknown }) => {
  const page = positiveIntOr(queryString(query.page), 1);
  const pageSize = Math.min(
    MAX_PAGE_SIZE,
    positiveIntOr(queryString(query.pageSize), DEFAULT_PAGE_SIZE)
  );
  return { page, pageSize, skip: (page - 1) * pageSize };
};

export const isOptionalString = (value: unknown): value is string | undefined =>
  value === undefined || typeof value === "string";

export const isInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value);

export const isOptionalInteger = (value: unknown): value is number | undefined =>
  value === undefined || isInteger(value);
