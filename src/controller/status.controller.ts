import type { Request, Response, NextFunction } from "express";
import { getLibrary } from "../db/library";
import { internalError } from "../utils/http";

export const healthCheck = (_req: Request, res: Response, next: NextFunction) => {
  try {
    res.json("working");
  } catch (e) {
    next(e);
  }
};

export const getStatus = (_req: Request, res: Response) => {
  try {
    return res.json({ ok: true, data: getLibrary().getStatus() });
  } catch (e) {
    console.error("getStatus failed:", e);
    return internalError(res);
  }
};
