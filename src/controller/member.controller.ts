import type { Request, Response } from "express";
import { getLibrary } from "../db/library";
import type { MemberUpdate } from "../types/member";
import {
  badRequest,
  internalError,
  isOptionalString,
  sendLibraryError,
} from "../utils/http";

type MemberParams = { memberId: string };

type AddMemberBody = { memberId?: unknown; name?: unknown; email?: unknown };
type UpdateMemberBody = { name?: unknown; email?: unknown };

export const listMembers = (_req: Request, res: Response) => {
  try {
    return res.json({ ok: true, data: getLibrary().listMembers() });
  } catch (e) {
    console.error("listMembers failed:", e);
    return internalError(res);
  }
};

export const addMember = (
  req: Request<Record<string, string>, unknown, AddMemberBody>,
  res: Response
) => {
  try {
    const { memberId, name, email } = req.body ?? {};

    if (
      typeof memberId !== "string" ||
      typeof name !== "string" ||
      typeof email !== "string"
    ) {
      return badRequest(res, "memberId, name and email are required strings");
    }

    const result = getLibrary().addMember({ memberId, name, email });
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("addMember failed:", e);
    return internalError(res);
  }
};

export const findMember = (req: Request<MemberParams>, res: Response) => {
  try {
    const result = getLibrary().findMember(req.params.memberId);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("findMember failed:", e);
    return internalError(res);
  }
};

export const updateMember = (
  req: Request<MemberParams, unknown, UpdateMemberBody>,
  res: Response
) => {
  try {
    const { name, email } = req.body ?? {};

    if (!isOptionalString(name) || !isOptionalString(email)) {
      return badRequest(res, "name and email must be strings");
    }

    const changes: MemberUpdate = { name, email };
    const result = getLibrary().updateMember(req.params.memberId, changes);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("updateMember failed:", e);
    return internalError(res);
  }
};

export const removeMember = (req: Request<MemberParams>, res: Response) => {
  try {
    const result = getLibrary().removeMember(req.params.memberId);
    if (!result.ok) return sendLibraryError(res, result.error);

    return res.json({ ok: true, data: result.data });
  } catch (e) {
    console.error("removeMember failed:", e);
    return internalError(res);
  }
};
