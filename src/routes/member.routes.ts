import express from "express";
import {
  addMember,
  findMember,
  listMembers,
  removeMember,
  updateMember,
} from "../controller/member.controller";

const router = express.Router();

router.get("/", listMembers);
router.post("/", addMember);
router.get("/:memberId", findMember);
router.patch("/:memberId", updateMember);
router.delete("/:memberId", removeMember);

export const memberRoutes = router;
