import express from "express";
import { getStatus, healthCheck } from "../controller/status.controller";
import { bookRoutes } from "./book.routes";
import { loanRoutes } from "./loan.routes";
import { memberRoutes } from "./member.routes";

const router = express.Router();

router.use("/books", bookRoutes);
router.use("/members", memberRoutes);
router.use("/loans", loanRoutes);
router.get("/health", healthCheck);
router.get("/status", getStatus);

export const libraryRoutes = router;
