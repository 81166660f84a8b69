import express from "express";
import { borrowBook, returnBook } from "../controller/loan.controller";

const router = express.Router();

router.post("/borrow", borrowBook);
router.post("/return", returnBook);

export const loanRoutes = router;
