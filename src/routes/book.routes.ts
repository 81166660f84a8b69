import express from "express";
import {
  addBook,
  getBook,
  removeBook,
  searchBooks,
  updateBook,
} from "../controller/book.controller";

const router = express.Router();

router.get("/", searchBooks);
router.post("/", addBook);
router.get("/:isbn", getBook);
router.patch("/:isbn", updateBook);
router.delete("/:isbn", removeBook);

export const bookRoutes = router;
