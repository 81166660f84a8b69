import { GENRES } from "../utils/constants";

export type Genre = (typeof GENRES)[number];

export type Book = {
  isbn: string;
  title: string;
  author: string;
  genre: Genre;
  totalCopies: number;
  availableCopies: number;
};

export type BookInput = {
  isbn: string;
  title: string;
  author: string;
  genre: string;
  copies: number;
};

export type BookUpdate = {
  title?: string;
  author?: string;
  genre?: string;
  totalCopies?: number;
};
