import { Library } from "../service/library.service";

// Process-wide catalogue. Tests swap in a fresh instance with setLibrary().
let current = new Library();

export function getLibrary(): Library {
  return current;
}

export function setLibrary(library: Library): Library {
  current = library;
  return current;
}
