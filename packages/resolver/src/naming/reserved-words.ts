/**
 * Reserved identifiers of the generated target language
 */

import { createRequire } from "module";

const require = createRequire(import.meta.url);
const words: unknown = require("./reserved-words.json");

const isStringArray = (value: unknown): value is readonly string[] =>
  Array.isArray(value) && value.every((item) => typeof item === "string");

if (!isStringArray(words)) {
  throw new Error("reserved-words.json must be an array of strings");
}

export const RESERVED_WORDS: ReadonlySet<string> = new Set(words);
