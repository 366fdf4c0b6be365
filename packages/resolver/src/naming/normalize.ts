/**
 * Identifier Normalizer
 *
 * Turns raw schema identifiers into a lower-camel member form and an
 * upper-camel type form. Results are memoized per raw identifier for the
 * lifetime of a run: package paths for shared ancestors are recomputed many
 * times and must come out byte-identical each time.
 */

import { RESERVED_WORDS } from "./reserved-words.js";

export type NormalizedName = {
  readonly member: string;
  readonly type: string;
};

export type NamingState = {
  readonly cache: Map<string, NormalizedName>;
  readonly reserved: ReadonlySet<string>;
};

const SEPARATORS: ReadonlySet<string> = new Set(["-", ".", "_"]);

/** Appended to reserved member forms, prepended to digit-leading ones */
export const ESCAPE_MARKER = "_";
/** Replaces the escape marker in the type form */
export const TYPE_ESCAPE_PREFIX = "J";

const EMPTY_NAME: NormalizedName = Object.freeze({ member: "", type: "" });

export const createNamingState = (
  extraReserved: Iterable<string> = []
): NamingState => ({
  cache: new Map(),
  reserved: new Set([...RESERVED_WORDS, ...extraReserved]),
});

const upperFirst = (s: string): string =>
  s.charAt(0).toUpperCase() + s.slice(1);

const lowerFirst = (s: string): string =>
  s.charAt(0).toLowerCase() + s.slice(1);

/**
 * Drop each separator and upper-case the character after it. The character
 * after a separator is always consumed, so `a--b` keeps one hyphen; a
 * trailing separator stays.
 */
const joinSeparated = (raw: string): string => {
  let joined = "";
  for (let i = 0; i < raw.length; i++) {
    const ch = raw.charAt(i);
    if (SEPARATORS.has(ch) && i + 1 < raw.length) {
      joined += raw.charAt(i + 1).toUpperCase();
      i++;
    } else {
      joined += ch;
    }
  }
  return joined;
};

const computeName = (
  raw: string,
  reserved: ReadonlySet<string>
): NormalizedName => {
  // single characters keep their case
  const base = raw.length === 1 ? raw : lowerFirst(joinSeparated(raw));

  if (reserved.has(base)) {
    return {
      member: `${base}${ESCAPE_MARKER}`,
      type: `${TYPE_ESCAPE_PREFIX}${upperFirst(base)}`,
    };
  }
  if (/^[0-9]/.test(base)) {
    return {
      member: `${ESCAPE_MARKER}${base}`,
      type: `${TYPE_ESCAPE_PREFIX}${base}`,
    };
  }
  return { member: base, type: upperFirst(base) };
};

/**
 * Normalize a raw identifier. An absent identifier (argument-less
 * statements) yields empty forms and is not cached.
 */
export const normalizeIdentifier = (
  state: NamingState,
  raw: string | undefined
): NormalizedName => {
  if (raw === undefined) return EMPTY_NAME;

  const cached = state.cache.get(raw);
  if (cached) return cached;

  const name = Object.freeze(computeName(raw, state.reserved));
  state.cache.set(raw, name);
  return name;
};
