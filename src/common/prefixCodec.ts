/*
 * Classification prefixes ("ToK" codes) are embedded at the start of a
 * filename as single alphanumeric characters each followed by one space:
 *
 *   "A B 3 annual report.pdf"  ->  code "AB3", base "annual report.pdf"
 *
 * At least two such pairs are required; anything shorter is a bare file.
 */

const PREFIX_PATTERN = /^(?:[a-zA-Z0-9] ){2,}/;
const CODE_CHARACTER = /^[a-zA-Z0-9]$/;

export interface ParsedFilename {
  /** Matched run with trailing whitespace trimmed, e.g. `"A B 3"`; null for bare files. */
  prefix: string | null;
  /** Prefix characters without separators, e.g. `"AB3"`; empty for bare files. */
  code: string;
  /** Filename with the prefix removed and leading whitespace trimmed. */
  baseFilename: string;
}

export const parsePrefix = (filename: string): string | null => {
  const match = PREFIX_PATTERN.exec(filename);
  return match ? match[0].trimEnd() : null;
};

export const prefixToCode = (prefix: string) => prefix.replace(/\s+/g, '');

export const parseFilename = (filename: string): ParsedFilename => {
  const prefix = parsePrefix(filename);
  if (!prefix) {
    return { prefix: null, code: '', baseFilename: filename };
  }
  return {
    prefix,
    code: prefixToCode(prefix),
    baseFilename: filename.slice(prefix.length).trim(),
  };
};

export const isBareFilename = (filename: string) => parsePrefix(filename) === null;

export const isCodeCharacter = (character: string) => CODE_CHARACTER.test(character);

/** `"AB3"` -> `"A B 3 "`; concatenate directly in front of the base filename. */
export const formatPrefix = (code: string): string =>
  Array.from(code)
    .map((character) => `${character} `)
    .join('');

export const buildPrefixedFilename = (code: string, baseFilename: string) =>
  `${formatPrefix(code)}${baseFilename}`;
