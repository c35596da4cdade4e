import { isCodeCharacter } from '../common/prefixCodec';
import { NotFoundError, ValidationError } from '../common/errors';
import type { ClassificationEntry } from '../types/classification';
import { sortClassificationEntries } from './tokHierarchy';

/**
 * Accepts a code typed with or without separating spaces (`"A B 3"` or
 * `"AB3"`) and returns it without separators.
 */
export const normaliseClassificationCode = (raw: string): string => {
  const code = raw.replace(/\s+/g, '');
  if (!code) {
    throw new ValidationError('Classification code cannot be empty');
  }
  const invalid = Array.from(code).find((character) => !isCodeCharacter(character));
  if (invalid !== undefined) {
    throw new ValidationError(
      `Classification code "${raw.trim()}" must contain only letters, digits and spaces (found "${invalid}")`,
    );
  }
  return code;
};

const normaliseLabel = (raw: string) => {
  const label = raw.trim();
  if (!label) {
    throw new ValidationError('Classification label cannot be empty');
  }
  return label;
};

const assertCodeAvailable = (entries: readonly ClassificationEntry[], code: string, ignoreCode?: string) => {
  if (entries.some((entry) => entry.code === code && entry.code !== ignoreCode)) {
    throw new ValidationError(`Classification code "${code}" already exists`);
  }
};

export const addClassificationEntry = (
  entries: readonly ClassificationEntry[],
  rawCode: string,
  rawLabel: string,
): ClassificationEntry[] => {
  const code = normaliseClassificationCode(rawCode);
  const label = normaliseLabel(rawLabel);
  assertCodeAvailable(entries, code);
  return sortClassificationEntries([...entries, { code, label }]);
};

/**
 * Replaces the entry whose code was `originalCode` when the edit started. The
 * original code is the identifier; labels may repeat and are never matched.
 */
export const updateClassificationEntry = (
  entries: readonly ClassificationEntry[],
  originalCode: string,
  rawCode: string,
  rawLabel: string,
): ClassificationEntry[] => {
  const index = entries.findIndex((entry) => entry.code === originalCode);
  if (index < 0) {
    throw new NotFoundError(`Classification code "${originalCode}" not found`);
  }
  const code = normaliseClassificationCode(rawCode);
  const label = normaliseLabel(rawLabel);
  assertCodeAvailable(entries, code, originalCode);
  const next = [...entries];
  next[index] = { code, label };
  return sortClassificationEntries(next);
};

export const deleteClassificationEntry = (
  entries: readonly ClassificationEntry[],
  code: string,
): { entries: ClassificationEntry[]; removed: ClassificationEntry } => {
  const removed = entries.find((entry) => entry.code === code);
  if (!removed) {
    throw new NotFoundError(`Classification code "${code}" not found`);
  }
  return { entries: sortClassificationEntries(entries.filter((entry) => entry !== removed)), removed };
};
