import type { ClassificationEntry, ClassificationNode } from '../types/classification';

export const compareClassificationCodes = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

export const sortClassificationEntries = (entries: readonly ClassificationEntry[]): ClassificationEntry[] =>
  [...entries].sort((a, b) => compareClassificationCodes(a.code, b.code));

export const parentCodeOf = (code: string): string | null => (code.length > 1 ? code.slice(0, -1) : null);

/**
 * Rebuilds the classification forest from the flat entry list. A node hangs
 * under the code one character shorter when that code exists; otherwise it is
 * a root. Entries are placed in ascending code order, and a proper prefix
 * always sorts before the codes it prefixes, so parents are placed first.
 */
export const buildClassificationTree = (entries: readonly ClassificationEntry[]): ClassificationNode[] => {
  const roots: ClassificationNode[] = [];
  const placed = new Map<string, ClassificationNode>();

  for (const entry of sortClassificationEntries(entries)) {
    const parentCode = parentCodeOf(entry.code);
    const parent = parentCode !== null ? placed.get(parentCode) : undefined;
    const node: ClassificationNode = {
      code: entry.code,
      label: entry.label,
      parentCode: parent ? parent.code : null,
      depth: parent ? parent.depth + 1 : 0,
      children: [],
    };
    if (parent) {
      parent.children.push(node);
    } else {
      roots.push(node);
    }
    placed.set(entry.code, node);
  }

  return roots;
};

export const dfsOrder = (forest: readonly ClassificationNode[]): ClassificationNode[] => {
  const result: ClassificationNode[] = [];
  const visit = (node: ClassificationNode) => {
    result.push(node);
    node.children.forEach(visit);
  };
  forest.forEach(visit);
  return result;
};

export const findClassificationNode = (
  forest: readonly ClassificationNode[],
  code: string,
): ClassificationNode | undefined => dfsOrder(forest).find((node) => node.code === code);

/** Labels from the root down to `code`, e.g. `["Science", "Physics", "Optics"]`. */
export const classificationPath = (forest: readonly ClassificationNode[], code: string): string[] => {
  const byCode = new Map(dfsOrder(forest).map((node) => [node.code, node]));
  const labels: string[] = [];
  let current = byCode.get(code);
  while (current) {
    labels.unshift(current.label);
    current = current.parentCode !== null ? byCode.get(current.parentCode) : undefined;
  }
  return labels;
};

export const formatClassificationTree = (forest: readonly ClassificationNode[]): string =>
  dfsOrder(forest)
    .map((node) => `${'  '.repeat(node.depth)}${node.code}  ${node.label}`)
    .join('\n');
