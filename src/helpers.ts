export const equalFold = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

export const formatList = (items: readonly string[]) => `[${items.join(', ')}]`;

export const quote = (value: string | boolean) => `'${value}'`;

/**
 * Compares two lists as sets of strings. Neither input is reordered.
 */
export const sameMembers = (a: readonly string[], b: readonly string[]) => {
  if (a.length !== b.length) return false;
  const left = [...a].sort();
  const right = [...b].sort();
  return left.every((item, i) => item === right[i]);
};
