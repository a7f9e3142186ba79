export const normalizeWhitespace = (value: string): string => value.replace(/\s+/g, " ").trim();

export const uniqueInOrder = <T>(values: Iterable<T>): T[] => [...new Set(values)];
