export type IdPrefix = 'item' | 'mk' | 'line' | 'span';

export function generateId(prefix: IdPrefix): string {
  return `${prefix}_${crypto.randomUUID()}`;
}
