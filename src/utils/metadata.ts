import { z } from 'zod';
import type { Metadata } from '../types/marking';

export const MetadataSchema = z.record(z.union([z.string(), z.number(), z.boolean(), z.null()]));

/**
 * True when `metadata` is non-empty and holds every key of `partial` with an
 * identical value. An empty `partial` matches every item that has metadata.
 */
export function matchesMetadata(metadata: Metadata, partial: Metadata): boolean {
  if (Object.keys(metadata).length === 0) return false;
  return Object.entries(partial).every(
    ([key, value]) => Object.prototype.hasOwnProperty.call(metadata, key) && metadata[key] === value
  );
}

/** Order-independent key for a metadata mapping */
export function metadataKey(metadata: Metadata): string {
  const entries = Object.entries(metadata).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
  return JSON.stringify(entries);
}
