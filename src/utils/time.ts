/**
 * Epoch milliseconds -> ISO-8601 (UTC), the wire form of every timestamp
 */
export function toIsoTimestamp(timestamp: number): string {
  return new Date(timestamp).toISOString();
}
