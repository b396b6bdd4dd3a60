/**
 * Append to a list kept at most `cap` long, evicting from the front.
 * Returns the evicted items, oldest first.
 */
export function appendCapped<T>(list: T[], item: T, cap: number): T[] {
  list.push(item);
  const overflow = list.length - cap;
  return overflow > 0 ? list.splice(0, overflow) : [];
}

/**
 * Append a value to a keyed bucket whose lists are each capped
 */
export function appendToBucket(
  buckets: Record<string, number[]>,
  key: string | number,
  value: number,
  cap: number
): void {
  const bucketKey = String(key);
  if (!buckets[bucketKey]) {
    buckets[bucketKey] = [];
  }
  appendCapped(buckets[bucketKey], value, cap);
}
