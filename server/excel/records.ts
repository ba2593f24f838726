/**
 * Keys here come from worksheet cells and tab names, so `__proto__` and names such as
 * `toString` are ordinary entries. Writes go through `defineProperty` and lookups check
 * own properties only.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

export const hasEntry = (target: object, key: string): boolean => Object.hasOwn(target, key);
