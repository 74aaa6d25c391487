// Assignment Kernel - natural ordering of identifiers
//
// Hole and box ids mix text and numbers ("Hole-2", "Hole-10"). A natural key
// splits an id into alternating runs: text, number, text, ... and always starts
// with a text run (possibly empty), so run i of two keys has the same kind.

export type NaturalKey = ReadonlyArray<string | number>;

const DIGIT_RUN = /(\d+)/;

export function naturalKey(id: string): NaturalKey {
  // split() with a capture group keeps the digit runs at odd indexes.
  return id.split(DIGIT_RUN).map((part, i) => (i % 2 === 1 ? Number(part) : part));
}

/**
 * Compares two natural keys run by run. Numeric runs compare by value, text
 * runs by code unit; a key that is a prefix of the other sorts first.
 */
export function compareNaturalKeys(a: NaturalKey, b: NaturalKey): number {
  const n = Math.min(a.length, b.length);
  for (let i = 0; i < n; i++) {
    const x = a[i];
    const y = b[i];
    if (x === y) continue;

    if (typeof x === "number" && typeof y === "number") return x < y ? -1 : 1;

    const xs = String(x);
    const ys = String(y);
    if (xs !== ys) return xs < ys ? -1 : 1;
  }
  return a.length - b.length;
}

export function compareNatural(a: string, b: string): number {
  return compareNaturalKeys(naturalKey(a), naturalKey(b));
}

/**
 * Returns a new, naturally sorted copy.
 */
export function naturalSort(ids: Iterable<string>): string[] {
  return [...ids].sort(compareNatural);
}
