/**
 * Exhaustiveness guard for switches over closed unions
 */

/**
 * Fail on a value the type system says cannot occur
 * @param value - Value that slipped past every case
 * @throws {Error} Always
 */
export function assertNever(value: never): never {
  throw new Error("Unhandled value: " + String(value));
}
