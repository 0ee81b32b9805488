/**
 * Names greeted when none are given on the command line.
 */
export const DEFAULT_NAMES: readonly string[] = Object.freeze(['Alice', 'Bob', 'Charlie']);

/**
 * Build the greeting for a single name.
 *
 * The name is substituted verbatim, so `greet('')` is `"Hello, !"`.
 */
export function greet(name: string): string {
  return `Hello, ${name}!`;
}
