/**
 * ID generators for action specs and store instances.
 */

let specIdCounter = 0;

/**
 * Generates a unique action name.
 * Pattern: `action-${autoIncrementId}`
 */
export function generateActionName(): string {
  return `action-${++specIdCounter}`;
}

let storeIdCounter = 0;

/**
 * Generates a unique store name.
 * Pattern: `store-${autoIncrementId}`
 */
export function generateStoreName(): string {
  return `store-${++storeIdCounter}`;
}

/**
 * Reset all counters. Only use in tests.
 * @internal
 */
export function resetGenerators(): void {
  specIdCounter = 0;
  storeIdCounter = 0;
}
