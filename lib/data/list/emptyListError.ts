/**
 * Empty list error definitions.
 *
 * This module defines the error raised when an operation needs a non-empty
 * list and is handed the empty one.
 *
 * @module
 */
export class EmptyListError extends Error {}
