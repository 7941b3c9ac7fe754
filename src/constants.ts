// Returned by malloc when no single free block is large enough.
export const MALLOC_FAILED = -1;

export const DEFAULT_EVENT_LIMIT = 1000;

export const FREE_EMPTY_MESSAGE = 'index must be between 0 and size';
