export class IncompatibleActionsError extends Error {}

export class UnhandledActionError extends Error {}

export class ContextExpiredError extends Error {}

export class StoreClosedError extends Error {}

export const EXPIRED_MESSAGE = 'Context used after its store was closed';
export const DETACHED_MESSAGE = 'Context has no event loop';
export const CLOSED_MESSAGE = 'Store is closed';
