/**
 * Async utilities
 */

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise<void>((r) => setTimeout(r, ms));
