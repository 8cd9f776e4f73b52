/**
 * Promise-based delay function type.
 * Injected into retry logic so tests can skip the wait.
 */
export type DelayFn = (ms: number) => Promise<void>;
