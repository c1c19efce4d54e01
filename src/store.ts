export const NO_MEMORIES = 'No memories found yet.';

export interface IMemoryStore {
  /** Location of the backing log, for diagnostics. */
  readonly location: string;
  append(text: string): void;
  readAll(): string;
}
