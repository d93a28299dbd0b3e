/**
 * Receives an undo step for every write made to journaled state. The host
 * replays the steps in reverse when a frame fails.
 */
export interface WriteJournal {
  record(undo: () => void): void;
}

/**
 * State that takes part in host frames
 */
export interface Journaled {
  attachJournal(journal: WriteJournal): void;
}

/**
 * Moves native value attached to a call. Resolves false when `from` cannot
 * cover `amount`.
 */
export interface ValueCarrier {
  moveNative(from: string, to: string, amount: bigint): boolean;
}
