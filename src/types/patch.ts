import type { PatchOrderingPolicy } from '../architecture';

/**
 * One text substitution against a specific file snapshot.
 *
 * Offsets are UTF-16 code unit indices into the snapshot the instruction was
 * computed from (the same indices `String.prototype.slice` uses).
 *
 * - Insertion:   `startOffset === endOffset`
 * - Replacement: `startOffset < endOffset`
 *
 * @see {@link PatchOrderingPolicy}
 */
export type PatchInstruction = {
  readonly filePath: string;
  readonly startOffset: number;
  readonly endOffset: number;
  readonly replacementText: string;
};

/**
 * Outcome of applying one file's patch batch.
 */
export type PatchFileStatus =
  /**
   * The batch changed the text and the file was written once.
   */
  | 'written'

  /**
   * The batch produced the text already on disk; nothing was written.
   */
  | 'unchanged'

  /**
   * The batch was rejected (I/O or range failure); the file is untouched.
   */
  | 'failed';

export type PatchFileResult = {
  readonly filePath: string;
  readonly status: PatchFileStatus;
  readonly instructionCount: number;
  readonly error?: Error;
};
