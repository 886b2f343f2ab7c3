import type { PatchOrderingPolicy } from '../architecture';
import type { PatchFileResult, PatchInstruction } from '../types';

import { PatchIoError, PatchRangeError, toError } from '../errors';
import { type FileSystem, nodeFileSystem } from '../file-system';

export type ApplyPatchesOptions = {
  /**
   * @default nodeFileSystem
   */
  fileSystem?: FileSystem;
};

type IndexedInstruction = {
  readonly instruction: PatchInstruction;

  /**
   * Position in the batch; breaks ties between equal start offsets.
   */
  readonly index: number;
};

/**
 * Groups instructions by file, keeping first-seen file order.
 */
function groupByFile(
  instructions: readonly PatchInstruction[]
): Map<string, PatchInstruction[]> {
  const groups = new Map<string, PatchInstruction[]>();

  for (const instruction of instructions) {
    const group = groups.get(instruction.filePath);
    if (group) {
      group.push(instruction);
    } else {
      groups.set(instruction.filePath, [instruction]);
    }
  }

  return groups;
}

/**
 * Highest start offset first; ties in reverse batch order so texts inserted
 * at the same offset end up in batch order.
 */
function compareForApplication(a: IndexedInstruction, b: IndexedInstruction): number {
  return (
    b.instruction.startOffset - a.instruction.startOffset || b.index - a.index
  );
}

function describeRange(instruction: PatchInstruction): string {
  return `[${instruction.startOffset}, ${instruction.endOffset})`;
}

/**
 * Applies one file's batch to its text.
 *
 * Each range is validated against the current in-memory text right before
 * its splice. Because splices run from the end of the file backwards, the
 * text in front of `previousStart` is still the original snapshot.
 *
 * @throws {PatchRangeError} On an inverted, out-of-bounds or overlapping range.
 */
export function applyToText(
  text: string,
  filePath: string,
  instructions: readonly PatchInstruction[]
): string {
  const ordered = instructions
    .map((instruction, index) => ({ instruction, index }))
    .sort(compareForApplication);

  let current = text;
  let previousStart = Number.POSITIVE_INFINITY;

  for (const { instruction } of ordered) {
    const { startOffset, endOffset } = instruction;

    if (
      !Number.isInteger(startOffset) ||
      !Number.isInteger(endOffset) ||
      startOffset < 0 ||
      startOffset > endOffset
    ) {
      throw new PatchRangeError(
        `Invalid patch range ${describeRange(instruction)} for ${filePath}.`,
        filePath
      );
    }

    if (endOffset > current.length) {
      throw new PatchRangeError(
        `Patch range ${describeRange(instruction)} exceeds the length of ${filePath} (${current.length}).`,
        filePath
      );
    }

    if (endOffset > previousStart) {
      throw new PatchRangeError(
        `Patch range ${describeRange(instruction)} overlaps another patch of ${filePath} starting at ${previousStart}.`,
        filePath
      );
    }

    current =
      current.slice(0, startOffset) + instruction.replacementText + current.slice(endOffset);
    previousStart = startOffset;
  }

  return current;
}

async function applyFileBatch(
  filePath: string,
  batch: readonly PatchInstruction[],
  fileSystem: FileSystem
): Promise<PatchFileResult> {
  const instructionCount = batch.length;
  const failed = (error: Error): PatchFileResult => ({
    filePath,
    status: 'failed',
    instructionCount,
    error
  });

  let original: string;
  try {
    original = await fileSystem.readFile(filePath);
  } catch (error) {
    return failed(
      new PatchIoError(`Cannot read ${filePath}: ${toError(error).message}`, filePath, error)
    );
  }

  let patched: string;
  try {
    patched = applyToText(original, filePath, batch);
  } catch (error) {
    return failed(toError(error));
  }

  if (patched === original) {
    return { filePath, status: 'unchanged', instructionCount };
  }

  try {
    await fileSystem.writeFile(filePath, patched);
  } catch (error) {
    return failed(
      new PatchIoError(`Cannot write ${filePath}: ${toError(error).message}`, filePath, error)
    );
  }

  return { filePath, status: 'written', instructionCount };
}

/**
 * Applies patch instructions, one read-modify-write cycle per file
 * ({@link PatchOrderingPolicy}).
 *
 * A failing file (unreadable, unwritable, invalid range) is reported with
 * status `failed` and left untouched; other files are still patched.
 *
 * @returns One result per file, in first-seen file order.
 */
export async function applyPatches(
  instructions: readonly PatchInstruction[],
  options: ApplyPatchesOptions = {}
): Promise<PatchFileResult[]> {
  const fileSystem = options.fileSystem ?? nodeFileSystem;
  const groups = groupByFile(instructions);

  return Promise.all(
    [...groups].map(([filePath, batch]) => applyFileBatch(filePath, batch, fileSystem))
  );
}
