import type { PatchFileResult, PatchFileStatus } from '../types';

export type PatchSummaryOptions = {
  /**
   * Maximum number of failed files listed in the preview.
   * @default 5
   */
  maxPreviewFiles?: number;
};

const STATUS_ORDER: readonly PatchFileStatus[] = ['written', 'unchanged', 'failed'];

/**
 * Counts results by status, in a fixed order, skipping empty buckets
 * (e.g. "written=2, failed=1").
 */
function formatStatusDistribution(results: readonly PatchFileResult[]): string {
  const countByStatus = new Map<PatchFileStatus, number>();

  for (const result of results) {
    countByStatus.set(result.status, (countByStatus.get(result.status) ?? 0) + 1);
  }

  return STATUS_ORDER.flatMap(status => {
    const count = countByStatus.get(status);
    return count ? [`${status}=${count}`] : [];
  }).join(', ');
}

/**
 * Lists failed files with their error name, truncated to `limit` entries.
 *
 * @returns Undefined if nothing failed or the preview is disabled.
 */
function formatFailurePreview(
  results: readonly PatchFileResult[],
  limit: number
): string | undefined {
  const failures = results.filter(result => result.status === 'failed');
  if (failures.length === 0 || limit <= 0) return undefined;

  const items = failures.slice(0, limit).map(
    result => `"${result.filePath}" (${result.error?.name ?? 'Error'})`
  );

  if (failures.length > limit) {
    items.push(`… (${failures.length - limit} more)`);
  }

  return `preview: ${items.join(', ')}`;
}

/**
 * Formats a one-line summary of a patch run.
 *
 * @returns e.g. `Summary: patched files written=2, failed=1; preview: "src/a.js" (PatchRangeError)`;
 *          undefined when there were no patches.
 */
export function formatPatchSummary(
  results: readonly PatchFileResult[],
  options: PatchSummaryOptions = {}
): string | undefined {
  if (results.length === 0) return undefined;

  const parts = [`Summary: patched files ${formatStatusDistribution(results)}`];

  const preview = formatFailurePreview(results, options.maxPreviewFiles ?? 5);
  if (preview) parts.push(preview);

  return parts.join('; ');
}
