/**
 * Branch Size
 *
 * Current size of a branch: the blobs of the recursive tree at its head
 * commit. Not windowed.
 */

import type { MetricContext } from './shared.js';

export interface BranchSize {
  sizeBytes: number;
  fileCount: number;
}

export async function measureBranch(ctx: MetricContext, branch: string): Promise<BranchSize> {
  const sha = await ctx.api.getBranchHead(ctx.ref, branch);
  const entries = await ctx.api.listTree(ctx.ref, sha, true);

  let sizeBytes = 0;
  let fileCount = 0;
  for (const entry of entries) {
    if (entry.type !== 'blob') continue;
    sizeBytes += entry.size ?? 0;
    fileCount++;
  }
  return { sizeBytes, fileCount };
}

export function bytesToMegabytes(bytes: number): number {
  return bytes / (1024 * 1024);
}
