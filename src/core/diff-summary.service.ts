import { WorkingCopyService } from './working-copy.service';
import { errorMessage } from '../errors/base.error';
import { DiffPreview, SyncTarget } from '../types/sync.types';
import { FULL_DIFF_LINE_LIMIT } from '../types/config.types';

export interface NumstatTotals {
  fileCount: number;
  insertions: number;
  deletions: number;
}

/**
 * Sum `git diff --numstat` output. Binary files count as changed files with
 * no line counts.
 */
export function parseNumstat(output: string): NumstatTotals {
  const totals: NumstatTotals = { fileCount: 0, insertions: 0, deletions: 0 };

  for (const line of output.split('\n')) {
    const match = /^(\d+|-)\t(\d+|-)\t.+$/.exec(line.trim());
    if (!match) {
      continue;
    }
    totals.fileCount++;
    totals.insertions += match[1] === '-' ? 0 : Number(match[1]);
    totals.deletions += match[2] === '-' ? 0 : Number(match[2]);
  }

  return totals;
}

/**
 * Builds the preview shown before the confirmation gate.
 *
 * The target is mirrored into the working copy and staged so git can compute
 * the stat; the orchestrator's cleanup path discards it if the push does not go
 * ahead. Failures never propagate: the caller proceeds without a preview.
 */
export class DiffSummaryService {
  public async summarize(
    workingCopy: WorkingCopyService,
    target: SyncTarget,
    onError?: (message: string) => void,
  ): Promise<DiffPreview | undefined> {
    try {
      await workingCopy.mirrorInto(target.localSourcePath, target.repoRelativePath);
      await workingCopy.stagePath(target.repoRelativePath);

      const stat = (await workingCopy.diffStaged(target.repoRelativePath, 'stat')).trimEnd();
      const totals = parseNumstat(await workingCopy.diffStaged(target.repoRelativePath, 'numstat'));

      const preview: DiffPreview = { stat, ...totals };
      if (totals.fileCount === 1 && totals.insertions + totals.deletions <= FULL_DIFF_LINE_LIMIT) {
        preview.fullDiff = await workingCopy.diffStaged(target.repoRelativePath, 'patch');
      }
      return preview;
    } catch (error) {
      onError?.(errorMessage(error));
      return undefined;
    }
  }
}
