import { logger } from './logger.service';
import { SyncProgressReporter, SyncStage } from '../types/sync.types';

const STAGE_LABELS: Record<SyncStage, string> = {
  'verify-privacy': 'Privacy',
  'prepare-repository': 'Repository',
  'detect-changes': 'Changes',
  preview: 'Preview',
  confirm: 'Confirm',
  branch: 'Branch',
  stage: 'Stage',
  commit: 'Commit',
  push: 'Push',
  cleanup: 'Cleanup',
  copy: 'Copy',
};

/**
 * Progress reporter that renders orchestrator stages through the logger
 */
export class ConsoleProgressReporter implements SyncProgressReporter {
  public stage(stage: SyncStage, message: string): void {
    logger.stage(`${STAGE_LABELS[stage]}: ${message}`);
  }

  public info(message: string): void {
    logger.info(message);
  }

  public warn(message: string): void {
    logger.warn(message);
  }
}
