/**
 * @stackwright/feature-deployment
 *
 * Deploy and update sequencers over a compose-managed service stack.
 */

export { DeploySequencer } from './deploy.service.js';
export { UpdateSequencer } from './update.service.js';
export type { UpdateSequencerDeps } from './update.service.js';
export { Sequencer, STEP_MESSAGES } from './sequencer.js';
export type { StepResult } from './sequencer.js';

export { ComposeOrchestrator } from './compose.service.js';
export type { ComposeOptions } from './compose.service.js';
export { FsWorkspace } from './workspace.service.js';
export { FileLock, isProcessAlive } from './lock.js';
export type { FileLockOptions } from './lock.js';
export { BackupService, formatBackupTimestamp } from './backup.service.js';
export type { BackupOptions } from './backup.service.js';
export { SourceService } from './source.service.js';
export type { SourceOptions } from './source.service.js';

export type {
  Orchestrator,
  Workspace,
  RunLock,
  LoggerLike,
  ProgressReporter,
  SequencerDeps,
  VerificationResult,
} from './types.js';
