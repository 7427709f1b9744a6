export type {
  StepName,
  StepStatus,
  StepRecord,
  RunKind,
  Outcome,
  DeploymentRun,
  HealthProbeResult,
} from './deployment.js';

export type { CommandResult, ExecOptions, CommandRunner } from './exec.js';
