/**
 * @stackwright/exec - Local command execution
 */

export {
  LocalExec,
  formatCommand,
  TIMEOUT_EXIT_CODE,
  SPAWN_FAILED_EXIT_CODE,
  type LocalExecOptions,
  type OutputListener,
} from './local-exec.js';
