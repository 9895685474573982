/**
 * @notiflux/core/control — barrel export
 */

export { controlCommandSchema, parseControlRequest } from './types.js';
export type {
  ControlCommand,
  ControlCommandInput,
  ControlCommandName,
  ControlState,
  ControlResult,
  ControlErrorBody,
  ControlResponse,
} from './types.js';
export {
  sendControlCommand,
  runControlCommand,
  ControlUnreachableError,
  ControlExitCode,
  DEFAULT_CONTROL_TIMEOUT_MS,
} from './client.js';
export type { ControlReply, ControlClientOptions } from './client.js';
