/**
 * SSH Module
 */

export { SSHManager } from "./manager.js";
export type {
  SSHConfig,
  ChannelExecOptions,
  ChannelExecResult,
  CommandChannel,
  Transport,
} from "./types.js";
