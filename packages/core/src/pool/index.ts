export { ChannelPool, DEFAULT_MAX_SESSIONS } from "./channel-pool.js";
export type { ChannelPoolOptions } from "./channel-pool.js";
