export { Converger } from "./converger.js";
export { OutcomeStatus } from "./types.js";
export type { ResourceOutcome } from "./types.js";
