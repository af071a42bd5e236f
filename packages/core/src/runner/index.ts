export { runCommand } from "./command-runner.js";
export type { CommandOutput } from "./command-runner.js";
