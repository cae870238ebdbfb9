/**
 * External collaborators stages drive: the system shell and the advisor.
 */

export {
  ProcessShellRunner,
  DryRunShellRunner,
  isSuccess,
  EXIT_DISPATCH_FAILURE,
  EXIT_TIMEOUT,
  type CommandResult,
  type RunOptions,
  type ShellRunner,
} from "./shell.js";
export {
  ModelAdvisor,
  DryRunAdvisor,
  createAnthropicGenerator,
  extractCodeBlock,
  type Advisor,
  type AdviceRequest,
  type GenerationRequest,
  type TextGenerator,
} from "./advisor.js";
