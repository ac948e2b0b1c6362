export {
  DEFAULT_GIT_TIMEOUT_MS,
  GitCommandError,
  LocalGitClient,
  type BranchSummary,
  type GitExecFn,
  type GitExecOptions,
  type LocalGitClientOptions,
} from './local-git.js';
export {
  parseWorkflows,
  summariseWorkflowsForPrompt,
  type WorkflowJob,
  type WorkflowSummary,
} from './workflow-parser.js';
