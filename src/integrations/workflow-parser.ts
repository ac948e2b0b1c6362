/**
 * GitHub Actions workflow parser
 *
 * Reads `.github/workflows/*.yml|*.yaml` from a local checkout so agents
 * can see which CI checks guard a repository.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { parse } from 'yaml';
import { silentLogger, type Logger } from '../utils/logger.js';

export interface WorkflowJob {
  name: string;
  stepsCount: number;
  runsOn: string;
}

export interface WorkflowSummary {
  name: string;
  /** Path relative to the repository root */
  file: string;
  triggers: string[];
  jobs: WorkflowJob[];
  /** `paths` filters of the push and pull_request triggers */
  pathFilters: string[];
}

const WORKFLOW_EXTENSIONS = new Set(['.yml', '.yaml']);

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function extractTriggers(on: unknown): string[] {
  if (typeof on === 'string') return [on];
  if (Array.isArray(on)) return on.map(String);
  if (isRecord(on)) return Object.keys(on);
  return [];
}

function extractPathFilters(on: unknown): string[] {
  if (!isRecord(on)) return [];

  const paths: string[] = [];
  for (const event of ['push', 'pull_request']) {
    const eventConfig = on[event];
    if (isRecord(eventConfig) && Array.isArray(eventConfig['paths'])) {
      paths.push(...eventConfig['paths'].map(String));
    }
  }
  return paths;
}

function formatRunsOn(value: unknown): string {
  if (typeof value === 'string') return value;
  if (Array.isArray(value)) return value.map(String).join(', ');
  return 'unknown';
}

function summariseWorkflow(file: string, data: Record<string, unknown>): WorkflowSummary {
  const on = data['on'];
  const name = typeof data['name'] === 'string' ? data['name'] : path.parse(file).name;

  const jobs: WorkflowJob[] = [];
  const jobDefs = data['jobs'];
  if (isRecord(jobDefs)) {
    for (const [jobId, job] of Object.entries(jobDefs)) {
      if (!isRecord(job)) continue;
      const steps = job['steps'];
      jobs.push({
        name: typeof job['name'] === 'string' ? job['name'] : jobId,
        stepsCount: Array.isArray(steps) ? steps.length : 0,
        runsOn: formatRunsOn(job['runs-on']),
      });
    }
  }

  return {
    name,
    file,
    triggers: extractTriggers(on),
    jobs,
    pathFilters: extractPathFilters(on),
  };
}

/**
 * Parse every workflow file under `repoDir`, in file-name order.
 * A missing workflows directory gives an empty list; a file that fails
 * to parse is logged and skipped.
 */
export async function parseWorkflows(
  repoDir: string,
  options: { logger?: Logger } = {}
): Promise<WorkflowSummary[]> {
  const logger = options.logger ?? silentLogger;
  const workflowsDir = path.join(repoDir, '.github', 'workflows');

  let entries: string[];
  try {
    entries = await fs.readdir(workflowsDir);
  } catch {
    logger.debug?.(`No .github/workflows directory in ${repoDir}`);
    return [];
  }

  const files = entries.filter((entry) => WORKFLOW_EXTENSIONS.has(path.extname(entry))).sort();

  const workflows: WorkflowSummary[] = [];
  for (const entry of files) {
    const relative = path.posix.join('.github', 'workflows', entry);
    try {
      const data: unknown = parse(await fs.readFile(path.join(workflowsDir, entry), 'utf-8'));
      if (!isRecord(data)) continue;
      workflows.push(summariseWorkflow(relative, data));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.warn(`Failed to parse workflow ${relative}: ${message}`);
    }
  }
  return workflows;
}

/**
 * Compact text block for prompts; empty string when there are no workflows.
 */
export function summariseWorkflowsForPrompt(workflows: WorkflowSummary[]): string {
  if (workflows.length === 0) {
    return '';
  }

  const lines = ['CI/CD Workflows:'];
  for (const workflow of workflows) {
    lines.push(`  - ${workflow.name} (${workflow.file})`);
    lines.push(`    Triggers: ${workflow.triggers.join(', ') || 'none'}`);
    if (workflow.pathFilters.length > 0) {
      lines.push(`    Path filters: ${workflow.pathFilters.join(', ')}`);
    }
    for (const job of workflow.jobs) {
      lines.push(`    Job: ${job.name} (${job.stepsCount} steps, runs-on: ${job.runsOn})`);
    }
  }
  return lines.join('\n');
}
