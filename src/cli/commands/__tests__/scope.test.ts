/**
 * Tests for the scope command
 *
 * Diff-file mode reads a patch from disk; git mode runs against a stubbed
 * git in a temp directory that holds a CI workflow.
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createScopeCommand } from '../scope.js';
import { formatScopeComment, ScopeReportSchema } from '../../../agents/index.js';
import { MalformedOutputError, ValidationError } from '../../../errors/index.js';
import { PARSE_FAILURE_MESSAGE } from '../../../llm/json.js';
import { createMockContext, createTestApp, runCommand, withGitStub, type TestApp } from './setup.js';

const NO_ENTITIES = '{"entities": []}';

const REPORT = {
  alignment_score: 0.6,
  violations: [
    {
      violation_type: 'unapproved_dependency',
      file: 'src/settle.ts',
      description: 'Adds a message queue the design does not mention',
      severity: 'critical',
    },
  ],
  summary: 'Mostly aligned.',
  requires_tpm_approval: true,
};

const WORKFLOW = `name: CI
on:
  pull_request:
    paths: ['src/**']
jobs:
  test:
    runs-on: ubuntu-latest
    steps:
      - run: npm test
`;

describe('createScopeCommand', () => {
  let tempDir: string;
  let patchPath: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'warden-scope-'));
    patchPath = join(tempDir, 'change.patch');
    writeFileSync(patchPath, '+await queue.publish(refund)\n');
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  async function createIndexedApp(replies: string[]): Promise<TestApp> {
    const testApp = createTestApp([NO_ENTITIES, ...replies]);
    await testApp.app.graph.addProject('ledger', 'Ledger');
    await testApp.app.pipeline.indexDocument({
      docId: 'ledger/design',
      projectId: 'ledger',
      title: 'Ledger design',
      docType: 'technical_design',
      content: 'Refunds settle nightly through the ledger batch job.',
    });
    return testApp;
  }

  describe('with --diff-file', () => {
    let testApp: TestApp;

    afterEach(() => {
      testApp.app.close();
    });

    it('prints the review comment', async () => {
      testApp = await createIndexedApp([JSON.stringify(REPORT)]);
      const { ctx, logs } = createMockContext();

      await runCommand(createScopeCommand(() => ctx, testApp.openApp), [
        'scope',
        '--project',
        'ledger',
        '--key',
        'acme-ledger',
        '--diff-file',
        patchPath,
        '--title',
        'Queue refunds',
      ]);

      expect(logs).toEqual([formatScopeComment(ScopeReportSchema.parse(REPORT)).trimEnd()]);
      const prompt = testApp.completion.promptAt(1);
      expect(prompt).toContain('Refunds settle nightly through the ledger batch job.');
      expect(prompt).toContain('Change under review: patch change.patch in acme-ledger');
      expect(prompt).toContain('Title: Queue refunds');
      expect(prompt).toContain('Description:\n(none)');
      expect(prompt).toContain('+await queue.publish(refund)');
    });

    it('prints the report as JSON with --json', async () => {
      testApp = await createIndexedApp([JSON.stringify(REPORT)]);
      const { ctx } = createMockContext({ json: true });
      const consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});

      await runCommand(createScopeCommand(() => ctx, testApp.openApp), [
        'scope',
        '-p',
        'ledger',
        '--diff-file',
        patchPath,
      ]);

      expect(JSON.parse(String(consoleLogSpy.mock.calls[0]?.[0]))).toEqual(REPORT);
      consoleLogSpy.mockRestore();
    });

    it('fails when the model answers without JSON', async () => {
      testApp = await createIndexedApp(['I think it looks fine']);
      const cmd = createScopeCommand(() => createMockContext().ctx, testApp.openApp);

      const run = runCommand(cmd, ['scope', '-p', 'ledger', '--diff-file', patchPath]);

      await expect(run).rejects.toThrow(MalformedOutputError);
      await expect(run).rejects.toThrow(PARSE_FAILURE_MESSAGE);
    });
  });

  describe('with git', () => {
    let testApp: TestApp;

    beforeEach(() => {
      mkdirSync(join(tempDir, '.github', 'workflows'), { recursive: true });
      writeFileSync(join(tempDir, '.github', 'workflows', 'ci.yml'), WORKFLOW);
    });

    afterEach(() => {
      testApp.app.close();
    });

    it('compares the current branch with the default branch', async () => {
      testApp = await createIndexedApp([JSON.stringify(REPORT)]);
      const openApp = withGitStub(testApp, {
        'branch --list main master': '  main\n',
        'rev-parse --abbrev-ref HEAD': 'feature/refunds\n',
        'diff main..feature/refunds': '+settleNightly()\n',
        'log --format=%s --max-count=50 main..feature/refunds': 'Add nightly settlement\nWire job\n',
      });
      const { ctx } = createMockContext();

      await runCommand(createScopeCommand(() => ctx, openApp), [
        'scope',
        '-p',
        'ledger',
        '--repo',
        tempDir,
        '--key',
        'acme-ledger',
      ]);

      const prompt = testApp.completion.promptAt(1);
      expect(prompt).toContain('Change under review: branch feature/refunds → main in acme-ledger');
      expect(prompt).toContain('Title: Add nightly settlement');
      expect(prompt).toContain('Description:\nAdd nightly settlement\nWire job\n\nCI/CD Workflows:\n  - CI (.github/workflows/ci.yml)');
      expect(prompt).toContain('+settleNightly()');
    });

    it('refuses to compare a branch with itself', async () => {
      testApp = createTestApp();
      const openApp = withGitStub(testApp, {});
      const cmd = createScopeCommand(() => createMockContext().ctx, openApp);

      await expect(
        runCommand(cmd, ['scope', '-p', 'ledger', '--repo', tempDir, '--base', 'main', '--head', 'main'])
      ).rejects.toThrow(ValidationError);
    });

    it('warns when the branch has no changes', async () => {
      testApp = await createIndexedApp([JSON.stringify(REPORT)]);
      const openApp = withGitStub(testApp, {
        'diff main..feature/empty': '',
        'log --format=%s --max-count=50 main..feature/empty': '',
      });
      const { ctx, warnings } = createMockContext();

      await runCommand(createScopeCommand(() => ctx, openApp), [
        'scope',
        '-p',
        'ledger',
        '--repo',
        tempDir,
        '--base',
        'main',
        '--head',
        'feature/empty',
      ]);

      expect(warnings).toEqual(['feature/empty has no changes against main']);
      expect(testApp.completion.promptAt(1)).toContain('Title: (no commits)');
    });
  });
});
