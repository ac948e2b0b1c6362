/**
 * Tests for the index command
 */

import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createIndexCommand } from '../index.js';
import { CLIError, ValidationError } from '../../../errors/index.js';
import type { ProgressEvent } from '../../utils/progress.js';
import { createMockContext, createTestApp, runCommand, type TestApp } from './setup.js';

vi.mock('ora', () => ({
  default: vi.fn(() => ({
    start: vi.fn().mockReturnThis(),
    succeed: vi.fn().mockReturnThis(),
    fail: vi.fn().mockReturnThis(),
    text: '',
  })),
}));

const ENTITY_REPLY = '{"entities": [{"name": "Ledger Service", "type": "service"}]}';

describe('createIndexCommand', () => {
  let tempDir: string;
  let designPath: string;
  let testApp: TestApp;
  let consoleLogSpy: ReturnType<typeof vi.spyOn>;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'warden-index-'));
    designPath = join(tempDir, 'design.md');
    writeFileSync(designPath, 'The Ledger Service settles refunds nightly.');
    testApp = createTestApp([ENTITY_REPLY]);
    consoleLogSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
  });

  afterEach(() => {
    testApp.app.close();
    rmSync(tempDir, { recursive: true, force: true });
    consoleLogSpy.mockRestore();
  });

  describe('command structure', () => {
    it('has a required --project option and a document type default', () => {
      const cmd = createIndexCommand(() => createMockContext().ctx);

      expect(cmd.name()).toBe('index');
      expect(cmd.registeredArguments[0]?.name()).toBe('file');
      const project = cmd.options.find((o) => o.long === '--project');
      expect(project?.short).toBe('-p');
      expect(project?.mandatory).toBe(true);
      expect(cmd.options.find((o) => o.long === '--type')?.defaultValue).toBe('document');
    });
  });

  it('stores the document and links it into a new project', async () => {
    const { ctx } = createMockContext();
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await runCommand(cmd, ['index', designPath, '--project', 'ledger', '--type', 'technical_design']);

    const { app } = testApp;
    expect(await app.documents.count({ doc_id: 'ledger/design' })).toBe(1);
    expect(await app.graph.getProjectGraph('ledger')).toEqual({
      project: { id: 'ledger', name: 'ledger' },
      documents: [{ id: 'ledger/design', title: 'design.md', docType: 'technical_design' }],
      entities: [{ name: 'Ledger Service', type: 'service' }],
      dependencies: [],
    });
  });

  it('honours --doc-id, --title and --project-name', async () => {
    const { ctx } = createMockContext();
    await testApp.app.graph.addProject('ledger', 'Old name');
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await runCommand(cmd, [
      'index',
      designPath,
      '-p',
      'ledger',
      '--project-name',
      'Ledger',
      '--doc-id',
      'ledger-design-v2',
      '--title',
      'Ledger design',
    ]);

    const graph = await testApp.app.graph.getProjectGraph('ledger');
    expect(graph.project).toEqual({ id: 'ledger', name: 'Ledger' });
    expect(graph.documents).toEqual([{ id: 'ledger-design-v2', title: 'Ledger design', docType: 'document' }]);
  });

  it('keeps an existing project name when none is given', async () => {
    const { ctx } = createMockContext();
    await testApp.app.graph.addProject('ledger', 'Ledger');
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await runCommand(cmd, ['index', designPath, '-p', 'ledger']);

    expect((await testApp.app.graph.getProjectGraph('ledger')).project).toEqual({
      id: 'ledger',
      name: 'Ledger',
    });
  });

  it('emits NDJSON progress with --json', async () => {
    const { ctx } = createMockContext({ json: true });
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await runCommand(cmd, ['index', designPath, '-p', 'ledger']);

    const events: ProgressEvent[] = consoleLogSpy.mock.calls.map((call) => JSON.parse(String(call[0])));
    expect(events.map((event) => `${event.type}:${event.stage ?? ''}`)).toEqual([
      'stage_start:chunking',
      'stage_complete:chunking',
      'stage_start:embedding',
      'stage_complete:embedding',
      'stage_start:storing',
      'stage_complete:storing',
      'stage_start:enriching',
      'stage_complete:enriching',
      'complete:',
    ]);
    expect(events.at(-1)?.data['result']).toEqual({
      docId: 'ledger/design',
      chunks: 1,
      entities: 1,
      enrichmentFailed: false,
    });
  });

  it('rejects a missing file', async () => {
    const { ctx } = createMockContext();
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await expect(
      runCommand(cmd, ['index', join(tempDir, 'missing.md'), '-p', 'ledger'])
    ).rejects.toThrow(CLIError);
    expect(await testApp.app.documents.count()).toBe(0);
  });

  it('rejects a malformed document type', async () => {
    const { ctx } = createMockContext();
    const cmd = createIndexCommand(() => ctx, testApp.openApp);

    await expect(
      runCommand(cmd, ['index', designPath, '-p', 'ledger', '--type', 'Tech Design'])
    ).rejects.toThrow(ValidationError);
  });
});
