/**
 * Tests for the risk command
 */

import { afterEach, beforeAll, beforeEach, describe, expect, it } from 'vitest';
import chalk from 'chalk';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createRiskCommand, formatRiskReport } from '../risk.js';
import { CLIError, MalformedOutputError, ValidationError } from '../../../errors/index.js';
import { createMockContext, createTestApp, runCommand, type TestApp } from './setup.js';

const REPORT = {
  overall_risk_score: 0.35,
  risks: [
    {
      title: 'Fraud review backlog',
      description: 'Refund spikes could overwhelm manual review',
      severity: 'high',
      mitigation: 'Pre-staff the fraud queue',
    },
  ],
  dependencies: [{ target: 'Fraud Team', type: 'soft', description: 'Reviews refund limits' }],
  summary: 'Launch is feasible.',
};

describe('createRiskCommand', () => {
  let tempDir: string;
  let prdPath: string;
  let testApp: TestApp;

  beforeAll(() => {
    chalk.level = 0;
  });

  beforeEach(async () => {
    tempDir = mkdtempSync(join(tmpdir(), 'warden-risk-'));
    prdPath = join(tempDir, 'prd.md');
    writeFileSync(prdPath, 'Customers can request instant refunds from the app.');
    testApp = createTestApp([JSON.stringify(REPORT)]);
    await testApp.app.graph.addProject('ledger', 'Ledger');
  });

  afterEach(() => {
    testApp.app.close();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('prints the report and records dependencies', async () => {
    const { ctx, logs } = createMockContext();

    await runCommand(createRiskCommand(() => ctx, testApp.openApp), ['risk', prdPath, '--project', 'ledger']);

    expect(logs).toEqual([
      'Overall risk: 35%',
      '',
      'Risks (1)',
      '  [high] Fraud review backlog',
      '    Refund spikes could overwhelm manual review',
      '    Mitigation: Pre-staff the fraud queue',
      '',
      'Dependencies (1)',
      '  → Fraud Team [soft]',
      '',
      'Launch is feasible.',
    ]);
    expect((await testApp.app.graph.getProjectGraph('ledger')).dependencies).toEqual([
      { entity: { name: 'Fraud Team', type: '' }, type: 'soft', description: 'Reviews refund limits' },
    ]);
    const prompt = testApp.completion.promptAt(0);
    expect(prompt).toContain('Customers can request instant refunds from the app.');
    expect(prompt).toContain('Historical events from past launches:\n(none)');
  });

  it('passes historical events from --events', async () => {
    const eventsPath = join(tempDir, 'events.json');
    writeFileSync(
      eventsPath,
      JSON.stringify([{ eventType: 'launch_delay', team: 'Payments', durationDays: 14, outcome: 'slipped' }])
    );
    const { ctx } = createMockContext();

    await runCommand(createRiskCommand(() => ctx, testApp.openApp), [
      'risk',
      prdPath,
      '-p',
      'ledger',
      '--events',
      eventsPath,
    ]);

    expect(testApp.completion.promptAt(0)).toContain(
      '[{"eventType":"launch_delay","team":"Payments","durationDays":14,"outcome":"slipped"}]'
    );
  });

  it('rejects an events file that is not JSON', async () => {
    const eventsPath = join(tempDir, 'events.json');
    writeFileSync(eventsPath, 'launch_delay,Payments');
    const cmd = createRiskCommand(() => createMockContext().ctx, testApp.openApp);

    await expect(runCommand(cmd, ['risk', prdPath, '-p', 'ledger', '-e', eventsPath])).rejects.toThrow(
      ValidationError
    );
    expect(testApp.completion.requests).toHaveLength(0);
  });

  it('rejects events without a type', async () => {
    const eventsPath = join(tempDir, 'events.json');
    writeFileSync(eventsPath, JSON.stringify([{ team: 'Payments' }]));
    const cmd = createRiskCommand(() => createMockContext().ctx, testApp.openApp);

    await expect(runCommand(cmd, ['risk', prdPath, '-p', 'ledger', '-e', eventsPath])).rejects.toThrow(
      'Invalid events file'
    );
  });

  it('rejects a missing PRD file', async () => {
    const cmd = createRiskCommand(() => createMockContext().ctx, testApp.openApp);

    await expect(runCommand(cmd, ['risk', join(tempDir, 'nope.md'), '-p', 'ledger'])).rejects.toThrow(
      CLIError
    );
  });

  it('fails on a report of the wrong shape and stores nothing', async () => {
    testApp.app.close();
    testApp = createTestApp(['{"overall_risk_score": "high"}']);
    await testApp.app.graph.addProject('ledger', 'Ledger');
    const cmd = createRiskCommand(() => createMockContext().ctx, testApp.openApp);

    await expect(runCommand(cmd, ['risk', prdPath, '-p', 'ledger'])).rejects.toThrow(MalformedOutputError);
    expect((await testApp.app.graph.getProjectGraph('ledger')).dependencies).toEqual([]);
  });
});

describe('formatRiskReport', () => {
  beforeAll(() => {
    chalk.level = 0;
  });

  it('handles an empty report', () => {
    expect(
      formatRiskReport({ overall_risk_score: 0, risks: [], dependencies: [], summary: '' })
    ).toEqual(['Overall risk: 0%', '', 'No risks identified.']);
  });
});
