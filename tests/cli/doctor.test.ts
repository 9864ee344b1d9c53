import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import path from 'node:path';
import os from 'node:os';
import { runDoctor, type DoctorCheck } from '../../src/cli/doctor.js';
import { runInit } from '../../src/cli/init.js';

let tmpDir: string;

beforeEach(() => {
  tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'hookgate-doctor-test-'));
});

afterEach(() => {
  fs.rmSync(tmpDir, { recursive: true, force: true });
});

function writeSettings(settings: unknown, file = 'settings.json'): void {
  const target = path.join(tmpDir, '.claude', file);
  fs.mkdirSync(path.dirname(target), { recursive: true });
  fs.writeFileSync(target, typeof settings === 'string' ? settings : JSON.stringify(settings));
}

function inSection(checks: DoctorCheck[], section: string): DoctorCheck[] {
  return checks.filter((c) => c.section === section);
}

const WIRED = { hooks: [{ type: 'command', command: 'npx hookgate hook' }] };

describe('runDoctor', () => {
  it('should warn when the project has no settings', () => {
    const report = runDoctor({ projectDir: tmpDir });

    expect(inSection(report.checks, 'Settings')).toEqual([
      {
        section: 'Settings',
        status: 'warn',
        message: 'No .claude/settings.json or settings.local.json found (run `hookgate init`)',
      },
    ]);
    expect(inSection(report.checks, 'Hooks')).toEqual([]);
    expect(report.warnings).toBe(1);
    expect(report.errors).toBe(0);
  });

  it('should pass a freshly initialized project', () => {
    runInit({ projectDir: tmpDir });

    const report = runDoctor({ projectDir: tmpDir });

    expect(report.errors).toBe(0);
    expect(report.warnings).toBe(0);
    expect(inSection(report.checks, 'Hooks').map((c) => c.message)).toEqual([
      'PreToolUse is wired to hookgate',
      'Stop is wired to hookgate',
    ]);
    const config = inSection(report.checks, 'Config');
    expect(config).toHaveLength(1);
    expect(config[0].status).toBe('ok');
    expect(config[0].message.startsWith('Config is valid: ')).toBe(true);
    expect(config[0].message.endsWith('(failure policy: open)')).toBe(true);
    expect(inSection(report.checks, 'Loops')).toEqual([{ section: 'Loops', status: 'info', message: 'No loop records' }]);
    expect(inSection(report.checks, 'Audit')[0].message).toBe(
      `${path.join('.hookgate', 'logs')} does not exist yet (created on first event)`,
    );
  });

  it('should report a required event that is not wired', () => {
    writeSettings({ hooks: { PreToolUse: [WIRED], PostToolUse: [WIRED] } });

    const report = runDoctor({ projectDir: tmpDir });

    expect(inSection(report.checks, 'Hooks')).toContainEqual({
      section: 'Hooks',
      status: 'error',
      message: 'Stop is not wired to `hookgate hook`',
    });
    expect(inSection(report.checks, 'Hooks')).toContainEqual({
      section: 'Hooks',
      status: 'info',
      message: 'SubagentStop is not wired (no audit records for it)',
    });
    expect(report.errors).toBe(1);
  });

  it('should warn about unknown events and empty handlers', () => {
    writeSettings({ hooks: { PreToolUse: [WIRED], Stop: [WIRED, {}], SessionStartt: [WIRED] } });

    const warnings = inSection(runDoctor({ projectDir: tmpDir }).checks, 'Hooks').filter((c) => c.status === 'warn');

    expect(warnings.map((c) => c.message)).toEqual(["hooks.Stop[1]: no 'hooks' entries", 'Unknown hook event: SessionStartt']);
  });

  it('should prefer settings.local.json and report invalid files', () => {
    writeSettings('{ broken', 'settings.json');
    writeSettings({ hooks: { PreToolUse: [WIRED], Stop: [WIRED] } }, 'settings.local.json');

    const report = runDoctor({ projectDir: tmpDir });
    const settings = inSection(report.checks, 'Settings');

    expect(settings[0]).toEqual({
      section: 'Settings',
      status: 'ok',
      message: `${path.join('.claude', 'settings.local.json')}: valid JSON`,
    });
    expect(settings[1].status).toBe('error');
    expect(settings[1].message.startsWith(`${path.join('.claude', 'settings.json')}: invalid JSON (`)).toBe(true);
    expect(inSection(report.checks, 'Hooks').filter((c) => c.status === 'error')).toEqual([]);
  });

  it('should report a config that does not validate', () => {
    runInit({ projectDir: tmpDir });
    fs.writeFileSync(path.join(tmpDir, '.hookgate', 'config.yaml'), 'failure_policy: sometimes\n');

    const config = inSection(runDoctor({ projectDir: tmpDir }).checks, 'Config');

    expect(config).toHaveLength(1);
    expect(config[0].status).toBe('error');
    expect(config[0].message).toMatch(/Config validation failed with 1 issue\(s\): failure_policy: /);
  });

  it('should list loop records and flag corrupt ones', () => {
    const loops = path.join(tmpDir, '.hookgate', 'loops');
    fs.mkdirSync(loops, { recursive: true });
    fs.writeFileSync(
      path.join(loops, 'default.md'),
      [
        '---',
        'active: true',
        'iteration: 2',
        'max_iterations: 5',
        'completion_token: DONE',
        "started_at: '2026-03-01T10:00:00.000Z'",
        '---',
        'Task',
        '',
      ].join('\n'),
    );
    fs.writeFileSync(path.join(loops, 'broken.md'), 'no header here');

    const checks = inSection(runDoctor({ projectDir: tmpDir }).checks, 'Loops');

    expect(checks).toEqual([
      {
        section: 'Loops',
        status: 'error',
        message: `broken: ${path.join(loops, 'broken.md')}: missing header`,
      },
      { section: 'Loops', status: 'info', message: 'default: active, iteration 2/5' },
    ]);
  });
});
