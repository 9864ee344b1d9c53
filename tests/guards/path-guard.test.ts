import { describe, it, expect } from 'vitest';
import { isOverrideEnabled, normalizeTargetPath, PathGuard } from '../../src/guards/path-guard.js';
import { DEFAULT_CONFIG_PATH, loadConfigFile, resolveConfig, toProtectedPathSpec } from '../../src/policy/loader.js';

const spec = toProtectedPathSpec(resolveConfig(loadConfigFile(DEFAULT_CONFIG_PATH)));
const guard = PathGuard.fromSpec(spec, { projectDir: '/work/app' });

const ENV_BLOCK_REASON = 'Path check: ".env" matches protected pattern "**/.env" (Environment file (may contain secrets))';

describe('PathGuard with the bundled rules', () => {
  it('should allow an ordinary source file', () => {
    expect(guard.evaluate({ path: 'src/index.ts', content: 'export {};' })).toEqual({ decision: 'allow' });
  });

  it('should block a protected path and name the pattern', () => {
    expect(guard.evaluate({ path: '.env', content: 'KEY=1' })).toEqual({
      decision: 'block',
      reason: ENV_BLOCK_REASON,
      category: 'protected-path',
      pattern: '**/.env',
    });
  });

  it('should match absolute paths inside the project relative to it', () => {
    expect(guard.evaluate({ path: '/work/app/.env' })).toMatchObject({ decision: 'block', reason: ENV_BLOCK_REASON });
  });

  it('should resolve relative paths that climb out of the project', () => {
    expect(guard.evaluate({ path: '../other/.env' })).toMatchObject({
      decision: 'block',
      reason: 'Path check: "/work/other/.env" matches protected pattern "**/.env" (Environment file (may contain secrets))',
    });
    expect(guard.evaluate({ path: 'x/../../y/.env' })).toMatchObject({ decision: 'block', pattern: '**/.env' });
    expect(guard.evaluate({ path: '../secrets/db.key' })).toMatchObject({ decision: 'block', pattern: '**/*.key' });
  });

  it('should resolve relative paths against the working directory of the call', () => {
    expect(guard.evaluate({ path: '.env', cwd: '/work/app/packages/api' })).toMatchObject({
      decision: 'block',
      reason: 'Path check: "packages/api/.env" matches protected pattern "**/.env" (Environment file (may contain secrets))',
    });
    expect(guard.evaluate({ path: '../../../other/.env', cwd: '/work/app/packages/api' }).decision).toBe('block');
  });

  it('should allow an exception path and say which exception applied', () => {
    expect(guard.evaluate({ path: '.env.example', content: 'KEY=' })).toEqual({
      decision: 'allow',
      reason: 'Path matches exception pattern "**/.env.example"',
      category: 'protected-path',
    });
  });

  it('should apply exceptions to every protected glob', () => {
    expect(guard.evaluate({ path: 'config/production/db.yaml' }).decision).toBe('block');
    expect(guard.evaluate({ path: 'config/production/db.yaml.example' }).decision).toBe('allow');
  });

  it('should protect its own state and log directory', () => {
    expect(guard.evaluate({ path: '.hookgate/loops/default.md' })).toMatchObject({
      decision: 'block',
      pattern: '**/.hookgate/**',
    });
  });

  it('should block content carrying a sentinel marker', () => {
    expect(guard.evaluate({ path: 'src/a.ts', content: '// @hookgate-protected\nexport const a = 1;' })).toEqual({
      decision: 'block',
      reason: 'Content check: new content contains sentinel marker "@hookgate-protected"',
      category: 'sentinel-marker',
      pattern: '@hookgate-protected',
    });
  });

  it('should not let path exceptions override the content check', () => {
    expect(guard.evaluate({ path: 'notes.example', content: 'HOOKGATE:DO-NOT-EDIT' })).toMatchObject({
      decision: 'block',
      category: 'sentinel-marker',
    });
  });
});

describe('PathGuard operator override', () => {
  const overridden = PathGuard.fromSpec(spec, { projectDir: '/work/app', override: true });

  it('should allow a protected path and record what it would have blocked', () => {
    expect(overridden.evaluate({ path: '.env' })).toEqual({
      decision: 'allow',
      reason: `Protection bypassed by operator override (HOOKGATE_ALLOW_PROTECTED); would have blocked: ${ENV_BLOCK_REASON}`,
      category: 'protected-path',
    });
  });

  it('should disable the content check too', () => {
    expect(overridden.evaluate({ path: 'a.ts', content: '@hookgate-protected' }).decision).toBe('allow');
  });

  it('should still mark ordinary allows as bypassed', () => {
    expect(overridden.evaluate({ path: 'src/a.ts' })).toEqual({
      decision: 'allow',
      reason: 'Protection bypassed by operator override (HOOKGATE_ALLOW_PROTECTED)',
    });
  });
});

describe('normalizeTargetPath', () => {
  it('should normalize relative paths', () => {
    expect(normalizeTargetPath('./src//a.ts')).toBe('src/a.ts');
    expect(normalizeTargetPath('src\\win\\a.ts')).toBe('src/win/a.ts');
  });

  it('should make paths inside the project relative', () => {
    expect(normalizeTargetPath('/work/app/x/.env', '/work/app')).toBe('x/.env');
  });

  it('should leave paths outside the project absolute', () => {
    expect(normalizeTargetPath('/work/other/.env', '/work/app')).toBe('/work/other/.env');
  });

  it('should resolve relative paths against the project or the working directory', () => {
    expect(normalizeTargetPath('../x/.env', '/work/app')).toBe('/work/x/.env');
    expect(normalizeTargetPath('x/../../y/.env', '/work/app')).toBe('/work/y/.env');
    expect(normalizeTargetPath('./src/a.ts', '/work/app')).toBe('src/a.ts');
    expect(normalizeTargetPath('../lib/a.ts', '/work/app', '/work/app/packages/api')).toBe('packages/lib/a.ts');
  });

  it('should keep a file whose name starts with two dots inside the project', () => {
    expect(normalizeTargetPath('..hidden', '/work/app')).toBe('..hidden');
  });
});

describe('isOverrideEnabled', () => {
  it('should accept 1, true and yes in any case', () => {
    expect(isOverrideEnabled({ ALLOW: '1' }, 'ALLOW')).toBe(true);
    expect(isOverrideEnabled({ ALLOW: 'TRUE' }, 'ALLOW')).toBe(true);
    expect(isOverrideEnabled({ ALLOW: ' yes ' }, 'ALLOW')).toBe(true);
  });

  it('should reject anything else', () => {
    expect(isOverrideEnabled({ ALLOW: '0' }, 'ALLOW')).toBe(false);
    expect(isOverrideEnabled({}, 'ALLOW')).toBe(false);
  });
});
