import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, readFileSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { createInitCommand } from '../../../src/cli/commands/init.js';
import { createStatusCommand } from '../../../src/cli/commands/status.js';

describe('config commands', () => {
  let home: string;
  let projectDir: string;
  let lines: string[];

  beforeEach(() => {
    home = mkdtempSync(join(tmpdir(), 'lanrelay-home-'));
    projectDir = mkdtempSync(join(tmpdir(), 'lanrelay-project-'));
    vi.stubEnv('LANRELAY_HOME', home);
    lines = [];
    vi.spyOn(console, 'log').mockImplementation((...args: unknown[]) => {
      lines.push(args.join(' '));
    });
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
    rmSync(home, { recursive: true, force: true });
    rmSync(projectDir, { recursive: true, force: true });
  });

  // ── init ──

  it('should write the default config once', async () => {
    const path = join(home, 'config.yaml');

    await createInitCommand().parseAsync(['--dir', projectDir], { from: 'user' });
    expect(lines).toEqual([
      `✓ Created ${path}`,
      '  Receiver  http://192.168.1.4:3000/upload',
      '  Discovery _photosync._tcp',
    ]);
    expect(readFileSync(path, 'utf-8')).toContain('serviceType: _photosync._tcp');

    lines = [];
    await createInitCommand().parseAsync(['--dir', projectDir], { from: 'user' });
    expect(lines[0]).toBe(`Config already exists at ${path}`);
  });

  it('should report the receiver from an existing config', async () => {
    writeFileSync(join(home, 'config.yaml'), 'endpoint:\n  host: 10.0.0.9\n  port: 4000\n');

    await createInitCommand().parseAsync(['--dir', projectDir], { from: 'user' });

    expect(lines[1]).toBe('  Receiver  http://10.0.0.9:4000/upload');
  });

  // ── status ──

  it('should print both config locations as JSON', async () => {
    writeFileSync(join(projectDir, '.lanrelay.yaml'), 'discovery:\n  enabled: false\n');

    await createStatusCommand().parseAsync(['--dir', projectDir, '--json'], { from: 'user' });

    const report: unknown = JSON.parse(lines.join('\n'));
    expect(report).toMatchObject({
      globalDir: home,
      projectDir,
      defaultUrl: 'http://192.168.1.4:3000/upload',
      config: { discovery: { enabled: false } },
    });
  });
});
