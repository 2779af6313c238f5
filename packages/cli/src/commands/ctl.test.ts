import * as fs from 'node:fs';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildControlCommand, runCtlCommand } from './ctl.js';

describe('buildControlCommand', () => {
  it('maps pause actions', () => {
    expect(buildControlCommand('pause', undefined)).toEqual({ method: 'pause' });
    expect(buildControlCommand('resume', undefined)).toEqual({ method: 'resume' });
    expect(buildControlCommand('toggle', undefined)).toEqual({ method: 'toggle-pause' });
  });

  it('maps history actions', () => {
    expect(buildControlCommand('close-all', undefined)).toEqual({ method: 'close-all' });
    expect(buildControlCommand('history-pop', undefined)).toEqual({ method: 'history-pop' });
  });

  it('builds a close command with an optional reason', () => {
    expect(buildControlCommand('close', '3', 'dismissed')).toEqual({
      method: 'close',
      params: { id: 3, reason: 'dismissed' },
    });
  });

  it('builds limit and status commands', () => {
    expect(buildControlCommand('limit', '2')).toEqual({ method: 'limit', params: { value: 2 } });
    expect(buildControlCommand('idle', 'on')).toEqual({ method: 'status', params: { idle: true } });
    expect(buildControlCommand('fullscreen', 'off')).toEqual({
      method: 'status',
      params: { fullscreen: false },
    });
  });

  it('rejects bad arguments', () => {
    expect(() => buildControlCommand('close', undefined)).toThrow('ctl close requires an argument');
    expect(() => buildControlCommand('close', 'three')).toThrow('id must be an integer: three');
    expect(() => buildControlCommand('close', '3', 'lost')).toThrow('Invalid close reason: lost');
    expect(() => buildControlCommand('idle', 'maybe')).toThrow('ctl idle expects on or off: maybe');
    expect(() => buildControlCommand('reboot', undefined)).toThrow('Unknown ctl action: reboot');
  });
});

describe('runCtlCommand', () => {
  let tmpDir: string;
  let inboxDir: string;
  const originalEnv = process.env.XDG_CONFIG_HOME;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'notiqd-ctl-test-'));
    inboxDir = path.join(tmpDir, 'inbox');
    process.env.XDG_CONFIG_HOME = tmpDir;
  });

  afterEach(() => {
    if (originalEnv === undefined) {
      delete process.env.XDG_CONFIG_HOME;
    }
    else {
      process.env.XDG_CONFIG_HOME = originalEnv;
    }
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  function inboxContent(): string {
    return fs.readFileSync(path.join(inboxDir, 'commands.jsonl'), 'utf-8');
  }

  it('appends the command line to the inbox', async () => {
    await runCtlCommand(['--inbox', inboxDir, 'toggle']);
    expect(inboxContent()).toBe('{"method":"toggle-pause"}\n');
  });

  it('fills in the default close reason', async () => {
    await runCtlCommand(['--inbox', inboxDir, 'close', '4']);
    expect(JSON.parse(inboxContent())).toEqual({
      method: 'close',
      params: { id: 4, reason: 'signal' },
    });
  });

  it('rejects a close id of 0', async () => {
    await expect(runCtlCommand(['--inbox', inboxDir, 'close', '0'])).rejects.toThrow(
      'Invalid inbox command',
    );
  });

  it('takes the inbox directory from the config file', async () => {
    const configDir = path.join(tmpDir, 'notiqd');
    fs.mkdirSync(configDir);
    fs.writeFileSync(
      path.join(configDir, 'config.json'),
      JSON.stringify({ inbox: inboxDir }),
    );

    await runCtlCommand(['pause']);
    expect(inboxContent()).toBe('{"method":"pause"}\n');
  });
});
