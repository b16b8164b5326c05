import { describe, it, beforeEach, afterEach } from 'node:test';
import assert from 'node:assert';
import { mkdirSync, rmSync, existsSync, readFileSync, readdirSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { runCheck, runSync, CHECK_LOG_FILE, SYNC_LOG_FILE } from './index.js';
import { ProcessLaunchError } from '../utils/errors.js';
import { FakeClock, FakeCommandRunner, captureConsole } from '../test-utils/fakes.js';

describe('commands', () => {
  let testDir: string;
  let logDir: string;
  let clock: FakeClock;

  beforeEach(() => {
    testDir = join(tmpdir(), `commands-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    logDir = join(testDir, 'logs');
    mkdirSync(testDir, { recursive: true });
    clock = new FakeClock();
  });

  afterEach(() => {
    if (existsSync(testDir)) {
      rmSync(testDir, { recursive: true, force: true });
    }
  });

  function writeConfig(overrides: Record<string, unknown>): string {
    const path = join(testDir, 'config.json');
    writeFileSync(
      path,
      JSON.stringify({
        logging: { dir: logDir, level: 'debug' },
        ...overrides,
      })
    );
    return path;
  }

  const monitor = {
    targets: ['nas-peer', 'desktop'],
    requiredOfflineSeconds: 0,
    pollingIntervalSeconds: 60,
    probe: { command: 'ping', args: ['-c', '1'] },
    shutdown: { command: '/sbin/shutdown', args: ['-P', 'now'] },
  };

  describe('runCheck', () => {
    it('should shut down when no target responds', async () => {
      const runner = new FakeCommandRunner((call) => (call.command === 'ping' ? 1 : 0));

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor }),
        env: {},
        runner,
        console: captureConsole().sink,
        clock: clock.now,
        sleep: clock.sleep,
      });

      assert.strictEqual(exitCode, 0);
      assert.deepStrictEqual(
        runner.calls.map((c) => [c.command, ...c.args].join(' ')),
        ['ping -c 1 nas-peer', 'ping -c 1 desktop', '/sbin/shutdown -P now']
      );
      const log = readFileSync(join(logDir, CHECK_LOG_FILE), 'utf-8');
      assert.ok(log.includes("'/sbin/shutdown -P now' returncode: 0"));
      assert.ok(log.includes('Exit program (committed).'));
    });

    it('should not shut down when a target responds', async () => {
      const runner = new FakeCommandRunner((call) => (call.args.includes('desktop') ? 0 : 1));

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor }),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 0);
      assert.strictEqual(runner.calls.length, 2);
      assert.ok(runner.calls.every((c) => c.command === 'ping'));
    });

    it('should only log the shutdown in dry-run mode', async () => {
      const runner = new FakeCommandRunner(() => 1);

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor }),
        env: {},
        dryRun: true,
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 0);
      assert.strictEqual(runner.calls.filter((c) => c.command === '/sbin/shutdown').length, 0);
    });

    it('should exit with 1 when ping cannot be launched', async () => {
      const runner = new FakeCommandRunner((call) => new ProcessLaunchError(call.command, call.args));

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor }),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 1);
      assert.strictEqual(runner.calls.length, 1);
    });

    it('should exit with 1 on invalid timing before probing anything', async () => {
      const runner = new FakeCommandRunner(() => 1);

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor: { ...monitor, requiredOfflineSeconds: 50, pollingIntervalSeconds: 30 } }),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 1);
      assert.strictEqual(runner.calls.length, 0);
      assert.ok(readFileSync(join(logDir, CHECK_LOG_FILE), 'utf-8').includes('[CONFIG_TIMING_INVALID]'));
    });

    it('should exit with 1 when no targets are configured', async () => {
      const runner = new FakeCommandRunner(() => 1);

      const exitCode = await runCheck({
        configPath: writeConfig({ monitor: { ...monitor, targets: [] } }),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 1);
      assert.strictEqual(runner.calls.length, 0);
    });
  });

  describe('runSync', () => {
    let sourceRoot: string;
    let targetDir: string;
    let captureDir: string;

    beforeEach(() => {
      sourceRoot = join(testDir, 'data');
      targetDir = join(testDir, 'backup');
      captureDir = join(testDir, 'logs', 'rsync');
      for (const name of ['home', 'photos', 'music']) {
        mkdirSync(join(sourceRoot, name), { recursive: true });
      }
      mkdirSync(targetDir, { recursive: true });
    });

    function syncConfig(tasks: Array<{ name: string; source: string; target: string }>) {
      return { sync: { command: 'rsync', args: ['--archive'], logDir: captureDir, tasks } };
    }

    it('should run every task and exit with 0 even when one fails', async () => {
      const runner = new FakeCommandRunner((call) => (call.args.includes(join(sourceRoot, 'photos')) ? 23 : 0));
      const tasks = ['home', 'photos', 'music'].map((name) => ({
        name,
        source: join(sourceRoot, name),
        target: targetDir,
      }));

      const exitCode = await runSync({
        configPath: writeConfig(syncConfig(tasks)),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 0);
      assert.strictEqual(runner.calls.length, 3);
      assert.strictEqual(readdirSync(captureDir).length, 3);
      const log = readFileSync(join(logDir, SYNC_LOG_FILE), 'utf-8');
      assert.ok(log.includes('rsync returncode not 0: 23'));
      assert.ok(log.includes('Program termination.'));
    });

    it('should exit with 1 before running anything when a source has a trailing separator', async () => {
      const runner = new FakeCommandRunner(() => 0);

      const exitCode = await runSync({
        configPath: writeConfig(syncConfig([
          { name: 'home', source: join(sourceRoot, 'home'), target: targetDir },
          { name: 'photos', source: `${join(sourceRoot, 'photos')}/`, target: targetDir },
        ])),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 1);
      assert.strictEqual(runner.calls.length, 0);
      assert.ok(readFileSync(join(logDir, SYNC_LOG_FILE), 'utf-8').includes('PRECONDITION_TRAILING_SEPARATOR'));
    });

    it('should not be blocked by invalid shutdown timing settings', async () => {
      const runner = new FakeCommandRunner(() => 0);

      const exitCode = await runSync({
        configPath: writeConfig({
          monitor: { requiredOfflineSeconds: 50, pollingIntervalSeconds: 30 },
          ...syncConfig([{ name: 'home', source: join(sourceRoot, 'home'), target: targetDir }]),
        }),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 0);
      assert.strictEqual(runner.calls.length, 1);
    });

    it('should exit with 1 when a target directory is missing', async () => {
      const runner = new FakeCommandRunner(() => 0);

      const exitCode = await runSync({
        configPath: writeConfig(syncConfig([
          { name: 'home', source: join(sourceRoot, 'home'), target: join(testDir, 'unmounted') },
        ])),
        env: {},
        runner,
        console: captureConsole().sink,
      });

      assert.strictEqual(exitCode, 1);
      assert.strictEqual(runner.calls.length, 0);
    });
  });
});
