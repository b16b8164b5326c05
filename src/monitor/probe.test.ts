import { describe, it } from 'node:test';
import assert from 'node:assert';
import { PingProbe, anyAlive } from './probe.js';
import { ErrorCode, ProcessLaunchError, StructuredError } from '../utils/errors.js';
import { FakeCommandRunner, createTestLogger } from '../test-utils/fakes.js';

const pingSpec = { command: 'ping', args: ['-c', '1', '-w', '5'] };

function messages(lines: string[]): string[] {
  return lines.map((line) => {
    const entry: { message: string } = JSON.parse(line);
    return entry.message;
  });
}

describe('PingProbe', () => {
  it('should append the target to the probe arguments', async () => {
    const runner = new FakeCommandRunner(() => 0);
    const probe = new PingProbe(pingSpec, runner, createTestLogger().logger);

    await probe.probe('nas-peer');

    assert.strictEqual(runner.calls.length, 1);
    assert.strictEqual(runner.calls[0].command, 'ping');
    assert.deepStrictEqual(runner.calls[0].args, ['-c', '1', '-w', '5', 'nas-peer']);
  });

  it('should report a target as alive when ping exits with 0', async () => {
    const runner = new FakeCommandRunner(() => ({ exitCode: 0, stdout: '1 packets received\n' }));
    const { logger, lines } = createTestLogger();
    const probe = new PingProbe(pingSpec, runner, logger);

    const result = await probe.probe('nas-peer');

    assert.deepStrictEqual(result, { target: 'nas-peer', alive: true, exitCode: 0, durationMs: 0 });
    assert.ok(messages(lines).includes("Ping returned with code 0, host 'nas-peer' is up."));
    assert.ok(messages(lines).includes('Probe stdout:\n1 packets received'));
  });

  it('should report a target as down for any nonzero exit code', async () => {
    const runner = new FakeCommandRunner(() => 2);
    const { logger, lines } = createTestLogger();
    const probe = new PingProbe(pingSpec, runner, logger);

    const result = await probe.probe('192.168.1.5');

    assert.strictEqual(result.alive, false);
    assert.strictEqual(result.exitCode, 2);
    assert.ok(messages(lines).includes("Ping returned with code 2, host '192.168.1.5' is down."));
  });

  it('should propagate launch failures instead of treating the host as down', async () => {
    const runner = new FakeCommandRunner(() => new ProcessLaunchError('ping', ['nas-peer']));
    const probe = new PingProbe(pingSpec, runner, createTestLogger().logger);

    await assert.rejects(
      () => probe.probe('nas-peer'),
      (error: unknown) => error instanceof StructuredError && error.code === ErrorCode.PROCESS_LAUNCH_FAILED
    );
  });
});

describe('anyAlive', () => {
  it('should stop probing at the first responding target', async () => {
    const runner = new FakeCommandRunner((call) => (call.args[call.args.length - 1] === 'b' ? 0 : 1));
    const probe = new PingProbe(pingSpec, runner, createTestLogger().logger);

    const result = await anyAlive(['a', 'b', 'c'], probe);

    assert.strictEqual(result.alive, true);
    if (result.alive) {
      assert.strictEqual(result.respondingTarget, 'b');
    }
    assert.deepStrictEqual(result.results.map((r) => r.target), ['a', 'b']);
    assert.strictEqual(runner.calls.length, 2);
  });

  it('should probe every target when none responds', async () => {
    const runner = new FakeCommandRunner(() => 1);
    const probe = new PingProbe(pingSpec, runner, createTestLogger().logger);

    const result = await anyAlive(['a', 'b', 'c'], probe);

    assert.strictEqual(result.alive, false);
    assert.deepStrictEqual(result.results.map((r) => r.target), ['a', 'b', 'c']);
  });

  it('should report no liveness for an empty target list', async () => {
    const runner = new FakeCommandRunner(() => 0);
    const probe = new PingProbe(pingSpec, runner, createTestLogger().logger);

    const result = await anyAlive([], probe);

    assert.deepStrictEqual(result, { alive: false, results: [] });
    assert.strictEqual(runner.calls.length, 0);
  });
});
