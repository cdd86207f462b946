import { describe, it, beforeEach } from 'mocha';
import { strict as assert } from 'assert';
import { runCli, HELP_TEXT, getVersion } from '../../../src/cli/cli-interface';
import { MemorySink } from '../../../src/logging/log-sink';
import { posixExit } from '../../../src/models/outcome';
import { FakeChild, FakeClock, fakeLauncher } from '../../helpers/fake-child';

describe('CLI Interface', () => {
  let sink: MemorySink;
  let stdout: string[];
  let clock: FakeClock;

  beforeEach(() => {
    sink = new MemorySink();
    stdout = [];
    clock = new FakeClock();
  });

  function io(env: Record<string, string | undefined> = {}) {
    return { sink, env, stdout: (text: string) => stdout.push(text) };
  }

  describe('help and version', () => {
    it('should print usage for --help and exit 2 without launching', async () => {
      const launcher = fakeLauncher(new FakeChild());

      const code = await runCli(['--help'], io(), { launch: launcher.launch });

      assert.equal(code, 2);
      assert.deepEqual(stdout, [HELP_TEXT]);
      assert.equal(launcher.calls.length, 0);
      assert.deepEqual(sink.getAll(), []);
    });

    it('should accept -h', async () => {
      const code = await runCli(['--verbose', '-h'], io());
      assert.equal(code, 2);
      assert.deepEqual(stdout, [HELP_TEXT]);
    });

    it('should forward --help after the separator to the child', async () => {
      const child = new FakeChild();
      const launcher = fakeLauncher(child, (c) => c.finish(posixExit(0)));

      const code = await runCli(['--', './tst', '--help'], io(), { launch: launcher.launch });

      assert.equal(code, 0);
      assert.deepEqual(stdout, []);
      assert.deepEqual(launcher.calls[0].command, ['./tst', '--help']);
    });

    it('should print the package version', async () => {
      const code = await runCli(['--version'], io());
      assert.equal(code, 0);
      assert.deepEqual(stdout, [`testrunner ${getVersion()}\n`]);
    });

    it('should read the version from package.json', () => {
      assert.match(getVersion(), /^\d+\.\d+\.\d+/);
    });
  });

  describe('argument errors', () => {
    it('should reject an empty argv with exit 2', async () => {
      const code = await runCli([], io());
      assert.equal(code, 2);
      assert.deepEqual(sink.getAll(), ['testrunner: not enough arguments']);
    });

    it('should reject a bare separator with exit 2', async () => {
      const code = await runCli(['--'], io());
      assert.equal(code, 2);
      assert.deepEqual(sink.getAll(), ['testrunner: not enough arguments']);
    });

    it('should reject an unknown supervisor option', async () => {
      const launcher = fakeLauncher(new FakeChild());
      const code = await runCli(['--bogus', './tst'], io(), { launch: launcher.launch });
      assert.equal(code, 2);
      assert.equal(launcher.calls.length, 0);
      assert.deepEqual(sink.getAll(), ['testrunner: unknown option: --bogus']);
    });
  });

  describe('environment', () => {
    it('should fail with exit 3 on an invalid override', async () => {
      const launcher = fakeLauncher(new FakeChild());

      const code = await runCli(['./tst'], io({ TESTRUNNER_VERBOSE: 'maybe' }), { launch: launcher.launch });

      assert.equal(code, 3);
      assert.equal(launcher.calls.length, 0);
      assert.deepEqual(sink.getAll(), [
        'testrunner: invalid environment value: TESTRUNNER_VERBOSE=maybe (expected 1/0, true/false, yes/no, on/off)',
      ]);
    });

    it('should enable verbose markers from the environment', async () => {
      const child = new FakeChild();
      const launcher = fakeLauncher(child, (c) => c.finish(posixExit(0)));

      const code = await runCli(['./tst'], io({ TESTRUNNER_VERBOSE: '1' }), {
        launch: launcher.launch,
        now: clock.now,
      });

      assert.equal(code, 0);
      assert.deepEqual(sink.getAll(), [
        'testrunner: begin tst @1700000000.000: [exec] ./tst',
        'testrunner: end tst: ok, exit code 0',
      ]);
    });

    it('should let --timeout override the environment default', async () => {
      const child = new FakeChild();
      const launcher = fakeLauncher(child, (c) => {
        clock.advance(900);
        c.finish(posixExit(0));
      });

      await runCli(['--timeout', '100', './tst'], io({ TESTRUNNER_TIMEOUT: '1' }), {
        launch: launcher.launch,
        now: clock.now,
      });

      // 0.9s of 100s is nowhere near the margin; of 1s it would be
      assert.deepEqual(sink.getAll(), []);
    });

    it('should apply the environment timeout when no flag is given', async () => {
      const child = new FakeChild();
      const launcher = fakeLauncher(child, (c) => {
        clock.advance(900);
        c.finish(posixExit(0));
      });

      await runCli(['./tst'], io({ TESTRUNNER_TIMEOUT: '1' }), { launch: launcher.launch, now: clock.now });

      assert.equal(sink.getAll().length, 2);
    });
  });

  it('should return the child exit code', async () => {
    const child = new FakeChild();
    const launcher = fakeLauncher(child, (c) => c.finish(posixExit(42)));

    const code = await runCli(['./tst', 'arg'], io(), { launch: launcher.launch });

    assert.equal(code, 42);
    assert.deepEqual(launcher.calls[0].command, ['./tst', 'arg']);
  });
});
