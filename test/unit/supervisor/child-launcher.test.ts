import { describe, it } from 'mocha';
import { strict as assert } from 'assert';
import * as path from 'path';
import { launchChild, toTerminationInfo, currentPlatform } from '../../../src/supervisor/child-launcher';
import { SpawnError } from '../../../src/errors/supervisor-error';
import { ErrorCode } from '../../../src/errors/error-codes';

const FIXTURES = path.join(__dirname, '..', '..', 'fixtures');
const isWindows = process.platform === 'win32';

describe('Child Launcher', () => {
  describe('toTerminationInfo', () => {
    it('should keep a POSIX exit code', () => {
      assert.deepEqual(toTerminationInfo(3, null, 'posix'), {
        platform: 'posix',
        exitCode: 3,
        signal: null,
        signalName: null,
        coreDumped: false,
      });
    });

    it('should resolve a signal name to its number', () => {
      const info = toTerminationInfo(null, 'SIGKILL', 'posix');
      assert.equal(info.signal, 9);
      assert.equal(info.signalName, 'SIGKILL');
      assert.equal(info.exitCode, null);
      assert.equal(info.coreDumped, false);
    });

    it('should keep a Windows exit code as reported', () => {
      const info = toTerminationInfo(0xc0000005, null, 'windows');
      assert.equal(info.platform, 'windows');
      assert.equal(info.exitCode, 0xc0000005);
    });

    it('should ignore signals on Windows', () => {
      const info = toTerminationInfo(null, 'SIGTERM', 'windows');
      assert.equal(info.exitCode, null);
      assert.equal(info.signal, null);
    });
  });

  describe('currentPlatform', () => {
    it('should match the host', () => {
      assert.equal(currentPlatform(), isWindows ? 'windows' : 'posix');
    });
  });

  describe('launchChild', () => {
    it('should report the exit code of a finished child', async () => {
      const child = await launchChild([process.execPath, path.join(FIXTURES, 'exit-with.js'), '7']);
      assert.equal(typeof child.pid, 'number');

      const info = await child.exited;

      assert.equal(info.exitCode, 7);
      assert.equal(info.signal, null);
    });

    it('should resolve exited once and reuse the same result', async () => {
      const child = await launchChild([process.execPath, path.join(FIXTURES, 'exit-with.js'), '0']);
      const first = await child.exited;
      const second = await child.exited;
      assert.equal(first, second);
    });

    it('should send at most one termination request', async function () {
      if (isWindows) {
        this.skip();
      }
      const child = await launchChild([process.execPath, '-e', 'setTimeout(() => undefined, 10000)']);

      assert.equal(child.terminate(), true);
      assert.equal(child.terminate(), false);

      const info = await child.exited;
      assert.equal(info.signal, 15);
      assert.equal(info.signalName, 'SIGTERM');
    });

    it('should not signal a child that already exited', async () => {
      const child = await launchChild([process.execPath, path.join(FIXTURES, 'exit-with.js'), '0']);
      await child.exited;
      assert.equal(child.terminate(), false);
    });

    it('should report a child killed by a signal', async function () {
      if (isWindows) {
        this.skip();
      }
      const child = await launchChild([process.execPath, path.join(FIXTURES, 'self-kill.js'), 'SIGKILL']);
      const info = await child.exited;
      assert.equal(info.signal, 9);
    });

    it('should reject with a not-found error for a missing executable', async () => {
      const missing = path.join(FIXTURES, 'does-not-exist');
      await assert.rejects(
        () => launchChild([missing]),
        (err: Error) =>
          err instanceof SpawnError &&
          err.code === ErrorCode.E301_COMMAND_NOT_FOUND &&
          err.syscallCode === 'ENOENT' &&
          err.exitCode === 127
      );
    });
  });
});
