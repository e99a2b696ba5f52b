/**
 * Shutdown handling tests
 */

import { describe, it, expect, jest, beforeEach, afterEach } from '@jest/globals';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  createShutdownHandler,
  removeAliveFile,
  signalExitCode,
  writeAliveFile,
} from '../../../src/mcp/server/shutdown';
import { createCapturingLogger, createSilentLogger, messages } from '../../__support__/logger';

describe('shutdown', () => {
  let directory: string;
  let aliveFile: string;

  beforeEach(() => {
    directory = mkdtempSync(join(tmpdir(), 'shutdown-'));
    aliveFile = join(directory, '.alive');
  });

  afterEach(() => {
    rmSync(directory, { recursive: true, force: true });
  });

  it('should map signals to conventional exit codes', () => {
    expect(signalExitCode('SIGINT')).toBe(130);
    expect(signalExitCode('SIGTERM')).toBe(143);
  });

  it('should write and remove the alive file', () => {
    const logger = createSilentLogger();

    writeAliveFile(aliveFile, logger);
    expect(readFileSync(aliveFile, 'utf8')).toBe(`${process.pid}\n`);

    removeAliveFile(aliveFile, logger);
    expect(existsSync(aliveFile)).toBe(false);
    removeAliveFile(aliveFile, logger);
  });

  it('should close the server, remove the alive file and exit', async () => {
    const logger = createSilentLogger();
    writeAliveFile(aliveFile, logger);
    const close = jest.fn<() => Promise<void>>().mockResolvedValue(undefined);
    const exit = jest.fn<(code: number) => void>();

    await createShutdownHandler({ logger, close, aliveFile, exit })('SIGTERM');

    expect(close).toHaveBeenCalledTimes(1);
    expect(existsSync(aliveFile)).toBe(false);
    expect(exit).toHaveBeenCalledWith(143);
  });

  it('should still exit when closing fails', async () => {
    const { logger, records } = createCapturingLogger();
    const close = jest.fn<() => Promise<void>>().mockRejectedValue(new Error('socket busy'));
    const exit = jest.fn<(code: number) => void>();

    await createShutdownHandler({ logger, close, exit })('SIGINT');

    expect(messages(records)).toEqual(['Shutting down', 'Error during shutdown']);
    expect(exit).toHaveBeenCalledWith(130);
  });

  it('should force the exit on a second signal', async () => {
    const logger = createSilentLogger();
    let release: () => void = () => undefined;
    const close = jest.fn<() => Promise<void>>(
      () =>
        new Promise<void>((resolve) => {
          release = resolve;
        }),
    );
    const exit = jest.fn<(code: number) => void>();
    const handler = createShutdownHandler({ logger, close, exit });

    const first = handler('SIGTERM');
    await handler('SIGINT');
    release();
    await first;

    expect(exit.mock.calls).toEqual([[1], [143]]);
    expect(close).toHaveBeenCalledTimes(1);
  });
});
