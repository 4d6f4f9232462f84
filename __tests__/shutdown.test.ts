import { describe, test, expect, vi } from 'vitest';
import { createShutdown, type ClosableServer } from '../src/shutdown';

// A server whose close only completes when the test says so
function pendingServer() {
  let finish: (error?: Error) => void = () => {};
  const server: ClosableServer = {
    close: vi.fn((callback: (error?: Error) => void) => {
      finish = callback;
    }),
  };
  return { server, finish: (error?: Error) => finish(error) };
}

describe('createShutdown', () => {
  const logger = () => ({ log: vi.fn(), warn: vi.fn(), error: vi.fn() });

  test('closes storage only after the server has drained', async () => {
    const { server, finish } = pendingServer();
    const storage = { close: vi.fn().mockResolvedValue(undefined) };
    const log = logger();

    const done = createShutdown(server, storage, log)('SIGTERM');
    await Promise.resolve();

    expect(server.close).toHaveBeenCalledTimes(1);
    expect(storage.close).not.toHaveBeenCalled();

    finish();
    await done;

    expect(storage.close).toHaveBeenCalledTimes(1);
    expect(log.log).toHaveBeenNthCalledWith(1, 'SIGTERM received, shutting down');
    expect(log.log).toHaveBeenNthCalledWith(2, '👋 Server closed');
  });

  test('still closes storage when the server fails to close', async () => {
    const { server, finish } = pendingServer();
    const storage = { close: vi.fn().mockResolvedValue(undefined) };

    const done = createShutdown(server, storage, logger())('SIGINT');
    finish(new Error('Server is not running.'));

    await expect(done).rejects.toThrow('Server is not running.');
    expect(storage.close).toHaveBeenCalledTimes(1);
  });
});
