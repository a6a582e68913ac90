import { describe, it, expect, vi } from 'vitest';
import { createShutdownHandler } from './shutdown';

describe('createShutdownHandler', () => {
  it('closes the server once and exits with 0', () => {
    const close = vi.fn((cb: (err?: Error) => void) => {
      cb();
    });
    const exit = vi.fn();
    const shutdown = createShutdownHandler({ close }, exit);

    shutdown('SIGTERM');

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(0);
  });

  it('ignores a second signal while the server is closing', () => {
    const close = vi.fn();
    const exit = vi.fn();
    const shutdown = createShutdownHandler({ close }, exit);

    shutdown('SIGINT');
    shutdown('SIGINT');
    shutdown('SIGTERM');

    expect(close).toHaveBeenCalledTimes(1);
    expect(exit).not.toHaveBeenCalled();
  });

  it('exits with 1 when closing fails', () => {
    const close = vi.fn((cb: (err?: Error) => void) => {
      cb(new Error('Server is not running.'));
    });
    const exit = vi.fn();

    createShutdownHandler({ close }, exit)('SIGTERM');

    expect(exit).toHaveBeenCalledTimes(1);
    expect(exit).toHaveBeenCalledWith(1);
  });
});
