import { ClusterHost, ProcessManager, WorkerExitListener, WorkerHandle } from './process-manager';

class FakeCluster implements ClusterHost {
  readonly forks: Array<{ worker: WorkerHandle; env: Record<string, string> }> = [];
  readonly kills: Array<{ id: number; signal: string | undefined }> = [];
  private listener: WorkerExitListener | null = null;

  fork(env: Record<string, string>): WorkerHandle {
    const worker: WorkerHandle = {
      id: this.forks.length + 1,
      kill: (signal?: string) => {
        this.kills.push({ id: worker.id, signal });
      },
    };
    this.forks.push({ worker, env });
    return worker;
  }

  onExit(listener: WorkerExitListener): void {
    this.listener = listener;
  }

  exit(id: number, code: number | null = 1, signal: string | null = null): void {
    const fork = this.forks.find((entry) => entry.worker.id === id);
    if (fork && this.listener) {
      this.listener(fork.worker, code, signal);
    }
  }
}

describe('ProcessManager', () => {
  let host: FakeCluster;

  beforeEach(() => {
    host = new FakeCluster();
  });

  it('forks the configured number of workers with the shared environment', () => {
    const manager = new ProcessManager(host, { workers: 4, env: { CHROMEDRIVER_PATH: '/opt/chromedriver' } });

    manager.start();

    expect(manager.size).toBe(4);
    expect(host.forks.map((entry) => entry.env)).toEqual(
      Array.from({ length: 4 }, () => ({ CHROMEDRIVER_PATH: '/opt/chromedriver' })),
    );
  });

  it('replaces a worker that dies', () => {
    const manager = new ProcessManager(host, { workers: 2 });
    manager.start();

    host.exit(1);

    expect(host.forks).toHaveLength(3);
    expect(manager.size).toBe(2);
  });

  it('replaces a worker after the restart delay', () => {
    jest.useFakeTimers();
    try {
      const manager = new ProcessManager(host, { workers: 1, restartDelayMs: 1000 });
      manager.start();

      host.exit(1);
      expect(manager.size).toBe(0);

      jest.advanceTimersByTime(1000);
      expect(manager.size).toBe(1);
      expect(host.forks).toHaveLength(2);
    } finally {
      jest.useRealTimers();
    }
  });

  it('signals every worker on stop and resolves once all have exited', async () => {
    const manager = new ProcessManager(host, { workers: 2 });
    manager.start();

    let stopped = false;
    const stopping = manager.stop('SIGINT').then(() => {
      stopped = true;
    });

    expect(host.kills).toEqual([
      { id: 1, signal: 'SIGINT' },
      { id: 2, signal: 'SIGINT' },
    ]);

    host.exit(1, null, 'SIGINT');
    await Promise.resolve();
    expect(stopped).toBe(false);

    host.exit(2, null, 'SIGINT');
    await stopping;

    expect(stopped).toBe(true);
    expect(host.forks).toHaveLength(2);
    expect(manager.size).toBe(0);
  });

  it('resolves stop immediately without workers', async () => {
    const manager = new ProcessManager(host, { workers: 0 });
    manager.start();

    await expect(manager.stop()).resolves.toBeUndefined();
  });
});
