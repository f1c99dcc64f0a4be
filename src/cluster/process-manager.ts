import { Logger } from '@nestjs/common';

export interface WorkerHandle {
  readonly id: number;
  kill(signal?: string): void;
}

export type WorkerExitListener = (worker: WorkerHandle, code: number | null, signal: string | null) => void;

/** The part of `node:cluster` the manager drives. */
export interface ClusterHost {
  fork(env: Record<string, string>): WorkerHandle;
  onExit(listener: WorkerExitListener): void;
}

export interface ProcessManagerOptions {
  workers: number;
  /** Extra environment for every worker. */
  env?: Record<string, string>;
  /** Delay before a crashed worker is replaced. */
  restartDelayMs?: number;
}

/**
 * Keeps a fixed pool of HTTP workers alive. A worker that dies is replaced
 * until `stop()` is called; `stop()` resolves once every worker has exited.
 */
export class ProcessManager {
  private readonly logger = new Logger(ProcessManager.name);
  private readonly workers = new Map<number, WorkerHandle>();
  private stopping = false;
  private onDrained: (() => void) | null = null;

  constructor(
    private readonly host: ClusterHost,
    private readonly options: ProcessManagerOptions,
  ) {}

  get size(): number {
    return this.workers.size;
  }

  start(): void {
    this.host.onExit((worker, code, signal) => this.handleExit(worker, code, signal));

    for (let i = 0; i < this.options.workers; i++) {
      this.spawn();
    }
    this.logger.log(`Started ${this.options.workers} worker(s)`);
  }

  stop(signal = 'SIGTERM'): Promise<void> {
    this.stopping = true;
    if (this.workers.size === 0) {
      return Promise.resolve();
    }

    this.logger.log(`Stopping ${this.workers.size} worker(s) with ${signal}`);
    const drained = new Promise<void>((resolve) => {
      this.onDrained = resolve;
    });
    for (const worker of this.workers.values()) {
      worker.kill(signal);
    }
    return drained;
  }

  private spawn(): void {
    const worker = this.host.fork(this.options.env ?? {});
    this.workers.set(worker.id, worker);
  }

  private handleExit(worker: WorkerHandle, code: number | null, signal: string | null): void {
    this.workers.delete(worker.id);

    if (this.stopping) {
      if (this.workers.size === 0 && this.onDrained) {
        this.onDrained();
        this.onDrained = null;
      }
      return;
    }

    this.logger.warn(`Worker ${worker.id} exited (code ${code ?? '-'}, signal ${signal ?? '-'}), restarting`);
    const delay = this.options.restartDelayMs ?? 0;
    if (delay > 0) {
      setTimeout(() => {
        if (!this.stopping) {
          this.spawn();
        }
      }, delay);
    } else {
      this.spawn();
    }
  }
}
