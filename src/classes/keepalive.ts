import { SSHTransport } from '../interfaces';
import { KeepaliveLostError } from '../lib/errors';

export const DEFAULT_KEEPALIVE_INTERVAL_MS = 60000;

export interface KeepaliveOptions {
  intervalMs?: number;
  /**
   * @description Called once when the transport is found inactive or a keepalive fails.
   */
  onLost: (reason: KeepaliveLostError) => void;
}

/**
 * Periodically pings a transport. Stops on the first loss, or as soon as `stop()` is called.
 */
export class KeepaliveTask {
  private timer: NodeJS.Timeout | null = null;
  private stopped = true;
  private readonly intervalMs: number;
  private readonly onLost: (reason: KeepaliveLostError) => void;

  constructor(
    private readonly transport: SSHTransport,
    options: KeepaliveOptions
  ) {
    this.intervalMs = options.intervalMs ?? DEFAULT_KEEPALIVE_INTERVAL_MS;
    this.onLost = options.onLost;
  }

  get running(): boolean {
    return !this.stopped;
  }

  start(): void {
    if (!this.stopped) return;
    this.stopped = false;
    this.schedule();
  }

  stop(): void {
    this.stopped = true;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  private schedule(): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      this.tick().catch((error) =>
        this.lose(new KeepaliveLostError('Keepalive check failed', { cause: error }))
      );
    }, this.intervalMs);
    this.timer.unref();
  }

  private async tick(): Promise<void> {
    if (this.stopped) return;

    if (!this.transport.isActive()) {
      this.lose(new KeepaliveLostError('Transport is no longer active'));
      return;
    }

    await this.transport.sendKeepalive();

    // stop() may have run while the keepalive was in flight
    if (!this.stopped) {
      this.schedule();
    }
  }

  private lose(reason: KeepaliveLostError): void {
    if (this.stopped) return;
    this.stop();
    this.onLost(reason);
  }
}
