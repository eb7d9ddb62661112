import { createConnection } from "node:net";

// ── Connectivity Probe ──────────────────────────────────────────────────────

export interface ConnectivityResult {
  readonly host: string;
  readonly port: number;
  readonly reachable: boolean;
  readonly latencyMs: number | null;
  readonly error?: string;
}

export interface ConnectivityProbe {
  check(signal?: AbortSignal): Promise<ConnectivityResult>;
}

/**
 * Reachability via a bounded TCP connect. Needs no raw-socket privileges,
 * unlike ICMP.
 */
export class TcpConnectivityProbe implements ConnectivityProbe {
  constructor(
    private readonly host: string,
    private readonly port: number,
    private readonly timeoutMs: number,
  ) {}

  check(signal?: AbortSignal): Promise<ConnectivityResult> {
    const { host, port } = this;
    const started = performance.now();

    return new Promise((resolve) => {
      const socket = createConnection({ host, port });

      let settled = false;

      const finish = (reachable: boolean, error?: string): void => {
        if (settled) return;
        settled = true;
        clearTimeout(timer);
        signal?.removeEventListener("abort", onAbort);
        socket.destroy();
        resolve({
          host,
          port,
          reachable,
          latencyMs: reachable ? Math.round(performance.now() - started) : null,
          ...(error !== undefined ? { error } : {}),
        });
      };

      const onAbort = (): void => finish(false, "aborted");
      const timer = setTimeout(
        () => finish(false, `timed out after ${this.timeoutMs}ms`),
        this.timeoutMs,
      );

      socket.once("connect", () => finish(true));
      socket.on("error", (err) => finish(false, err.message));

      if (signal?.aborted) {
        finish(false, "aborted");
        return;
      }
      signal?.addEventListener("abort", onAbort, { once: true });
    });
  }
}
