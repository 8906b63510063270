import * as net from "node:net";
import { setTimeout as sleep } from "node:timers/promises";
import { PortWaitTimeoutError } from "../types/errors";

/** Resolves true if host:port accepted a connection within `timeoutMs`. */
export type PortProbe = (host: string, port: number, timeoutMs: number) => Promise<boolean>;

export interface WaitForPortOptions {
  host: string;
  port: number;
  intervalMs?: number;
  /** 0 waits forever. */
  timeoutMs?: number;
  /** Upper bound for a single connection attempt. */
  probeTimeoutMs?: number;
  probe?: PortProbe;
}

export const tcpProbe: PortProbe = (host, port, timeoutMs) =>
  new Promise((resolve) => {
    const socket = net.connect({ host, port });
    const done = (ok: boolean) => {
      socket.removeAllListeners();
      socket.destroy();
      resolve(ok);
    };
    socket.setTimeout(timeoutMs);
    socket.once("connect", () => done(true));
    socket.once("timeout", () => done(false));
    socket.once("error", () => done(false));
  });

/** Settles false once `ms` elapse, unless `pending` settles first. */
function withDeadline(pending: Promise<boolean>, ms: number): Promise<boolean> {
  let timer: NodeJS.Timeout | undefined;
  const expired = new Promise<boolean>((resolve) => {
    timer = setTimeout(() => resolve(false), ms);
  });
  return Promise.race([pending, expired]).finally(() => clearTimeout(timer));
}

/** Polls until the port accepts connections. Returns the number of attempts. */
export async function waitForPort(opts: WaitForPortOptions): Promise<number> {
  const probe = opts.probe ?? tcpProbe;
  const interval = opts.intervalMs ?? 100;
  const timeout = opts.timeoutMs ?? 0;
  const probeTimeout = opts.probeTimeoutMs ?? 1000;
  const deadline = timeout > 0 ? Date.now() + timeout : Infinity;
  let attempts = 0;
  for (;;) {
    attempts++;
    const budget = Math.max(1, Math.min(probeTimeout, deadline - Date.now()));
    if (await withDeadline(probe(opts.host, opts.port, budget), budget)) {
      return attempts;
    }
    if (Date.now() >= deadline) {
      throw new PortWaitTimeoutError(opts.host, opts.port, timeout);
    }
    await sleep(Math.min(interval, Math.max(0, deadline - Date.now())));
  }
}
