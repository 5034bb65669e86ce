import net from 'node:net';

import { LOCAL_HOSTS, TIMEOUTS } from '../constants/index.js';

export type PortProbeOptions = {
  host?: string;
  timeoutMs?: number;
};

/**
 * Connect-and-close check against a local TCP port. Resolves false on refusal,
 * timeout or any socket error; never rejects.
 */
export function isPortOpen(port: number, options: PortProbeOptions = {}): Promise<boolean> {
  const host = options.host ?? LOCAL_HOSTS.IPV4;
  const timeoutMs = options.timeoutMs ?? TIMEOUTS.PORT_PROBE;

  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    const socket = new net.Socket();
    let settled = false;
    const finish = (open: boolean): void => {
      if (settled) {
        return;
      }
      settled = true;
      clearTimeout(timer);
      socket.destroy();
      resolve(open);
    };
    const timer = setTimeout(() => finish(false), timeoutMs);

    socket.once('connect', () => finish(true));
    socket.once('error', () => finish(false));
    try {
      socket.connect({ port, host });
    } catch {
      finish(false);
    }
  });
}
