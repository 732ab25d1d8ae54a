import { execFile } from 'node:child_process';
import { lookup } from 'node:dns/promises';
import { Socket } from 'node:net';
import { platform } from 'node:os';

export interface HttpResponse {
  status: number;
  body: string;
}

/**
 * Network primitives a HostProbe needs. Each call is bounded by its own timeout.
 */
export interface ProbeNetwork {
  /** ICMP echo; resolves false on no reply */
  ping(address: string, timeoutMs: number): Promise<boolean>;
  /** TCP connect; resolves false on refusal or timeout */
  connect(address: string, port: number, timeoutMs: number): Promise<boolean>;
  /** HTTP GET; rejects on transport failure or timeout */
  httpGet(url: string, timeoutMs: number): Promise<HttpResponse>;
  /** Raw neighbor table output for one address; rejects if the tool fails */
  neighborTable(address: string, timeoutMs: number): Promise<string>;
  /** First IPv4 address for a hostname; rejects when unresolvable */
  resolve(hostname: string): Promise<string>;
}

function run(command: string, args: string[], timeoutMs: number): Promise<string> {
  return new Promise((resolve, reject) => {
    execFile(command, args, { timeout: timeoutMs, windowsHide: true }, (err, stdout) => {
      if (err) {
        reject(err);
        return;
      }
      resolve(stdout);
    });
  });
}

function pingArgs(address: string, timeoutMs: number): string[] {
  switch (platform()) {
    case 'win32':
      return ['-n', '1', '-w', String(timeoutMs), address];
    case 'darwin':
      return ['-c', '1', '-W', String(timeoutMs), address];
    default:
      return ['-c', '1', '-W', String(Math.max(1, Math.ceil(timeoutMs / 1000))), address];
  }
}

/**
 * ProbeNetwork backed by the OS ping/arp tools, node:net, fetch and DNS.
 */
export const systemNetwork: ProbeNetwork = {
  async ping(address, timeoutMs) {
    try {
      // The process gets some slack beyond the echo timeout to start and exit.
      await run('ping', pingArgs(address, timeoutMs), timeoutMs + 1_000);
      return true;
    } catch {
      return false;
    }
  },

  connect(address, port, timeoutMs) {
    return new Promise((resolve) => {
      const socket = new Socket();
      const finish = (ok: boolean): void => {
        socket.removeAllListeners();
        socket.destroy();
        resolve(ok);
      };
      socket.setTimeout(timeoutMs);
      socket.once('connect', () => finish(true));
      socket.once('timeout', () => finish(false));
      socket.once('error', () => finish(false));
      socket.connect(port, address);
    });
  },

  async httpGet(url, timeoutMs) {
    const response = await fetch(url, { signal: AbortSignal.timeout(timeoutMs) });
    return { status: response.status, body: await response.text() };
  },

  neighborTable(address, timeoutMs) {
    return run('arp', ['-a', address], timeoutMs);
  },

  async resolve(hostname) {
    const result = await lookup(hostname, { family: 4 });
    return result.address;
  },
};
