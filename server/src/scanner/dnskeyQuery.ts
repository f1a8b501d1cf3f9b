import dgram from 'dgram';
import { randomInt } from 'crypto';
import { isIPv6 } from 'net';
import { type DecodedPacket, RECURSION_DESIRED, TRUNCATED_RESPONSE, decode, encode } from 'dns-packet';

export interface DnsServer {
  address: string;
  port: number;
}

const DNS_PORT = 53;

/** Reads one entry of `Resolver#getServers()`: `1.2.3.4`, `1.2.3.4:5353`, `::1` or `[::1]:5353`. */
export const parseDnsServer = (entry: string): DnsServer => {
  const bracketed = /^\[([^\]]+)\](?::(\d+))?$/.exec(entry);
  if (bracketed) {
    return { address: bracketed[1], port: bracketed[2] ? Number(bracketed[2]) : DNS_PORT };
  }
  if (isIPv6(entry)) return { address: entry, port: DNS_PORT };
  const [address, port] = entry.split(':');
  return { address, port: port ? Number(port) : DNS_PORT };
};

/**
 * Asks `server` for the DNSKEY set of `domain` over UDP. A truncated reply
 * means the key set did not fit in one datagram, so keys exist.
 */
export const queryDnskey = (domain: string, server: DnsServer, timeoutMs: number): Promise<boolean> =>
  new Promise<boolean>((resolve, reject) => {
    const socket = dgram.createSocket(isIPv6(server.address) ? 'udp6' : 'udp4');
    const id = randomInt(0, 0x10000);
    let settled = false;

    const finish = (err: Error | null, present = false) => {
      if (settled) return;
      settled = true;
      clearTimeout(timer);
      socket.close();
      if (err) reject(err);
      else resolve(present);
    };

    const timer = setTimeout(
      () => finish(new Error(`DNSKEY query for ${domain} timed out after ${timeoutMs}ms`)),
      timeoutMs
    );

    socket.on('message', (message: Buffer) => {
      let response: DecodedPacket;
      try {
        response = decode(message);
      } catch (err) {
        finish(err instanceof Error ? err : new Error(String(err)));
        return;
      }
      if (response.id !== id) return;
      const truncated = ((response.flags ?? 0) & TRUNCATED_RESPONSE) !== 0;
      finish(null, truncated || (response.answers ?? []).some((answer) => answer.type === 'DNSKEY'));
    });
    socket.once('error', (err) => finish(err));

    const query = encode({
      type: 'query',
      id,
      flags: RECURSION_DESIRED,
      questions: [{ type: 'DNSKEY', name: domain }],
    });
    socket.send(query, server.port, server.address, (err) => {
      if (err) finish(err);
    });
  });
