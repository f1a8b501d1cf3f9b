import dgram from 'dgram';
import type { AddressInfo } from 'net';
import { type Answer, RECURSION_DESIRED, TRUNCATED_RESPONSE, decode, encode } from 'dns-packet';
import { afterEach, describe, expect, it } from 'vitest';
import { parseDnsServer, queryDnskey } from './dnskeyQuery';

type Reply = (query: ReturnType<typeof decode>) => Buffer | null;

const servers: dgram.Socket[] = [];

/** UDP responder on loopback that answers each query with `reply`. */
const startResponder = (reply: Reply) =>
  new Promise<number>((resolve) => {
    const server = dgram.createSocket('udp4');
    servers.push(server);
    server.on('message', (message, remote) => {
      const answer = reply(decode(message));
      if (answer) server.send(answer, remote.port, remote.address);
    });
    server.bind(0, '127.0.0.1', () => {
      const address: AddressInfo = server.address();
      resolve(address.port);
    });
  });

const respond = (query: ReturnType<typeof decode>, answers: Answer[], flags = RECURSION_DESIRED) =>
  encode({ type: 'response', id: query.id, flags, questions: query.questions, answers });

afterEach(() => {
  for (const server of servers.splice(0)) server.close();
});

describe('parseDnsServer', () => {
  it('should read addresses with and without ports', () => {
    expect(parseDnsServer('192.0.2.53')).toEqual({ address: '192.0.2.53', port: 53 });
    expect(parseDnsServer('192.0.2.53:5353')).toEqual({ address: '192.0.2.53', port: 5353 });
    expect(parseDnsServer('2001:db8::53')).toEqual({ address: '2001:db8::53', port: 53 });
    expect(parseDnsServer('[2001:db8::53]:5353')).toEqual({ address: '2001:db8::53', port: 5353 });
  });
});

describe('queryDnskey', () => {
  it('should report keys when the answer holds a DNSKEY record', async () => {
    const port = await startResponder((query) =>
      respond(query, [
        {
          type: 'DNSKEY',
          name: 'secure.example.com',
          ttl: 300,
          data: { flags: 257, algorithm: 13, key: Buffer.from('test-key') },
        },
      ])
    );

    await expect(queryDnskey('secure.example.com', { address: '127.0.0.1', port }, 1000)).resolves.toBe(true);
  });

  it('should ask for the DNSKEY type with recursion', async () => {
    const seen: string[] = [];
    const port = await startResponder((query) => {
      seen.push(...(query.questions ?? []).map((question) => `${question.type} ${question.name}`));
      return respond(query, []);
    });

    await expect(queryDnskey('plain.example.com', { address: '127.0.0.1', port }, 1000)).resolves.toBe(false);
    expect(seen).toEqual(['DNSKEY plain.example.com']);
  });

  it('should count a truncated reply as signed', async () => {
    const port = await startResponder((query) =>
      respond(query, [], RECURSION_DESIRED | TRUNCATED_RESPONSE)
    );

    await expect(queryDnskey('big.example.com', { address: '127.0.0.1', port }, 1000)).resolves.toBe(true);
  });

  it('should time out when nothing answers', async () => {
    const port = await startResponder(() => null);

    await expect(queryDnskey('quiet.example.com', { address: '127.0.0.1', port }, 50)).rejects.toThrow(
      'DNSKEY query for quiet.example.com timed out after 50ms'
    );
  });
});
