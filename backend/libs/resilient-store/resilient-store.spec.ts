import { register } from '../observability/metrics';
import { ResilientStore, type ResilientStoreOptions } from './resilient-store';
import {
  MalformedDescriptorError,
  StoreClosedError,
  TransportConfigError,
  ValueEncodingError,
} from './resilient-store.errors';
import { InMemoryConnectionFactory, connectionRefused } from './testing';
import { decodeJson } from './value-codec';

async function collect(source: AsyncIterable<Buffer>): Promise<string[]> {
  const values: string[] = [];
  for await (const value of source) {
    values.push(value.toString('utf8'));
  }
  return values;
}

async function operationCount(operation: string, outcome: string) {
  const metric = await register.getSingleMetric('store_operations_total')?.get();
  const sample = metric?.values.find(
    (value) =>
      value.labels.operation === operation && value.labels.outcome === outcome,
  );
  return sample?.value ?? 0;
}

describe('ResilientStore', () => {
  let factory: InMemoryConnectionFactory;
  let store: ResilientStore;

  const storeFor = <T = unknown>(
    url = 'redis://localhost:6379',
    options: ResilientStoreOptions<T> = {},
  ) =>
    new ResilientStore<T>(url, {
      connectionFactory: factory,
      reconnection: { sleep: async () => undefined },
      ...options,
    });

  beforeEach(async () => {
    register.resetMetrics();
    factory = new InMemoryConnectionFactory();
    store = storeFor();
    await store.connect();
  });

  afterEach(async () => {
    await store.close();
  });

  describe('operations', () => {
    it('stores values as JSON', async () => {
      await store.set('policy:1', { effect: 'allow', actions: ['read'] });

      const bytes = await store.get('policy:1');

      expect(bytes?.toString('utf8')).toBe('{"effect":"allow","actions":["read"]}');
      expect(bytes && decodeJson(bytes)).toEqual({
        effect: 'allow',
        actions: ['read'],
      });
    });

    it('returns null for a missing key', async () => {
      await expect(store.get('missing')).resolves.toBeNull();
    });

    it('writes with setIfAbsent only when the key is absent', async () => {
      await expect(store.setIfAbsent('lock', 'first')).resolves.toBe(true);
      await expect(store.setIfAbsent('lock', 'second')).resolves.toBe(false);

      expect(factory.server.entries.get('lock')?.toString()).toBe('"first"');
    });

    it('deletes keys, including ones that do not exist', async () => {
      await store.set('policy:1', 1);

      await store.delete('policy:1');
      await store.delete('policy:1');

      await expect(store.get('policy:1')).resolves.toBeNull();
    });

    it('uses a custom encoder', async () => {
      const upper = storeFor<string>('redis://localhost:6379', {
        encoder: (value) => Buffer.from(value.toUpperCase()),
      });
      await upper.connect();

      await upper.set('greeting', 'hello');

      expect(factory.server.entries.get('greeting')?.toString()).toBe('HELLO');
      await upper.close();
    });

    it('rejects values without a JSON form before touching the store', async () => {
      await expect(store.set('counter', 10n)).rejects.toThrow(ValueEncodingError);
      await expect(store.set('nothing', undefined)).rejects.toThrow(
        'Value of type undefined has no JSON form',
      );

      expect(factory.server.commandCounts.set).toBe(0);
    });
  });

  describe('scan', () => {
    beforeEach(() => {
      const seed: Record<string, string> = { 'other:1': 'x' };
      for (let index = 0; index < 25; index++) {
        seed[`policy:${String(index).padStart(2, '0')}`] = `p${index}`;
      }
      factory.server.seed(seed);
    });

    it('yields every value matching the pattern across pages', async () => {
      const scanning = storeFor('redis://localhost:6379', { scanCount: 10 });
      await scanning.connect();

      const values = await collect(scanning.scan('policy:*'));

      expect(values).toHaveLength(25);
      expect(new Set(values).size).toBe(25);
      expect(values).not.toContain('x');
      expect(factory.server.commandCounts.scan).toBe(3);
      await scanning.close();
    });

    it('yields nothing when no key matches', async () => {
      await expect(collect(store.scan('session:*'))).resolves.toEqual([]);
    });

    it('skips keys deleted between SCAN and GET', async () => {
      factory.server.entries.clear();
      factory.server.seed({ a: '1', b: '2' });
      const original = factory.server.entries;
      const scanning = storeFor('redis://localhost:6379', { scanCount: 10 });
      await scanning.connect();

      const values: string[] = [];
      for await (const value of scanning.scan('*')) {
        values.push(value.toString());
        original.delete('b');
      }

      expect(values).toEqual(['1']);
      await scanning.close();
    });

    it('restarts from the first page after a transient failure', async () => {
      const scanning = storeFor('redis://localhost:6379', { scanCount: 10 });
      await scanning.connect();
      factory.server.entries.delete('other:1');
      factory.server.failNext('scan', 1, () => connectionRefused(), 1);

      const values = await collect(scanning.scan('policy:*'));

      expect(values).toHaveLength(35);
      expect(new Set(values).size).toBe(25);
      expect(factory.resolutions).toBe(3);
      await scanning.close();
    });
  });

  describe('recovery', () => {
    beforeEach(async () => {
      await store.set('policy:1', 'v1');
    });

    it('retries once after a connection failure without the caller noticing', async () => {
      const before = factory.lastConnection;
      factory.server.failNext('get', 1);

      const bytes = await store.get('policy:1');

      expect(bytes?.toString()).toBe('"v1"');
      expect(factory.resolutions).toBe(2);
      expect(before?.isClosed).toBe(true);
      expect(store.reconnectionState).toBe('idle');
      await expect(operationCount('get', 'retried')).resolves.toBe(1);
    });

    it('recovers on READONLY replies after a failover', async () => {
      factory.server.failNext(
        'set',
        1,
        () => new Error("READONLY You can't write against a read only replica."),
      );

      await store.set('policy:2', 'v2');

      expect(factory.resolutions).toBe(2);
      expect(factory.server.entries.get('policy:2')?.toString()).toBe('"v2"');
    });

    it('throws the second failure as is', async () => {
      const failure = connectionRefused();
      factory.server.failNext('get', 2, () => failure);

      await expect(store.get('policy:1')).rejects.toBe(failure);

      expect(factory.resolutions).toBe(2);
      await expect(operationCount('get', 'failed')).resolves.toBe(1);
    });

    it('does not reconnect on an application error', async () => {
      factory.server.failNext(
        'get',
        1,
        () =>
          new Error(
            'WRONGTYPE Operation against a key holding the wrong kind of value',
          ),
      );

      await expect(store.get('policy:1')).rejects.toThrow(/^WRONGTYPE/);
      expect(factory.resolutions).toBe(1);
    });

    it('runs a single episode for concurrent failures', async () => {
      const concurrent = storeFor('redis://localhost:6379', {
        reconnection: { deferredWaitMs: 5 },
      });
      await concurrent.connect();
      factory.server.failNext('get', 2);

      const [first, second] = await Promise.all([
        concurrent.get('policy:1'),
        concurrent.get('missing'),
      ]);

      expect(first?.toString()).toBe('"v1"');
      expect(second).toBeNull();
      expect(factory.resolutions).toBe(3);
      await concurrent.close();
    });

    it('follows the primary to its new address', async () => {
      factory.primaries.set('policies', { host: '10.0.0.5', port: 6379 });
      const discovered = storeFor('redis+sentinel://s1,s2/policies');
      await discovered.connect();
      expect(factory.lastConnection?.label).toBe('10.0.0.5:6379');

      factory.primaries.set('policies', { host: '10.0.0.6', port: 6379 });
      factory.server.failNext('get', 1);

      await expect(discovered.get('policy:1')).resolves.toEqual(
        Buffer.from('"v1"'),
      );
      expect(factory.lastConnection?.label).toBe('10.0.0.6:6379');
      await discovered.close();
    });

    it('propagates an abandoned reconnection', async () => {
      factory.server.failNext('get', 1);
      factory.failNextConnect(
        () => new TransportConfigError('Malformed certificate in /etc/ca.pem'),
      );

      await expect(store.get('policy:1')).rejects.toThrow(
        'Reconnection to redis://localhost:6379 abandoned: Malformed certificate in /etc/ca.pem',
      );
    });
  });

  describe('connect', () => {
    it('leaves a transient initial failure to the first operation', async () => {
      const lazy = storeFor();
      factory.failNextConnect();

      await expect(lazy.connect()).resolves.toBeUndefined();
      await expect(lazy.get('missing')).resolves.toBeNull();

      expect(factory.calls.fromUrl).toBe(3);
      await lazy.close();
    });

    it('throws a configuration error from the initial connection', async () => {
      const broken = storeFor();
      factory.failNextConnect(() => new TransportConfigError('bad CA'));

      await expect(broken.connect()).rejects.toThrow(TransportConfigError);
    });

    it('closes a connection that resolves after the store was closed', async () => {
      factory.primaries.set('g', { host: '10.0.0.5', port: 6379 });
      const racing = storeFor('redis+sentinel://s1/g');

      const pending = racing.connect().catch((error: unknown) => error);
      await racing.close();

      expect(await pending).toBeInstanceOf(StoreClosedError);
      expect(factory.calls.connect).toBe(1);
      expect(factory.lastConnection?.label).toBe('10.0.0.5:6379');
      expect(factory.lastConnection?.isClosed).toBe(true);
    });

    it('is a no-op once connected', async () => {
      await store.connect();

      expect(factory.resolutions).toBe(1);
    });

    it('rejects a malformed connection string', () => {
      expect(() => storeFor('memcached://localhost:11211')).toThrow(
        MalformedDescriptorError,
      );
    });

    it('rejects an unusable CA bundle at construction', () => {
      expect(() =>
        storeFor('redis+sentinel://s1/m?ssl=true&ssl_ca_certs=/nonexistent/ca.pem'),
      ).toThrow(TransportConfigError);
      expect(factory.calls.connectSentinel).toBe(0);
    });

    it('describes its target without credentials', () => {
      expect(storeFor('redis://:secret@cache:6379').target).toBe(
        'redis://:****@cache:6379',
      );
    });
  });

  describe('close', () => {
    it('closes the connection and refuses further work', async () => {
      await store.close();

      expect(factory.connections[0].isClosed).toBe(true);
      await expect(store.get('policy:1')).rejects.toThrow(StoreClosedError);
      await expect(store.connect()).rejects.toThrow(StoreClosedError);
      await expect(collect(store.scan('*'))).rejects.toThrow(StoreClosedError);
      expect(factory.resolutions).toBe(1);
    });

    it('can be called more than once', async () => {
      await store.close();
      await store.close();

      expect(factory.server.commandCounts.close).toBe(1);
    });
  });

  describe('healthCheck', () => {
    it('reports a live connection', async () => {
      await expect(store.healthCheck()).resolves.toBe(true);
    });

    it('reports a failed ping without reconnecting', async () => {
      factory.server.failNext('ping', 1);

      await expect(store.healthCheck()).resolves.toBe(false);
      expect(factory.resolutions).toBe(1);
    });

    it('reports a store that never connected', async () => {
      factory.failNextConnect();
      const lazy = storeFor();
      await lazy.connect();

      await expect(lazy.healthCheck()).resolves.toBe(false);
    });
  });
});
