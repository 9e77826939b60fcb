import { deepEqual, equal, ok } from 'node:assert';
import { after, before, describe, it } from 'node:test';
import { setTimeout as delay } from 'node:timers/promises';
import { GatewayConfig, ReloadSummary, Transaction } from '../../../src';
import {
  TestBackend,
  TestGateway,
  startBackend,
  startGateway
} from '../../libs/servers';

const routeJobsTo = (backend: string, version: string): GatewayConfig => ({
  version,
  routes: [{ name: 'jobs', prefix: '/jobs', backend }]
});

describe('Configuration reload', () => {
  let arrived: () => void = () => undefined;
  let slowBackend: TestBackend;
  let fastBackend: TestBackend;
  let gateway: TestGateway;

  before(async () => {
    slowBackend = await startBackend((request, response) => {
      arrived();
      const timer = setTimeout(() => response.type('text/plain').send('slow'), 300);

      response.on('close', () => clearTimeout(timer));
    });
    fastBackend = await startBackend((request, response) => {
      response.type('text/plain').send('fast');
    });
    gateway = await startGateway(routeJobsTo(slowBackend.url, '1.0'));
  });

  after(async () => {
    await gateway.stop();
    await slowBackend.close();
    await fastBackend.close();
  });

  it('should finish in-flight requests on the table they started with', async () => {
    const backendReached = new Promise<void>((resolve) => {
      arrived = () => resolve();
    });
    const transactions: Transaction[] = [];
    const recordTransaction = (transaction: Transaction) => {
      transactions.push(transaction);
    };
    gateway.server.on('transaction-complete', recordTransaction);

    const inFlight = fetch(`${gateway.url}/jobs/1`);
    await backendReached;

    const result = gateway.server.applyConfig(
      routeJobsTo(fastBackend.url, '2.0'),
      'test'
    );
    ok(result.success);

    const afterSwap = await fetch(`${gateway.url}/jobs/2`);
    equal(await afterSwap.text(), 'fast');

    const firstResponse = await inFlight;
    equal(await firstResponse.text(), 'slow');

    // both responses are sent, wait for their close events
    await delay(50);
    gateway.server.off('transaction-complete', recordTransaction);

    deepEqual(
      transactions
        .map((transaction) => [transaction.path, transaction.revision])
        .sort(),
      [
        ['/jobs/1', 1],
        ['/jobs/2', 2]
      ]
    );
  });

  it('should keep the active tables when a configuration is rejected', async () => {
    const rejections: string[][] = [];
    gateway.server.once('config-reload-rejected', (_source, issues) => {
      rejections.push(issues);
    });

    const result = gateway.server.applyConfig(
      {
        version: '3.0',
        routes: [{ prefix: '/jobs', backend: slowBackend.url }],
        mocks: [{ template: '/jobs/:id', body: '{{name}}' }]
      },
      'test'
    );

    equal(result.success, false);
    deepEqual(rejections, [
      ['mocks[0].body: body references unknown capture(s) name (available: id)']
    ]);
    equal(gateway.loader.getSnapshot().revision, 2);

    const response = await fetch(`${gateway.url}/jobs/3`);
    equal(await response.text(), 'fast');
  });

  it('should announce accepted configurations', () => {
    const summaries: ReloadSummary[] = [];
    gateway.server.once('config-reloaded', (summary) => {
      summaries.push(summary);
    });

    const result = gateway.server.applyConfig(
      {
        version: '4.0',
        routes: [{ prefix: '/jobs', backend: fastBackend.url }],
        mocks: [{ path: '/jobs/cancelled', statusCode: 410, body: 'gone' }]
      },
      'inline'
    );

    ok(result.success);
    deepEqual(summaries, [
      { revision: 3, version: '4.0', source: 'inline', routes: 1, mocks: 1 }
    ]);
  });

  it('should answer new mocks before the routes right after the swap', async () => {
    const response = await fetch(`${gateway.url}/jobs/cancelled`);

    equal(response.status, 410);
    equal(await response.text(), 'gone');
  });

  it('should never serve a request from a mix of two tables', async () => {
    const answeredBy = new Map<number, string>();
    const transactions = new Map<string, Transaction>();
    const recordTransaction = (transaction: Transaction) => {
      transactions.set(transaction.path, transaction);
    };
    gateway.server.on('transaction-complete', recordTransaction);

    const requests: Promise<[string, number, string]>[] = [];

    for (let index = 0; index < 6; index++) {
      const slow = index % 2 === 0;
      const result = gateway.server.applyConfig(
        routeJobsTo(slow ? slowBackend.url : fastBackend.url, `5.${index}`),
        'test'
      );
      ok(result.success);
      answeredBy.set(result.summary.revision, slow ? 'slow' : 'fast');

      const backendReached = slow
        ? new Promise<void>((resolve) => {
            arrived = () => resolve();
          })
        : undefined;
      const path = `/jobs/overlap-${index}`;

      requests.push(
        fetch(`${gateway.url}${path}`).then(async (response): Promise<[string, number, string]> => [
          path,
          response.status,
          await response.text()
        ])
      );

      // the next swap happens while this request waits on the backend
      if (backendReached) {
        await backendReached;
      }
    }

    const answers = await Promise.all(requests);

    await delay(50);
    gateway.server.off('transaction-complete', recordTransaction);

    answers.forEach(([path, status, body]) => {
      const revision = transactions.get(path)?.revision;

      equal(status, 200);
      ok(revision !== undefined);
      equal(answeredBy.get(revision), body);
    });
  });
});
