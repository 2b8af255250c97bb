import { linkAbort } from '../request-context.js';
import type { ClientOperation } from '../types.js';
import { randomHeaders, randomQuery } from './content.js';

export const getOperation: ClientOperation = {
  name: 'GET',
  async run(ctx) {
    await ctx.client.request('/get', { signal: ctx.signal });
  },
};

export const getParametersOperation: ClientOperation = {
  name: 'GET Parameters',
  async run(ctx) {
    await ctx.client.request(`/variables?${randomQuery(ctx)}`, { signal: ctx.signal });
  },
};

export const getHeadersOperation: ClientOperation = {
  name: 'GET Headers',
  async run(ctx) {
    await ctx.client.request('/headers', { headers: randomHeaders(ctx), signal: ctx.signal });
  },
};

export const headOperation: ClientOperation = {
  name: 'HEAD',
  async run(ctx) {
    await ctx.client.request('/', { method: 'HEAD', signal: ctx.signal });
  },
};

/**
 * Aborts its own request after a few random milliseconds. That abort is the
 * expected result; only cancellation of the surrounding context propagates.
 */
export const getAbortedOperation: ClientOperation = {
  name: 'GET Aborted',
  async run(ctx) {
    const controller = new AbortController();
    const unlink = linkAbort(ctx.signal, controller);
    const timer = setTimeout(() => controller.abort(), ctx.random.nextInt(0, 5));

    try {
      await ctx.client.request('/slow', { signal: controller.signal });
    } catch (error) {
      const abortedByUs =
        controller.signal.aborted && error === controller.signal.reason && !ctx.isCancellationRequested;
      if (!abortedByUs) throw error;
    } finally {
      clearTimeout(timer);
      unlink();
    }
  },
};
