import type { ClientOperation } from '../types.js';
import { randomContent } from './content.js';

const TEXT = { 'content-type': 'text/plain; charset=utf-8' };

export const postOperation: ClientOperation = {
  name: 'POST',
  async run(ctx) {
    await ctx.client.request('/post', {
      method: 'POST',
      headers: TEXT,
      body: randomContent(ctx),
      signal: ctx.signal,
    });
  },
};

export const putOperation: ClientOperation = {
  name: 'PUT',
  async run(ctx) {
    await ctx.client.request('/put', {
      method: 'PUT',
      headers: TEXT,
      body: randomContent(ctx),
      signal: ctx.signal,
    });
  },
};
