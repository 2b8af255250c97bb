import type { RequestContext } from '../types.js';

/** Between 1 and `maxParameters` query parameters with random values. */
export function randomQuery(ctx: RequestContext): URLSearchParams {
  const params = new URLSearchParams();
  const count = ctx.random.nextInt(1, ctx.config.maxParameters + 1);
  for (let i = 0; i < count; i++) {
    params.append(`p${i}`, ctx.random.nextString(ctx.random.nextInt(1, 21)));
  }
  return params;
}

export function randomHeaders(ctx: RequestContext): Record<string, string> {
  const headers: Record<string, string> = {};
  const count = ctx.random.nextInt(1, ctx.config.maxParameters + 1);
  for (let i = 0; i < count; i++) {
    headers[`x-stress-${i}`] = ctx.random.nextString(ctx.random.nextInt(1, 21));
  }
  return headers;
}

/** Random body of at most `maxContentLength` characters. */
export function randomContent(ctx: RequestContext): string {
  return ctx.random.nextString(ctx.random.nextInt(0, ctx.config.maxContentLength + 1));
}
