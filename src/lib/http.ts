// Runtime-aware fetch resolution. Node 20 ships a global fetch; tests inject their own.
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

let cachedFetch: FetchLike | undefined = undefined;

export function getHttpFetch(): FetchLike {
  if (cachedFetch) return cachedFetch;
  if (typeof globalThis.fetch !== 'function') throw new Error('No fetch available');
  const f = globalThis.fetch.bind(globalThis);
  cachedFetch = (input, init) => f(input, init);
  return cachedFetch;
}
