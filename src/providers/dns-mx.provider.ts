import { Resolver } from 'dns/promises';
import type { MxRecord } from 'dns';
import type { MxLookup } from '../types/dns.types.js';

/**
 * Default MX lookup
 *
 * Uses a dedicated Resolver per lookup so that aborting the signal cancels only
 * this lookup's outstanding queries (the pending promise rejects with ECANCELLED).
 */
export const dnsMxLookup: MxLookup = async (domain: string, signal: AbortSignal): Promise<MxRecord[]> => {
  const resolver = new Resolver({ tries: 1 });

  if (signal.aborted) {
    resolver.cancel();
  }

  const onAbort = () => resolver.cancel();
  signal.addEventListener('abort', onAbort, { once: true });

  try {
    return await resolver.resolveMx(domain);
  } finally {
    signal.removeEventListener('abort', onAbort);
  }
};
