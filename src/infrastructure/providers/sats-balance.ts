import { z } from 'zod';
import type { BalanceProvider } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';

const satsBalanceSchema = z.object({
  balance: z.array(z.number()).min(1, 'Missing SATs balance'),
});

/**
 * SATS balance from the off-chain balance service:
 * `GET <baseUrl>/<principal>` answering `{ balance: [number, ...] }`.
 */
export class SatsBalanceProvider implements BalanceProvider {
  readonly name = 'sats';
  readonly field = 'sats_balance';

  constructor(private readonly baseUrl: string) {}

  async lookup(identity: string, signal: AbortSignal): Promise<number> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(identity)}`;
    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw new PipelineError('ProviderError', `SATS balance service returned ${response.status}`, {
        upstreamStatus: response.status,
      });
    }

    const parsed = satsBalanceSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PipelineError('ProviderError', `Unexpected SATS balance response: ${parsed.error.message}`);
    }
    return parsed.data.balance[0] ?? 0;
  }
}
