import { z } from 'zod';
import type { CreatorStatusProvider } from '../../domain/index.js';
import { PipelineError } from '../../domain/index.js';

const creatorStatusSchema = z.object({
  is_creator: z.boolean(),
});

/**
 * Asks the creator registry whether `identity` created the canister
 * `scope`: `GET <baseUrl>/<scope>?principal=<identity>`.
 */
export class HttpCreatorStatusProvider implements CreatorStatusProvider {
  constructor(private readonly baseUrl: string) {}

  async lookup(identity: string, scope: string, signal: AbortSignal): Promise<boolean> {
    const url = new URL(`${this.baseUrl.replace(/\/+$/, '')}/${encodeURIComponent(scope)}`);
    url.searchParams.set('principal', identity);

    const response = await fetch(url, { signal });
    if (!response.ok) {
      throw new PipelineError('ProviderError', `Creator registry returned ${response.status}`, {
        upstreamStatus: response.status,
      });
    }

    const parsed = creatorStatusSchema.safeParse(await response.json());
    if (!parsed.success) {
      throw new PipelineError('ProviderError', 'Unexpected creator registry response');
    }
    return parsed.data.is_creator;
  }
}
