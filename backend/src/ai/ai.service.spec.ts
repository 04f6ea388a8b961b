import { describe, expect, it } from '@jest/globals';
import { FakeAiProvider } from '../../test/support/fake-ai-provider.js';
import { ProviderError } from './ai.errors.js';
import { AIService } from './ai.service.js';

describe('AIService', () => {
  it('embeds a single input', async () => {
    const service = new AIService(new FakeAiProvider(['alpha', 'beta']));

    await expect(service.embedOne('beta beta alpha')).resolves.toEqual([1, 2]);
  });

  it('fails when the provider returns no vector', async () => {
    const provider = new FakeAiProvider();
    provider.embedText.mockResolvedValueOnce({ embeddings: [] });
    const service = new AIService(provider);

    const error = await service.embedOne('anything').catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({
      code: 'PROVIDER_REQUEST_FAILED',
      provider: 'fake',
    });
  });
});
