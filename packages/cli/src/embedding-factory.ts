/**
 * Creates an EmbeddingProvider from the `embedding` config section.
 *
 * Supported providers:
 *   hash: deterministic offline hashing (default; not semantic)
 *   ollama: local Ollama
 *   openai: OpenAI text-embedding-3-small / text-embedding-3-large
 *   google: Google text-embedding-004
 *   azure: Azure OpenAI deployment
 *   http: any OpenAI-compatible endpoint (Cohere, Voyage, Together, ...)
 */
import {
  GoogleEmbeddingProvider,
  HashEmbeddingProvider,
  HttpEmbeddingProvider,
  OllamaEmbeddingProvider,
  OpenAIEmbeddingProvider,
} from '@vecsync/core';
import type { EmbeddingProvider } from '@vecsync/core';
import type { Config } from './config';

export function createEmbeddingProvider(
  config: Config['embedding'],
  env: NodeJS.ProcessEnv = process.env,
): EmbeddingProvider {
  const { provider, model, apiKey, baseUrl, dim } = config;

  switch (provider) {
    case 'hash':
      return new HashEmbeddingProvider(dim);

    case 'ollama':
      return new OllamaEmbeddingProvider({ baseUrl, model, dim });

    case 'openai':
      if (!apiKey) throw new Error('embedding.provider=openai requires EMBEDDING_API_KEY');
      return new OpenAIEmbeddingProvider({ apiKey, model, baseUrl, dim });

    case 'google':
      if (!apiKey) throw new Error('embedding.provider=google requires EMBEDDING_API_KEY');
      return new GoogleEmbeddingProvider({ apiKey, model, dim });

    case 'azure':
      // EMBEDDING_BASE_URL: https://<resource>.cognitiveservices.azure.com/openai/deployments/<deployment>
      if (!baseUrl) throw new Error('embedding.provider=azure requires EMBEDDING_BASE_URL');
      if (!apiKey) throw new Error('embedding.provider=azure requires EMBEDDING_API_KEY');
      return new HttpEmbeddingProvider({
        baseUrl,
        model: model ?? 'text-embedding-ada-002',
        dim,
        headers: { 'api-key': apiKey },
        queryParams: { 'api-version': env.AZURE_API_VERSION ?? '2025-01-01-preview' },
      });

    case 'http':
      if (!baseUrl) throw new Error('embedding.provider=http requires EMBEDDING_BASE_URL');
      return new HttpEmbeddingProvider({
        baseUrl,
        apiKey,
        model: model ?? 'text-embedding-3-small',
        dim,
      });

    default:
      throw new Error(`Unknown embedding provider "${provider}"`);
  }
}
