import { BedrockRuntimeClient, InvokeModelCommand } from '@aws-sdk/client-bedrock-runtime';
import { z } from 'zod';
import type { OracleConfig } from '../config.js';
import type { Completion, CompletionTransport } from './judgment-oracle.js';

// Anthropic messages response, as returned by InvokeModel.
const messageResponse = z.object({
  content: z.array(z.object({ type: z.string(), text: z.string().optional() })).default([]),
  usage: z
    .object({ input_tokens: z.number().default(0), output_tokens: z.number().default(0) })
    .default({}),
});

/**
 * Completion transport over Amazon Bedrock. Retries are left to the
 * oracle so that rate limits surface as errors here.
 */
export function createBedrockTransport(
  config: OracleConfig,
  client = new BedrockRuntimeClient({ region: config.region, maxAttempts: 1 }),
): CompletionTransport {
  return {
    async complete(system: string, user: string): Promise<Completion> {
      const command = new InvokeModelCommand({
        modelId: config.modelId,
        contentType: 'application/json',
        accept: 'application/json',
        body: JSON.stringify({
          anthropic_version: 'bedrock-2023-05-31',
          max_tokens: config.maxTokens,
          temperature: 0.1,
          system,
          messages: [{ role: 'user', content: [{ type: 'text', text: user }] }],
        }),
      });

      const response = await client.send(command);
      const body = messageResponse.parse(JSON.parse(response.body.transformToString()));

      return {
        text: body.content.find((block) => block.type === 'text')?.text ?? '',
        prompt_tokens: body.usage.input_tokens,
        completion_tokens: body.usage.output_tokens,
      };
    },
  };
}
