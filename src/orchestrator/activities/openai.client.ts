import OpenAI from "openai"
import * as https from "https"
import { getPipelineSettings } from "../../config/configuration"

let client: OpenAI | undefined

/**
 * Shared OpenAI client for the worker, created on first use
 */
export function getOpenAIClient(): OpenAI {
  if (!client) {
    // Keepalive agent prevents ECONNRESET on long audio uploads
    const httpsAgent = new https.Agent({
      keepAlive: true,
      maxSockets: 10,
      keepAliveMsecs: 30000,
    })

    client = new OpenAI({
      apiKey: getPipelineSettings().OPENAI_API_KEY,
      httpAgent: httpsAgent,
      timeout: 120000,
      // retryWithBackoff handles retries
      maxRetries: 0,
    })
  }
  return client
}
