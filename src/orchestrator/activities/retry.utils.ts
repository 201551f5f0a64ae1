const RETRYABLE_CODES = new Set(["ECONNRESET", "ETIMEDOUT", "ENOTFOUND", "ECONNREFUSED", "EPIPE"])

export interface RetryOptions {
  attempts?: number
  delayMs?: number
  operation?: string
}

function errorCode(err: unknown): string | undefined {
  return typeof err === "object" && err !== null && "code" in err && typeof err.code === "string" ? err.code : undefined
}

function errorStatus(err: unknown): number | undefined {
  return typeof err === "object" && err !== null && "status" in err && typeof err.status === "number" ? err.status : undefined
}

/**
 * Client errors other than rate limiting will fail the same way again
 */
export function isRetryable(err: unknown): boolean {
  const code = errorCode(err)
  if (code && RETRYABLE_CODES.has(code)) {
    return true
  }
  const status = errorStatus(err)
  if (status !== undefined && status >= 400 && status < 500) {
    return status === 408 || status === 429
  }
  return true
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms))
}

/**
 * Retry wrapper for API calls with exponential backoff
 */
export async function retryWithBackoff<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { attempts = 3, delayMs = 1000, operation = "API call" } = options
  let lastError: unknown

  for (let i = 0; i < attempts; i++) {
    try {
      return await fn()
    } catch (err) {
      lastError = err
      const errorMessage = err instanceof Error ? err.message : String(err)

      console.warn(`[Retry] ${operation} attempt ${i + 1}/${attempts} failed: ${errorMessage}`)

      if (i === attempts - 1) {
        console.error(`[Retry] ${operation} exhausted all ${attempts} attempts`)
        break
      }

      if (!isRetryable(err)) {
        console.error(`[Retry] ${operation} received client error ${errorStatus(err)}, not retrying`)
        break
      }

      const backoffMs = delayMs * Math.pow(2, i)
      console.log(`[Retry] Waiting ${backoffMs}ms before retry...`)
      await sleep(backoffMs)
    }
  }

  throw lastError
}
