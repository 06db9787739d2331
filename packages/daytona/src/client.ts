import { Effect } from "effect"
import type { SandboxError, SandboxErrorContext } from "@sandbox-lifecycle/sdk"
import { mapHttpErrorWithContext, isSandboxError, SandboxProviderError, SandboxTransientError } from "@sandbox-lifecycle/sdk"

/**
 * Minimal Daytona control-plane client. Responses are returned undecoded.
 */
export interface DaytonaClient {
  baseUrl: string
  request(method: string, path: string, body?: unknown): Effect.Effect<unknown, SandboxError>
}

/**
 * Create error context for Daytona API requests.
 */
const makeContext = (method: string, path: string): SandboxErrorContext => ({
  provider: "daytona",
  operation: `${method} ${path}`,
})

const sandboxIdFromPath = (path: string): string | undefined =>
  path.match(/^\/(?:sandbox|toolbox)\/([^/?]+)/)?.[1]

export const createClient = (baseUrl: string, apiKey: string, organizationId?: string): DaytonaClient => ({
  baseUrl,
  request: (method: string, path: string, body?: unknown) =>
    Effect.tryPromise({
      try: async (signal): Promise<unknown> => {
        const headers: Record<string, string> = {
          Authorization: `Bearer ${apiKey}`,
        }
        if (organizationId) {
          headers["X-Daytona-Organization-ID"] = organizationId
        }

        let requestBody: string | undefined
        if (body !== undefined) {
          headers["Content-Type"] = "application/json"
          requestBody = JSON.stringify(body)
        }

        const response = await fetch(`${baseUrl}${path}`, {
          method,
          headers,
          body: requestBody,
          signal,
        })

        if (!response.ok) {
          const text = await response.text()
          throw mapHttpErrorWithContext(
            { status: response.status, body: text, headers: response.headers },
            { ...makeContext(method, path), sandboxId: sandboxIdFromPath(path) },
            sandboxIdFromPath(path),
          )
        }

        if (response.status === 204) return undefined

        const contentType = response.headers.get("content-type") ?? ""
        if (contentType.includes("application/json")) {
          try {
            return await response.json()
          } catch (cause) {
            throw new SandboxProviderError({
              message: `Malformed JSON in ${response.status} response to ${method} ${path}`,
              status: response.status,
              cause,
              context: makeContext(method, path),
            })
          }
        }

        const text = await response.text()
        return text.length > 0 ? text : undefined
      },
      catch: (err) => {
        if (isSandboxError(err)) {
          return err
        }
        return new SandboxTransientError({
          reason: "network",
          message: err instanceof Error ? err.message : String(err),
          cause: err,
          context: makeContext(method, path),
        })
      },
    }),
})
