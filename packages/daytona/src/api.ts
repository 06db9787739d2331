import { Schema } from "effect"

const NullableString = Schema.optionalWith(Schema.String, { nullable: true })

/**
 * Sandbox record as returned by `GET /sandbox/{id}` and `POST /sandbox`.
 * Fields the lifecycle layer does not read are dropped on decode; `null` reads as absent.
 */
export const DaytonaSandbox = Schema.Struct({
  id: Schema.String,
  /** "started", "stopped", "archived", "starting", "creating", "error", ... */
  state: Schema.String,
  target: NullableString,
  labels: Schema.optionalWith(Schema.Record({ key: Schema.String, value: Schema.String }), { nullable: true }),
  createdAt: NullableString,
  errorReason: NullableString,
})

export type DaytonaSandbox = typeof DaytonaSandbox.Type

export interface DaytonaCreateSandboxBody {
  image: string
  public: boolean
  env: Record<string, string>
  resources: { cpu: number; memory: number; disk: number }
  labels?: Record<string, string>
  target?: string
}

export interface DaytonaCreateSessionBody {
  sessionId: string
}

export interface DaytonaSessionExecuteBody {
  command: string
  runAsync: boolean
}
