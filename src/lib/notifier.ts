/**
 * Activity notifications to chat webhooks (Discord-compatible payloads).
 *
 * Lifecycle events (startup, shutdown) go to NOTIFY_WEBHOOK_URL; desk
 * activity and heartbeats go to NOTIFY_EVENTS_WEBHOOK_URL, falling back to
 * the lifecycle webhook. Sending is best-effort and never throws.
 */

import os from "os"

import { createComponentLogger } from "./logger.js"

const log = createComponentLogger("notifier")

const SEND_TIMEOUT_MS = 5000
const MAX_FIELD_LENGTH = 256
const DEFAULT_HEARTBEAT_SECONDS = 1800

export type NotifyEvent =
  | "startup"
  | "shutdown"
  | "heartbeat"
  | "submit"
  | "issue"
  | "return"
  | "admin_approve"
  | "admin_reject"

export interface NotifierConfig {
  lifecycleWebhookUrl: string | null
  eventsWebhookUrl: string | null
  heartbeatSeconds: number
}

export interface NotifyContext {
  path?: string
  ip?: string
  userAgent?: string
  extra?: Record<string, unknown>
}

interface EmbedField {
  name: string
  value: string
  inline: boolean
}

export interface WebhookPayload {
  content: string
  embeds: Array<{ title: string; timestamp: string; fields: EmbedField[] }>
}

type FetchLike = (url: string, init: RequestInit) => Promise<Response>

export function loadNotifierConfig(env: NodeJS.ProcessEnv = process.env): NotifierConfig {
  const lifecycleWebhookUrl = env.NOTIFY_WEBHOOK_URL?.trim() || null
  const heartbeat = parseInt(env.HEARTBEAT_SECONDS ?? "", 10)
  return {
    lifecycleWebhookUrl,
    eventsWebhookUrl: env.NOTIFY_EVENTS_WEBHOOK_URL?.trim() || lifecycleWebhookUrl,
    heartbeatSeconds: Number.isNaN(heartbeat) ? DEFAULT_HEARTBEAT_SECONDS : Math.max(0, heartbeat),
  }
}

function field(name: string, value: unknown, inline = false): EmbedField {
  const text = typeof value === "string" ? value : JSON.stringify(value)
  return { name, value: (text ?? "").slice(0, MAX_FIELD_LENGTH) || "-", inline }
}

export function buildPayload(
  event: NotifyEvent,
  context: NotifyContext = {},
  now: Date = new Date(),
  host: string = os.hostname()
): WebhookPayload {
  const timestamp = now.toISOString()
  const fields: EmbedField[] = [
    field("host", host, true),
    field("system", `${os.type()} ${os.release()} | Node ${process.version}`),
  ]

  if (context.path !== undefined) fields.push(field("path", context.path))
  if (context.ip !== undefined) fields.push(field("ip", context.ip, true))
  if (context.userAgent !== undefined) fields.push(field("user_agent", context.userAgent))
  for (const [name, value] of Object.entries(context.extra ?? {})) {
    fields.push(field(name, value, true))
  }

  return {
    content: `[${event}] ${host} @ ${timestamp}`,
    embeds: [{ title: `circulation-desk: ${event}`, timestamp, fields }],
  }
}

export class Notifier {
  private heartbeat: NodeJS.Timeout | null = null

  constructor(
    private readonly config: NotifierConfig,
    private readonly fetchFn: FetchLike = fetch
  ) {}

  async notify(event: NotifyEvent, context: NotifyContext = {}): Promise<void> {
    const url =
      event === "startup" || event === "shutdown" ? this.config.lifecycleWebhookUrl : this.config.eventsWebhookUrl
    if (!url) return

    try {
      const response = await this.fetchFn(url, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify(buildPayload(event, context)),
        signal: AbortSignal.timeout(SEND_TIMEOUT_MS),
      })
      if (!response.ok) {
        log.warn({ event, status: response.status }, "Webhook rejected notification")
      }
    } catch (error) {
      log.warn({ event, error }, "Failed to send notification")
    }
  }

  /**
   * Send a heartbeat now and then every heartbeatSeconds. No-op when the
   * interval is 0 or a heartbeat is already running.
   */
  startHeartbeat(): void {
    if (this.heartbeat || this.config.heartbeatSeconds <= 0) return

    // notify() never rejects
    void this.notify("heartbeat")
    this.heartbeat = setInterval(() => {
      void this.notify("heartbeat")
    }, this.config.heartbeatSeconds * 1000)
    this.heartbeat.unref()
  }

  stopHeartbeat(): void {
    if (this.heartbeat) {
      clearInterval(this.heartbeat)
      this.heartbeat = null
    }
  }
}
