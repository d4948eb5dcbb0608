import type { ReviewReply } from './schemas.js'

const STATUS_EMOJI: Record<string, string> = {
  fixed: '✅',
  wontfix: '⚠️',
  'need-info': '❓'
}

export function formatReviewReply(reply: ReviewReply): string {
  const status = reply.status ?? 'comment'
  const emoji = STATUS_EMOJI[status.toLowerCase()] ?? '📝'
  let body = `${emoji} **${status.toUpperCase()}**: ${reply.message}`

  if (reply.action_taken) {
    body += `\n\n**Action taken**: ${reply.action_taken}`
  }

  return body
}

/** Prefix `body` with `marker` unless it already carries it. */
export function withMarker(body: string, marker: string): string {
  return body.includes(marker) ? body : `${marker}\n${body}`
}
