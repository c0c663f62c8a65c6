import { z } from 'zod'
import { jsonPart } from '@hs-jwt/core'
import { createLogger } from '../src/logger.js'

export const secret = 'test-secret-at-least-32-bytes-long!!'

export const claimsSchema = z.object({
  sub: z.string(),
  company: z.string(),
})

export type Claims = z.infer<typeof claimsSchema>

export const claims = jsonPart(claimsSchema)

/** Creates a logger whose JSON lines are collected in memory */
export function captureLogger(level: 'debug' | 'info' | 'warn' = 'debug') {
  const lines: Record<string, unknown>[] = []
  const logger = createLogger({
    level,
    destination: {
      write(msg: string) {
        lines.push(JSON.parse(msg))
      },
    },
  })
  return { logger, lines }
}
