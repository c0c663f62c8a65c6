import { describe, it, expect } from 'vitest'
import { loadConfigFromEnv } from '../src/config.js'
import { secret } from './helpers.js'

describe('config', () => {
  describe('loadConfigFromEnv', () => {
    it('should apply defaults', () => {
      expect(loadConfigFromEnv({ JWT_SECRET: secret })).toEqual({
        secret,
        algorithm: 'HS256',
        minSecretBytes: 32,
        logLevel: 'info',
      })
    })

    it('should read every variable', () => {
      expect(
        loadConfigFromEnv({
          JWT_SECRET: secret,
          JWT_ALGORITHM: 'HS384',
          JWT_MIN_SECRET_BYTES: '48',
          LOG_LEVEL: 'debug',
        }),
      ).toEqual({
        secret,
        algorithm: 'HS384',
        minSecretBytes: 48,
        logLevel: 'debug',
      })
    })

    it('should ignore unrelated variables', () => {
      const config = loadConfigFromEnv({ JWT_SECRET: secret, PATH: '/usr/bin' })
      expect(config).not.toHaveProperty('PATH')
    })

    it('should require JWT_SECRET', () => {
      expect(() => loadConfigFromEnv({})).toThrow('Invalid environment configuration: JWT_SECRET')
    })

    it('should reject an empty JWT_SECRET', () => {
      expect(() => loadConfigFromEnv({ JWT_SECRET: '' })).toThrow(
        'Invalid environment configuration: JWT_SECRET (JWT_SECRET must not be empty)',
      )
    })

    it('should reject algorithms outside the closed set', () => {
      expect(() => loadConfigFromEnv({ JWT_SECRET: secret, JWT_ALGORITHM: 'none' })).toThrow(
        'Invalid environment configuration: JWT_ALGORITHM',
      )
      expect(() => loadConfigFromEnv({ JWT_SECRET: secret, JWT_ALGORITHM: 'RS256' })).toThrow(
        'JWT_ALGORITHM',
      )
    })

    it('should reject a non-numeric minimum secret length', () => {
      expect(() => loadConfigFromEnv({ JWT_SECRET: secret, JWT_MIN_SECRET_BYTES: 'many' })).toThrow(
        'Invalid environment configuration: JWT_MIN_SECRET_BYTES',
      )
    })

    it('should reject a zero minimum secret length', () => {
      expect(() => loadConfigFromEnv({ JWT_SECRET: secret, JWT_MIN_SECRET_BYTES: '0' })).toThrow(
        'JWT_MIN_SECRET_BYTES',
      )
    })

    it('should reject unknown log levels', () => {
      expect(() => loadConfigFromEnv({ JWT_SECRET: secret, LOG_LEVEL: 'verbose' })).toThrow(
        'Invalid environment configuration: LOG_LEVEL',
      )
    })

    it('should list every failing variable', () => {
      expect(() => loadConfigFromEnv({ JWT_ALGORITHM: 'none' })).toThrow(/JWT_SECRET.*JWT_ALGORITHM/)
    })
  })
})
