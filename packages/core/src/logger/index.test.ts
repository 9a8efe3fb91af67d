import { describe, it, expect, afterEach, vi } from 'vitest'
import { createLogger } from './index.js'

afterEach(() => {
  vi.unstubAllEnvs()
})

describe('createLogger', () => {
  it('creates logger with specified level', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'debug', pretty: false })
    expect(logger.level).toBe('debug')
  })

  it('binds the default name', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false })
    expect(logger.bindings()).toEqual({ name: 'cliparchive' })
  })

  it('binds a custom name', () => {
    vi.stubEnv('NODE_ENV', 'production')
    const logger = createLogger({ level: 'info', pretty: false }, 'ingest')
    expect(logger.bindings()).toEqual({ name: 'ingest' })
  })

  it('creates a working logger when pretty: true', () => {
    vi.stubEnv('NODE_ENV', 'production')
    // pino-pretty runs in a worker transport, so only the logger itself is checked
    const logger = createLogger({ level: 'warn', pretty: true })
    expect(logger.level).toBe('warn')
    expect(typeof logger.child).toBe('function')
  })
})
