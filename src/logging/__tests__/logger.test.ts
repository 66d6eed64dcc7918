import { afterEach, describe, it, expect, vi } from 'vitest'
import { configureLogging, createNoopLogger, getLogger, type Logger } from '../logger.js'

function recordingLogger(): Logger & { entries: unknown[][]; children: Record<string, unknown>[] } {
  const entries: unknown[][] = []
  const children: Record<string, unknown>[] = []
  const logger = {
    entries,
    children,
    debug: (context: Record<string, unknown>, message: string) => entries.push(['debug', context, message]),
    info: (context: Record<string, unknown>, message: string) => entries.push(['info', context, message]),
    warn: (context: Record<string, unknown>, message: string) => entries.push(['warn', context, message]),
    error: (context: Record<string, unknown>, message: string) => entries.push(['error', context, message]),
    child(bindings: Record<string, unknown>): Logger {
      children.push(bindings)
      return logger
    },
  }
  return logger
}

describe('getLogger', () => {
  afterEach(() => {
    configureLogging(createNoopLogger())
  })

  it('binds the module name through child', () => {
    const root = recordingLogger()
    configureLogging(root)

    getLogger('agent').info({ stepNumber: 1 }, 'step started')

    expect(root.children).toEqual([{ module: 'agent' }])
    expect(root.entries).toEqual([['info', { stepNumber: 1 }, 'step started']])
  })

  it('follows a root logger configured after creation', () => {
    const logger = getLogger('retry')
    const first = recordingLogger()
    const second = recordingLogger()

    configureLogging(first)
    logger.warn({}, 'one')
    logger.warn({}, 'two')
    configureLogging(second)
    logger.warn({}, 'three')

    expect(first.children).toHaveLength(1)
    expect(first.entries.map((entry) => entry[2])).toEqual(['one', 'two'])
    expect(second.entries.map((entry) => entry[2])).toEqual(['three'])
  })

  it('logs to a root logger without child unbound', () => {
    const error = vi.fn()
    configureLogging({ debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error })

    getLogger('tool-executor').error({ toolName: 't' }, 'tool failed: boom')

    expect(error).toHaveBeenCalledWith({ toolName: 't' }, 'tool failed: boom')
  })
})
