import { describe, it, expect, vi } from 'vitest'
import { FunctionTool, toToolResponse } from '../function-tool.js'
import { ToolResponse } from '../tool.js'
import { createMockContext } from '../../__fixtures__/tool-helpers.js'

const add = new FunctionTool({
  name: 'add',
  description: 'Adds two numbers',
  inputSchema: {
    type: 'object',
    properties: { a: { type: 'number' }, b: { type: 'number' } },
    required: ['a', 'b'],
  },
  callback: (input) => Number(input['a']) + Number(input['b']),
})

describe('FunctionTool', () => {
  it('exposes its spec', () => {
    expect(add.toolSpec).toEqual({
      name: 'add',
      description: 'Adds two numbers',
      inputSchema: {
        type: 'object',
        properties: { a: { type: 'number' }, b: { type: 'number' } },
        required: ['a', 'b'],
      },
    })
  })

  it('runs the callback with the parsed input', async () => {
    const response = await add.run(createMockContext('add', '{"a":2,"b":3}'))

    expect(response).toEqual({ type: 'text', content: '5', isError: false })
  })

  it('passes the context to the callback', async () => {
    const callback = vi.fn(() => 'done')
    const echo = new FunctionTool({ name: 'echo', description: 'Echo', inputSchema: { type: 'object' }, callback })
    const context = createMockContext('echo', '{}', 'call-7')

    await echo.run(context)

    expect(callback).toHaveBeenCalledWith({}, context)
  })

  it('returns an error response for input that is not a JSON object', async () => {
    const notJson = await add.run(createMockContext('add', 'oops'))
    const notObject = await add.run(createMockContext('add', '[1,2]'))

    expect(notJson.isError).toBe(true)
    expect(notJson.content.startsWith('invalid parameters: ')).toBe(true)
    expect(notObject).toEqual({
      type: 'text',
      content: 'invalid parameters: input must be a JSON object',
      isError: true,
    })
  })

  it('propagates a callback error', async () => {
    const broken = new FunctionTool({
      name: 'broken',
      description: 'Always fails',
      inputSchema: { type: 'object' },
      callback: () => {
        throw new Error('callback failed')
      },
    })

    await expect(broken.run(createMockContext('broken', '{}'))).rejects.toThrow('callback failed')
  })

  it('can be invoked directly', async () => {
    await expect(add.invoke({ a: 1, b: 1 })).resolves.toBe(2)
  })

  it('synthesizes a context for direct invocation', async () => {
    const callback = vi.fn(() => null)
    const lookup = new FunctionTool({ name: 'lookup', description: 'Lookup', inputSchema: { type: 'object' }, callback })

    await lookup.invoke({ q: 'x' })

    expect(callback).toHaveBeenCalledWith({ q: 'x' }, { toolCall: { id: 'direct-lookup', name: 'lookup', input: '{"q":"x"}' } })
  })
})

describe('toToolResponse', () => {
  it('passes responses through, wraps strings and encodes other values', () => {
    const response = ToolResponse.error('bad')

    expect(toToolResponse(response)).toBe(response)
    expect(toToolResponse('plain').content).toBe('plain')
    expect(toToolResponse({ ok: true }).content).toBe('{"ok":true}')
    expect(toToolResponse(null).content).toBe('null')
  })
})
