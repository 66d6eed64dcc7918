import { describe, it, expect, vi } from 'vitest'
import { Agent } from '../agent.js'
import { stepCountIs } from '../stop-conditions.js'
import { APICallError, InvalidArgumentError } from '../../errors.js'
import type { ModelStreamEvent } from '../../models/streaming.js'
import { ToolResponse } from '../../tools/tool.js'
import { ToolCallBlock } from '../../types/messages.js'
import { createMockTool } from '../../__fixtures__/tool-helpers.js'
import {
  MockModel,
  collectGenerator,
  textStream,
  toolCallStream,
  usage,
} from '../../__fixtures__/model-test-helpers.js'

const providerFailure = (): ModelStreamEvent[] => [
  { type: 'modelTextStartEvent', id: 'text-0' },
  { type: 'modelErrorEvent', error: new APICallError({ message: 'overloaded', statusCode: 503 }) },
]

describe('Agent', () => {
  describe('stream', () => {
    it('yields lifecycle events, raw events, completed blocks and tool results in order', async () => {
      const tool1 = createMockTool('tool1', () => ToolResponse.text('ok'), ['value'])
      const model = new MockModel({
        streams: [
          toolCallStream('tool1', '{"value":"value"}', 'call-1', usage(3, 10)),
          textStream('Hello, world!', usage(5, 7)),
        ],
      })
      const agent = new Agent({ model, tools: [tool1] })

      const { items, result } = await collectGenerator(agent.stream({ prompt: 'test' }))

      expect(items.map((item) => item.type)).toEqual([
        'agentStartEvent',
        'stepStartEvent',
        'modelToolInputStartEvent',
        'modelToolInputDeltaEvent',
        'modelToolInputEndEvent',
        'modelToolCallEvent',
        'toolCallBlock',
        'modelFinishEvent',
        'toolResultBlock',
        'stepFinishEvent',
        'stepStartEvent',
        'modelTextStartEvent',
        'modelTextDeltaEvent',
        'modelTextEndEvent',
        'textBlock',
        'modelFinishEvent',
        'stepFinishEvent',
        'agentFinishEvent',
      ])
      expect(result.steps).toHaveLength(2)
      expect(result.response.content).toEqual([{ type: 'textBlock', text: 'Hello, world!' }])
      expect(result.totalUsage).toEqual({ inputTokens: 8, outputTokens: 17, totalTokens: 25 })
      expect(model.streamCalls[1]?.messages.map((message) => message.role)).toEqual(['user', 'assistant', 'tool'])
    })

    it('calls the stream and lifecycle callbacks', async () => {
      const model = new MockModel({ streams: [toolCallStream('tool1', '{}'), textStream('done')] })
      const agent = new Agent({ model, tools: [createMockTool('tool1')] })
      const callbacks = {
        onChunk: vi.fn(),
        onTextDelta: vi.fn(),
        onToolInputStart: vi.fn(),
        onToolCall: vi.fn(),
        onToolResult: vi.fn(),
        onStreamFinish: vi.fn(),
        onAgentStart: vi.fn(),
        onStepStart: vi.fn(),
        onFinish: vi.fn(),
        onAgentFinish: vi.fn(),
        onError: vi.fn(),
      }

      const result = await agent.streamToResult({ prompt: 'test', ...callbacks })

      expect(callbacks.onChunk).toHaveBeenCalledTimes(9)
      expect(callbacks.onTextDelta).toHaveBeenCalledWith('text-1', 'done')
      expect(callbacks.onToolInputStart).toHaveBeenCalledWith('call-1', 'tool1')
      expect(callbacks.onToolCall).toHaveBeenCalledWith(
        expect.objectContaining({ toolCallId: 'call-1', toolName: 'tool1', invalid: false })
      )
      expect(callbacks.onToolResult).toHaveBeenCalledWith(
        expect.objectContaining({ toolCallId: 'call-1', result: { type: 'text', text: 'tool1 done' } })
      )
      expect(callbacks.onStreamFinish).toHaveBeenNthCalledWith(1, usage(3, 10), 'tool-calls', undefined)
      expect(callbacks.onAgentStart).toHaveBeenCalledTimes(1)
      expect(callbacks.onStepStart.mock.calls).toEqual([[0], [1]])
      expect(callbacks.onFinish).toHaveBeenCalledWith(result)
      expect(callbacks.onAgentFinish).toHaveBeenCalledWith(result)
      expect(callbacks.onError).not.toHaveBeenCalled()
    })

    it('reports an invalid streamed tool call and returns an error result for it', async () => {
      const run = vi.fn(() => ToolResponse.text('ok'))
      const model = new MockModel({ streams: [toolCallStream('tool1', '{}'), textStream('sorry')] })
      const agent = new Agent({ model, tools: [createMockTool('tool1', run, ['value'])] })
      const onToolCall = vi.fn()

      const result = await agent.streamToResult({ prompt: 'test', onToolCall })

      expect(run).not.toHaveBeenCalled()
      expect(onToolCall).toHaveBeenCalledWith(expect.objectContaining({ invalid: true }))
      const toolResult = result.steps[0]?.content[1]
      expect(toolResult?.type === 'toolResultBlock' && toolResult.result.type === 'error' && toolResult.result.error.message).toBe(
        'missing required parameter: value'
      )
    })

    it('fails on a provider error event without recording the step', async () => {
      const onStepFinish = vi.fn()
      const onError = vi.fn()
      const model = new MockModel({
        streams: [
          [
            { type: 'modelTextStartEvent', id: 'text-1' },
            { type: 'modelErrorEvent', error: new Error('provider exploded') },
          ],
        ],
      })
      const agent = new Agent({ model, onStepFinish })

      await expect(collectGenerator(agent.stream({ prompt: 'test', onError }))).rejects.toThrow('provider exploded')
      expect(onStepFinish).not.toHaveBeenCalled()
      expect(onError).toHaveBeenCalledWith(expect.objectContaining({ message: 'provider exploded' }))
    })

    it('restarts the step when a retryable provider error arrives mid-stream', async () => {
      const model = new MockModel({ streams: [providerFailure(), textStream('ok')] })
      const agent = new Agent({ model, retry: { initialDelayMs: 0 } })

      const { items, result } = await collectGenerator(agent.stream({ prompt: 'test' }))

      expect(model.streamCalls).toHaveLength(2)
      expect(result.steps).toHaveLength(1)
      expect(result.response.content).toEqual([{ type: 'textBlock', text: 'ok' }])
      expect(items.filter((item) => item.type === 'modelTextStartEvent')).toHaveLength(2)
      expect(items.filter((item) => item.type === 'textBlock')).toHaveLength(1)
    })

    it('propagates a callback error unchanged instead of retrying it', async () => {
      const observerError = new Error('observer failed')
      const model = new MockModel({ streams: [providerFailure(), textStream('ok'), textStream('never')] })
      const agent = new Agent({ model, retry: { initialDelayMs: 0 } })
      const onError = vi.fn()

      await expect(
        collectGenerator(
          agent.stream({
            prompt: 'test',
            onTextDelta: () => {
              throw observerError
            },
            onError,
          })
        )
      ).rejects.toBe(observerError)
      expect(model.streamCalls).toHaveLength(2)
      expect(onError).toHaveBeenCalledWith(observerError)
    })

    it('does not retry when a callback throws while a provider error is processed', async () => {
      const observerError = new Error('observer failed')
      const model = new MockModel({ streams: [providerFailure(), textStream('ok')] })
      const agent = new Agent({ model, retry: { initialDelayMs: 0 } })

      await expect(
        collectGenerator(
          agent.stream({
            prompt: 'test',
            onChunk: (event) => {
              if (event.type === 'modelErrorEvent') {
                throw observerError
              }
            },
          })
        )
      ).rejects.toBe(observerError)
      expect(model.streamCalls).toHaveLength(1)
    })

    it('substitutes a repaired streamed tool call in place', async () => {
      const run = vi.fn(() => ToolResponse.text('ok'))
      const model = new MockModel({ streams: [toolCallStream('tool1', '{}'), textStream('done')] })
      const agent = new Agent({
        model,
        tools: [createMockTool('tool1', run, ['value'])],
        repairToolCall: ({ originalToolCall }) =>
          new ToolCallBlock({
            toolCallId: originalToolCall.toolCallId,
            toolName: originalToolCall.toolName,
            input: '{"value":"fixed"}',
          }),
      })
      const onToolCall = vi.fn()

      const result = await agent.streamToResult({ prompt: 'test', onToolCall })

      expect(result.steps[0]?.content[0]).toEqual({
        type: 'toolCallBlock',
        toolCallId: 'call-1',
        toolName: 'tool1',
        input: '{"value":"fixed"}',
        invalid: false,
      })
      expect(onToolCall).toHaveBeenCalledWith(expect.objectContaining({ input: '{"value":"fixed"}', invalid: false }))
      expect(run).toHaveBeenCalledTimes(1)
    })

    it('sends only the active tools chosen by the step hook', async () => {
      const model = new MockModel({ streams: [textStream('done')] })
      const agent = new Agent({
        model,
        tools: [createMockTool('a'), createMockTool('b')],
        prepareStep: () => ({ activeTools: ['b'] }),
      })

      await agent.streamToResult({ prompt: 'test' })

      expect(model.streamCalls[0]?.tools.map((spec) => spec.name)).toEqual(['b'])
    })

    it('sends no tools when the step hook disables them', async () => {
      const model = new MockModel({ streams: [textStream('done')] })
      const agent = new Agent({
        model,
        tools: [createMockTool('a'), createMockTool('b')],
        prepareStep: () => ({ disableAllTools: true }),
      })

      await agent.streamToResult({ prompt: 'test' })

      expect(model.streamCalls[0]?.tools).toEqual([])
    })

    it('aborts the run when a tool throws', async () => {
      const onToolResult = vi.fn()
      const model = new MockModel({ streams: [toolCallStream('tool1', '{}')] })
      const tool1 = createMockTool('tool1', () => {
        throw new Error('boom')
      })
      const agent = new Agent({ model, tools: [tool1] })

      await expect(agent.streamToResult({ prompt: 'test', onToolResult })).rejects.toThrow('boom')
      expect(onToolResult).toHaveBeenCalledWith(
        expect.objectContaining({ result: { type: 'error', error: expect.objectContaining({ message: 'boom' }) } })
      )
    })

    it('honours stop conditions', async () => {
      const model = new MockModel({ streams: [toolCallStream('tool1', '{}'), textStream('never')] })
      const agent = new Agent({ model, tools: [createMockTool('tool1')], stopWhen: [stepCountIs(1)] })

      const result = await agent.streamToResult({ prompt: 'test' })

      expect(result.steps).toHaveLength(1)
      expect(model.streamCalls).toHaveLength(1)
    })

    it('rejects an empty prompt before calling the model', async () => {
      const model = new MockModel({ streams: [textStream('never')] })
      const agent = new Agent({ model })

      await expect(collectGenerator(agent.stream({ prompt: '' }))).rejects.toThrow(InvalidArgumentError)
      expect(model.streamCalls).toHaveLength(0)
    })

    it('carries sources into the step content but not into the messages', async () => {
      const model = new MockModel({
        streams: [
          [
            { type: 'modelSourceEvent', source: { sourceType: 'url', id: 'src-1', url: 'https://example.com' } },
            ...textStream('cited'),
          ],
        ],
      })
      const agent = new Agent({ model })

      const result = await agent.streamToResult({ prompt: 'test' })

      expect(result.response.content.map((block) => block.type)).toEqual(['sourceBlock', 'textBlock'])
      expect(result.response.messages).toHaveLength(1)
      expect(result.response.messages[0]?.content).toEqual([{ type: 'textBlock', text: 'cited' }])
    })
  })
})
