/**
 * Test fixtures for Model testing: a scripted model and generator helpers.
 */

import { Model, type BaseModelConfig, type ModelCall, type ModelResponse } from '../models/model.js'
import type { ModelStreamEvent, Usage } from '../models/streaming.js'
import { TextBlock, ToolCallBlock } from '../types/messages.js'

/**
 * Scripted turns for a {@link MockModel}. An Error entry makes that call throw.
 */
export interface MockModelScript {
  responses?: (ModelResponse | Error)[]
  streams?: (ModelStreamEvent[] | Error)[]
  modelId?: string
}

/**
 * Model that replays scripted responses and records every call it receives.
 */
export class MockModel extends Model<BaseModelConfig> {
  readonly provider = 'mock'
  readonly generateCalls: ModelCall[] = []
  readonly streamCalls: ModelCall[] = []
  private _config: BaseModelConfig
  private readonly _responses: (ModelResponse | Error)[]
  private readonly _streams: (ModelStreamEvent[] | Error)[]

  constructor(script: MockModelScript = {}) {
    super()
    this._config = { modelId: script.modelId ?? 'mock-model' }
    this._responses = [...(script.responses ?? [])]
    this._streams = [...(script.streams ?? [])]
  }

  updateConfig(modelConfig: BaseModelConfig): void {
    this._config = { ...this._config, ...modelConfig }
  }

  getConfig(): BaseModelConfig {
    return this._config
  }

  async generate(call: ModelCall): Promise<ModelResponse> {
    this.generateCalls.push(call)
    const next = this._responses.shift()
    if (next === undefined) {
      throw new Error('MockModel: no scripted response left')
    }
    if (next instanceof Error) {
      throw next
    }
    return next
  }

  async *stream(call: ModelCall): AsyncGenerator<ModelStreamEvent> {
    this.streamCalls.push(call)
    const next = this._streams.shift()
    if (next === undefined) {
      throw new Error('MockModel: no scripted stream left')
    }
    if (next instanceof Error) {
      throw next
    }
    for (const event of next) {
      yield event
    }
  }
}

/**
 * Builds usage with a consistent total.
 */
export function usage(inputTokens: number, outputTokens: number): Usage {
  return { inputTokens, outputTokens, totalTokens: inputTokens + outputTokens }
}

/**
 * A response holding one text block that finishes with `stop`.
 */
export function textResponse(text: string, responseUsage: Usage = usage(3, 10)): ModelResponse {
  return { content: [new TextBlock(text)], finishReason: 'stop', usage: responseUsage }
}

/**
 * A response holding one tool call that finishes with `tool-calls`.
 */
export function toolCallResponse(
  toolName: string,
  input: string,
  toolCallId = 'call-1',
  responseUsage: Usage = usage(3, 10)
): ModelResponse {
  return {
    content: [new ToolCallBlock({ toolCallId, toolName, input })],
    finishReason: 'tool-calls',
    usage: responseUsage,
  }
}

/**
 * Stream events for a single text block.
 */
export function textStream(text: string, responseUsage: Usage = usage(3, 10)): ModelStreamEvent[] {
  return [
    { type: 'modelTextStartEvent', id: 'text-1' },
    { type: 'modelTextDeltaEvent', id: 'text-1', delta: text },
    { type: 'modelTextEndEvent', id: 'text-1' },
    { type: 'modelFinishEvent', finishReason: 'stop', usage: responseUsage },
  ]
}

/**
 * Stream events for a single tool call, with its input streamed first.
 */
export function toolCallStream(
  toolName: string,
  input: string,
  toolCallId = 'call-1',
  responseUsage: Usage = usage(3, 10)
): ModelStreamEvent[] {
  return [
    { type: 'modelToolInputStartEvent', id: toolCallId, toolName },
    { type: 'modelToolInputDeltaEvent', id: toolCallId, delta: input },
    { type: 'modelToolInputEndEvent', id: toolCallId },
    { type: 'modelToolCallEvent', toolCallId, toolName, input },
    { type: 'modelFinishEvent', finishReason: 'tool-calls', usage: responseUsage },
  ]
}

/**
 * Helper function to collect all items from an async generator.
 *
 * @param generator - Async generator to collect from
 * @returns Yielded items and the generator's return value
 */
export async function collectGenerator<T, R>(
  generator: AsyncGenerator<T, R, undefined>
): Promise<{ items: T[]; result: R }> {
  const items: T[] = []
  let next = await generator.next()
  while (!next.done) {
    items.push(next.value)
    next = await generator.next()
  }
  return { items, result: next.value }
}
