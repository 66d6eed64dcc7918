import { InvalidArgumentError, normalizeError } from '../errors.js'
import { getLogger } from '../logging/logger.js'
import type { Model, ModelCall } from '../models/model.js'
import { retryGeneratorWithExponentialBackoff, retryWithExponentialBackoff } from '../models/retry.js'
import type { CallWarning, FinishReason, Usage } from '../models/streaming.js'
import { ToolRegistry } from '../registry/tool-registry.js'
import type { Tool } from '../tools/tool.js'
import { AgentResult, type StepResult } from '../types/agent.js'
import { Message, type ContentBlock, type FileBlock, type ProviderMetadata, type ToolCallBlock } from '../types/messages.js'
import {
  resolveSettings,
  toCallSettings,
  validateSettings,
  type AgentCall,
  type AgentConfig,
  type AgentSettings,
  type AgentStreamCall,
  type ResolvedSettings,
} from './config.js'
import { toResponseMessages } from './response-messages.js'
import { prepareStep, type PreparedStep } from './step-preparation.js'
import { isStopConditionMet, shouldContinue } from './stop-conditions.js'
import { StreamReconstructor, type ReconstructedStep } from './stream-reconstructor.js'
import type { AgentStreamEvent, StreamCallbacks } from './streaming.js'
import { validateAndRepairToolCall } from './tool-call-validation.js'
import { executeTools, streamToolResults } from './tool-executor.js'

const logger = getLogger('agent')

/**
 * State of one generate or stream invocation.
 */
interface Run {
  settings: ResolvedSettings
  /**
   * System prompt, prior conversation and the user prompt.
   */
  initialMessages: Message[]
  signal: AbortSignal | undefined
  steps: StepResult[]
  /**
   * Messages produced by completed steps, in order.
   */
  responseMessages: Message[]
  /**
   * Errors thrown by callbacks and hooks during a streamed step. They bypass retrying.
   */
  observerErrors: Set<unknown>
}

/**
 * Model output of one step before tool execution.
 */
interface StepOutput {
  content: ContentBlock[]
  toolCalls: ToolCallBlock[]
  finishReason: FinishReason
  usage: Usage
  warnings: CallWarning[]
  providerMetadata?: ProviderMetadata | undefined
}

/**
 * Orchestrates multi-step interactions between a model and a set of tools.
 *
 * Each step calls the model, validates the tool calls it requests, runs them in order,
 * and feeds the results back. The run ends when a stop condition holds or when the
 * model finishes without requesting tools.
 *
 * An Agent holds configuration only; every invocation owns its own step history, so one
 * instance may serve concurrent invocations.
 *
 * @example
 * ```typescript
 * const agent = new Agent({
 *   model,
 *   tools: [weather],
 *   systemPrompt: 'You are a helpful assistant.',
 *   stopWhen: [stepCountIs(5)],
 * })
 * const result = await agent.generate({ prompt: 'What is the weather in Paris?' })
 * console.log(result.text)
 * ```
 */
export class Agent {
  private readonly _model: Model
  private readonly _toolRegistry: ToolRegistry
  private readonly _systemPrompt: string | undefined
  private readonly _settings: AgentSettings

  /**
   * Creates an instance of the Agent.
   * @param config - The configuration for the agent.
   * @throws \{InvalidArgumentError\} When a setting is out of range or tool names collide
   */
  constructor(config: AgentConfig) {
    const { model, tools, systemPrompt, ...settings } = config
    validateSettings(settings)

    this._model = model
    this._toolRegistry = new ToolRegistry(tools ?? [])
    this._systemPrompt = systemPrompt
    this._settings = settings
  }

  /**
   * The model this agent calls unless a step hook substitutes another.
   */
  get model(): Model {
    return this._model
  }

  /**
   * The tools this agent can use.
   */
  get tools(): Tool[] {
    return this._toolRegistry.values()
  }

  /**
   * The tool registry for managing the agent's tools.
   */
  get toolRegistry(): ToolRegistry {
    return this._toolRegistry
  }

  /**
   * Runs the step loop with non-streaming model calls.
   *
   * @param call - Prompt, conversation and per-call settings
   * @returns Every step plus the summed usage
   * @throws \{InvalidArgumentError\} When the prompt is empty; no model call is made
   *
   * @example
   * ```typescript
   * const result = await agent.generate({ prompt: 'What is 2 + 2?' })
   * console.log(result.steps.length, result.totalUsage.totalTokens)
   * ```
   */
  async generate(call: AgentCall): Promise<AgentResult> {
    const run = this._startRun(call)

    while (true) {
      const stepNumber = run.steps.length
      const prepared = await this._prepareStep(run)
      logger.debug({ stepNumber, modelId: prepared.model.modelId, tools: prepared.tools.length }, 'step started')

      const modelCall = this._toModelCall(prepared, run)
      const response = await retryWithExponentialBackoff(
        () => prepared.model.generate(modelCall),
        run.settings.retryOptions,
        run.signal
      )

      const content: ContentBlock[] = []
      const toolCalls: ToolCallBlock[] = []
      for (const block of response.content) {
        if (block.type === 'toolCallBlock') {
          const toolCall = await this._validateToolCall(block, prepared, run)
          toolCalls.push(toolCall)
          content.push(toolCall)
        } else {
          content.push(block)
        }
      }

      const toolResults = await executeTools(this._toolRegistry.values(), toolCalls, { signal: run.signal })

      const step = await this._recordStep(run, {
        content: [...content, ...toolResults],
        toolCalls,
        finishReason: response.finishReason,
        usage: response.usage,
        warnings: response.warnings ?? [],
        providerMetadata: response.providerMetadata,
      })

      if (this._isFinished(run, step)) {
        return new AgentResult(run.steps)
      }
    }
  }

  /**
   * Runs the step loop with streaming model calls, yielding events as they happen.
   *
   * Yields lifecycle events, every raw model event, each content block once complete,
   * and each tool result. Callbacks on the call observe the same stream. When a model
   * call is retried, the step starts over; events of the failed attempt were already
   * yielded.
   *
   * @param call - Prompt, conversation, per-call settings and callbacks
   * @returns Async generator that yields AgentStreamEvent objects and returns AgentResult
   *
   * @example
   * ```typescript
   * for await (const event of agent.stream({ prompt: 'Hello' })) {
   *   if (event.type === 'modelTextDeltaEvent') process.stdout.write(event.delta)
   * }
   * ```
   */
  async *stream(call: AgentStreamCall): AsyncGenerator<AgentStreamEvent, AgentResult, undefined> {
    const run = this._startRun(call)

    try {
      await call.onAgentStart?.()
      yield { type: 'agentStartEvent' }

      while (true) {
        const stepNumber = run.steps.length
        const prepared = await this._prepareStep(run)
        logger.debug({ stepNumber, modelId: prepared.model.modelId, tools: prepared.tools.length }, 'step started')

        await call.onStepStart?.(stepNumber)
        yield { type: 'stepStartEvent', stepNumber, messages: prepared.messages }

        const output = yield* retryGeneratorWithExponentialBackoff(
          () => this._streamStep(prepared, run, call),
          { ...run.settings.retryOptions, propagate: (error) => run.observerErrors.has(error) },
          run.signal
        )

        const toolResults = yield* streamToolResults(this._toolRegistry.values(), output.toolCalls, {
          signal: run.signal,
          onToolResult: call.onToolResult,
        })

        const step = await this._recordStep(run, { ...output, content: [...output.content, ...toolResults] })
        yield { type: 'stepFinishEvent', stepNumber, step }

        if (this._isFinished(run, step)) {
          break
        }
      }

      const result = new AgentResult(run.steps)
      await call.onFinish?.(result)
      await call.onAgentFinish?.(result)
      yield { type: 'agentFinishEvent', result }
      return result
    } catch (error) {
      await call.onError?.(normalizeError(error))
      throw error
    }
  }

  /**
   * Consumes {@link Agent.stream} and returns only the final result.
   *
   * @param call - Prompt, conversation, per-call settings and callbacks
   * @returns Promise that resolves to the final AgentResult
   */
  async streamToResult(call: AgentStreamCall): Promise<AgentResult> {
    const generator = this.stream(call)
    let next = await generator.next()
    while (!next.done) {
      next = await generator.next()
    }
    return next.value
  }

  private _startRun(call: AgentCall): Run {
    const settings = resolveSettings(this._settings, call)
    return {
      settings,
      initialMessages: createPrompt(this._systemPrompt, call.prompt, call.messages ?? [], call.files ?? []),
      signal: call.signal,
      steps: [],
      responseMessages: [],
      observerErrors: new Set(),
    }
  }

  private _prepareStep(run: Run): Promise<PreparedStep> {
    const context = {
      steps: [...run.steps],
      stepNumber: run.steps.length,
      messages: [...run.initialMessages, ...run.responseMessages],
      ...(run.signal !== undefined ? { signal: run.signal } : {}),
    }
    return prepareStep(
      {
        model: this._model,
        systemPrompt: this._systemPrompt,
        toolChoice: run.settings.toolChoice,
        activeTools: run.settings.activeTools,
        registry: this._toolRegistry,
      },
      context,
      run.settings.prepareStep
    )
  }

  private _toModelCall(prepared: PreparedStep, run: Run): ModelCall {
    const modelCall: ModelCall = {
      ...toCallSettings(run.settings),
      messages: prepared.messages,
      tools: ToolRegistry.toSpecs(prepared.tools),
      toolChoice: prepared.toolChoice,
    }
    if (run.settings.providerOptions !== undefined) {
      modelCall.providerOptions = run.settings.providerOptions
    }
    if (run.signal !== undefined) {
      modelCall.signal = run.signal
    }
    return modelCall
  }

  private _validateToolCall(toolCall: ToolCallBlock, prepared: PreparedStep, run: Run): Promise<ToolCallBlock> {
    return validateAndRepairToolCall(toolCall, {
      tools: this._toolRegistry.values(),
      repairToolCall: run.settings.repairToolCall,
      systemPrompt: prepared.systemPrompt,
      messages: prepared.messages,
      signal: run.signal,
    })
  }

  private async *_streamStep(
    prepared: PreparedStep,
    run: Run,
    callbacks: StreamCallbacks
  ): AsyncGenerator<AgentStreamEvent, ReconstructedStep, undefined> {
    const reconstructor = new StreamReconstructor(
      (toolCall) => this._validateToolCall(toolCall, prepared, run),
      callbacks
    )

    for await (const event of prepared.model.stream(this._toModelCall(prepared, run))) {
      yield event
      let block: ContentBlock | undefined
      try {
        block = await reconstructor.process(event)
      } catch (error) {
        if (error !== reconstructor.providerError) {
          run.observerErrors.add(error)
        }
        throw error
      }
      if (block !== undefined) {
        yield block
      }
    }

    return reconstructor.finish()
  }

  private async _recordStep(run: Run, output: StepOutput): Promise<StepResult> {
    const step: StepResult = {
      content: output.content,
      finishReason: output.finishReason,
      usage: output.usage,
      warnings: output.warnings,
      messages: toResponseMessages(output.content),
    }
    if (output.providerMetadata !== undefined) {
      step.providerMetadata = output.providerMetadata
    }

    run.steps.push(step)
    run.responseMessages.push(...step.messages)
    logger.debug(
      { stepNumber: run.steps.length - 1, finishReason: step.finishReason, toolCalls: output.toolCalls.length },
      'step finished'
    )

    await run.settings.onStepFinish?.(step)
    return step
  }

  private _isFinished(run: Run, step: StepResult): boolean {
    return isStopConditionMet(run.settings.stopWhen, run.steps) || !shouldContinue(step)
  }
}

/**
 * Builds the messages every step starts from: system prompt, prior conversation, user prompt.
 *
 * @throws \{InvalidArgumentError\} When the prompt is empty
 */
function createPrompt(
  systemPrompt: string | undefined,
  prompt: string,
  messages: readonly Message[],
  files: FileBlock[]
): Message[] {
  if (prompt === '') {
    throw new InvalidArgumentError('prompt', "prompt can't be empty")
  }

  const prepared: Message[] = []
  if (systemPrompt !== undefined && systemPrompt !== '') {
    prepared.push(Message.system(systemPrompt))
  }
  prepared.push(...messages, Message.user(prompt, files))
  return prepared
}
