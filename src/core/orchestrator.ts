/**
 * Conversation orchestrator: runs the model <-> tool loop for one user message.
 *
 * Flow:
 * 1. Append the user turn to the session transcript
 * 2. Call the model with {system prompt, tool definitions, transcript}
 * 3. If the model asks for tools: run each one, notify the client after each,
 *    then append the assistant turn and a single tool_result carrier turn
 * 4. Repeat until the model gives a final answer or the round-trip cap is hit
 * 5. Append the concatenated text as the final assistant turn
 *
 * Runs for the same session are serialized; different sessions run in parallel.
 */

import {
  describeError,
  LoopLimitExceededError,
  ModelServiceError,
  SinkDeliveryError,
  UnknownSessionError,
} from './errors';
import { logger, Logger } from './logger';
import { KeyedMutex } from './sessionLock';
import { SessionStore } from './sessionStore';
import { ToolRegistry } from './toolRegistry';
import {
  AssistantBlock,
  ModelClient,
  ModelRequest,
  ModelResponse,
  NotificationEvent,
  NotificationSink,
  ToolResultBlock,
  ToolUseBlock,
} from './types';

export type RunState = 'idle' | 'awaiting_model' | 'executing_tools' | 'done' | 'failed';

export type RunFailure = ModelServiceError | LoopLimitExceededError | UnknownSessionError;

export type RunOutcome =
  | { status: 'done'; text: string; roundTrips: number }
  | { status: 'failed'; error: RunFailure; roundTrips: number };

export interface OrchestratorConfig {
  systemPrompt: string;
  /** Model calls allowed per user message. */
  maxRoundTrips: number;
}

export interface OrchestratorDependencies {
  sessions: SessionStore;
  tools: ToolRegistry;
  model: ModelClient;
  sink: NotificationSink;
}

export const DEFAULT_MAX_ROUND_TRIPS = 8;

export class ConversationOrchestrator {
  private readonly sessions: SessionStore;
  private readonly tools: ToolRegistry;
  private readonly model: ModelClient;
  private readonly sink: NotificationSink;
  private readonly config: OrchestratorConfig;
  private readonly locks = new KeyedMutex();

  constructor(deps: OrchestratorDependencies, config: OrchestratorConfig) {
    if (!Number.isInteger(config.maxRoundTrips) || config.maxRoundTrips < 1) {
      throw new RangeError(`maxRoundTrips must be a positive integer, got ${config.maxRoundTrips}`);
    }
    this.sessions = deps.sessions;
    this.tools = deps.tools;
    this.model = deps.model;
    this.sink = deps.sink;
    this.config = config;
  }

  /**
   * Resolve one user message into one final assistant turn. Queues behind any
   * run already in flight for the same session. Never rejects for model or
   * loop failures; those come back as a `failed` outcome.
   */
  handleUserMessage(sessionId: string, text: string): Promise<RunOutcome> {
    return this.locks.runExclusive(sessionId, () => this.run(sessionId, text));
  }

  /** Resolves once every run queued for the session so far has finished. */
  settle(sessionId: string): Promise<void> {
    return this.locks.runExclusive(sessionId, () => undefined);
  }

  isBusy(sessionId: string): boolean {
    return this.locks.isLocked(sessionId);
  }

  // ─── Run loop ─────────────────────────────────────────────────────────────

  private async run(sessionId: string, text: string): Promise<RunOutcome> {
    const log = logger.with({ sessionId });
    let state: RunState = 'idle';
    let roundTrips = 0;
    const fragments: string[] = [];

    const transition = (next: RunState): void => {
      log.debug('Run state transition', {}, { from: state, to: next, roundTrips });
      state = next;
    };

    try {
      this.sessions.appendTurn(sessionId, { role: 'user', content: text });

      for (;;) {
        transition('awaiting_model');
        const response = await this.callModel(sessionId, log);
        roundTrips += 1;
        fragments.push(...textFragments(response.content));

        const requests = toolRequests(response.content);
        if (response.stopCondition === 'final' || requests.length === 0) {
          const finalText = fragments.join('');
          this.sessions.appendTurn(sessionId, { role: 'assistant', content: finalText });
          transition('done');
          log.info('Run complete', {}, { roundTrips, textLength: finalText.length });
          this.emit(sessionId, { type: 'final_response', text: finalText });
          return { status: 'done', text: finalText, roundTrips };
        }

        // Fail before running this round's tools so the transcript never
        // ends on a tool request with no matching results.
        if (roundTrips >= this.config.maxRoundTrips) {
          throw new LoopLimitExceededError(this.config.maxRoundTrips);
        }

        transition('executing_tools');
        const results = await this.executeTools(sessionId, requests, log);
        this.sessions.appendTurn(sessionId, { role: 'assistant', content: [...response.content] });
        this.sessions.appendTurn(sessionId, { role: 'tool_result', content: results });
      }
    } catch (err) {
      if (
        err instanceof ModelServiceError ||
        err instanceof LoopLimitExceededError ||
        err instanceof UnknownSessionError
      ) {
        transition('failed');
        log.error('Run failed', {}, { code: err.code, error: err.message, roundTrips });
        this.emit(sessionId, { type: 'error', message: err.message });
        return { status: 'failed', error: err, roundTrips };
      }
      throw err;
    }
  }

  private async callModel(sessionId: string, log: Logger): Promise<ModelResponse> {
    const request: ModelRequest = {
      system: this.config.systemPrompt,
      tools: this.tools.definitions(),
      messages: this.sessions.readTranscript(sessionId),
    };

    log.debug('Calling model service', {}, {
      provider: this.model.name,
      messageCount: request.messages.length,
    });

    try {
      return await this.model.createMessage(request);
    } catch (err) {
      if (err instanceof ModelServiceError) {
        throw err;
      }
      throw new ModelServiceError(`Model service request failed: ${describeError(err)}`, { cause: err });
    }
  }

  private async executeTools(
    sessionId: string,
    requests: readonly ToolUseBlock[],
    log: Logger,
  ): Promise<ToolResultBlock[]> {
    const results: ToolResultBlock[] = [];

    for (const request of requests) {
      const { content, isError } = await this.tools.resolve(request.name, request.input);
      log.info('Tool invocation completed', { toolUseId: request.id }, { toolName: request.name, isError });
      this.emit(sessionId, { type: 'tool_invocation_completed', toolName: request.name });
      results.push(
        isError
          ? { type: 'tool_result', toolUseId: request.id, content, isError }
          : { type: 'tool_result', toolUseId: request.id, content },
      );
    }

    return results;
  }

  private emit(sessionId: string, event: NotificationEvent): void {
    try {
      this.sink.notify(sessionId, event);
    } catch (err) {
      const failure = new SinkDeliveryError(sessionId, err);
      logger.warn(failure.message, { sessionId }, { eventType: event.type });
    }
  }
}

// ─── Block helpers ──────────────────────────────────────────────────────────

function textFragments(blocks: readonly AssistantBlock[]): string[] {
  const fragments: string[] = [];
  for (const block of blocks) {
    switch (block.type) {
      case 'text':
        fragments.push(block.text);
        break;
      case 'tool_use':
        break;
    }
  }
  return fragments;
}

function toolRequests(blocks: readonly AssistantBlock[]): ToolUseBlock[] {
  return blocks.filter((block): block is ToolUseBlock => block.type === 'tool_use');
}
