/**
 * One interactive blueprint session.
 *
 * A session owns its conversation state, transcript, blueprint document and
 * continuation id; nothing is shared between sessions. Each submitted
 * message runs one turn:
 *
 * 1. the gateway continues the conversation
 * 2. the reported state is checked against mode ordering
 * 3. the user and assistant turns are recorded (and sent to telemetry)
 * 4. in BUILDER mode, a reply carrying blueprint text is synthesized and
 *    checked for consistency
 *
 * A gateway failure changes nothing. A reset while a turn is waiting on the
 * model discards that turn's result.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import {
  renderBlueprint,
  withConsistency,
  type BlueprintDocument,
} from '../blueprint/document.js';
import { BlueprintSynthesizer } from '../blueprint/synthesizer.js';
import { ConsistencyChecker } from '../consistency/checker.js';
import { Transcript } from '../conversation/transcript.js';
import {
  ConversationStateMachine,
  type TransitionError,
} from '../conversation/transitions.js';
import type { ConversationState, Role, Turn } from '../conversation/types.js';
import type { ModelGateway, ProviderError } from '../gateway/types.js';
import type { TelemetryRecorder } from '../telemetry/recorder.js';
import { logger as defaultLogger, type Logger } from '../utils/logger.js';
import { EmptyMessageError, TurnInProgressError } from './errors.js';

/**
 * Outcome of one submitted message.
 */
export type TurnOutcome =
  | {
      /** The reply was accepted and the state advanced. */
      readonly status: 'accepted';
      readonly assistantText: string;
      readonly state: ConversationState;
      readonly modeChanged: boolean;
      /** The document produced by this turn, if it produced one. */
      readonly blueprint: BlueprintDocument | undefined;
    }
  | {
      /** The reply was recorded but its state moved backwards and was ignored. */
      readonly status: 'transition_rejected';
      readonly assistantText: string;
      readonly state: ConversationState;
      readonly error: TransitionError;
    }
  | {
      /** The gateway failed; nothing changed. */
      readonly status: 'provider_error';
      readonly error: ProviderError;
    }
  | {
      /** The session was reset while the turn was running. */
      readonly status: 'discarded';
    };

/**
 * Options for a BlueprintSession.
 */
export interface BlueprintSessionOptions {
  readonly gateway: ModelGateway;
  /** Defaults to a checker over the same gateway. */
  readonly checker?: ConsistencyChecker;
  readonly synthesizer?: BlueprintSynthesizer;
  /** Omit to disable telemetry. */
  readonly telemetry?: TelemetryRecorder;
  /** Defaults to a random UUID. */
  readonly sessionId?: string;
  readonly logger?: Logger;
}

/**
 * Orchestrates turns for one user.
 *
 * @example
 * ```typescript
 * const session = new BlueprintSession({ gateway });
 * const outcome = await session.submit('I want to sell eco-friendly water bottles online');
 * if (outcome.status === 'accepted') {
 *   console.log(outcome.assistantText);
 * }
 * ```
 */
export class BlueprintSession {
  /** Identifier sent with telemetry records. */
  readonly id: string;

  private readonly gateway: ModelGateway;
  private readonly checker: ConsistencyChecker;
  private readonly synthesizer: BlueprintSynthesizer;
  private readonly telemetry: TelemetryRecorder | undefined;
  private readonly log: Logger;

  private readonly machine = new ConversationStateMachine();
  private readonly transcript = new Transcript();
  private document: BlueprintDocument | undefined;
  private continuationId: string | undefined;
  /** Bumped on reset; a turn started under an older generation is stale. */
  private generation = 0;
  private activeGeneration: number | undefined;

  constructor(options: BlueprintSessionOptions) {
    this.id = options.sessionId ?? randomUUID();
    this.log = (options.logger ?? defaultLogger).child('Session');
    this.gateway = options.gateway;
    this.checker =
      options.checker ?? new ConsistencyChecker({ gateway: options.gateway, logger: this.log });
    this.synthesizer = options.synthesizer ?? new BlueprintSynthesizer({ logger: this.log });
    this.telemetry = options.telemetry;
  }

  /** Current conversation state. */
  get state(): ConversationState {
    return this.machine.current;
  }

  /** Recorded turns, oldest first. */
  get turns(): readonly Turn[] {
    return this.transcript.all();
  }

  /** Latest checked blueprint, if one has been produced. */
  get blueprint(): BlueprintDocument | undefined {
    return this.document;
  }

  /** Latest blueprint as Markdown, or an empty string before BUILDER output. */
  get blueprintMarkdown(): string {
    return this.document === undefined ? '' : renderBlueprint(this.document);
  }

  /** Continuation id of the provider thread, if one exists. */
  get threadId(): string | undefined {
    return this.continuationId;
  }

  /** Whether a turn is waiting on the model. */
  get busy(): boolean {
    return this.activeGeneration === this.generation;
  }

  /**
   * Runs one turn.
   *
   * @throws TurnInProgressError if another turn is still running.
   * @throws EmptyMessageError if the message is blank.
   */
  async submit(userText: string): Promise<TurnOutcome> {
    if (this.busy) {
      throw new TurnInProgressError();
    }
    const text = userText.trim();
    if (text === '') {
      throw new EmptyMessageError();
    }

    const generation = this.generation;
    this.activeGeneration = generation;
    try {
      return await this.runTurn(text, generation);
    } finally {
      if (this.activeGeneration === generation) {
        this.activeGeneration = undefined;
      }
    }
  }

  /**
   * Returns the session to its initial state: mode DISCOVERY, empty
   * transcript, no blueprint and no provider thread. A turn still running
   * is discarded when it completes.
   */
  reset(): void {
    this.generation++;
    this.activeGeneration = undefined;
    this.machine.reset();
    this.transcript.clear();
    this.document = undefined;
    this.continuationId = undefined;
    this.log.info('session_reset', { sessionId: this.id });
  }

  /**
   * Waits for telemetry sends still in flight.
   */
  async flush(): Promise<void> {
    await this.telemetry?.flush();
  }

  private async runTurn(text: string, generation: number): Promise<TurnOutcome> {
    const result = await this.gateway.continueConversation(
      { continuationId: this.continuationId },
      text
    );

    if (generation !== this.generation) {
      this.log.debug('turn_discarded', { sessionId: this.id, stage: 'reply' });
      return { status: 'discarded' };
    }

    if (!result.success) {
      this.log.warn('turn_failed', {
        sessionId: this.id,
        kind: result.error.kind,
        message: result.error.message,
      });
      return { status: 'provider_error', error: result.error };
    }

    const reply = result.response;
    // The provider thread already holds this exchange, whatever happens to
    // the reported state.
    this.continuationId = reply.continuationId;
    this.record('user', text);
    this.record('assistant', reply.assistantText);

    const applied = this.machine.apply(reply.newState);
    if (!applied.success) {
      this.log.warn('transition_rejected', {
        sessionId: this.id,
        fromMode: applied.error.fromMode,
        toMode: applied.error.toMode,
      });
      return {
        status: 'transition_rejected',
        assistantText: reply.assistantText,
        state: this.machine.current,
        error: applied.error,
      };
    }

    let produced: BlueprintDocument | undefined;
    if (reply.blueprintMarkdown !== undefined) {
      if (applied.state.mode !== 'BUILDER') {
        this.log.debug('blueprint_ignored', { sessionId: this.id, mode: applied.state.mode });
      } else {
        const { document } = this.synthesizer.synthesize(reply.blueprintMarkdown);
        const outcome = await this.checker.evaluate(renderBlueprint(document));

        if (generation !== this.generation) {
          this.log.debug('turn_discarded', { sessionId: this.id, stage: 'consistency' });
          return { status: 'discarded' };
        }
        produced = withConsistency(document, outcome);
        this.document = produced;
      }
    }

    if (applied.modeChanged) {
      this.log.info('mode_changed', { sessionId: this.id, mode: applied.state.mode });
    }

    return {
      status: 'accepted',
      assistantText: reply.assistantText,
      state: applied.state,
      modeChanged: applied.modeChanged,
      blueprint: produced,
    };
  }

  private record(role: Role, text: string): void {
    this.transcript.record(role, text);
    this.telemetry?.record(role, text);
  }
}
