import { v4 as uuidv4 } from 'uuid';
import { SessionService } from './session.service';
import { RoutingService } from './routing.service';
import { IntentService } from './intent.service';
import { TransactionService } from './transaction.service';
import { AcquisitionMachine } from './machines/acquisition.machine';
import { ServiceBookingMachine } from './machines/service.machine';
import { ConsignmentMachine } from './machines/consignment.machine';
import { DomainMachine, MissingField } from './machines/machine';
import { IncomingMessage, TurnAction, TurnResponse } from '../types/agent';
import { TextCompletion } from '../types/capabilities';
import { AwaitedField, Domain, DomainSlots, SessionStage, SessionState } from '../types/session';
import { Signal } from '../types/signal';
import { buildSystemContext } from '../utils/prompts';
import { CLARIFY_REPLY, GREETING_REPLY, RETRY_REPLY, draftReply, incompleteReply } from '../utils/replies';
import { ServiceError, errorMessage } from '../utils/errors';
import { logger } from '../utils/logger';

export interface DomainMachines {
  acquisition: AcquisitionMachine;
  service: ServiceBookingMachine;
  consignment: ConsignmentMachine;
}

export interface AgentDependencies {
  sessions: SessionService;
  router: RoutingService;
  intents: IntentService;
  machines: DomainMachines;
  transactions: TransactionService;
  /** Rewrites draft replies; null keeps the drafts. */
  completion: TextCompletion | null;
}

interface StepResult {
  stage: SessionStage;
  missing: MissingField[];
  awaiting: AwaitedField | null;
}

interface Reply {
  action: TurnAction;
  text: string;
  missing: string[];
  recordId?: string;
  warnings?: string[];
}

export class AgentService {
  private sessions: SessionService;
  private router: RoutingService;
  private intents: IntentService;
  private machines: DomainMachines;
  private transactions: TransactionService;
  private completion: TextCompletion | null;

  constructor(deps: AgentDependencies) {
    this.sessions = deps.sessions;
    this.router = deps.router;
    this.intents = deps.intents;
    this.machines = deps.machines;
    this.transactions = deps.transactions;
    this.completion = deps.completion;
  }

  /**
   * One turn per session at a time. The turn works on a copy of the session and
   * only commits it at the end, so an infrastructure fault leaves the stored
   * session exactly as it was and the same message can be sent again.
   */
  async handleMessage(incoming: IncomingMessage): Promise<TurnResponse> {
    const { session_id: sessionId, message, channel } = incoming;

    return this.sessions.runExclusive(sessionId, async () => {
      let committed: Pick<SessionState, 'activeDomain' | 'stage'> = { activeDomain: 'none', stage: 'greeting' };

      try {
        const session = await this.sessions.fetchOrCreate(sessionId);
        committed = { activeDomain: session.activeDomain, stage: session.stage };

        const response = await this.processTurn(session, message);

        logger.info('Message handled', {
          sessionId,
          channel,
          domain: response.domain,
          stage: response.stage,
          action: response.action_taken,
        });

        return response;
      } catch (error) {
        if (error instanceof ServiceError) {
          logger.error('Turn failed, session left unchanged', {
            sessionId,
            service: error.service,
            operation: error.operation,
            retryable: error.retryable,
            error: error.message,
          });

          return {
            success: false,
            session_id: sessionId,
            response: RETRY_REPLY,
            action_taken: 'retry',
            domain: committed.activeDomain,
            stage: committed.stage,
            missing_fields: [],
            warnings: [],
            retryable: error.retryable,
          };
        }

        logger.error('Failed to handle message', { sessionId, channel, error: errorMessage(error) });
        throw error;
      }
    });
  }

  private async processTurn(session: SessionState, message: string): Promise<TurnResponse> {
    const { sessionId } = session;

    // 1. Route
    const decision = await this.router.route(message, session);

    if (decision.kind !== 'domain') {
      this.sessions.appendTurn(session, 'user', message);
      const greeted = decision.kind === 'greeting';
      return this.finish(session, {
        action: greeted ? 'greeted' : 'clarified',
        text: greeted ? GREETING_REPLY : CLARIFY_REPLY,
        missing: [],
      });
    }

    // 2. Open a funnel for a newly routed domain
    if (decision.source !== 'sticky' || !session.slots) {
      this.startFunnel(session, decision.domain);
    }
    const slots = session.slots;
    if (!slots) {
      throw new Error(`Session ${sessionId} has no slots after routing`);
    }
    this.sessions.appendTurn(session, 'user', message);

    // 3. Extract, against the field the funnel was waiting for
    const signals = this.intents.extract(message, session);

    // 4. Merge and advance
    const step = await this.advance(slots, session.stage, signals, sessionId);
    session.stage = step.stage;
    session.awaiting = step.awaiting;

    // 5. Readiness gate: at most one record per funnel
    if (step.stage === 'ready' && !slots.recordCreated) {
      const result = await this.transactions.create(slots, sessionId);

      if (!result.success) {
        return this.finish(session, {
          action: 'awaiting_info',
          text: incompleteReply(result.missingFields),
          missing: result.missingFields,
        });
      }

      // 6. Completed: confirm verbatim, then reset the funnel under the same session id
      session.stage = 'completed';
      const response = this.respond(session, {
        action: 'record_created',
        text: result.message,
        missing: [],
        recordId: result.recordId,
        warnings: result.warnings,
      });
      this.sessions.appendTurn(session, 'assistant', result.message);
      this.sessions.clear(session);
      await this.sessions.save(session);
      return response;
    }

    const labels = step.missing.map((field) => field.label);
    return this.finish(session, {
      action: 'collecting',
      text: draftReply(slots, session.stage, labels),
      missing: labels,
    });
  }

  private startFunnel(session: SessionState, domain: Domain): void {
    const machine = this.machines[domain];
    session.activeDomain = domain;
    session.slots = machine.initialSlots(uuidv4());
    session.stage = machine.initialStage;
    session.awaiting = null;
    logger.info('Funnel started', { sessionId: session.sessionId, domain, funnelId: session.slots.funnelId });
  }

  private advance(slots: DomainSlots, stage: SessionStage, signals: Signal[], sessionId: string): Promise<StepResult> {
    switch (slots.domain) {
      case 'acquisition':
        return this.step(this.machines.acquisition, slots, stage, signals, sessionId);
      case 'service':
        return this.step(this.machines.service, slots, stage, signals, sessionId);
      case 'consignment':
        return this.step(this.machines.consignment, slots, stage, signals, sessionId);
    }
  }

  private async step<S extends DomainSlots, Stage extends SessionStage>(
    machine: DomainMachine<S, Stage>,
    slots: S,
    stage: SessionStage,
    signals: Signal[],
    sessionId: string
  ): Promise<StepResult> {
    const result = await machine.advance(machine.toStage(stage), slots, signals, sessionId);
    return { stage: result.stage, missing: result.missing, awaiting: result.awaiting };
  }

  /** Polishes the draft, records the reply and commits the session. */
  private async finish(session: SessionState, reply: Reply): Promise<TurnResponse> {
    const text = await this.compose(session, reply);
    this.sessions.appendTurn(session, 'assistant', text);
    await this.sessions.save(session);
    return this.respond(session, { ...reply, text });
  }

  /** Reply generation is never fatal: any completion fault falls back to the draft. */
  private async compose(session: SessionState, reply: Reply): Promise<string> {
    if (!this.completion) return reply.text;

    const systemContext = buildSystemContext({
      domain: session.activeDomain,
      stage: session.stage,
      missing: reply.missing,
      draft: reply.text,
    });
    const turns = session.history.map(({ role, content }) => ({ role, content }));

    try {
      const text = await this.completion.complete(systemContext, turns);
      return text.trim() || reply.text;
    } catch (error) {
      logger.warn('Reply generation failed, using draft', {
        sessionId: session.sessionId,
        error: errorMessage(error),
      });
      return reply.text;
    }
  }

  private respond(session: SessionState, reply: Reply): TurnResponse {
    return {
      success: true,
      session_id: session.sessionId,
      response: reply.text,
      action_taken: reply.action,
      domain: session.activeDomain,
      stage: session.stage,
      missing_fields: reply.missing,
      ...(reply.recordId ? { record_id: reply.recordId } : {}),
      warnings: reply.warnings ?? [],
    };
  }
}
