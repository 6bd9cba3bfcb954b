import { Inject, Injectable, Logger, NotFoundException } from '@nestjs/common';
import { ConversationRunnerService } from '../conversation/conversation-runner.service';
import { ConversationTranscript } from '../conversation/conversation-transcript';
import type { ConversationTurn } from '../conversation/conversation.types';
import { IntakeFlowFactoryService } from '../intake-flow/intake-flow-factory.service';
import type { IntakeState } from '../shared/intake-state.interface';
import { CALL_SESSION_STORE, StateStore } from '../state/state-store.interface';
import { CALL_FORWARDER, CallForwarder } from '../telephony/telephony.types';
import {
  CALL_SESSION_CONFIG,
  CallReport,
  CallSession,
  CallSessionConfig,
  CallSessionView,
  CallTurn,
} from './call-session.types';

export const buildCallReport = (
  callId: string,
  nodesVisited: readonly string[],
  state: Readonly<Partial<IntakeState>>,
): CallReport => ({
  callId,
  nodesVisited,
  patient: {
    name: state.name,
    dateOfBirth: state.dateOfBirth,
    phoneNumber: state.phoneNumber,
    email: state.email,
    address: state.address,
  },
  insurance: { payerName: state.payerName, payerId: state.payerId },
  referralDoctor: state.referralDoctor,
  chiefComplaint: state.chiefComplaint,
  appointment: {
    selected: state.selectedAppointment,
    converted: state.convertedAppointment,
    customTime: state.customTime,
  },
  confirmationSent: state.confirmationSent ?? false,
});

/**
 * Binds the telephony events of one call to its intake flow. Each call gets its
 * own flow manager and transcript; nothing is shared between calls.
 */
@Injectable()
export class CallSessionService {
  private readonly logger = new Logger(CallSessionService.name);
  // filled when a call reaches the end node, handed out with the turn that got it there
  private readonly reports = new Map<string, CallReport>();

  constructor(
    private readonly flowFactory: IntakeFlowFactoryService,
    private readonly runner: ConversationRunnerService,
    @Inject(CALL_FORWARDER) private readonly forwarder: CallForwarder,
    @Inject(CALL_SESSION_STORE) private readonly sessions: StateStore<CallSession>,
    @Inject(CALL_SESSION_CONFIG) private readonly config: CallSessionConfig,
  ) {
    this.sessions.onExpire((callId, session) => this.expire(callId, session));
  }

  async start(callId: string, sipUri: string): Promise<CallSessionView> {
    const existing = await this.sessions.get(callId);
    if (existing) {
      this.logger.warn(`Call ${callId} already has a session`);
      return this.toView(existing);
    }

    const flow = this.flowFactory.create(callId, {
      onConversationEnd: (state) => this.complete(callId, state),
    });
    const session: CallSession = {
      callId,
      sipUri,
      flow,
      transcript: new ConversationTranscript(),
      startedAtUtc: new Date().toISOString(),
    };
    await this.sessions.set(callId, session, this.config.ttlSeconds);
    this.logger.log(`Started session for call ${callId} (SIP ${sipUri})`);
    return this.toView(session);
  }

  async participantJoined(callId: string): Promise<CallTurn> {
    const session = await this.require(callId);
    this.logger.log(`First participant joined call ${callId}`);
    return this.guardTurn(session, () =>
      this.runner.start(session.flow, session.transcript, this.flowFactory.entryNode()),
    );
  }

  async dialinReady(callId: string): Promise<void> {
    const session = await this.require(callId);
    try {
      await this.forwarder.forwardCall(callId, session.sipUri);
    } catch (error) {
      // the call stays unforwarded; the next dial-in-ready event retries
      const reason = error instanceof Error ? error.message : String(error);
      this.logger.error(`Forwarding call ${callId} to ${session.sipUri} failed: ${reason}`);
    }
  }

  async utterance(callId: string, text: string): Promise<CallTurn> {
    const session = await this.require(callId);
    return this.guardTurn(session, () => this.runner.respond(session.flow, session.transcript, text));
  }

  async participantLeft(callId: string, reason: string): Promise<void> {
    this.logger.log(`Participant left call ${callId}: ${reason}`);
    await this.terminate(callId, `participant left (${reason})`);
  }

  async dialinError(callId: string, detail: string): Promise<void> {
    this.logger.error(`Dial-in error on call ${callId}: ${detail}`);
    await this.terminate(callId, `dial-in error (${detail})`);
  }

  async view(callId: string): Promise<CallSessionView> {
    return this.toView(await this.require(callId));
  }

  private async guardTurn(session: CallSession, turn: () => Promise<ConversationTurn>): Promise<CallTurn> {
    try {
      const result = await turn();
      const report = this.reports.get(session.callId);
      this.reports.delete(session.callId);
      return report ? { ...result, report } : result;
    } catch (error) {
      if (session.flow.flowStatus === 'cancelled') {
        throw new NotFoundException(`Call ${session.callId} has ended`);
      }
      throw error;
    }
  }

  private async complete(callId: string, state: Readonly<Partial<IntakeState>>): Promise<void> {
    const session = await this.sessions.get(callId);
    const report = buildCallReport(callId, session?.flow.history ?? [], state);
    this.reports.set(callId, report);
    this.logger.log(`Call ${callId} completed: ${JSON.stringify(report)}`);
    this.forwarder.release(callId);
    await this.sessions.delete(callId);
  }

  private async terminate(callId: string, reason: string): Promise<void> {
    const session = await this.sessions.get(callId);
    if (!session) {
      return;
    }
    session.flow.cancel(reason);
    this.forwarder.release(callId);
    await this.sessions.delete(callId);
  }

  private expire(callId: string, session: CallSession): void {
    this.logger.warn(`Session for call ${callId} expired without a hang-up`);
    session.flow.cancel('session expired');
    this.forwarder.release(callId);
  }

  private async require(callId: string): Promise<CallSession> {
    const session = await this.sessions.get(callId);
    if (!session) {
      throw new NotFoundException(`No session for call ${callId}`);
    }
    return session;
  }

  private toView(session: CallSession): CallSessionView {
    return {
      callId: session.callId,
      node: session.flow.flowStatus === 'idle' ? undefined : session.flow.current.name,
      status: session.flow.flowStatus,
      startedAtUtc: session.startedAtUtc,
    };
  }
}
