import { Inject, Injectable, Logger } from '@nestjs/common';
import twilio from 'twilio';
import { CallForwarder, CallsClient, TWILIO_CLIENT } from './telephony.types';

export const buildSipDialTwiml = (sipUri: string): string => {
  const response = new twilio.twiml.VoiceResponse();
  response.dial().sip(sipUri);
  return response.toString();
};

/**
 * Hands a PSTN call over to the SIP endpoint of the voice pipeline. Each call is
 * forwarded at most once; repeated or concurrent requests share the first one.
 */
@Injectable()
export class TwilioCallForwardingService implements CallForwarder {
  private readonly logger = new Logger(TwilioCallForwardingService.name);
  private readonly forwards = new Map<string, Promise<void>>();

  constructor(@Inject(TWILIO_CLIENT) private readonly client: CallsClient) {}

  forwardCall(callId: string, sipUri: string): Promise<void> {
    const existing = this.forwards.get(callId);
    if (existing) {
      this.logger.debug(`Call ${callId} already forwarded`);
      return existing;
    }

    const forward = this.update(callId, sipUri).catch((error: unknown) => {
      this.forwards.delete(callId);
      throw error;
    });
    this.forwards.set(callId, forward);
    return forward;
  }

  release(callId: string): void {
    this.forwards.delete(callId);
  }

  private async update(callId: string, sipUri: string): Promise<void> {
    try {
      await this.client.calls(callId).update({ twiml: buildSipDialTwiml(sipUri) });
      this.logger.log(`Forwarded call ${callId} to ${sipUri}`);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.error(`Failed to forward call ${callId}: ${message}`);
      throw error;
    }
  }
}
