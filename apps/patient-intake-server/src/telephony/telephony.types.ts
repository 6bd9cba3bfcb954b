export interface CallUpdater {
  update(params: { twiml: string }): Promise<unknown>;
}

/** The slice of the Twilio REST client the bridge depends on. */
export type CallsClient = {
  calls(callSid: string): CallUpdater;
};

export interface CallForwarder {
  forwardCall(callId: string, sipUri: string): Promise<void>;
  release(callId: string): void;
}

export type TwilioConfig = {
  accountSid?: string;
  authToken?: string;
};

export const TWILIO_CLIENT = Symbol('TWILIO_CLIENT');
export const TWILIO_CONFIG = Symbol('TWILIO_CONFIG');
export const CALL_FORWARDER = Symbol('CALL_FORWARDER');
