import { BadRequestException, Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common';
import { z } from 'zod';
import { CallSessionService } from './call-session.service';

const StartCallSchema = z.object({
  callId: z.string().min(1),
  sipUri: z.string().min(1),
});

const UtteranceSchema = z.object({
  text: z.string().min(1),
});

const ParticipantLeftSchema = z.object({
  reason: z.string().optional(),
});

const DialinErrorSchema = z.object({
  error: z.string().optional(),
});

const parseBody = <T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> => {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new BadRequestException(parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`));
  }
  return parsed.data;
};

@Controller('calls')
export class CallSessionController {
  constructor(private readonly calls: CallSessionService) {}

  @Post()
  start(@Body() body: unknown) {
    const { callId, sipUri } = parseBody(StartCallSchema, body);
    return this.calls.start(callId, sipUri);
  }

  @Get(':callId')
  view(@Param('callId') callId: string) {
    return this.calls.view(callId);
  }

  @Post(':callId/participant-joined')
  participantJoined(@Param('callId') callId: string) {
    return this.calls.participantJoined(callId);
  }

  @Post(':callId/dialin-ready')
  @HttpCode(204)
  async dialinReady(@Param('callId') callId: string): Promise<void> {
    await this.calls.dialinReady(callId);
  }

  @Post(':callId/utterances')
  utterance(@Param('callId') callId: string, @Body() body: unknown) {
    const { text } = parseBody(UtteranceSchema, body);
    return this.calls.utterance(callId, text);
  }

  @Post(':callId/participant-left')
  @HttpCode(204)
  async participantLeft(@Param('callId') callId: string, @Body() body: unknown): Promise<void> {
    const { reason } = parseBody(ParticipantLeftSchema, body);
    await this.calls.participantLeft(callId, reason ?? 'unknown');
  }

  @Post(':callId/dialin-error')
  @HttpCode(204)
  async dialinError(@Param('callId') callId: string, @Body() body: unknown): Promise<void> {
    const { error } = parseBody(DialinErrorSchema, body);
    await this.calls.dialinError(callId, error ?? 'unknown');
  }
}
