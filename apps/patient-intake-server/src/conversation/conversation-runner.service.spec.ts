import { DateConverterService } from '../date-conversion/date-converter.service';
import { IntakeFlowFactoryService } from '../intake-flow/intake-flow-factory.service';
import { intakeNodes } from '../intake-flow/intake-nodes';
import {
  MONDAY_MORNING,
  RecordingNotifier,
  ScriptedAddressValidator,
  ScriptedChatModel,
  callTools,
  fixedClock,
  say,
} from '../testing/intake-fakes';
import { ConversationRunnerService, parseToolArguments } from './conversation-runner.service';
import { ConversationTranscript } from './conversation-transcript';

const factory = new IntakeFlowFactoryService(
  new ScriptedAddressValidator(),
  new DateConverterService(fixedClock(MONDAY_MORNING)),
  new RecordingNotifier(),
);

const GREETING = "Hello, I'm Dr. Smith's medical AI assistant. How are you doing today?";

describe('ConversationRunnerService', () => {
  it('greets the caller from the entry node', async () => {
    const model = new ScriptedChatModel([say(GREETING)]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-1');
    const transcript = new ConversationTranscript();

    const turn = await runner.start(flow, transcript, factory.entryNode());

    expect(turn).toEqual({
      reply: GREETING,
      node: 'initial',
      ended: false,
      steps: [
        { action: 'model-call', node: 'initial' },
        { action: 'reply', node: 'initial' },
      ],
    });
    const initial = intakeNodes.initial();
    expect(model.requests).toEqual([
      { messages: [...(initial.roleMessages ?? []), ...initial.taskMessages], tools: ['collect_name'] },
    ]);
    expect(transcript.messages[transcript.messages.length - 1]).toEqual({ role: 'assistant', content: GREETING });
  });

  it('routes a tool call through the flow and presents the next node', async () => {
    const model = new ScriptedChatModel([
      say(GREETING),
      callTools(['collect_name', { name: 'Ada Lovelace' }]),
      say('Thanks Ada. What is your date of birth?'),
    ]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-2');
    const transcript = new ConversationTranscript();
    await runner.start(flow, transcript, factory.entryNode());

    const turn = await runner.respond(flow, transcript, 'I am Ada Lovelace');

    expect(turn.reply).toBe('Thanks Ada. What is your date of birth?');
    expect(turn.node).toBe('date_of_birth');
    expect(turn.steps).toEqual([
      { action: 'model-call', node: 'initial' },
      {
        action: 'call-tool',
        node: 'initial',
        tool: 'collect_name',
        args: { name: 'Ada Lovelace' },
        result: { name: 'Ada Lovelace' },
      },
      { action: 'model-call', node: 'date_of_birth' },
      { action: 'reply', node: 'date_of_birth' },
    ]);
    expect(model.requests[2].tools).toEqual(['collect_date_of_birth']);
    expect(model.requests[2].messages.slice(-4)).toEqual([
      { role: 'user', content: 'I am Ada Lovelace' },
      {
        role: 'assistant',
        toolCalls: [{ id: 'call-1', name: 'collect_name', arguments: '{"name":"Ada Lovelace"}' }],
      },
      { role: 'tool', toolCallId: 'call-1', content: '{"name":"Ada Lovelace"}' },
      { role: 'system', content: "Ask about the customer's date of birth." },
    ]);
    expect(flow.state.get('name')).toBe('Ada Lovelace');
  });

  it('keeps the tool results of one reply together before presenting the next node', async () => {
    const model = new ScriptedChatModel([
      callTools(
        ['collect_referral', { referral_name: 'Dr. Jones' }],
        ['collect_chief_complaint', { chief_complaint: 'Knee pain' }],
      ),
      say('Thanks. What is your address?'),
    ]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-batch');

    const turn = await runner.start(flow, new ConversationTranscript(), intakeNodes.referral());

    expect(turn.node).toBe('address');
    const presented = model.requests[1].messages;
    expect(presented.map((message) => message.role)).toEqual(['system', 'assistant', 'tool', 'tool', 'system']);
    expect(presented[2]).toMatchObject({ toolCallId: 'call-1' });
    expect(presented[3]).toMatchObject({ toolCallId: 'call-2' });
    expect(presented[4]).toEqual(intakeNodes.address().taskMessages[0]);
    expect(model.requests[1].tools).toEqual(['collect_address']);
  });

  it('answers a call to an undeclared tool with an error and stays on the node', async () => {
    const model = new ScriptedChatModel([
      say(GREETING),
      callTools(['collect_address', { address: '12 Elm Street' }]),
      say('Sorry, could you tell me your name?'),
    ]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-3');
    const transcript = new ConversationTranscript();
    await runner.start(flow, transcript, factory.entryNode());

    const turn = await runner.respond(flow, transcript, 'I live on Elm Street');

    expect(turn.node).toBe('initial');
    expect(turn.steps[1]).toEqual({
      action: 'call-tool',
      node: 'initial',
      tool: 'collect_address',
      args: { address: '12 Elm Street' },
      error: 'Tool collect_address is not available in node initial',
    });
    expect(model.requests[2].tools).toEqual(['collect_name']);
    expect(model.requests[2].messages[model.requests[2].messages.length - 1]).toEqual({
      role: 'tool',
      toolCallId: 'call-1',
      content: '{"error":"Tool collect_address is not available in node initial"}',
    });
    expect(flow.state.snapshot()).toEqual({});
  });

  it('gives up on the turn after the configured number of model calls', async () => {
    const model = new ScriptedChatModel([
      say(GREETING),
      callTools(['end_quote', {}]),
      callTools(['end_quote', {}]),
    ]);
    const runner = new ConversationRunnerService(model, { maxModelCalls: 2 });
    const flow = factory.create('call-4');
    const transcript = new ConversationTranscript();
    await runner.start(flow, transcript, factory.entryNode());

    const turn = await runner.respond(flow, transcript, 'hello?');

    expect(turn.reply).toBeUndefined();
    expect(turn.ended).toBe(false);
    expect(turn.steps.filter((step) => step.action === 'model-call')).toHaveLength(2);
    expect(model.requests).toHaveLength(3);
  });

  it('ends the conversation after the goodbye on the terminal node', async () => {
    const onConversationEnd = jest.fn();
    const model = new ScriptedChatModel([callTools(['end_quote', {}]), say('Thank you for calling. Goodbye!')]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-5', { onConversationEnd });

    const turn = await runner.start(flow, new ConversationTranscript(), intakeNodes.appointmentScheduling());

    expect(turn).toMatchObject({ reply: 'Thank you for calling. Goodbye!', node: 'end', ended: true });
    expect(model.requests[1].tools).toEqual([]);
    expect(flow.flowStatus).toBe('ended');
    expect(onConversationEnd).toHaveBeenCalledWith({});
  });

  it('stops a turn on a cancelled flow', async () => {
    const model = new ScriptedChatModel([say(GREETING)]);
    const runner = new ConversationRunnerService(model, {});
    const flow = factory.create('call-6');
    const transcript = new ConversationTranscript();
    await runner.start(flow, transcript, factory.entryNode());
    flow.cancel('participant left');

    await expect(runner.respond(flow, transcript, 'hello?')).rejects.toMatchObject({ code: 'cancelled' });
    expect(model.requests).toHaveLength(1);
  });
});

describe('parseToolArguments', () => {
  it('reads JSON arguments', () => {
    expect(parseToolArguments({ id: 'call-1', name: 'collect_name', arguments: '{"name":"Ada"}' })).toEqual({
      name: 'Ada',
    });
  });

  it('treats blank arguments as an empty object', () => {
    expect(parseToolArguments({ id: 'call-1', name: 'end_quote', arguments: ' ' })).toEqual({});
  });

  it('rejects malformed JSON as invalid arguments', () => {
    expect(() => parseToolArguments({ id: 'call-1', name: 'collect_name', arguments: '{"name":' })).toThrow(
      /^Arguments for collect_name are not valid JSON: /,
    );
  });
});
