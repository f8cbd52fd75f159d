import { Test, TestingModule } from '@nestjs/testing';
import { Socket } from 'socket.io';
import { ChatRequest, TutorEventSink } from '../../utils/types';
import { ChatService } from '../chat/chat.service';
import { QueryOutcome } from '../chat/types';
import { SocketGateway, TUTOR_EVENT } from './socket.gateway';

type Handshake = { auth: Record<string, unknown>; query: Record<string, unknown> };

function fakeSocket(id: string, handshake: Handshake = { auth: {}, query: {} }) {
  const emitted: Array<[string, unknown]> = [];
  const raw = {
    id,
    connected: true,
    data: {},
    handshake,
    emit: (event: string, payload: unknown) => {
      emitted.push([event, payload]);
      return true;
    },
  };
  return { socket: raw as unknown as Socket, raw, emitted };
}

const flush = () => new Promise<void>(resolve => setImmediate(resolve));

describe('SocketGateway', () => {
  let gateway: SocketGateway;
  const ask = jest.fn<Promise<QueryOutcome>, [ChatRequest, TutorEventSink, AbortSignal?]>();

  beforeEach(async () => {
    ask.mockReset();
    ask.mockImplementation(async (_request, emit) => {
      emit({ type: 'processing', queryId: 'q-1', timestamp: '2025-01-01T00:00:00.000Z' });
      return { status: 'cancelled', queryId: 'q-1' };
    });

    const module: TestingModule = await Test.createTestingModule({
      providers: [SocketGateway, { provide: ChatService, useValue: { ask } }],
    }).compile();

    gateway = module.get<SocketGateway>(SocketGateway);
  });

  it('should be defined', () => {
    expect(gateway).toBeDefined();
  });

  it('acknowledges a connection with the handshake session id', () => {
    const { socket, emitted } = fakeSocket('sock-1', { auth: { sessionId: ' learner-7 ' }, query: {} });

    gateway.handleConnection(socket);

    expect(emitted).toEqual([['connection:ack', { socketId: 'sock-1', sessionId: 'learner-7' }]]);
  });

  it('falls back to the socket id as session id', () => {
    const { socket, emitted } = fakeSocket('sock-2');

    gateway.handleConnection(socket);

    expect(emitted[0][1]).toEqual({ socketId: 'sock-2', sessionId: 'sock-2' });
  });

  it('forwards questions, accepting the legacy message field', async () => {
    const { socket, emitted } = fakeSocket('sock-1', { auth: {}, query: { sessionId: 'learner-7' } });
    gateway.handleConnection(socket);

    gateway.handleAsk(socket, { message: 'What is a stack?' });
    gateway.handleAsk(socket, JSON.stringify({ question: 'And a queue?', sessionId: 'other' }));
    await flush();

    expect(ask.mock.calls.map(call => call[0])).toEqual([
      { question: 'What is a stack?', sessionId: 'learner-7' },
      { question: 'And a queue?', sessionId: 'other' },
    ]);
    expect(emitted.filter(([event]) => event === TUTOR_EVENT)).toHaveLength(2);
  });

  it('answers a malformed payload with an InvalidQuery error event', async () => {
    const { socket, emitted } = fakeSocket('sock-1');

    gateway.handleAsk(socket, 42);
    await flush();

    expect(ask).not.toHaveBeenCalled();
    expect(emitted).toHaveLength(1);
    expect(emitted[0][0]).toBe(TUTOR_EVENT);
    expect(emitted[0][1]).toMatchObject({ type: 'error', code: 'InvalidQuery', message: 'Please enter a question.' });
  });

  it('cancels in-flight queries on disconnect and stops forwarding events', async () => {
    const { socket, raw, emitted } = fakeSocket('sock-1');
    let late: TutorEventSink = () => undefined;
    ask.mockImplementationOnce(
      (_request, emit, signal) =>
        new Promise(resolve => {
          late = emit;
          signal?.addEventListener('abort', () => resolve({ status: 'cancelled', queryId: 'q-2' }));
        }),
    );

    gateway.handleAsk(socket, { question: 'What is a stack?' });
    await flush();
    expect(gateway.activeQueries).toBe(1);

    raw.connected = false;
    gateway.handleDisconnect(socket);
    await flush();

    late({ type: 'generating', queryId: 'q-2', timestamp: '2025-01-01T00:00:00.000Z' });
    expect(ask.mock.calls[0][2]?.aborted).toBe(true);
    expect(emitted).toEqual([]);
    expect(gateway.activeQueries).toBe(0);
  });
});
