import {
  WebSocketGateway,
  WebSocketServer,
  OnGatewayConnection,
  OnGatewayDisconnect,
  SubscribeMessage,
  ConnectedSocket,
  MessageBody,
} from '@nestjs/websockets';
import { Server, Socket } from 'socket.io';
import { Injectable, Logger } from '@nestjs/common';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { ChatService } from '../chat/chat.service';
import { QueryRun } from '../chat/query-state';
import { KeyedSerialQueue } from '../../utils/async';
import { InvalidQueryError, describeError } from '../../utils/errors';
import { ChatRequest, TutorEvent } from '../../utils/types';

export const ASK_EVENT = 'chat.ask';
export const TUTOR_EVENT = 'chat.event';

const askSchema = z.object({
  question: z.string().max(4000).optional(),
  // older clients send the question as `message`
  message: z.string().max(4000).optional(),
  sessionId: z.string().trim().min(1).max(191).optional(),
});

@WebSocketGateway({
  cors: {
    origin: ['http://localhost:3000', 'http://localhost:5173'],
    credentials: false,
  },
})
@Injectable()
export class SocketGateway implements OnGatewayConnection, OnGatewayDisconnect {
  private readonly logger = new Logger(SocketGateway.name);
  private readonly inFlight: Map<string, Set<AbortController>> = new Map(); // socketId -> queries
  private readonly queue = new KeyedSerialQueue();

  @WebSocketServer()
  public server!: Server;

  constructor(private readonly chatService: ChatService) {}

  handleConnection(client: Socket) {
    const auth = client.handshake.auth ?? {};
    const query = client.handshake.query ?? {};

    const sessionId = this.parseString(auth.sessionId ?? query.sessionId) ?? client.id;
    client.data.sessionId = sessionId;

    client.emit('connection:ack', {
      socketId: client.id,
      sessionId,
    });
  }

  handleDisconnect(client: Socket) {
    const controllers = this.inFlight.get(client.id);
    if (!controllers) return;
    for (const controller of controllers) controller.abort();
    this.inFlight.delete(client.id);
    this.logger.log(`Socket ${client.id} disconnected, cancelled ${controllers.size} query(s)`);
  }

  /** Queries of one socket run one at a time; events go back on `chat.event`. */
  @SubscribeMessage(ASK_EVENT)
  handleAsk(@ConnectedSocket() client: Socket, @MessageBody() payload: unknown): void {
    const controller = new AbortController();
    const controllers = this.inFlight.get(client.id) ?? new Set<AbortController>();
    controllers.add(controller);
    this.inFlight.set(client.id, controllers);

    const emit = (event: TutorEvent) => {
      if (client.connected && !controller.signal.aborted) client.emit(TUTOR_EVENT, event);
    };
    const request = this.toRequest(client, payload);

    void this.queue
      .run(client.id, async () => {
        if (controller.signal.aborted) return;
        if (!request) {
          new QueryRun(uuidv4(), emit).fail(new InvalidQueryError('malformed chat.ask payload'));
          return;
        }
        await this.chatService.ask(request, emit, controller.signal);
      })
      .catch(err => this.logger.error(`chat.ask on ${client.id} failed: ${describeError(err)}`))
      .finally(() => {
        controllers.delete(controller);
        if (controllers.size === 0 && this.inFlight.get(client.id) === controllers) this.inFlight.delete(client.id);
      });
  }

  broadcast(event: string, data: unknown) {
    this.server.emit(event, data);
  }

  get activeQueries(): number {
    let count = 0;
    for (const controllers of this.inFlight.values()) count += controllers.size;
    return count;
  }

  private toRequest(client: Socket, payload: unknown): ChatRequest | undefined {
    const parsed = askSchema.safeParse(this.parsePayload(payload));
    if (!parsed.success) return undefined;

    const question = parsed.data.question ?? parsed.data.message;
    if (question === undefined) return undefined;
    const sessionId = parsed.data.sessionId ?? this.parseString(client.data.sessionId) ?? client.id;
    return { question, sessionId };
  }

  private parsePayload(payload: unknown): unknown {
    if (typeof payload !== 'string') return payload;
    try {
      return JSON.parse(payload);
    } catch {
      return { question: payload };
    }
  }

  private parseString(value: unknown): string | undefined {
    if (typeof value === 'string' && value.trim().length > 0) {
      return value.trim();
    }
    return undefined;
  }
}
