import { WebSocketServer, type WebSocket } from 'ws';
import type { ClientMessage, DependencyEdge, ServerMessage } from '@tessera/shared';
import type { TaskOrchestrator } from '../orchestrator/task.orchestrator.js';
import { errorMessage } from '../errors.js';
import { WsBroadcaster, type MessageRecipient, type RecipientPool } from './ws.broadcaster.js';

export interface TesseraServerOptions {
  orchestrator: TaskOrchestrator;
  /** WebSocket port. Defaults to 7433. */
  port?: number;
}

type Reply = (msg: ServerMessage) => void;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === 'string');
}

function isEdgeList(value: unknown): value is DependencyEdge[] {
  return Array.isArray(value) && value.every((e) => isStringArray(e) && e.length === 2);
}

/** Validate an incoming frame; returns null for anything that is not a ClientMessage. */
export function parseClientMessage(raw: string): ClientMessage | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return null;
  }
  if (!isRecord(parsed) || !isRecord(parsed['payload'])) return null;
  const payload = parsed['payload'];

  switch (parsed['type']) {
    case 'SUBMIT_TASK': {
      const { description, resources } = payload;
      const edges = payload['edges'] ?? [];
      if (typeof description !== 'string' || !isStringArray(resources) || !isEdgeList(edges)) return null;
      return { type: 'SUBMIT_TASK', payload: { description, resources, edges } };
    }
    case 'CANCEL_TASK': {
      const { taskId } = payload;
      return typeof taskId === 'string' ? { type: 'CANCEL_TASK', payload: { taskId } } : null;
    }
    case 'GET_TASK': {
      const { taskId } = payload;
      return typeof taskId === 'string' ? { type: 'GET_TASK', payload: { taskId } } : null;
    }
    default:
      return null;
  }
}

/**
 * Local WebSocket front end for a TaskOrchestrator. Clients submit, cancel
 * and query tasks; every orchestrator event is broadcast to all of them.
 *
 * Lifecycle: new TesseraServer(options) → start() → close()
 */
export class TesseraServer implements RecipientPool {
  private readonly orchestrator: TaskOrchestrator;
  private wss: WebSocketServer | null = null;
  private readonly broadcaster: WsBroadcaster;

  readonly port: number;

  constructor(options: TesseraServerOptions) {
    this.orchestrator = options.orchestrator;
    this.port = options.port ?? 7433;
    this.broadcaster = new WsBroadcaster(this);
    this.broadcaster.wireOrchestrator(this.orchestrator);
  }

  start(): void {
    if (this.wss) return;
    const wss = new WebSocketServer({ port: this.port });
    wss.on('connection', (ws) => this.handleConnection(ws));
    this.wss = wss;
  }

  close(): Promise<void> {
    const wss = this.wss;
    this.wss = null;
    if (!wss) return Promise.resolve();
    for (const client of wss.clients) client.terminate();
    return new Promise((resolve, reject) => {
      wss.close((err) => (err ? reject(err) : resolve()));
    });
  }

  /**
   * Route one client message. Replies go to the sender only; state changes
   * reach every client through the orchestrator broadcasts.
   */
  async handleClientMessage(msg: ClientMessage, reply: Reply): Promise<void> {
    switch (msg.type) {
      case 'SUBMIT_TASK': {
        try {
          const { description, resources, edges } = msg.payload;
          const receipt = await this.orchestrator.submit(description, resources, edges);
          reply({ type: 'PLAN_RECEIPT', payload: receipt });
        } catch (err) {
          reply({ type: 'ERROR', payload: { message: errorMessage(err) } });
        }
        return;
      }

      case 'CANCEL_TASK': {
        const { taskId } = msg.payload;
        const task = this.orchestrator.getTask(taskId);
        if (!task) {
          reply({ type: 'ERROR', payload: { message: `Unknown task: ${taskId}` } });
          return;
        }
        this.orchestrator.cancel(taskId);
        reply({ type: 'TASK_STATE', payload: this.orchestrator.getTask(taskId) ?? task });
        return;
      }

      case 'GET_TASK': {
        const { taskId } = msg.payload;
        const task = this.orchestrator.getTask(taskId);
        reply(
          task
            ? { type: 'TASK_STATE', payload: task }
            : { type: 'ERROR', payload: { message: `Unknown task: ${taskId}` } },
        );
        return;
      }
    }
  }

  private handleConnection(ws: WebSocket): void {
    const reply: Reply = (msg) => this.broadcaster.send(ws, msg);

    ws.on('message', (raw) => {
      const msg = parseClientMessage(raw.toString());
      if (!msg) {
        reply({ type: 'ERROR', payload: { message: 'Invalid client message' } });
        return;
      }
      this.handleClientMessage(msg, reply).catch((err: unknown) => {
        reply({ type: 'ERROR', payload: { message: errorMessage(err) } });
      });
    });
  }

  /** Connected sockets; empty until start(). */
  get clients(): Iterable<MessageRecipient> {
    return this.wss?.clients ?? [];
  }
}
