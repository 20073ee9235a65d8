import { WebSocket } from 'ws';
import type { ServerMessage } from '@tessera/shared';
import type { TaskOrchestrator } from '../orchestrator/task.orchestrator.js';

/** The part of a WebSocket a broadcast needs. */
export interface MessageRecipient {
  readonly readyState: number;
  send(data: string): void;
}

/** Anything holding a live set of clients, e.g. a ws WebSocketServer. */
export interface RecipientPool {
  readonly clients: Iterable<MessageRecipient>;
}

/**
 * Outgoing side of the progress protocol: fans ServerMessages out to every
 * open client and maps orchestrator events onto them.
 */
export class WsBroadcaster {
  constructor(private readonly pool: RecipientPool) {}

  /** Send a message to all open clients. */
  broadcast(msg: ServerMessage): void {
    const json = JSON.stringify(msg);
    for (const client of this.pool.clients) {
      if (client.readyState === WebSocket.OPEN) {
        client.send(json);
      }
    }
  }

  /** Send a message to a single client. */
  send(client: MessageRecipient, msg: ServerMessage): void {
    if (client.readyState === WebSocket.OPEN) {
      client.send(JSON.stringify(msg));
    }
  }

  wireOrchestrator(orchestrator: TaskOrchestrator): void {
    orchestrator.on('progress', (event) => {
      this.broadcast({ type: 'PROGRESS', payload: event });
    });

    orchestrator.on('task:status', (task) => {
      this.broadcast({ type: 'TASK_STATE', payload: task });
    });

    orchestrator.on('task:outcome', (outcome) => {
      this.broadcast({ type: 'TASK_COMPLETE', payload: outcome });
    });

    orchestrator.on('session:state', (state) => {
      this.broadcast({ type: 'SESSION_UPDATE', payload: state });
    });

    orchestrator.on('lock:update', (leases) => {
      this.broadcast({ type: 'LOCK_UPDATE', payload: leases });
    });

    orchestrator.on('halted', (error) => {
      this.broadcast({ type: 'ERROR', payload: { message: `${error.message}; dispatch halted` } });
    });
  }
}
