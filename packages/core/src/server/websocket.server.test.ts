import { describe, it, expect } from 'vitest';
import { WebSocket } from 'ws';
import type { Budget, ResourceProcessor, ServerMessage } from '@tessera/shared';
import { TaskOrchestrator } from '../orchestrator/task.orchestrator.js';
import { MemoryLedgerBackend } from '../ledger/memory.ledger.backend.js';
import { LedgerUnavailableError } from '../errors.js';
import { TesseraServer, parseClientMessage } from './websocket.server.js';
import { WsBroadcaster, type MessageRecipient } from './ws.broadcaster.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const BUDGET: Budget = {
  maxResourcesPerSubtask: 8,
  softThreshold: 100,
  hardThreshold: 150,
  postCompactionBaseline: 10,
  concurrencyLimit: 2,
  sessionTimeoutMs: 60_000,
  maxRetries: 2,
};

function makeOrchestrator(processor?: ResourceProcessor): TaskOrchestrator {
  return new TaskOrchestrator({
    budget: BUDGET,
    provider: { read: async (id) => `// ${id}`, write: async () => undefined },
    processor: processor ?? { process: async (input) => ({ output: input.content.toUpperCase(), units: 1 }) },
    ledger: new MemoryLedgerBackend(),
  });
}

function makeClient(readyState: number = WebSocket.OPEN): MessageRecipient & { sent: ServerMessage[] } {
  const sent: ServerMessage[] = [];
  return {
    readyState,
    sent,
    send: (data: string) => {
      const parsed: ServerMessage = JSON.parse(data);
      sent.push(parsed);
    },
  };
}

function collect(): { reply: (msg: ServerMessage) => void; replies: ServerMessage[] } {
  const replies: ServerMessage[] = [];
  return { reply: (msg) => replies.push(msg), replies };
}

// ---------------------------------------------------------------------------
// parseClientMessage
// ---------------------------------------------------------------------------

describe('parseClientMessage', () => {
  it('accepts a submission and defaults missing edges', () => {
    expect(
      parseClientMessage(JSON.stringify({ type: 'SUBMIT_TASK', payload: { description: 'd', resources: ['a'] } })),
    ).toEqual({ type: 'SUBMIT_TASK', payload: { description: 'd', resources: ['a'], edges: [] } });
  });

  it('keeps dependency edges', () => {
    const msg = { type: 'SUBMIT_TASK', payload: { description: 'd', resources: ['a', 'b'], edges: [['a', 'b']] } };
    expect(parseClientMessage(JSON.stringify(msg))).toEqual(msg);
  });

  it('rejects malformed frames', () => {
    expect(parseClientMessage('not json')).toBeNull();
    expect(parseClientMessage(JSON.stringify({ type: 'GET_TASK', payload: {} }))).toBeNull();
    expect(parseClientMessage(JSON.stringify({ type: 'SUBMIT_TASK', payload: { description: 'd', resources: 'a' } }))).toBeNull();
    expect(
      parseClientMessage(JSON.stringify({ type: 'SUBMIT_TASK', payload: { description: 'd', resources: [], edges: [['a']] } })),
    ).toBeNull();
    expect(parseClientMessage(JSON.stringify({ type: 'APPROVE', payload: {} }))).toBeNull();
  });

  it('accepts cancel and query messages', () => {
    expect(parseClientMessage(JSON.stringify({ type: 'CANCEL_TASK', payload: { taskId: 't' } }))).toEqual({
      type: 'CANCEL_TASK',
      payload: { taskId: 't' },
    });
    expect(parseClientMessage(JSON.stringify({ type: 'GET_TASK', payload: { taskId: 't' } }))).toEqual({
      type: 'GET_TASK',
      payload: { taskId: 't' },
    });
  });
});

// ---------------------------------------------------------------------------
// WsBroadcaster
// ---------------------------------------------------------------------------

describe('WsBroadcaster', () => {
  it('sends only to open clients', () => {
    const open = makeClient();
    const closed = makeClient(WebSocket.CLOSED);
    const broadcaster = new WsBroadcaster({ clients: [open, closed] });

    broadcaster.broadcast({ type: 'ERROR', payload: { message: 'x' } });
    broadcaster.send(closed, { type: 'ERROR', payload: { message: 'y' } });

    expect(open.sent).toEqual([{ type: 'ERROR', payload: { message: 'x' } }]);
    expect(closed.sent).toEqual([]);
  });

  it('forwards orchestrator events as protocol messages', async () => {
    const orchestrator = makeOrchestrator();
    const client = makeClient();
    new WsBroadcaster({ clients: [client] }).wireOrchestrator(orchestrator);

    const { taskId } = await orchestrator.submit('shout', ['a.ts']);
    await orchestrator.idle();

    const types = new Set(client.sent.map((m) => m.type));
    expect([...types].sort()).toEqual(['LOCK_UPDATE', 'PROGRESS', 'SESSION_UPDATE', 'TASK_COMPLETE', 'TASK_STATE']);

    const complete = client.sent.find((m) => m.type === 'TASK_COMPLETE');
    expect(complete?.payload).toMatchObject({ taskId, status: 'completed' });
  });

  it('reports a halted orchestrator as an error', () => {
    const orchestrator = makeOrchestrator();
    const client = makeClient();
    new WsBroadcaster({ clients: [client] }).wireOrchestrator(orchestrator);

    orchestrator.emit('halted', new LedgerUnavailableError(new Error('disk full')));

    expect(client.sent).toEqual([
      { type: 'ERROR', payload: { message: 'Plan ledger unavailable: disk full; dispatch halted' } },
    ]);
  });
});

// ---------------------------------------------------------------------------
// TesseraServer
// ---------------------------------------------------------------------------

describe('TesseraServer', () => {
  it('defaults the port and has no clients before start()', () => {
    const server = new TesseraServer({ orchestrator: makeOrchestrator() });
    expect(server.port).toBe(7433);
    expect([...server.clients]).toEqual([]);
  });

  it('answers SUBMIT_TASK with a plan receipt', async () => {
    const orchestrator = makeOrchestrator();
    const server = new TesseraServer({ orchestrator });
    const { reply, replies } = collect();

    await server.handleClientMessage(
      { type: 'SUBMIT_TASK', payload: { description: 'shout', resources: ['a.ts', 'b.ts'], edges: [] } },
      reply,
    );
    await orchestrator.idle();

    expect(replies).toHaveLength(1);
    const receipt = replies[0];
    expect(receipt?.type).toBe('PLAN_RECEIPT');
    if (receipt?.type === 'PLAN_RECEIPT') {
      expect(receipt.payload.subtaskIds).toEqual([`${receipt.payload.taskId}/st-001`]);
      expect(orchestrator.getTask(receipt.payload.taskId)?.status).toBe('completed');
    }
  });

  it('answers an invalid submission with ERROR', async () => {
    const server = new TesseraServer({ orchestrator: makeOrchestrator() });
    const { reply, replies } = collect();

    await server.handleClientMessage({ type: 'SUBMIT_TASK', payload: { description: 'x', resources: [], edges: [] } }, reply);

    expect(replies).toEqual([{ type: 'ERROR', payload: { message: 'Task must name at least one resource' } }]);
  });

  it('cancels a running task and returns its state', async () => {
    let release: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      release = resolve;
    });
    const orchestrator = makeOrchestrator({
      process: async (input) => {
        await gate;
        return { output: input.content, units: 1 };
      },
    });
    const server = new TesseraServer({ orchestrator });
    const { taskId } = await orchestrator.submit('slow', ['a.ts']);
    const { reply, replies } = collect();

    await server.handleClientMessage({ type: 'CANCEL_TASK', payload: { taskId } }, reply);
    release();
    await orchestrator.idle();

    expect(replies).toHaveLength(1);
    expect(replies[0]?.type).toBe('TASK_STATE');
    expect(replies[0]?.payload).toMatchObject({ id: taskId, status: 'cancelled' });
  });

  it('reports unknown tasks', async () => {
    const server = new TesseraServer({ orchestrator: makeOrchestrator() });
    const { reply, replies } = collect();

    await server.handleClientMessage({ type: 'GET_TASK', payload: { taskId: 'nope' } }, reply);
    await server.handleClientMessage({ type: 'CANCEL_TASK', payload: { taskId: 'nope' } }, reply);

    expect(replies).toEqual([
      { type: 'ERROR', payload: { message: 'Unknown task: nope' } },
      { type: 'ERROR', payload: { message: 'Unknown task: nope' } },
    ]);
  });

  it('close() before start() resolves', async () => {
    const server = new TesseraServer({ orchestrator: makeOrchestrator() });
    await expect(server.close()).resolves.toBeUndefined();
  });
});
