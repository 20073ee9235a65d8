#!/usr/bin/env node
/**
 * tessera-core: standalone orchestrator process.
 *
 * Loads ~/.tessera/config.yaml, resumes unfinished tasks from the ledger and
 * serves the progress protocol over WebSocket.
 *
 * Usage:
 *   tessera-core [--port <number>] [--project-root <path>]
 */
import * as path from 'node:path';
import { loadConfig } from '../config/config.loader.js';
import { createOrchestrator } from '../orchestrator/orchestrator.factory.js';
import { errorMessage } from '../errors.js';
import { TesseraServer } from './websocket.server.js';

interface CliArgs {
  port: number | null;
  projectRoot: string;
}

function parseArgs(argv: string[]): CliArgs {
  const args = argv.slice(2);
  let port: number | null = null;
  let projectRoot = process.cwd();

  for (let i = 0; i < args.length; i++) {
    const value = args[i + 1];
    if (args[i] === '--port' && value) {
      const parsed = parseInt(value, 10);
      if (!Number.isInteger(parsed) || parsed <= 0) throw new Error(`Invalid --port: ${value}`);
      port = parsed;
      i++;
    } else if (args[i] === '--project-root' && value) {
      projectRoot = path.resolve(value);
      i++;
    }
  }

  return { port, projectRoot };
}

async function main(): Promise<void> {
  const args = parseArgs(process.argv);
  const config = await loadConfig();
  const port = args.port ?? config.server.port;

  const orchestrator = createOrchestrator(config, args.projectRoot);
  const server = new TesseraServer({ orchestrator, port });
  server.start();
  await orchestrator.recover();

  process.stdout.write(JSON.stringify({ type: 'ready', port }) + '\n');

  const shutdown = () => {
    Promise.all([orchestrator.close(), server.close()]).then(
      () => process.exit(0),
      (err: unknown) => {
        process.stderr.write(`[tessera] Shutdown failed: ${errorMessage(err)}\n`);
        process.exit(1);
      },
    );
  };

  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch((err: unknown) => {
  process.stderr.write(`[tessera] ${errorMessage(err)}\n`);
  process.exit(1);
});
