import type { CommandConfig, ProcessInput, ProcessedResource, ResourceProcessor } from '@tessera/shared';
import { estimateUnits } from '../sessions/budget.monitor.js';
import { runCommand, truncateOutput } from './command.runner.js';

/**
 * Pipes each resource through a shell command: the content goes to stdin and
 * stdout becomes the new content. The command sees the resource id in
 * TESSERA_RESOURCE_ID and the session's working context, as JSON, in
 * TESSERA_CONTEXT. Units are estimated from input, output and context.
 *
 * The command is killed only when `input.signal` aborts, which happens on
 * shutdown or at the session deadline. Cancelling the task lets it finish.
 */
export class CommandResourceProcessor implements ResourceProcessor {
  constructor(
    private readonly config: CommandConfig,
    private readonly projectRoot: string,
  ) {}

  async process(input: ProcessInput): Promise<ProcessedResource> {
    const context = JSON.stringify(input.context);
    const result = await runCommand({
      command: this.config.command,
      cwd: this.projectRoot,
      timeoutMs: this.config.timeout_ms,
      input: input.content,
      env: { TESSERA_RESOURCE_ID: input.resourceId, TESSERA_CONTEXT: context },
      signal: input.signal,
    });

    if (result.aborted) {
      throw new Error(`Worker command stopped while processing ${input.resourceId}`);
    }
    if (result.timedOut) {
      throw new Error(
        `Worker command timed out after ${this.config.timeout_ms}ms on ${input.resourceId}`,
      );
    }
    if (result.code !== 0) {
      const stderr = result.stderr.trim();
      throw new Error(
        `Worker command exited with code ${result.code} on ${input.resourceId}` +
          (stderr ? `: ${truncateOutput(stderr)}` : ''),
      );
    }

    const note = result.stderr.trim();
    return {
      output: result.stdout,
      units: estimateUnits(input.content) + estimateUnits(result.stdout) + estimateUnits(context),
      ...(note ? { note: truncateOutput(note) } : {}),
    };
  }
}
