import type { ResourceId, VerificationHook, VerificationHookConfig, VerificationResult } from '@tessera/shared';
import { runCommand, truncateOutput } from '../workers/command.runner.js';

/**
 * Verification step backed by a shell command (a build, a linter, a test
 * suite). Passes on exit code 0. The written resource ids are passed
 * newline-separated in TESSERA_RESOURCES.
 */
export class CommandVerificationHook implements VerificationHook {
  readonly name: string;

  constructor(
    private readonly config: VerificationHookConfig,
    private readonly projectRoot: string,
  ) {
    this.name = config.name;
  }

  async run(resources: ResourceId[]): Promise<VerificationResult> {
    const result = await runCommand({
      command: this.config.command,
      cwd: this.projectRoot,
      timeoutMs: this.config.timeout_ms,
      env: { TESSERA_RESOURCES: resources.join('\n') },
    });

    const combined = result.stdout + (result.stderr ? `\nSTDERR:\n${result.stderr}` : '');
    if (result.timedOut) {
      return { pass: false, diagnostics: `Timed out after ${this.config.timeout_ms}ms\n${truncateOutput(combined)}` };
    }
    if (result.code !== 0) {
      return { pass: false, diagnostics: `Exit code ${result.code}\n${truncateOutput(combined)}` };
    }
    return { pass: true, diagnostics: truncateOutput(combined) };
  }
}
