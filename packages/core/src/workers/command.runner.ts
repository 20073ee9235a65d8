import { spawn } from 'node:child_process';

const MAX_OUTPUT_CHARS = 8_000;

export interface CommandRequest {
  command: string;
  cwd: string;
  timeoutMs: number;
  /** Written to stdin, which is then closed. */
  input?: string;
  env?: Record<string, string>;
  signal?: AbortSignal;
}

export interface CommandResult {
  code: number | null;
  stdout: string;
  stderr: string;
  timedOut: boolean;
  aborted: boolean;
}

/**
 * Run a shell command to completion. Never rejects for a failing command:
 * exit status, timeout and abort are reported in the result. Rejects only when
 * the process cannot be spawned.
 */
export function runCommand(request: CommandRequest): Promise<CommandResult> {
  const { command, cwd, timeoutMs, input, env, signal } = request;

  return new Promise<CommandResult>((resolve, reject) => {
    if (signal?.aborted) {
      resolve({ code: null, stdout: '', stderr: '', timedOut: false, aborted: true });
      return;
    }

    const proc = spawn(command, { shell: true, cwd, env: { ...process.env, ...env } });
    let stdout = '';
    let stderr = '';
    let timedOut = false;
    let aborted = false;

    const killProc = () => {
      if (proc.exitCode === null) proc.kill('SIGKILL');
    };

    const timer = setTimeout(() => {
      timedOut = true;
      killProc();
    }, timeoutMs);

    const onAbort = () => {
      aborted = true;
      killProc();
    };
    signal?.addEventListener('abort', onAbort);

    proc.stdout.on('data', (chunk: Buffer) => {
      stdout += chunk.toString();
    });
    proc.stderr.on('data', (chunk: Buffer) => {
      stderr += chunk.toString();
    });
    // The command may exit without reading its input
    proc.stdin.on('error', () => undefined);
    proc.stdin.end(input ?? '');

    let finished = false;
    const finish = (code: number | null) => {
      if (finished) return;
      finished = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      resolve({ code, stdout, stderr, timedOut, aborted });
    };

    // A killed shell can leave grandchildren holding stdout open; don't wait for them
    proc.on('exit', (code) => {
      if (timedOut || aborted) finish(code);
    });
    // Otherwise 'close' waits for stdout to drain, so the full output is captured
    proc.on('close', (code) => finish(code));

    proc.on('error', (err) => {
      if (finished) return;
      finished = true;
      clearTimeout(timer);
      signal?.removeEventListener('abort', onAbort);
      reject(err);
    });
  });
}

/** Keep the head and tail of long command output. */
export function truncateOutput(output: string): string {
  if (output.length <= MAX_OUTPUT_CHARS) return output;
  const HEAD = 2_000;
  const TAIL = MAX_OUTPUT_CHARS - HEAD;
  const omitted = output.length - HEAD - TAIL;
  return `${output.slice(0, HEAD)}\n[... ${omitted} bytes omitted ...]\n${output.slice(-TAIL)}`;
}
