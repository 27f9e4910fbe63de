import type { ExecutionResult } from './client.js';

// ── Stream seam ──────────────────────────────────────────────

/** The readable half of an interactive shell: stdout, or its stderr. */
export interface OutputSource {
  on(event: 'data', listener: (chunk: string) => void): unknown;
  setEncoding(encoding: BufferEncoding): unknown;
}

/** What a `ShellSession` needs from an ssh2 `ClientChannel`. */
export interface ShellStream extends OutputSource {
  readonly stderr: OutputSource;
  write(data: string): unknown;
  end(): unknown;
}

// ── Prompt heuristic ─────────────────────────────────────────

const PROMPT_CHARS = ['$', '#', '>'];

export function looksLikePrompt(chunk: string): boolean {
  return PROMPT_CHARS.some((c) => chunk.includes(c));
}

// ── ShellSession ─────────────────────────────────────────────

/**
 * Reads a command's output off an interactive shell. Output is collected
 * until a prompt-like chunk arrives with nothing further buffered one poll
 * later, or until the timeout; on timeout the partial output is returned
 * without an error.
 */
export class ShellSession {
  private buffered = '';
  private fault: string | undefined;

  constructor(
    private readonly stream: ShellStream,
    private readonly pollIntervalMs: number,
  ) {
    // Decode through the stream so a character split across packets survives.
    const collect = (chunk: string): void => {
      this.buffered += chunk;
    };
    stream.setEncoding('utf8');
    stream.stderr.setEncoding('utf8');
    stream.on('data', collect);
    stream.stderr.on('data', collect);
  }

  /** Record a transport fault; the running command reports it on its next poll. */
  fail(message: string): void {
    this.fault = message;
  }

  discard(): void {
    this.buffered = '';
  }

  async run(command: string, timeoutSeconds: number): Promise<ExecutionResult> {
    this.buffered = '';
    const deadline = Date.now() + timeoutSeconds * 1000;
    let output = '';

    this.stream.write(`${command}\n`);

    while (Date.now() < deadline) {
      await delay(this.pollIntervalMs);

      const chunk = this.buffered;
      this.buffered = '';
      output += chunk;

      if (this.fault !== undefined) {
        return { output, error: `Command execution error: ${this.fault}` };
      }
      if (chunk.length === 0 || !looksLikePrompt(chunk)) continue;

      await delay(this.pollIntervalMs);
      if (this.buffered.length === 0) break;
    }

    return { output };
  }

  end(): void {
    this.stream.end();
  }
}

export function delay(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
