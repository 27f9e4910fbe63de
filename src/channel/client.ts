// ── RemoteChannel interface ──────────────────────────────────

export interface ExecutionResult {
  output: string;
  /** Set when the channel itself faulted; partial output is still kept. */
  error?: string | undefined;
}

export interface RemoteChannel {
  /** Rejects with ChannelError when the target is unreachable. */
  connect(): Promise<void>;
  execute(command: string, timeoutSeconds: number): Promise<ExecutionResult>;
  /** Never rejects. */
  close(): Promise<void>;
}

export type ChannelFactory = () => RemoteChannel;

// ── Error ────────────────────────────────────────────────────

export class ChannelError extends Error {
  readonly exitCode = 1;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ChannelError';
  }
}

// ── Scoped acquisition ───────────────────────────────────────

/**
 * Open a fresh channel, hand it to `use`, and close it afterwards whether
 * `use` resolved or threw. Channels are never pooled across steps.
 */
export async function withChannel<T>(
  factory: ChannelFactory,
  use: (channel: RemoteChannel) => Promise<T>,
): Promise<T> {
  const channel = factory();
  try {
    await channel.connect();
    return await use(channel);
  } finally {
    await channel.close();
  }
}
