import type { ChannelFactory, ExecutionResult, RemoteChannel } from './client.js';
import { ChannelError } from './client.js';

export interface MockChannelScript {
  /** Outputs handed out in order, one per execute; then a default echo. */
  outputs?: readonly (string | ExecutionResult)[] | undefined;
  /** 1-based connect attempts that fail, or 'always'. */
  failConnects?: 'always' | readonly number[] | undefined;
}

export interface MockChannelHandle {
  factory: ChannelFactory;
  readonly commands: readonly string[];
  readonly stats: { connects: number; closes: number };
}

/**
 * In-process stand-in for the remote channel. Every channel the factory
 * creates shares one script, so a run that reconnects per step walks
 * through the outputs in order.
 */
export function createMockChannel(script: MockChannelScript = {}): MockChannelHandle {
  const commands: string[] = [];
  const stats = { connects: 0, closes: 0 };

  const factory: ChannelFactory = (): RemoteChannel => ({
    async connect(): Promise<void> {
      stats.connects++;
      const fails =
        script.failConnects === 'always' ||
        (script.failConnects?.includes(stats.connects) ?? false);
      if (fails) {
        throw new ChannelError('Failed to establish SSH connection to mock target');
      }
    },

    async execute(command: string): Promise<ExecutionResult> {
      const next = script.outputs?.[commands.length];
      commands.push(command);
      if (next === undefined) return { output: `${command}\n$ ` };
      return typeof next === 'string' ? { output: next } : next;
    },

    async close(): Promise<void> {
      stats.closes++;
    },
  });

  return { factory, commands, stats };
}
