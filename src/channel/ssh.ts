import { readFile } from 'node:fs/promises';

import { Client } from 'ssh2';
import type { ClientChannel, ConnectConfig } from 'ssh2';

import type { Target } from '../schema/index.js';
import { TIMEOUTS } from '../config/defaults.js';
import type { ExecutionResult, RemoteChannel } from './client.js';
import { ChannelError } from './client.js';
import { ShellSession, delay } from './shell.js';

// ── Options ──────────────────────────────────────────────────

export interface SshChannelOptions {
  connectTimeoutMs?: number | undefined;
  /** Wait after opening the shell before discarding the login banner. */
  settleMs?: number | undefined;
  pollIntervalMs?: number | undefined;
}

// ── SshChannel ───────────────────────────────────────────────

/** Interactive-shell SSH channel; reading is left to a `ShellSession`. */
export class SshChannel implements RemoteChannel {
  private client: Client | undefined;
  private session: ShellSession | undefined;

  private readonly connectTimeoutMs: number;
  private readonly settleMs: number;
  private readonly pollIntervalMs: number;

  constructor(
    private readonly target: Target,
    options: SshChannelOptions = {},
  ) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? TIMEOUTS.CONNECT_TIMEOUT;
    this.settleMs = options.settleMs ?? TIMEOUTS.SHELL_SETTLE;
    this.pollIntervalMs = options.pollIntervalMs ?? TIMEOUTS.OUTPUT_POLL_INTERVAL;
  }

  async connect(): Promise<void> {
    const client = new Client();
    const session = new ShellSession(await this.openShell(client), this.pollIntervalMs);
    this.client = client;
    this.session = session;

    client.on('error', (err: Error) => session.fail(err.message));

    // Drop the login banner and first prompt.
    await delay(this.settleMs);
    session.discard();
  }

  async execute(command: string, timeoutSeconds: number): Promise<ExecutionResult> {
    if (!this.session) return { output: '', error: 'No active shell connection' };
    return this.session.run(command, timeoutSeconds);
  }

  async close(): Promise<void> {
    this.session?.end();
    this.client?.end();
    this.session = undefined;
    this.client = undefined;
  }

  // ── Internals ──────────────────────────────────────────────

  private async openShell(client: Client): Promise<ClientChannel> {
    try {
      const config = await this.buildConfig();
      await new Promise<void>((resolve, reject) => {
        client.once('ready', () => resolve());
        client.once('error', reject);
        client.connect(config);
      });
      return await new Promise<ClientChannel>((resolve, reject) => {
        client.shell((err, stream) => (err ? reject(err) : resolve(stream)));
      });
    } catch (err) {
      client.end();
      const message = err instanceof Error ? err.message : String(err);
      throw new ChannelError(
        `Failed to establish SSH connection to ${this.describeTarget()}: ${message}`,
        { cause: err },
      );
    }
  }

  private async buildConfig(): Promise<ConnectConfig> {
    const config: ConnectConfig = {
      host: this.target.host,
      port: this.target.port ?? 22,
      username: this.target.username ?? 'root',
      readyTimeout: this.connectTimeoutMs,
    };

    if (this.target.keyPath) {
      config.privateKey = await readFile(this.target.keyPath);
    } else {
      config.password = this.target.password ?? '';
    }

    return config;
  }

  private describeTarget(): string {
    return `${this.target.host}:${String(this.target.port ?? 22)}`;
  }
}
