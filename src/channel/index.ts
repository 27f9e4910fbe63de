/**
 * Remote channel module.
 * The only place that touches the target system.
 */

import type { Target } from '../schema/index.js';
import type { ChannelFactory } from './client.js';
import { createMockChannel } from './mock.js';
import { SshChannel } from './ssh.js';
import type { SshChannelOptions } from './ssh.js';

export * from './client.js';
export { SshChannel } from './ssh.js';
export { ShellSession, looksLikePrompt } from './shell.js';
export type { OutputSource, ShellStream } from './shell.js';
export type { SshChannelOptions } from './ssh.js';
export { createMockChannel } from './mock.js';
export type { MockChannelScript, MockChannelHandle } from './mock.js';

export type ChannelKind = 'ssh' | 'mock';

export function createChannelFactory(
  kind: ChannelKind,
  target: Target,
  options: SshChannelOptions = {},
): ChannelFactory {
  switch (kind) {
    case 'ssh':
      return () => new SshChannel(target, options);
    case 'mock':
      return createMockChannel().factory;
  }
}
